/**
 * Service-account lookup
 *
 * Token secrets are found two ways: the service account's own `secrets`
 * list, and token secrets annotated with the service account's name. Pull
 * secrets come from the account's `imagePullSecrets`, which admission copies
 * into every pod that runs as it.
 */

import {
  SERVICE_ACCOUNT_NAME_ANNOTATION,
  SecretTypes,
  type Secret,
  type ServiceAccount,
} from '../types/secrets';

/** Account a pod runs as when its spec names none */
export const DEFAULT_SERVICE_ACCOUNT = 'default';

export interface ServiceAccountLookup {
  /** Token secret names, or undefined when none are known */
  tokensFor(serviceAccountName: string): readonly string[] | undefined;
  imagePullSecretsFor(serviceAccountName: string): readonly string[];
}

const sorted = (names: Set<string> | undefined): string[] => [...(names ?? [])].sort();

export function buildServiceAccountIndex(
  serviceAccounts: readonly ServiceAccount[],
  secrets: readonly Secret[],
): ServiceAccountLookup {
  const tokens = new Map<string, Set<string>>();
  const pullSecrets = new Map<string, Set<string>>();

  const add = (index: Map<string, Set<string>>, serviceAccount: string, secretName: string): void => {
    const names = index.get(serviceAccount) ?? new Set<string>();
    names.add(secretName);
    index.set(serviceAccount, names);
  };

  for (const account of serviceAccounts) {
    account.secrets.forEach((name) => add(tokens, account.name, name));
    account.imagePullSecrets.forEach((name) => add(pullSecrets, account.name, name));
  }

  for (const secret of secrets) {
    if (secret.type !== SecretTypes.SERVICE_ACCOUNT_TOKEN) continue;
    const owner = secret.annotations[SERVICE_ACCOUNT_NAME_ANNOTATION];
    if (owner) {
      add(tokens, owner, secret.name);
    }
  }

  return {
    tokensFor(serviceAccountName: string): readonly string[] | undefined {
      const names = tokens.get(serviceAccountName);
      return names && names.size > 0 ? sorted(names) : undefined;
    },
    imagePullSecretsFor(serviceAccountName: string): readonly string[] {
      return sorted(pullSecrets.get(serviceAccountName));
    },
  };
}
