/**
 * Unused Secret Filter
 */

import type { Secret } from '../types/secrets';
import { findExclusion, type ExclusionPolicy } from './exclusion-policy';

export interface ExcludedSecret {
  readonly secret: Secret;
  readonly rule: string;
}

export interface SecretPartition {
  /** Sorted ascending by name */
  readonly unused: readonly Secret[];
  readonly used: readonly Secret[];
  readonly excluded: readonly ExcludedSecret[];
}

const byName = (a: Secret, b: Secret): number => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

export function partitionSecrets(
  secrets: Iterable<Secret>,
  reachable: ReadonlySet<string>,
  policy: ExclusionPolicy,
): SecretPartition {
  const unused: Secret[] = [];
  const used: Secret[] = [];
  const excluded: ExcludedSecret[] = [];

  for (const secret of secrets) {
    const rule = findExclusion(policy, secret);
    if (rule) {
      excluded.push({ secret, rule: rule.name });
    } else if (reachable.has(secret.name)) {
      used.push(secret);
    } else {
      unused.push(secret);
    }
  }

  return {
    unused: unused.sort(byName),
    used: used.sort(byName),
    excluded: excluded.sort((a, b) => byName(a.secret, b.secret)),
  };
}

export function filterUnusedSecrets(
  secrets: Iterable<Secret>,
  reachable: ReadonlySet<string>,
  policy: ExclusionPolicy,
): readonly Secret[] {
  return partitionSecrets(secrets, reachable, policy).unused;
}
