/**
 * Secret and ServiceAccount Types
 *
 * Read-only views of the cluster objects the audit inspects. Only the
 * attributes the reachability computation and exclusion policy need are kept.
 */

/**
 * Well-known secret types
 */
export const SecretTypes = {
  OPAQUE: 'Opaque',
  SERVICE_ACCOUNT_TOKEN: 'kubernetes.io/service-account-token',
  DOCKERCFG: 'kubernetes.io/dockercfg',
  DOCKER_CONFIG_JSON: 'kubernetes.io/dockerconfigjson',
  BASIC_AUTH: 'kubernetes.io/basic-auth',
  SSH_AUTH: 'kubernetes.io/ssh-auth',
  TLS: 'kubernetes.io/tls',
  BOOTSTRAP_TOKEN: 'bootstrap.kubernetes.io/token',
  HELM_RELEASE: 'helm.sh/release.v1',
} as const;

/**
 * Annotation the token controller writes on legacy service-account token secrets
 */
export const SERVICE_ACCOUNT_NAME_ANNOTATION = 'kubernetes.io/service-account.name';

export interface OwnerReference {
  readonly kind: string;
  readonly name: string;
  readonly uid?: string;
  readonly controller?: boolean;
}

export interface Secret {
  readonly namespace: string;
  readonly name: string;
  /** Any string; unknown types are carried through untouched */
  readonly type: string;
  readonly labels: Readonly<Record<string, string>>;
  readonly annotations: Readonly<Record<string, string>>;
  readonly ownerReferences: readonly OwnerReference[];
}

export interface ServiceAccount {
  readonly namespace: string;
  readonly name: string;
  /** Names from the legacy `secrets` list */
  readonly secrets: readonly string[];
  readonly imagePullSecrets: readonly string[];
}
