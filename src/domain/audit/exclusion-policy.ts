/**
 * Exclusion Policy
 *
 * Ordered rules identifying system-managed secrets. The first matching rule
 * excludes a secret before reachability is considered.
 */

import { SERVICE_ACCOUNT_NAME_ANNOTATION, SecretTypes, type Secret } from '../types/secrets';

export interface ExclusionRule {
  readonly name: string;
  matches(secret: Secret): boolean;
}

export type ExclusionPolicy = readonly ExclusionRule[];

export const DEFAULT_SYSTEM_PREFIXES: readonly string[] = [
  'default-token-',
  'kubernetes.io/service-account',
  'sh.helm.release.v1',
];

export const DEFAULT_EXCLUDED_TYPES: readonly string[] = [
  SecretTypes.HELM_RELEASE,
  SecretTypes.BOOTSTRAP_TOKEN,
];

/**
 * Token secrets the platform generates for a ServiceAccount
 */
export const serviceAccountTokenRule: ExclusionRule = {
  name: 'service-account-token',
  matches: (secret) =>
    secret.type === SecretTypes.SERVICE_ACCOUNT_TOKEN &&
    (secret.ownerReferences.some((owner) => owner.kind === 'ServiceAccount') ||
      Boolean(secret.annotations[SERVICE_ACCOUNT_NAME_ANNOTATION])),
};

export function systemPrefixRule(prefixes: readonly string[]): ExclusionRule {
  const configured = prefixes.filter((prefix) => prefix.length > 0);
  return {
    name: 'system-prefix',
    matches: (secret) => configured.some((prefix) => secret.name.startsWith(prefix)),
  };
}

export function secretTypeRule(types: readonly string[]): ExclusionRule {
  const excluded = new Set(types);
  return {
    name: 'system-type',
    matches: (secret) => excluded.has(secret.type),
  };
}

export interface ExclusionPolicyOptions {
  systemPrefixes?: readonly string[];
  excludedTypes?: readonly string[];
}

export function createExclusionPolicy(options: ExclusionPolicyOptions = {}): ExclusionPolicy {
  return [
    serviceAccountTokenRule,
    systemPrefixRule(options.systemPrefixes ?? DEFAULT_SYSTEM_PREFIXES),
    secretTypeRule(options.excludedTypes ?? DEFAULT_EXCLUDED_TYPES),
  ];
}

export function findExclusion(policy: ExclusionPolicy, secret: Secret): ExclusionRule | undefined {
  return policy.find((rule) => rule.matches(secret));
}
