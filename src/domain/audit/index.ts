export { normalizeWorkload } from './normalize';
export { extractReferences, type ExtractionResult } from './extractor';
export {
  DEFAULT_SERVICE_ACCOUNT,
  buildServiceAccountIndex,
  type ServiceAccountLookup,
} from './service-accounts';
export { resolveReachability, type ReachabilityResult } from './resolver';
export {
  DEFAULT_EXCLUDED_TYPES,
  DEFAULT_SYSTEM_PREFIXES,
  createExclusionPolicy,
  findExclusion,
  secretTypeRule,
  serviceAccountTokenRule,
  systemPrefixRule,
  type ExclusionPolicy,
  type ExclusionPolicyOptions,
  type ExclusionRule,
} from './exclusion-policy';
export {
  filterUnusedSecrets,
  partitionSecrets,
  type ExcludedSecret,
  type SecretPartition,
} from './filter';
export { auditNamespace } from './audit-namespace';
