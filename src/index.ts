/**
 * Library entry point: the audit core, the cluster client and the runner
 */

export * from './domain/types';
export * from './domain/audit';
export { runAudit, type AuditRun, type AuditRunOptions, type NamespaceFailure } from './application/audit-runner';
export {
  createStreamReporter,
  formatJson,
  formatNamespaceText,
  formatText,
  formatYaml,
  type OutputStream,
  type Reporter,
} from './application/reporter';
export * from './infrastructure/kubernetes';
export * from './config';
export * from './lib/errors';
export { createLogger, createTimer, type Logger, type Timer } from './lib/logger';
