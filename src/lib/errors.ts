/**
 * Structured Error Classes
 *
 * Hierarchy of audit errors with codes and metadata. Only the cluster
 * boundary and configuration loading raise these; the audit core never throws.
 */

export const ErrorCodes = {
  CONFIGURATION_INVALID: 'CONFIGURATION_INVALID',
  CLUSTER_ACCESS_FAILED: 'CLUSTER_ACCESS_FAILED',
  SNAPSHOT_FETCH_FAILED: 'SNAPSHOT_FETCH_FAILED',
  AUDIT_CANCELLED: 'AUDIT_CANCELLED',
  TIMEOUT: 'TIMEOUT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all audit errors
 */
export class AuditError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'AuditError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      timestamp: this.timestamp,
      stack: this.stack,
      cause: this.cause
        ? {
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }

  getUserMessage(): string {
    return `${this.message} (${this.code})`;
  }
}

export class ConfigurationError extends AuditError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message, ErrorCodes.CONFIGURATION_INVALID, { issues });
    this.name = 'ConfigurationError';
  }
}

/**
 * Kubeconfig could not be loaded or the namespace list could not be read
 */
export class ClusterAccessError extends AuditError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCodes.CLUSTER_ACCESS_FAILED, details, cause);
    this.name = 'ClusterAccessError';
  }
}

/**
 * One namespace's resources could not be read. Aborts that namespace only.
 */
export class SnapshotFetchError extends AuditError {
  constructor(
    message: string,
    public readonly namespace: string,
    public readonly resource: string,
    cause?: Error,
  ) {
    super(message, ErrorCodes.SNAPSHOT_FETCH_FAILED, { namespace, resource }, cause);
    this.name = 'SnapshotFetchError';
  }
}

export class AuditCancelledError extends AuditError {
  constructor(details?: Record<string, unknown>) {
    super('Audit cancelled', ErrorCodes.AUDIT_CANCELLED, details);
    this.name = 'AuditCancelledError';
  }
}

export class TimeoutError extends AuditError {
  constructor(message: string, timeoutMs: number) {
    super(message, ErrorCodes.TIMEOUT, { timeoutMs });
    this.name = 'TimeoutError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function isAuditError(error: unknown): error is AuditError {
  return error instanceof AuditError;
}
