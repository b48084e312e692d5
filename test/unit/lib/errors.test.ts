import { describe, it, expect } from '@jest/globals';
import {
  AuditError,
  ClusterAccessError,
  ErrorCodes,
  SnapshotFetchError,
  isAuditError,
  toError,
} from '../../../src/lib/errors';

describe('errors', () => {
  it('should expose code and details on subclasses', () => {
    const cause = new Error('HTTP request failed');
    const error = new SnapshotFetchError('Failed to list pods', 'payments', 'pods', cause);

    expect(error).toBeInstanceOf(AuditError);
    expect(error.name).toBe('SnapshotFetchError');
    expect(error.code).toBe(ErrorCodes.SNAPSHOT_FETCH_FAILED);
    expect(error.details).toEqual({ namespace: 'payments', resource: 'pods' });
    expect(error.cause).toBe(cause);
  });

  it('should serialize with the cause message', () => {
    const json = new ClusterAccessError('Failed to load kubeconfig', {}, new Error('ENOENT')).toJSON();

    expect(json).toMatchObject({
      name: 'ClusterAccessError',
      message: 'Failed to load kubeconfig',
      code: 'CLUSTER_ACCESS_FAILED',
      cause: { message: 'ENOENT' },
    });
  });

  it('should append the code to the user message', () => {
    expect(new ClusterAccessError('Unauthorized').getUserMessage()).toBe(
      'Unauthorized (CLUSTER_ACCESS_FAILED)',
    );
  });

  it('should wrap non-errors', () => {
    expect(toError('boom').message).toBe('boom');
    expect(isAuditError(new Error('plain'))).toBe(false);
    expect(isAuditError(new AuditError('typed'))).toBe(true);
  });
});
