/**
 * Resource Snapshot
 *
 * Point-in-time read of one namespace. Produced once by the cluster client
 * and never mutated afterwards.
 */

import type { Secret, ServiceAccount } from './secrets';
import type { WorkloadSpec } from './workloads';

export interface ResourceSnapshot {
  readonly namespace: string;
  readonly secrets: readonly Secret[];
  readonly serviceAccounts: readonly ServiceAccount[];
  readonly workloads: readonly WorkloadSpec[];
  readonly fetchedAt: string;
}

export interface SnapshotInput {
  namespace: string;
  secrets?: readonly Secret[];
  serviceAccounts?: readonly ServiceAccount[];
  workloads?: readonly WorkloadSpec[];
  fetchedAt?: Date;
}

export function createSnapshot(input: SnapshotInput): ResourceSnapshot {
  return Object.freeze({
    namespace: input.namespace,
    secrets: Object.freeze([...(input.secrets ?? [])]),
    serviceAccounts: Object.freeze([...(input.serviceAccounts ?? [])]),
    workloads: Object.freeze([...(input.workloads ?? [])]),
    fetchedAt: (input.fetchedAt ?? new Date()).toISOString(),
  });
}
