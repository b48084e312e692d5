/**
 * Workload normalization: every kind reduces to the pod spec it runs.
 */

import type { PodSpec, WorkloadSpec } from '../types/workloads';
import { Failure, Success, type Result } from '../types/result';

export function normalizeWorkload(workload: WorkloadSpec): Result<PodSpec> {
  switch (workload.kind) {
    case 'Pod':
      return workload.spec ? Success(workload.spec) : Failure('pod has no spec');
    case 'Deployment':
    case 'StatefulSet':
    case 'DaemonSet':
    case 'ReplicaSet':
      if (!workload.template) {
        return Failure(`${workload.kind.toLowerCase()} has no pod template`);
      }
      return workload.template.spec
        ? Success(workload.template.spec)
        : Failure(`${workload.kind.toLowerCase()} pod template has no spec`);
    default: {
      const unknownKind: never = workload;
      return Failure(`unsupported workload kind: ${String(unknownKind)}`);
    }
  }
}
