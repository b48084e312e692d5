/**
 * Reference and Report Types
 */

import type { WorkloadKind } from './workloads';

export type ReferenceKind =
  | 'envVar'
  | 'envFromSource'
  | 'volumeMount'
  | 'imagePullSecret'
  | 'serviceAccountMount';

export interface SecretReference {
  readonly secretName: string;
  readonly kind: ReferenceKind;
  /**
   * Containers mounting the volume that carries the secret. Only set for
   * `volumeMount`; empty when the volume is declared but never mounted.
   */
  readonly mountedBy?: readonly string[];
}

export interface SkippedWorkload {
  readonly kind: WorkloadKind;
  readonly name: string;
  readonly reason: string;
}

export interface NamespaceDiagnostics {
  readonly skippedWorkloads: readonly SkippedWorkload[];
  readonly unresolvedServiceAccounts: readonly string[];
  /**
   * Some workload runs as a service account whose token secret could not be
   * found, so its reachability is a lower bound
   */
  readonly incompleteServiceAccountResolution: boolean;
}

export interface UnusedSecret {
  readonly name: string;
  readonly type: string;
}

export interface UsedSecret {
  readonly name: string;
  readonly type: string;
  /** Every distinct way a workload reaches the secret */
  readonly references: readonly SecretReference[];
}

export interface NamespaceReport {
  readonly namespace: string;
  readonly unused: readonly UnusedSecret[];
  /** Reachable secrets that no exclusion rule matched, ascending by name */
  readonly used: readonly UsedSecret[];
  readonly totalSecrets: number;
  readonly totalWorkloads: number;
  readonly excludedSecrets: number;
  readonly diagnostics: NamespaceDiagnostics;
}
