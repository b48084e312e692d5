/**
 * Namespace audit: snapshot in, report out. No I/O, no shared state.
 */

import type { ResourceSnapshot } from '../types/snapshot';
import type { NamespaceReport } from '../types/report';
import { buildServiceAccountIndex } from './service-accounts';
import { resolveReachability } from './resolver';
import { partitionSecrets } from './filter';
import type { ExclusionPolicy } from './exclusion-policy';

export function auditNamespace(
  snapshot: ResourceSnapshot,
  policy: ExclusionPolicy,
): NamespaceReport {
  const accounts = buildServiceAccountIndex(snapshot.serviceAccounts, snapshot.secrets);
  const reachability = resolveReachability(snapshot.workloads, accounts);
  const partition = partitionSecrets(snapshot.secrets, reachability.reachable, policy);

  return {
    namespace: snapshot.namespace,
    unused: partition.unused.map((secret) => ({ name: secret.name, type: secret.type })),
    used: partition.used.map((secret) => ({
      name: secret.name,
      type: secret.type,
      references: reachability.references.get(secret.name) ?? [],
    })),
    totalSecrets: snapshot.secrets.length,
    totalWorkloads: snapshot.workloads.length,
    excludedSecrets: partition.excluded.length,
    diagnostics: {
      skippedWorkloads: reachability.skippedWorkloads,
      unresolvedServiceAccounts: reachability.unresolvedServiceAccounts,
      incompleteServiceAccountResolution: reachability.incompleteServiceAccountResolution,
    },
  };
}
