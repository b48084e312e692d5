/**
 * Reachability Resolver
 *
 * Unions extracted references across every workload in a namespace. All
 * outputs are sorted so the result does not depend on input order.
 */

import { workloadId, type WorkloadSpec } from '../types/workloads';
import type { SecretReference, SkippedWorkload } from '../types/report';
import { isFail } from '../types/result';
import { normalizeWorkload } from './normalize';
import { extractReferences } from './extractor';
import type { ServiceAccountLookup } from './service-accounts';

export interface ReachabilityResult {
  readonly reachable: ReadonlySet<string>;
  /** Every distinct reference per secret name */
  readonly references: ReadonlyMap<string, readonly SecretReference[]>;
  readonly skippedWorkloads: readonly SkippedWorkload[];
  readonly unresolvedServiceAccounts: readonly string[];
  readonly incompleteServiceAccountResolution: boolean;
}

const byCodeUnit = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

function mergeReference(
  existing: SecretReference | undefined,
  incoming: SecretReference,
): SecretReference {
  if (!existing?.mountedBy && !incoming.mountedBy) return incoming;
  const mountedBy = new Set([...(existing?.mountedBy ?? []), ...(incoming.mountedBy ?? [])]);
  return { ...incoming, mountedBy: [...mountedBy].sort(byCodeUnit) };
}

export function resolveReachability(
  workloads: readonly WorkloadSpec[],
  accounts?: ServiceAccountLookup,
): ReachabilityResult {
  const bySecret = new Map<string, Map<string, SecretReference>>();
  const skippedWorkloads: SkippedWorkload[] = [];
  const unresolved = new Set<string>();

  for (const workload of workloads) {
    const normalized = normalizeWorkload(workload);
    if (isFail(normalized)) {
      skippedWorkloads.push({ kind: workload.kind, name: workload.name, reason: normalized.error });
      continue;
    }

    const extraction = extractReferences(normalized.value, accounts);
    if (extraction.unresolvedServiceAccount) {
      unresolved.add(extraction.unresolvedServiceAccount);
    }

    for (const reference of extraction.references) {
      const kinds = bySecret.get(reference.secretName) ?? new Map<string, SecretReference>();
      kinds.set(reference.kind, mergeReference(kinds.get(reference.kind), reference));
      bySecret.set(reference.secretName, kinds);
    }
  }

  const secretNames = [...bySecret.keys()].sort(byCodeUnit);
  const references = new Map<string, readonly SecretReference[]>(
    secretNames.map((name) => {
      const kinds = bySecret.get(name) ?? new Map<string, SecretReference>();
      const sorted = [...kinds.entries()]
        .sort(([a], [b]) => byCodeUnit(a, b))
        .map(([, reference]) => reference);
      return [name, sorted];
    }),
  );

  skippedWorkloads.sort((a, b) => byCodeUnit(workloadId(a), workloadId(b)));

  return {
    reachable: new Set(secretNames),
    references,
    skippedWorkloads,
    unresolvedServiceAccounts: [...unresolved].sort(byCodeUnit),
    incompleteServiceAccountResolution: unresolved.size > 0,
  };
}
