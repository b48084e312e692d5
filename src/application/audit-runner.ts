/**
 * Audit Runner
 *
 * Fans namespace units out over the cluster client. Each unit fetches its own
 * snapshot and produces its own report, so units share nothing and a failed
 * fetch only costs that namespace.
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { ClusterClient } from '../infrastructure/kubernetes/client';
import type { NamespaceReport } from '../domain/types/report';
import { auditNamespace } from '../domain/audit/audit-namespace';
import type { ExclusionPolicy } from '../domain/audit/exclusion-policy';
import { isFail } from '../domain/types/result';
import type { SnapshotFetchError } from '../lib/errors';
import { createTimer } from '../lib/logger';
import { parallelLimit } from './utils/async-utils';

export interface AuditRunOptions {
  policy: ExclusionPolicy;
  /** Namespaces to audit; every namespace in the cluster when empty */
  namespaces?: readonly string[];
  excludeNamespaces?: readonly string[];
  concurrency?: number;
  signal?: AbortSignal;
}

export interface NamespaceFailure {
  readonly namespace: string;
  readonly error: SnapshotFetchError;
}

export interface AuditRun {
  readonly runId: string;
  /** Ascending by namespace */
  readonly reports: readonly NamespaceReport[];
  readonly failures: readonly NamespaceFailure[];
}

type UnitOutcome =
  | { ok: true; report: NamespaceReport }
  | { ok: false; failure: NamespaceFailure };

const DEFAULT_CONCURRENCY = 4;

async function resolveNamespaces(
  client: ClusterClient,
  options: AuditRunOptions,
): Promise<string[]> {
  let namespaces: readonly string[];
  if (options.namespaces && options.namespaces.length > 0) {
    namespaces = options.namespaces;
  } else {
    const listed = await client.listNamespaces();
    if (isFail(listed)) {
      throw listed.error;
    }
    namespaces = listed.value;
  }

  const excluded = new Set(options.excludeNamespaces ?? []);
  return [...new Set(namespaces)].filter((ns) => !excluded.has(ns)).sort();
}

/**
 * Audit every selected namespace. Rejects with ClusterAccessError when the
 * namespace list cannot be read and with AuditCancelledError when the signal
 * fires; per-namespace fetch failures are returned, not thrown.
 */
export async function runAudit(
  client: ClusterClient,
  logger: Logger,
  options: AuditRunOptions,
): Promise<AuditRun> {
  const runId = nanoid(10);
  const log = logger.child({ component: 'audit-runner', runId });
  const namespaces = await resolveNamespaces(client, options);

  log.info({ namespaces: namespaces.length }, 'Starting secret audit');

  const outcomes = await parallelLimit(
    namespaces,
    options.concurrency ?? DEFAULT_CONCURRENCY,
    async (namespace): Promise<UnitOutcome> => {
      const timer = createTimer(log, 'audit-namespace', { namespace });
      const snapshot = await client.fetchSnapshot(namespace, options.signal);
      if (isFail(snapshot)) {
        timer.error(snapshot.error);
        return { ok: false, failure: { namespace, error: snapshot.error } };
      }

      const report = auditNamespace(snapshot.value, options.policy);
      if (report.diagnostics.incompleteServiceAccountResolution) {
        log.warn(
          { namespace, serviceAccounts: report.diagnostics.unresolvedServiceAccounts },
          'Service account token secrets could not be resolved',
        );
      }
      if (report.diagnostics.skippedWorkloads.length > 0) {
        log.warn(
          { namespace, skipped: report.diagnostics.skippedWorkloads.length },
          'Skipped malformed workloads',
        );
      }
      timer.end({ unused: report.unused.length, secrets: report.totalSecrets });
      return { ok: true, report };
    },
    options.signal,
  );

  const reports: NamespaceReport[] = [];
  const failures: NamespaceFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      reports.push(outcome.report);
    } else {
      failures.push(outcome.failure);
    }
  }

  log.info(
    {
      audited: reports.length,
      failed: failures.length,
      unused: reports.reduce((sum, report) => sum + report.unused.length, 0),
    },
    'Secret audit finished',
  );

  return { runId, reports, failures };
}
