/**
 * Report rendering
 *
 * Reporters write to a stream and return immediately; callers never wait on
 * output being flushed.
 */

import * as yaml from 'js-yaml';
import type { NamespaceReport } from '../domain/types/report';
import { workloadId } from '../domain/types/workloads';
import type { OutputFormat } from '../config/app-config';

export interface Reporter {
  report: (reports: readonly NamespaceReport[]) => void;
}

export interface OutputStream {
  write: (chunk: string) => unknown;
}

const plural = (count: number, noun: string): string =>
  `${count} ${noun}${count === 1 ? '' : 's'}`;

export function formatNamespaceText(report: NamespaceReport): string[] {
  const lines = [`+ Namespace : ${report.namespace}`];

  if (report.unused.length === 0) {
    lines.push('  - No unused secrets found');
  } else {
    report.unused.forEach((secret) => lines.push(`  - ${secret.name} (${secret.type})`));
  }

  const { diagnostics } = report;
  if (diagnostics.incompleteServiceAccountResolution) {
    lines.push(
      `  ! Token secrets unresolved for service accounts: ${diagnostics.unresolvedServiceAccounts.join(', ')}`,
    );
  }
  for (const skipped of diagnostics.skippedWorkloads) {
    lines.push(`  ! Skipped ${workloadId(skipped)}: ${skipped.reason}`);
  }

  return lines;
}

export function formatText(reports: readonly NamespaceReport[]): string {
  const lines = reports.flatMap(formatNamespaceText);
  const secrets = reports.reduce((sum, report) => sum + report.totalSecrets, 0);
  const unused = reports.reduce((sum, report) => sum + report.unused.length, 0);
  lines.push(
    `Scanned ${plural(reports.length, 'namespace')}, ${plural(secrets, 'secret')}: ${unused} unused`,
  );
  return `${lines.join('\n')}\n`;
}

export function formatJson(reports: readonly NamespaceReport[]): string {
  return `${JSON.stringify({ reports }, null, 2)}\n`;
}

export function formatYaml(reports: readonly NamespaceReport[]): string {
  return yaml.dump({ reports }, { noRefs: true });
}

const FORMATTERS: Record<OutputFormat, (reports: readonly NamespaceReport[]) => string> = {
  text: formatText,
  json: formatJson,
  yaml: formatYaml,
};

export function createStreamReporter(format: OutputFormat, stream: OutputStream): Reporter {
  const render = FORMATTERS[format];
  return {
    report(reports: readonly NamespaceReport[]): void {
      stream.write(render(reports));
    },
  };
}
