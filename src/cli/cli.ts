/**
 * kube-secret-audit CLI
 * Scans namespaces for secrets no workload references and prints a report
 */

import { Command, CommanderError } from 'commander';
import type { Logger, LoggerOptions } from 'pino';
import {
  createAppConfig,
  getConfigurationSummary,
  type AppConfig,
  type ConfigOverrides,
} from '../config/app-config';
import { createExclusionPolicy } from '../domain/audit/exclusion-policy';
import { runAudit } from '../application/audit-runner';
import { createStreamReporter, type OutputStream } from '../application/reporter';
import {
  createKubernetesClient,
  type ClusterClient,
  type KubernetesClientOptions,
} from '../infrastructure/kubernetes/client';
import { createLogger } from '../lib/logger';
import { AuditCancelledError, ClusterAccessError, ConfigurationError, toError } from '../lib/errors';

export const ExitCodes = {
  SUCCESS: 0,
  CLUSTER_ACCESS_FAILED: 1,
  INVALID_CONFIGURATION: 2,
  CANCELLED: 130,
} as const;

export interface CliDependencies {
  version: string;
  stdout: OutputStream;
  stderr: OutputStream;
  env: Record<string, string | undefined>;
  createLogger: (options: LoggerOptions) => Logger;
  createClient: (logger: Logger, options: KubernetesClientOptions) => ClusterClient;
  signal?: AbortSignal;
}

type CliOptions = {
  kubeconfig?: string;
  context?: string;
  namespace: string[];
  excludeNamespace: string[];
  systemPrefix: string[];
  excludedType: string[];
  concurrency?: string;
  timeout?: string;
  output?: string;
  logLevel?: string;
  validate?: boolean;
};

const collect = (value: string, previous: string[]): string[] => [...previous, value];

export const defaultDependencies = (version: string): CliDependencies => ({
  version,
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  createLogger,
  createClient: createKubernetesClient,
});

export function createProgram(deps: Pick<CliDependencies, 'version' | 'stdout' | 'stderr'>): Command {
  return new Command()
    .name('kube-secret-audit')
    .description('Find Kubernetes secrets that no workload references')
    .version(deps.version)
    .option('--kubeconfig <path>', 'path to kubeconfig file (default: standard loading rules)')
    .option('--context <name>', 'kubeconfig context to use (default: current context)')
    .option('-n, --namespace <name>', 'namespace to audit, repeatable (default: all)', collect, [])
    .option('--exclude-namespace <name>', 'namespace to skip, repeatable', collect, [])
    .option('--system-prefix <prefix>', 'secret name prefix to ignore, repeatable (replaces defaults)', collect, [])
    .option('--excluded-type <type>', 'secret type to ignore, repeatable (replaces defaults)', collect, [])
    .option('--concurrency <n>', 'namespaces audited in parallel (default: 4)')
    .option('--timeout <ms>', 'timeout per Kubernetes API call in milliseconds (default: 30000)')
    .option('-o, --output <format>', 'report format: text, json, yaml (default: text)')
    .option('--log-level <level>', 'logging level: debug, info, warn, error (default: info)')
    .option('--validate', 'print the resolved configuration and exit')
    .addHelpText(
      'after',
      `

Examples:
  $ kube-secret-audit                          Audit every namespace
  $ kube-secret-audit -n payments -n billing   Audit two namespaces
  $ kube-secret-audit -o json > report.json    Machine-readable report

Exit codes:
  0    scan completed (whether or not unused secrets were found)
  1    cluster access failed, or a namespace could not be read
  2    invalid configuration
  130  cancelled

Environment Variables:
  LOG_LEVEL, KUBECONFIG, KUBE_CONTEXT, K8S_TIMEOUT, K8S_RETRIES, K8S_PAGE_SIZE,
  AUDIT_NAMESPACES, AUDIT_EXCLUDE_NAMESPACES, AUDIT_CONCURRENCY,
  AUDIT_SYSTEM_PREFIXES, AUDIT_EXCLUDED_TYPES, AUDIT_OUTPUT
`,
    )
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.stdout.write(str),
      writeErr: (str) => deps.stderr.write(str),
    });
}

function toOverrides(options: CliOptions): ConfigOverrides {
  return {
    logLevel: options.logLevel,
    kubeconfig: options.kubeconfig,
    context: options.context,
    timeout: options.timeout,
    namespaces: options.namespace,
    excludeNamespaces: options.excludeNamespace,
    concurrency: options.concurrency,
    systemPrefixes: options.systemPrefix,
    excludedTypes: options.excludedType,
    output: options.output,
  };
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
  const program = createProgram(deps);

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit 0; usage errors count as bad configuration
      return error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_CONFIGURATION;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();

  let config: AppConfig;
  try {
    config = createAppConfig(toOverrides(options), deps.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      deps.stderr.write(`${error.message}\n`);
      return ExitCodes.INVALID_CONFIGURATION;
    }
    throw error;
  }

  if (options.validate) {
    deps.stdout.write(`${JSON.stringify(getConfigurationSummary(config), null, 2)}\n`);
    return ExitCodes.SUCCESS;
  }

  const logger = deps.createLogger({ name: 'kube-secret-audit', level: config.logLevel });
  const reporter = createStreamReporter(config.output.format, deps.stdout);

  try {
    const client = deps.createClient(logger, config.kubernetes);
    const run = await runAudit(client, logger, {
      policy: createExclusionPolicy({
        systemPrefixes: config.audit.systemPrefixes,
        excludedTypes: config.audit.excludedTypes,
      }),
      namespaces: config.audit.namespaces,
      excludeNamespaces: config.audit.excludeNamespaces,
      concurrency: config.audit.concurrency,
      signal: deps.signal,
    });

    reporter.report(run.reports);

    for (const failure of run.failures) {
      logger.error({ namespace: failure.namespace, error: failure.error.toJSON() }, 'Namespace skipped');
      deps.stderr.write(`! ${failure.namespace}: ${failure.error.message}\n`);
    }
    return run.failures.length > 0 ? ExitCodes.CLUSTER_ACCESS_FAILED : ExitCodes.SUCCESS;
  } catch (err) {
    if (err instanceof AuditCancelledError) {
      logger.warn('Audit cancelled');
      return ExitCodes.CANCELLED;
    }
    const error = toError(err);
    logger.error({ error: error.message }, 'Audit failed');
    deps.stderr.write(
      `${error instanceof ClusterAccessError ? error.getUserMessage() : error.message}\n`,
    );
    return ExitCodes.CLUSTER_ACCESS_FAILED;
  }
}
