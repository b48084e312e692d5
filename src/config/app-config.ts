/**
 * Unified Application Configuration
 *
 * Single source of truth for configuration with Zod validation. Environment
 * variables supply values, CLI overrides win over them, defaults fill the rest.
 */

import { z } from 'zod';
import { DEFAULT_EXCLUDED_TYPES, DEFAULT_SYSTEM_PREFIXES } from '../domain/audit/exclusion-policy';
import { ConfigurationError } from '../lib/errors';

const CONSTANTS = {
  TIMEOUTS: {
    KUBERNETES: 30000, // 30s per list call
  },
  DEFAULTS: {
    RETRIES: 3,
    PAGE_SIZE: 500,
    CONCURRENCY: 4,
  },
} as const;

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
const OutputFormatSchema = z.enum(['text', 'json', 'yaml']);

const AppConfigSchema = z.object({
  logLevel: LogLevelSchema.default('info'),
  kubernetes: z.object({
    kubeconfig: z.string().min(1).optional(),
    context: z.string().min(1).optional(),
    timeout: z.coerce.number().int().positive().default(CONSTANTS.TIMEOUTS.KUBERNETES),
    retries: z.coerce.number().int().min(1).max(10).default(CONSTANTS.DEFAULTS.RETRIES),
    pageSize: z.coerce.number().int().min(1).max(5000).default(CONSTANTS.DEFAULTS.PAGE_SIZE),
  }),
  audit: z.object({
    namespaces: z.array(z.string().min(1)).default([]),
    excludeNamespaces: z.array(z.string().min(1)).default([]),
    concurrency: z.coerce.number().int().min(1).max(64).default(CONSTANTS.DEFAULTS.CONCURRENCY),
    systemPrefixes: z.array(z.string().min(1)).default([...DEFAULT_SYSTEM_PREFIXES]),
    excludedTypes: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDED_TYPES]),
  }),
  output: z.object({
    format: OutputFormatSchema.default('text'),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Values supplied on the command line
 */
export interface ConfigOverrides {
  logLevel?: string;
  kubeconfig?: string;
  context?: string;
  timeout?: string | number;
  namespaces?: string[];
  excludeNamespaces?: string[];
  concurrency?: string | number;
  systemPrefixes?: string[];
  excludedTypes?: string[];
  output?: string;
}

type Environment = Record<string, string | undefined>;

/**
 * Empty strings count as unset
 */
function envValue(env: Environment, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function envList(env: Environment, key: string): string[] | undefined {
  const value = envValue(env, key);
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const nonEmpty = <T>(list: T[] | undefined): T[] | undefined =>
  list && list.length > 0 ? list : undefined;

/**
 * Create configuration with environment variable and CLI overrides
 */
export function createAppConfig(
  overrides: ConfigOverrides = {},
  env: Environment = process.env,
): AppConfig {
  const rawConfig = {
    logLevel: overrides.logLevel ?? envValue(env, 'LOG_LEVEL'),
    kubernetes: {
      kubeconfig: overrides.kubeconfig ?? envValue(env, 'KUBECONFIG'),
      context: overrides.context ?? envValue(env, 'KUBE_CONTEXT'),
      timeout: overrides.timeout ?? envValue(env, 'K8S_TIMEOUT'),
      retries: envValue(env, 'K8S_RETRIES'),
      pageSize: envValue(env, 'K8S_PAGE_SIZE'),
    },
    audit: {
      namespaces: nonEmpty(overrides.namespaces) ?? envList(env, 'AUDIT_NAMESPACES'),
      excludeNamespaces:
        nonEmpty(overrides.excludeNamespaces) ?? envList(env, 'AUDIT_EXCLUDE_NAMESPACES'),
      concurrency: overrides.concurrency ?? envValue(env, 'AUDIT_CONCURRENCY'),
      systemPrefixes: nonEmpty(overrides.systemPrefixes) ?? envList(env, 'AUDIT_SYSTEM_PREFIXES'),
      excludedTypes: nonEmpty(overrides.excludedTypes) ?? envList(env, 'AUDIT_EXCLUDED_TYPES'),
    },
    output: {
      format: overrides.output ?? envValue(env, 'AUDIT_OUTPUT'),
    },
  };

  const parsed = AppConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/**
 * Configuration summary safe to print (no credentials are held in config)
 */
export function getConfigurationSummary(config: AppConfig): Record<string, unknown> {
  return {
    logLevel: config.logLevel,
    kubeconfig: config.kubernetes.kubeconfig ?? '(default)',
    context: config.kubernetes.context ?? '(current)',
    namespaces: config.audit.namespaces.length > 0 ? config.audit.namespaces : '(all)',
    excludeNamespaces: config.audit.excludeNamespaces,
    concurrency: config.audit.concurrency,
    systemPrefixes: config.audit.systemPrefixes,
    excludedTypes: config.audit.excludedTypes,
    output: config.output.format,
  };
}
