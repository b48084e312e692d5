/**
 * Configuration loading tests
 */

import { describe, it, expect } from '@jest/globals';
import { createAppConfig, getConfigurationSummary } from '../../../src/config/app-config';
import {
  DEFAULT_EXCLUDED_TYPES,
  DEFAULT_SYSTEM_PREFIXES,
} from '../../../src/domain/audit/exclusion-policy';
import { ConfigurationError } from '../../../src/lib/errors';

describe('createAppConfig', () => {
  it('should fill defaults from an empty environment', () => {
    expect(createAppConfig({}, {})).toEqual({
      logLevel: 'info',
      kubernetes: { timeout: 30000, retries: 3, pageSize: 500 },
      audit: {
        namespaces: [],
        excludeNamespaces: [],
        concurrency: 4,
        systemPrefixes: [...DEFAULT_SYSTEM_PREFIXES],
        excludedTypes: [...DEFAULT_EXCLUDED_TYPES],
      },
      output: { format: 'text' },
    });
  });

  it('should read environment variables', () => {
    const config = createAppConfig(
      {},
      {
        LOG_LEVEL: 'debug',
        KUBECONFIG: '/etc/kube/config',
        KUBE_CONTEXT: 'staging',
        K8S_TIMEOUT: '5000',
        K8S_RETRIES: '5',
        K8S_PAGE_SIZE: '100',
        AUDIT_NAMESPACES: 'payments, billing,,',
        AUDIT_EXCLUDE_NAMESPACES: 'kube-system',
        AUDIT_CONCURRENCY: '8',
        AUDIT_SYSTEM_PREFIXES: 'internal-',
        AUDIT_EXCLUDED_TYPES: 'example.com/managed',
        AUDIT_OUTPUT: 'yaml',
      },
    );

    expect(config).toEqual({
      logLevel: 'debug',
      kubernetes: {
        kubeconfig: '/etc/kube/config',
        context: 'staging',
        timeout: 5000,
        retries: 5,
        pageSize: 100,
      },
      audit: {
        namespaces: ['payments', 'billing'],
        excludeNamespaces: ['kube-system'],
        concurrency: 8,
        systemPrefixes: ['internal-'],
        excludedTypes: ['example.com/managed'],
      },
      output: { format: 'yaml' },
    });
  });

  it('should let command line values win over the environment', () => {
    const config = createAppConfig(
      { namespaces: ['ci'], concurrency: '2', output: 'json', context: 'prod' },
      { AUDIT_NAMESPACES: 'payments', AUDIT_CONCURRENCY: '8', AUDIT_OUTPUT: 'yaml', KUBE_CONTEXT: 'dev' },
    );

    expect(config.audit.namespaces).toEqual(['ci']);
    expect(config.audit.concurrency).toBe(2);
    expect(config.output.format).toBe('json');
    expect(config.kubernetes.context).toBe('prod');
  });

  it('should fall back to the environment for empty list overrides', () => {
    const config = createAppConfig({ namespaces: [] }, { AUDIT_NAMESPACES: 'payments' });

    expect(config.audit.namespaces).toEqual(['payments']);
  });

  it('should treat blank variables as unset', () => {
    const config = createAppConfig({}, { LOG_LEVEL: '  ', AUDIT_CONCURRENCY: '' });

    expect(config.logLevel).toBe('info');
    expect(config.audit.concurrency).toBe(4);
  });

  it('should reject an unknown output format', () => {
    expect(() => createAppConfig({ output: 'xml' }, {})).toThrow(ConfigurationError);
  });

  it('should report every invalid field with its path', () => {
    try {
      createAppConfig({ concurrency: '0' }, { K8S_TIMEOUT: 'soon' });
      throw new Error('expected createAppConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues.map((issue) => issue.split(':')[0])).toEqual([
          'kubernetes.timeout',
          'audit.concurrency',
        ]);
        expect(error.message).toMatch(/^Invalid configuration: kubernetes\.timeout: /);
        expect(error.code).toBe('CONFIGURATION_INVALID');
      }
    }
  });
});

describe('getConfigurationSummary', () => {
  it('should describe unset values with placeholders', () => {
    const summary = getConfigurationSummary(createAppConfig({}, {}));

    expect(summary).toMatchObject({
      kubeconfig: '(default)',
      context: '(current)',
      namespaces: '(all)',
      concurrency: 4,
      output: 'text',
    });
  });

  it('should list selected namespaces', () => {
    const summary = getConfigurationSummary(createAppConfig({ namespaces: ['payments'] }, {}));

    expect(summary.namespaces).toEqual(['payments']);
  });
});
