import { describe, it, expect } from '@jest/globals';
import {
  createExclusionPolicy,
  findExclusion,
  secretTypeRule,
  serviceAccountTokenRule,
  systemPrefixRule,
} from '../../../src/domain/audit/exclusion-policy';
import { SERVICE_ACCOUNT_NAME_ANNOTATION, SecretTypes } from '../../../src/domain/types';
import { createSecret, createServiceAccountToken } from '../../__support__/fixtures/resources';

describe('exclusion rules', () => {
  describe('serviceAccountTokenRule', () => {
    it('should match token secrets owned by a ServiceAccount', () => {
      expect(serviceAccountTokenRule.matches(createServiceAccountToken('builder-token', 'builder'))).toBe(true);
    });

    it('should match token secrets annotated with a service account name', () => {
      const secret = createSecret('legacy-token', {
        type: SecretTypes.SERVICE_ACCOUNT_TOKEN,
        annotations: { [SERVICE_ACCOUNT_NAME_ANNOTATION]: 'legacy' },
      });

      expect(serviceAccountTokenRule.matches(secret)).toBe(true);
    });

    it('should not match token secrets without an owner', () => {
      const secret = createSecret('manual-token', { type: SecretTypes.SERVICE_ACCOUNT_TOKEN });

      expect(serviceAccountTokenRule.matches(secret)).toBe(false);
    });

    it('should not match other types owned by a ServiceAccount', () => {
      const secret = createSecret('owned', {
        ownerReferences: [{ kind: 'ServiceAccount', name: 'builder' }],
      });

      expect(serviceAccountTokenRule.matches(secret)).toBe(false);
    });
  });

  it('should match names by prefix', () => {
    const rule = systemPrefixRule(['default-token-', '']);

    expect(rule.matches(createSecret('default-token-x7k2p'))).toBe(true);
    expect(rule.matches(createSecret('app-default-token'))).toBe(false);
  });

  it('should match configured secret types', () => {
    const rule = secretTypeRule([SecretTypes.HELM_RELEASE]);

    expect(rule.matches(createSecret('release', { type: SecretTypes.HELM_RELEASE }))).toBe(true);
    expect(rule.matches(createSecret('release'))).toBe(false);
  });
});

describe('createExclusionPolicy', () => {
  it('should order rules service-account, prefix, type', () => {
    expect(createExclusionPolicy().map((rule) => rule.name)).toEqual([
      'service-account-token',
      'system-prefix',
      'system-type',
    ]);
  });

  it('should apply the default system prefixes', () => {
    const policy = createExclusionPolicy();

    expect(findExclusion(policy, createSecret('sh.helm.release.v1.app.v3'))?.name).toBe('system-prefix');
    expect(findExclusion(policy, createSecret('default-token-abcde'))?.name).toBe('system-prefix');
    expect(findExclusion(policy, createSecret('db-pass'))).toBeUndefined();
  });

  it('should replace defaults with configured values', () => {
    const policy = createExclusionPolicy({ systemPrefixes: ['internal-'], excludedTypes: [] });

    expect(findExclusion(policy, createSecret('default-token-abcde'))).toBeUndefined();
    expect(findExclusion(policy, createSecret('internal-cache'))?.name).toBe('system-prefix');
    expect(
      findExclusion(policy, createSecret('bootstrap-token-abc', { type: SecretTypes.BOOTSTRAP_TOKEN })),
    ).toBeUndefined();
  });

  it('should report the first matching rule', () => {
    const secret = createServiceAccountToken('default-token-q8v7d', 'default');

    expect(findExclusion(createExclusionPolicy(), secret)?.name).toBe('service-account-token');
  });
});
