import { describe, it, expect } from '@jest/globals';
import { buildServiceAccountIndex } from '../../../src/domain/audit/service-accounts';
import { SERVICE_ACCOUNT_NAME_ANNOTATION, SecretTypes } from '../../../src/domain/types';
import { createSecret, createServiceAccount } from '../../__support__/fixtures/resources';

describe('buildServiceAccountIndex', () => {
  it('should resolve tokens listed on the service account', () => {
    const index = buildServiceAccountIndex(
      [createServiceAccount('deployer', ['deployer-token-b', 'deployer-token-a'])],
      [],
    );

    expect(index.tokensFor('deployer')).toEqual(['deployer-token-a', 'deployer-token-b']);
  });

  it('should resolve token secrets annotated with the service account name', () => {
    const token = createSecret('ci-token', {
      type: SecretTypes.SERVICE_ACCOUNT_TOKEN,
      annotations: { [SERVICE_ACCOUNT_NAME_ANNOTATION]: 'ci' },
    });

    const index = buildServiceAccountIndex([createServiceAccount('ci')], [token]);

    expect(index.tokensFor('ci')).toEqual(['ci-token']);
  });

  it('should ignore the annotation on secrets of other types', () => {
    const opaque = createSecret('not-a-token', {
      annotations: { [SERVICE_ACCOUNT_NAME_ANNOTATION]: 'ci' },
    });

    const index = buildServiceAccountIndex([], [opaque]);

    expect(index.tokensFor('ci')).toBeUndefined();
  });

  it('should merge both sources without duplicates', () => {
    const token = createSecret('ci-token', {
      type: SecretTypes.SERVICE_ACCOUNT_TOKEN,
      annotations: { [SERVICE_ACCOUNT_NAME_ANNOTATION]: 'ci' },
    });

    const index = buildServiceAccountIndex([createServiceAccount('ci', ['ci-token'])], [token]);

    expect(index.tokensFor('ci')).toEqual(['ci-token']);
  });

  it('should return undefined for service accounts without token secrets', () => {
    const index = buildServiceAccountIndex([createServiceAccount('default')], []);

    expect(index.tokensFor('default')).toBeUndefined();
    expect(index.tokensFor('missing')).toBeUndefined();
  });

  it('should return the sorted image pull secrets of a service account', () => {
    const index = buildServiceAccountIndex(
      [createServiceAccount('builder', [], ['regcred', 'mirror-cred'])],
      [],
    );

    expect(index.imagePullSecretsFor('builder')).toEqual(['mirror-cred', 'regcred']);
    expect(index.imagePullSecretsFor('missing')).toEqual([]);
  });
});
