/**
 * Builders for audit domain objects
 */

import {
  SecretTypes,
  type Container,
  type ControllerKind,
  type EnvFromSource,
  type EnvVar,
  type PodSpec,
  type Secret,
  type ServiceAccount,
  type WorkloadSpec,
} from '../../../src/domain/types';

export const NAMESPACE = 'default';

export function createSecret(name: string, overrides: Partial<Secret> = {}): Secret {
  return {
    namespace: NAMESPACE,
    name,
    type: SecretTypes.OPAQUE,
    labels: {},
    annotations: {},
    ownerReferences: [],
    ...overrides,
  };
}

export function createServiceAccountToken(name: string, serviceAccount: string): Secret {
  return createSecret(name, {
    type: SecretTypes.SERVICE_ACCOUNT_TOKEN,
    ownerReferences: [{ kind: 'ServiceAccount', name: serviceAccount, uid: `uid-${serviceAccount}` }],
  });
}

export function createServiceAccount(
  name: string,
  secrets: string[] = [],
  imagePullSecrets: string[] = [],
): ServiceAccount {
  return { namespace: NAMESPACE, name, secrets, imagePullSecrets };
}

export const secretEnv = (envName: string, secretName: string, key = 'value'): EnvVar => ({
  name: envName,
  valueFrom: { secretKeyRef: { name: secretName, key } },
});

export const secretEnvFrom = (secretName: string): EnvFromSource => ({
  secretRef: { name: secretName },
});

export function createContainer(name: string, overrides: Partial<Container> = {}): Container {
  return { name, ...overrides };
}

export function createPod(name: string, spec?: PodSpec): WorkloadSpec {
  return { kind: 'Pod', namespace: NAMESPACE, name, spec };
}

export function createController(
  kind: ControllerKind,
  name: string,
  spec?: PodSpec,
): WorkloadSpec {
  return { kind, namespace: NAMESPACE, name, template: { spec } };
}
