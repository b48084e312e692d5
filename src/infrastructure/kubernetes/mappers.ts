/**
 * Mapping from @kubernetes/client-node models to audit domain types
 */

import type * as k8s from '@kubernetes/client-node';
import type {
  Container,
  ControllerKind,
  PodSpec,
  Secret,
  ServiceAccount,
  Volume,
  WorkloadSpec,
} from '../../domain/types';

type ContainerLike = Pick<k8s.V1Container, 'name' | 'env' | 'envFrom' | 'volumeMounts'>;

interface ControllerLike {
  metadata?: k8s.V1ObjectMeta;
  spec?: { template?: k8s.V1PodTemplateSpec };
}

const names = (refs: Array<{ name?: string }> | undefined): string[] =>
  (refs ?? []).flatMap((ref) => (ref.name ? [ref.name] : []));

export function mapContainer(container: ContainerLike): Container {
  return {
    name: container.name,
    env: container.env?.map((env) => ({
      name: env.name,
      valueFrom: env.valueFrom
        ? {
            secretKeyRef: env.valueFrom.secretKeyRef,
            configMapKeyRef: env.valueFrom.configMapKeyRef,
          }
        : undefined,
    })),
    envFrom: container.envFrom?.map((source) => ({
      prefix: source.prefix,
      secretRef: source.secretRef,
      configMapRef: source.configMapRef,
    })),
    volumeMounts: container.volumeMounts?.map((mount) => ({
      name: mount.name,
      mountPath: mount.mountPath,
    })),
  };
}

export function mapVolume(volume: k8s.V1Volume): Volume {
  return {
    name: volume.name,
    secret: volume.secret
      ? { secretName: volume.secret.secretName, optional: volume.secret.optional }
      : undefined,
    projected: volume.projected
      ? {
          sources: (volume.projected.sources ?? []).map((source) => ({
            secret: source.secret
              ? { name: source.secret.name, optional: source.secret.optional }
              : undefined,
          })),
        }
      : undefined,
  };
}

export function mapPodSpec(spec: k8s.V1PodSpec): PodSpec {
  return {
    containers: (spec.containers ?? []).map(mapContainer),
    initContainers: spec.initContainers?.map(mapContainer),
    ephemeralContainers: spec.ephemeralContainers?.map(mapContainer),
    volumes: spec.volumes?.map(mapVolume),
    imagePullSecrets: spec.imagePullSecrets?.map((ref) => ({ name: ref.name })),
    serviceAccountName: spec.serviceAccountName,
  };
}

/**
 * Objects without a name cannot be identified and are dropped
 */
export function mapSecret(secret: k8s.V1Secret, namespace: string): Secret | undefined {
  const name = secret.metadata?.name;
  if (!name) return undefined;
  return {
    namespace,
    name,
    type: secret.type ?? 'Opaque',
    labels: { ...(secret.metadata?.labels ?? {}) },
    annotations: { ...(secret.metadata?.annotations ?? {}) },
    ownerReferences: (secret.metadata?.ownerReferences ?? []).map((owner) => ({
      kind: owner.kind,
      name: owner.name,
      uid: owner.uid,
      controller: owner.controller,
    })),
  };
}

export function mapServiceAccount(
  account: k8s.V1ServiceAccount,
  namespace: string,
): ServiceAccount | undefined {
  const name = account.metadata?.name;
  if (!name) return undefined;
  return {
    namespace,
    name,
    secrets: names(account.secrets),
    imagePullSecrets: names(account.imagePullSecrets),
  };
}

export function mapPod(pod: k8s.V1Pod, namespace: string): WorkloadSpec | undefined {
  const name = pod.metadata?.name;
  if (!name) return undefined;
  return {
    kind: 'Pod',
    namespace,
    name,
    spec: pod.spec ? mapPodSpec(pod.spec) : undefined,
  };
}

export function mapController(
  kind: ControllerKind,
  controller: ControllerLike,
  namespace: string,
): WorkloadSpec | undefined {
  const name = controller.metadata?.name;
  if (!name) return undefined;
  const template = controller.spec?.template;
  return {
    kind,
    namespace,
    name,
    template: template ? { spec: template.spec ? mapPodSpec(template.spec) : undefined } : undefined,
  };
}

export const compact = <T>(items: Array<T | undefined>): T[] =>
  items.filter((item): item is T => item !== undefined);
