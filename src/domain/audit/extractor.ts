/**
 * Reference Extractor
 *
 * Maps one pod spec to the secrets it references. Pure: the same spec always
 * yields the same references, in the same order.
 */

import type { Container, PodSpec, Volume } from '../types/workloads';
import type { ReferenceKind, SecretReference } from '../types/report';
import { DEFAULT_SERVICE_ACCOUNT, type ServiceAccountLookup } from './service-accounts';

export interface ExtractionResult {
  readonly references: readonly SecretReference[];
  /** Set when the pod runs as a service account with no known token secret */
  readonly unresolvedServiceAccount?: string;
}

const referenceKey = (secretName: string, kind: ReferenceKind): string =>
  `${kind}\u0000${secretName}`;

/**
 * Collects references with set semantics on (secretName, kind)
 */
class ReferenceSet {
  private readonly entries = new Map<string, { secretName: string; kind: ReferenceKind }>();
  private readonly mounts = new Map<string, Set<string>>();

  add(secretName: string | undefined, kind: ReferenceKind): void {
    if (!secretName) return;
    const key = referenceKey(secretName, kind);
    if (!this.entries.has(key)) {
      this.entries.set(key, { secretName, kind });
    }
  }

  addVolume(secretName: string | undefined, containers: readonly string[]): void {
    if (!secretName) return;
    this.add(secretName, 'volumeMount');
    const key = referenceKey(secretName, 'volumeMount');
    const mountedBy = this.mounts.get(key) ?? new Set<string>();
    containers.forEach((name) => mountedBy.add(name));
    this.mounts.set(key, mountedBy);
  }

  toArray(): SecretReference[] {
    return [...this.entries.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, entry]) => {
        const mountedBy = this.mounts.get(key);
        return mountedBy ? { ...entry, mountedBy: [...mountedBy].sort() } : entry;
      });
  }
}

function allContainers(spec: PodSpec): Container[] {
  return [
    ...(spec.containers ?? []),
    ...(spec.initContainers ?? []),
    ...(spec.ephemeralContainers ?? []),
  ];
}

function collectContainerReferences(container: Container, references: ReferenceSet): void {
  for (const env of container.env ?? []) {
    references.add(env.valueFrom?.secretKeyRef?.name, 'envVar');
  }
  for (const source of container.envFrom ?? []) {
    references.add(source.secretRef?.name, 'envFromSource');
  }
}

/**
 * Secret names a volume draws from, either directly or through projection
 */
function volumeSecretNames(volume: Volume): string[] {
  const names: string[] = [];
  if (volume.secret?.secretName) {
    names.push(volume.secret.secretName);
  }
  for (const source of volume.projected?.sources ?? []) {
    if (source.secret?.name) {
      names.push(source.secret.name);
    }
  }
  return names;
}

export function extractReferences(
  spec: PodSpec,
  accounts?: ServiceAccountLookup,
): ExtractionResult {
  const references = new ReferenceSet();
  const containers = allContainers(spec);

  containers.forEach((container) => collectContainerReferences(container, references));

  // A declared volume counts even when no container mounts it
  for (const volume of spec.volumes ?? []) {
    const mountedBy = containers
      .filter((container) =>
        (container.volumeMounts ?? []).some((mount) => mount.name === volume.name),
      )
      .map((container) => container.name);
    volumeSecretNames(volume).forEach((name) => references.addVolume(name, mountedBy));
  }

  for (const pullSecret of spec.imagePullSecrets ?? []) {
    references.add(pullSecret.name, 'imagePullSecret');
  }

  const serviceAccount = spec.serviceAccountName;
  accounts
    ?.imagePullSecretsFor(serviceAccount ?? DEFAULT_SERVICE_ACCOUNT)
    .forEach((name) => references.add(name, 'imagePullSecret'));

  if (!serviceAccount) {
    return { references: references.toArray() };
  }

  const tokenSecrets = accounts?.tokensFor(serviceAccount);
  if (!tokenSecrets) {
    return { references: references.toArray(), unresolvedServiceAccount: serviceAccount };
  }
  tokenSecrets.forEach((name) => references.add(name, 'serviceAccountMount'));

  return { references: references.toArray() };
}
