/**
 * Workload Types
 *
 * Every supported workload kind reduces to a pod spec. Pods carry it directly,
 * controllers carry it inside their pod template.
 */

export interface SecretKeySelector {
  name?: string;
  key?: string;
  optional?: boolean;
}

export interface EnvVar {
  name: string;
  valueFrom?: {
    secretKeyRef?: SecretKeySelector;
    configMapKeyRef?: { name?: string; key?: string };
  };
}

export interface EnvFromSource {
  prefix?: string;
  secretRef?: { name?: string; optional?: boolean };
  configMapRef?: { name?: string; optional?: boolean };
}

export interface VolumeMount {
  name: string;
  mountPath?: string;
}

export interface Container {
  name: string;
  env?: EnvVar[];
  envFrom?: EnvFromSource[];
  volumeMounts?: VolumeMount[];
}

export interface Volume {
  name: string;
  secret?: { secretName?: string; optional?: boolean };
  projected?: {
    sources?: Array<{ secret?: { name?: string; optional?: boolean } }>;
  };
}

export interface PodSpec {
  containers: Container[];
  initContainers?: Container[];
  ephemeralContainers?: Container[];
  volumes?: Volume[];
  imagePullSecrets?: Array<{ name?: string }>;
  serviceAccountName?: string;
}

export interface PodTemplate {
  spec?: PodSpec;
}

export const CONTROLLER_KINDS = ['Deployment', 'StatefulSet', 'DaemonSet', 'ReplicaSet'] as const;

export type ControllerKind = (typeof CONTROLLER_KINDS)[number];

export type WorkloadKind = 'Pod' | ControllerKind;

interface WorkloadIdentity {
  readonly namespace: string;
  readonly name: string;
}

export interface PodWorkload extends WorkloadIdentity {
  readonly kind: 'Pod';
  readonly spec?: PodSpec;
}

export interface ControllerWorkload extends WorkloadIdentity {
  readonly kind: ControllerKind;
  readonly template?: PodTemplate;
}

export type WorkloadSpec = PodWorkload | ControllerWorkload;

export const workloadId = (workload: Pick<WorkloadSpec, 'kind' | 'name'>): string =>
  `${workload.kind}/${workload.name}`;
