/**
 * Kubernetes Client - Direct k8s API Access
 *
 * Reads namespaces and per-namespace snapshots through @kubernetes/client-node.
 * Paging, retries and timeouts live here; the audit core only ever sees a
 * fully materialized snapshot.
 */

import * as k8s from '@kubernetes/client-node';
import type { Logger } from 'pino';
import { Failure, Success, type Result } from '../../domain/types/result';
import { createSnapshot, type ResourceSnapshot } from '../../domain/types/snapshot';
import {
  AuditCancelledError,
  ClusterAccessError,
  SnapshotFetchError,
  TimeoutError,
  toError,
} from '../../lib/errors';
import { withRetry, withTimeout } from '../../application/utils/async-utils';
import {
  compact,
  mapController,
  mapPod,
  mapSecret,
  mapServiceAccount,
} from './mappers';

export interface ClusterClient {
  listNamespaces: () => Promise<Result<string[], ClusterAccessError>>;
  fetchSnapshot: (
    namespace: string,
    signal?: AbortSignal,
  ) => Promise<Result<ResourceSnapshot, SnapshotFetchError>>;
}

export interface KubernetesClientOptions {
  /** Path to a kubeconfig file; default loading rules apply when unset */
  kubeconfig?: string;
  context?: string;
  timeout: number;
  retries: number;
  pageSize: number;
}

interface ListPage<T> {
  items: T[];
  metadata?: k8s.V1ListMeta;
}

type PageFetcher<T> = (cont: string | undefined) => Promise<{ body: ListPage<T> }>;

const isTransient = (error: Error): boolean => {
  if (error instanceof TimeoutError) return true;
  if (error instanceof k8s.HttpError) {
    const status = error.statusCode ?? 0;
    return status === 429 || status >= 500;
  }
  // Network-level failures carry no status
  return 'code' in error && typeof error.code === 'string';
};

const describeError = (error: Error): string => {
  if (error instanceof k8s.HttpError) {
    return `HTTP ${error.statusCode ?? 'unknown'}: ${error.message}`;
  }
  return error.message;
};

export function loadKubeConfig(options: Pick<KubernetesClientOptions, 'kubeconfig' | 'context'>): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  try {
    if (options.kubeconfig) {
      kc.loadFromFile(options.kubeconfig);
    } else {
      kc.loadFromDefault();
    }
    if (options.context) {
      kc.setCurrentContext(options.context);
    }
  } catch (error) {
    throw new ClusterAccessError(
      'Failed to load kubeconfig',
      { kubeconfig: options.kubeconfig, context: options.context },
      toError(error),
    );
  }
  return kc;
}

/**
 * Create a Kubernetes client with the read operations the audit needs
 */
export const createKubernetesClient = (
  logger: Logger,
  options: KubernetesClientOptions,
): ClusterClient => {
  const log = logger.child({ component: 'k8s-client' });
  const kc = loadKubeConfig(options);
  const coreApi = kc.makeApiClient(k8s.CoreV1Api);
  const appsApi = kc.makeApiClient(k8s.AppsV1Api);

  const call = <T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> =>
    withRetry(() => withTimeout(operation, options.timeout), {
      maxAttempts: Math.max(1, options.retries),
      retryIf: isTransient,
      signal,
      logger: log,
    });

  async function listAll<T>(fetchPage: PageFetcher<T>, signal?: AbortSignal): Promise<T[]> {
    const items: T[] = [];
    let cont: string | undefined;
    do {
      if (signal?.aborted) {
        throw new AuditCancelledError();
      }
      const { body } = await call(() => fetchPage(cont), signal);
      items.push(...body.items);
      cont = body.metadata?._continue || undefined;
    } while (cont);
    return items;
  }

  return {
    async listNamespaces(): Promise<Result<string[], ClusterAccessError>> {
      try {
        const namespaces = await listAll<k8s.V1Namespace>((cont) =>
          coreApi.listNamespace(undefined, undefined, cont, undefined, undefined, options.pageSize),
        );
        const names = compact(namespaces.map((ns) => ns.metadata?.name)).sort();
        log.debug({ count: names.length }, 'Namespaces listed');
        return Success(names);
      } catch (err) {
        const error = toError(err);
        log.error({ error: describeError(error) }, 'Failed to list namespaces');
        return Failure(
          new ClusterAccessError(`Failed to list namespaces: ${describeError(error)}`, {}, error),
        );
      }
    },

    async fetchSnapshot(
      namespace: string,
      signal?: AbortSignal,
    ): Promise<Result<ResourceSnapshot, SnapshotFetchError>> {
      let resource = 'secrets';
      const step = async <T>(name: string, fetchPage: PageFetcher<T>): Promise<T[]> => {
        resource = name;
        return listAll(fetchPage, signal);
      };
      const page = options.pageSize;

      try {
        const secrets = await step<k8s.V1Secret>('secrets', (cont) =>
          coreApi.listNamespacedSecret(namespace, undefined, undefined, cont, undefined, undefined, page),
        );
        const serviceAccounts = await step<k8s.V1ServiceAccount>('serviceaccounts', (cont) =>
          coreApi.listNamespacedServiceAccount(namespace, undefined, undefined, cont, undefined, undefined, page),
        );
        const pods = await step<k8s.V1Pod>('pods', (cont) =>
          coreApi.listNamespacedPod(namespace, undefined, undefined, cont, undefined, undefined, page),
        );
        const deployments = await step<k8s.V1Deployment>('deployments', (cont) =>
          appsApi.listNamespacedDeployment(namespace, undefined, undefined, cont, undefined, undefined, page),
        );
        const statefulSets = await step<k8s.V1StatefulSet>('statefulsets', (cont) =>
          appsApi.listNamespacedStatefulSet(namespace, undefined, undefined, cont, undefined, undefined, page),
        );
        const daemonSets = await step<k8s.V1DaemonSet>('daemonsets', (cont) =>
          appsApi.listNamespacedDaemonSet(namespace, undefined, undefined, cont, undefined, undefined, page),
        );
        const replicaSets = await step<k8s.V1ReplicaSet>('replicasets', (cont) =>
          appsApi.listNamespacedReplicaSet(namespace, undefined, undefined, cont, undefined, undefined, page),
        );

        const snapshot = createSnapshot({
          namespace,
          secrets: compact(secrets.map((secret) => mapSecret(secret, namespace))),
          serviceAccounts: compact(
            serviceAccounts.map((account) => mapServiceAccount(account, namespace)),
          ),
          workloads: compact([
            ...pods.map((pod) => mapPod(pod, namespace)),
            ...deployments.map((item) => mapController('Deployment', item, namespace)),
            ...statefulSets.map((item) => mapController('StatefulSet', item, namespace)),
            ...daemonSets.map((item) => mapController('DaemonSet', item, namespace)),
            ...replicaSets.map((item) => mapController('ReplicaSet', item, namespace)),
          ]),
        });

        log.debug(
          {
            namespace,
            secrets: snapshot.secrets.length,
            workloads: snapshot.workloads.length,
          },
          'Snapshot fetched',
        );
        return Success(snapshot);
      } catch (err) {
        if (err instanceof AuditCancelledError) {
          throw err;
        }
        const error = toError(err);
        return Failure(
          new SnapshotFetchError(
            `Failed to list ${resource} in namespace ${namespace}: ${describeError(error)}`,
            namespace,
            resource,
            error,
          ),
        );
      }
    },
  };
};
