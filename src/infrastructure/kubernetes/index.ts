export {
  createKubernetesClient,
  loadKubeConfig,
  type ClusterClient,
  type KubernetesClientOptions,
} from './client';
export * from './mappers';
