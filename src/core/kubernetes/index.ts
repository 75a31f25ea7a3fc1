/**
 * Kubernetes Module
 *
 * Adapters that back the reconciler with a Deployment, an Ingress and two
 * ConfigMaps, plus the client provider and error helpers they share.
 */

export { KubernetesClientProvider, type KubernetesClientConfig } from './client-provider.js';
export {
  ConfigMapConfigSource,
  type ConfigMapApi,
  ConfigMapStatusStore,
  IngressRelationFacts,
  type IngressRelationFactsOptions,
  type IngressStatusApi,
} from './configmap-sources.js';
export {
  formatKubernetesError,
  getErrorStatusCode,
  isConflictError,
  isNotFoundError,
  isRetryableError,
  toAdapterError,
} from './errors.js';
export {
  type IngressApi,
  KubernetesIngressAdapter,
  type KubernetesIngressAdapterOptions,
  MANAGED_BY,
  MANAGED_BY_LABEL,
  parseIngress,
  renderIngress,
  REWRITE_TARGET_ANNOTATION,
  USE_REGEX_ANNOTATION,
} from './ingress-adapter.js';
export { findContainer, ingressEndpoint, isLiteralEnvVar, isRecord } from './type-guards.js';
export {
  type DeploymentApi,
  KubernetesWorkloadAdapter,
  type KubernetesWorkloadAdapterOptions,
  mergeManagedEnv,
} from './workload-adapter.js';
