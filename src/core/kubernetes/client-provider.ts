/**
 * Kubernetes Client Provider
 *
 * Loads the KubeConfig once and hands out the typed API clients the adapters
 * need, created lazily and cached.
 */

import * as k8s from '@kubernetes/client-node';
import { OperatorError, toError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';

/**
 * Configuration options for the Kubernetes client provider
 */
export interface KubernetesClientConfig {
  /**
   * Custom kubeconfig file path. Without it the in-cluster service account
   * is used when present, then the default kubeconfig.
   */
  kubeconfigPath?: string | undefined;

  /**
   * Custom context name (optional)
   */
  context?: string | undefined;

  /**
   * SECURITY WARNING: Only set to true in non-production environments.
   * This disables TLS certificate verification.
   *
   * @default false
   */
  skipTLSVerify?: boolean | undefined;
}

export class KubernetesClientProvider {
  private readonly logger = getComponentLogger('kubernetes-client-provider');
  private appsApi: k8s.AppsV1Api | undefined;
  private networkingApi: k8s.NetworkingV1Api | undefined;
  private coreApi: k8s.CoreV1Api | undefined;

  private constructor(private readonly kubeConfig: k8s.KubeConfig) {}

  /**
   * Load a KubeConfig from the given configuration
   */
  static create(config: KubernetesClientConfig = {}): KubernetesClientProvider {
    const kc = new k8s.KubeConfig();
    try {
      if (config.kubeconfigPath) {
        kc.loadFromFile(config.kubeconfigPath);
      } else {
        kc.loadFromDefault();
      }
      if (config.context) {
        kc.setCurrentContext(config.context);
      }
    } catch (error) {
      throw new OperatorError(
        `Failed to load kubeconfig: ${toError(error).message}`,
        'KUBECONFIG_ERROR',
        { kubeconfigPath: config.kubeconfigPath, context: config.context }
      );
    }

    if (config.skipTLSVerify) {
      const cluster = kc.getCurrentCluster();
      if (cluster) {
        kc.clusters = kc.clusters.map((c) => (c.name === cluster.name ? { ...c, skipTLSVerify: true } : c));
      }
    }

    return KubernetesClientProvider.fromKubeConfig(kc);
  }

  /**
   * Wrap a pre-configured KubeConfig
   */
  static fromKubeConfig(kubeConfig: k8s.KubeConfig): KubernetesClientProvider {
    const provider = new KubernetesClientProvider(kubeConfig);
    provider.logger.info('Kubernetes client provider initialized', {
      currentContext: kubeConfig.getCurrentContext(),
      server: kubeConfig.getCurrentCluster()?.server,
    });
    return provider;
  }

  getKubeConfig(): k8s.KubeConfig {
    return this.kubeConfig;
  }

  /**
   * Deployments
   */
  getAppsV1Api(): k8s.AppsV1Api {
    this.appsApi ??= this.kubeConfig.makeApiClient(k8s.AppsV1Api);
    return this.appsApi;
  }

  /**
   * Ingresses
   */
  getNetworkingV1Api(): k8s.NetworkingV1Api {
    this.networkingApi ??= this.kubeConfig.makeApiClient(k8s.NetworkingV1Api);
    return this.networkingApi;
  }

  /**
   * ConfigMaps
   */
  getCoreV1Api(): k8s.CoreV1Api {
    this.coreApi ??= this.kubeConfig.makeApiClient(k8s.CoreV1Api);
    return this.coreApi;
  }
}
