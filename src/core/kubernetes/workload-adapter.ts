/**
 * Workload adapter backed by an apps/v1 Deployment
 *
 * The operator-managed variables live in the env of one container of the
 * deployment's pod template. Every other variable on that container is left
 * untouched. The same container carries the HTTP liveness check.
 */

import type { AppsV1Api, V1Container, V1Deployment, V1EnvVar, V1Probe } from '@kubernetes/client-node';
import { AdapterError, type AdapterOperation } from '../errors.js';
import { getComponentLogger, type OperatorLogger } from '../logging/index.js';
import { MANAGED_ENV_KEYS } from '../state/composer.js';
import type { AdapterCallOptions, WorkloadAdapter } from '../types/adapters.js';
import type { HealthCheck, ObservedWorkload, WorkloadEnv } from '../types/state.js';
import { isNotFoundError, toAdapterError } from './errors.js';
import { findContainer, isLiteralEnvVar } from './type-guards.js';

export type DeploymentApi = Pick<AppsV1Api, 'readNamespacedDeployment' | 'replaceNamespacedDeployment'>;

export interface KubernetesWorkloadAdapterOptions {
  api: DeploymentApi;
  namespace: string;
  deploymentName: string;
  /** Container holding the application; the first container when omitted */
  containerName?: string | undefined;
  logger?: OperatorLogger | undefined;
}

/**
 * Container env with every managed variable replaced by `env`. Unmanaged
 * variables keep their position; new managed ones are appended in the order
 * of `env`.
 */
export function mergeManagedEnv(current: readonly V1EnvVar[], env: WorkloadEnv): V1EnvVar[] {
  const merged: V1EnvVar[] = [];
  const written = new Set<string>();

  for (const envVar of current) {
    if (!MANAGED_ENV_KEYS.includes(envVar.name)) {
      merged.push(envVar);
      continue;
    }
    const value = env[envVar.name];
    if (value !== undefined && !written.has(envVar.name)) {
      merged.push({ name: envVar.name, value });
      written.add(envVar.name);
    }
  }

  for (const [name, value] of Object.entries(env)) {
    if (!written.has(name)) {
      merged.push({ name, value });
    }
  }

  return merged;
}

/**
 * Liveness settings calling `check` over HTTP. Timing fields and HTTP options
 * of the current settings are kept; any other handler is dropped.
 */
export function httpLivenessCheck(current: V1Probe | undefined, check: HealthCheck): V1Probe {
  const { exec: _exec, grpc: _grpc, tcpSocket: _tcpSocket, httpGet, ...timing } = current ?? {};
  return { ...timing, httpGet: { ...httpGet, path: check.path, port: check.port } };
}

/** Health check of a container; only an HTTP check on a numeric port counts */
export function observeHealthCheck(container: V1Container): HealthCheck | undefined {
  const httpGet = container.livenessProbe?.httpGet;
  if (!httpGet || typeof httpGet.port !== 'number') {
    return undefined;
  }
  return { path: httpGet.path ?? '/', port: httpGet.port };
}

export class KubernetesWorkloadAdapter implements WorkloadAdapter {
  readonly supportsCancellation = false;
  private readonly logger: OperatorLogger;

  constructor(private readonly options: KubernetesWorkloadAdapterOptions) {
    this.logger =
      options.logger ??
      getComponentLogger('workload-adapter', {
        namespace: options.namespace,
        resourceName: options.deploymentName,
      });
  }

  async fetchWorkload(_options: AdapterCallOptions): Promise<ObservedWorkload | undefined> {
    const deployment = await this.readDeployment('fetchWorkload');
    if (!deployment) {
      return undefined;
    }

    const container = findContainer(deployment, this.options.containerName);
    if (!container) {
      this.logger.debug('Deployment has no matching container yet', {
        container: this.options.containerName,
      });
      return undefined;
    }

    const env: Record<string, string> = {};
    for (const envVar of container.env ?? []) {
      if (MANAGED_ENV_KEYS.includes(envVar.name) && isLiteralEnvVar(envVar)) {
        env[envVar.name] = envVar.value;
      }
    }
    const healthCheck = observeHealthCheck(container);
    return { env, ...(healthCheck && { healthCheck }) };
  }

  async setEnv(env: WorkloadEnv, _options: AdapterCallOptions): Promise<void> {
    await this.updateContainer('setEnv', (container) => {
      container.env = mergeManagedEnv(container.env ?? [], env);
    });
    this.logger.info('Updated workload environment', { keys: Object.keys(env) });
  }

  async setHealthCheck(check: HealthCheck, _options: AdapterCallOptions): Promise<void> {
    await this.updateContainer('setHealthCheck', (container) => {
      container.livenessProbe = httpLivenessCheck(container.livenessProbe, check);
    });
    this.logger.info('Updated workload health check', { path: check.path, port: check.port });
  }

  /**
   * Read the deployment, change the application container and write it back
   */
  private async updateContainer(operation: AdapterOperation, update: (container: V1Container) => void): Promise<void> {
    const { namespace, deploymentName, containerName } = this.options;

    const deployment = await this.readDeployment(operation);
    if (!deployment) {
      throw new AdapterError(`Deployment ${namespace}/${deploymentName} not found`, operation, true, {
        statusCode: 404,
      });
    }

    const container = findContainer(deployment, containerName);
    if (!container) {
      throw new AdapterError(
        `Container ${containerName ?? '(first)'} not found in deployment ${namespace}/${deploymentName}`,
        operation,
        true
      );
    }
    update(container);

    try {
      await this.options.api.replaceNamespacedDeployment({
        name: deploymentName,
        namespace,
        body: deployment,
      });
    } catch (error) {
      throw toAdapterError(error, operation);
    }
  }

  private async readDeployment(operation: AdapterOperation): Promise<V1Deployment | undefined> {
    try {
      return await this.options.api.readNamespacedDeployment({
        name: this.options.deploymentName,
        namespace: this.options.namespace,
      });
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw toAdapterError(error, operation);
    }
  }
}
