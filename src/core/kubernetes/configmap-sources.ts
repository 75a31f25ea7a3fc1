/**
 * ConfigMap-backed configuration and status, and ingress-backed relation facts
 */

import type { CoreV1Api, NetworkingV1Api, V1ConfigMap } from '@kubernetes/client-node';
import { type } from 'arktype';
import { rawConfigFromOptions } from '../config/options.js';
import { formatArktypeError } from '../errors.js';
import { getComponentLogger, type OperatorLogger } from '../logging/index.js';
import type { ConfigSource, RelationFactsSource, StatusStore } from '../types/adapters.js';
import type { OptionDefinitions, RawConfig, RelationFacts } from '../types/config.js';
import type { ReconciliationStatus } from '../types/reconciliation.js';
import { isNotFoundError, toAdapterError } from './errors.js';
import { MANAGED_BY, MANAGED_BY_LABEL } from './ingress-adapter.js';
import { ingressEndpoint } from './type-guards.js';

export type ConfigMapApi = Pick<
  CoreV1Api,
  'readNamespacedConfigMap' | 'replaceNamespacedConfigMap' | 'createNamespacedConfigMap'
>;

interface ConfigMapRef {
  api: ConfigMapApi;
  namespace: string;
  name: string;
}

async function readConfigMap(
  ref: ConfigMapRef,
  operation: 'readConfig' | 'loadStatus' | 'saveStatus'
): Promise<V1ConfigMap | undefined> {
  try {
    return await ref.api.readNamespacedConfigMap({ name: ref.name, namespace: ref.namespace });
  } catch (error) {
    if (isNotFoundError(error)) {
      return undefined;
    }
    throw toAdapterError(error, operation);
  }
}

/**
 * Reads the four options from the data of a ConfigMap. A missing ConfigMap
 * means every option takes its default.
 */
export class ConfigMapConfigSource implements ConfigSource {
  private readonly logger: OperatorLogger;

  constructor(
    private readonly ref: ConfigMapRef,
    private readonly definitions: OptionDefinitions
  ) {
    this.logger = getComponentLogger('configmap-config', { namespace: ref.namespace, resourceName: ref.name });
  }

  async readConfig(): Promise<RawConfig> {
    const configMap = await readConfigMap(this.ref, 'readConfig');
    if (!configMap) {
      this.logger.debug('Configuration ConfigMap not found, using option defaults');
    }
    return rawConfigFromOptions(configMap?.data ?? {}, this.definitions);
  }
}

export type IngressStatusApi = Pick<NetworkingV1Api, 'readNamespacedIngress'>;

export interface IngressRelationFactsOptions {
  api: IngressStatusApi;
  namespace: string;
  ingressName: string;
  /** Identity of the workload, used as its default hostname */
  appName: string;
}

/**
 * Default hostname from the application's identity, endpoint from the load
 * balancer address the ingress controller publishes
 */
export class IngressRelationFacts implements RelationFactsSource {
  constructor(private readonly options: IngressRelationFactsOptions) {}

  async readFacts(): Promise<RelationFacts> {
    const { api, namespace, ingressName, appName } = this.options;
    try {
      const ingress = await api.readNamespacedIngress({ name: ingressName, namespace });
      return { defaultHostname: appName, ingressEndpoint: ingressEndpoint(ingress) };
    } catch (error) {
      if (isNotFoundError(error)) {
        return { defaultHostname: appName };
      }
      throw toAdapterError(error, 'readRelationFacts');
    }
  }
}

const StoredStatusSchema = type({
  phase: "'Waiting' | 'Applying' | 'Active' | 'Blocked' | 'Error'",
  message: 'string',
  'lastAppliedRevision?': 'string',
  'attemptedRevision?': 'string',
  updatedAt: 'string',
});

/**
 * Persists the ReconciliationStatus as the data of a ConfigMap so a restarted
 * operator resumes from its last applied revision
 */
export class ConfigMapStatusStore implements StatusStore {
  private readonly logger: OperatorLogger;

  constructor(private readonly ref: ConfigMapRef) {
    this.logger = getComponentLogger('configmap-status', { namespace: ref.namespace, resourceName: ref.name });
  }

  async load(): Promise<ReconciliationStatus | undefined> {
    const configMap = await readConfigMap(this.ref, 'loadStatus');
    if (!configMap?.data) {
      return undefined;
    }

    const result = StoredStatusSchema(configMap.data);
    if (result instanceof type.errors) {
      throw formatArktypeError(result, `status in ConfigMap ${this.ref.namespace}/${this.ref.name}`);
    }
    return result;
  }

  async save(status: ReconciliationStatus): Promise<void> {
    const { api, namespace, name } = this.ref;
    const data: Record<string, string> = {
      phase: status.phase,
      message: status.message,
      updatedAt: status.updatedAt,
    };
    if (status.lastAppliedRevision !== undefined) {
      data.lastAppliedRevision = status.lastAppliedRevision;
    }
    if (status.attemptedRevision !== undefined) {
      data.attemptedRevision = status.attemptedRevision;
    }

    const live = await readConfigMap(this.ref, 'saveStatus');
    const body: V1ConfigMap = {
      apiVersion: 'v1',
      kind: 'ConfigMap',
      metadata: {
        ...live?.metadata,
        name,
        namespace,
        labels: { ...live?.metadata?.labels, [MANAGED_BY_LABEL]: MANAGED_BY },
      },
      data,
    };

    try {
      if (live) {
        await api.replaceNamespacedConfigMap({ name, namespace, body });
      } else {
        await api.createNamespacedConfigMap({ namespace, body });
      }
    } catch (error) {
      throw toAdapterError(error, 'saveStatus');
    }
    this.logger.trace('Saved reconciliation status', { phase: status.phase });
  }
}
