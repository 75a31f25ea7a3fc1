/**
 * Ingress adapter backed by a networking.k8s.io/v1 Ingress
 *
 * Prefix stripping is rendered in the nginx ingress controller's form: a
 * regex path with `use-regex` and a `rewrite-target` annotation.
 */

import type { NetworkingV1Api, V1Ingress, V1ObjectMeta } from '@kubernetes/client-node';
import { getComponentLogger, type OperatorLogger } from '../logging/index.js';
import type { AdapterCallOptions, IngressAdapter } from '../types/adapters.js';
import { PATH_TYPES, type PathType, type RoutingRule } from '../types/state.js';
import { isNotFoundError, toAdapterError } from './errors.js';

export const REWRITE_TARGET_ANNOTATION = 'nginx.ingress.kubernetes.io/rewrite-target';
export const USE_REGEX_ANNOTATION = 'nginx.ingress.kubernetes.io/use-regex';
export const MANAGED_BY_LABEL = 'app.kubernetes.io/managed-by';
export const MANAGED_BY = 'spring-boot-operator';

const STRIP_PATTERN_SUFFIX = '(/|$)(.*)';

export type IngressApi = Pick<
  NetworkingV1Api,
  'readNamespacedIngress' | 'replaceNamespacedIngress' | 'createNamespacedIngress'
>;

export interface KubernetesIngressAdapterOptions {
  api: IngressApi;
  namespace: string;
  ingressName: string;
  /** `spec.ingressClassName` written on every apply */
  ingressClassName?: string | undefined;
  logger?: OperatorLogger | undefined;
}

function unescapeRegex(value: string): string {
  return value.replace(/\\(.)/g, '$1');
}

function isPathType(value: string): value is PathType {
  return PATH_TYPES.some((pathType) => pathType === value);
}

/**
 * Read the routing rule back from a live Ingress; undefined when the ingress
 * carries anything but a single service-backed path, so that it never
 * matches a desired rule
 */
export function parseIngress(ingress: V1Ingress): RoutingRule | undefined {
  const rules = ingress.spec?.rules ?? [];
  const rule = rules[0];
  const paths = rule?.http?.paths ?? [];
  const path = paths[0];
  if (rules.length !== 1 || paths.length !== 1) {
    return undefined;
  }

  const service = path?.backend.service;
  const port = service?.port?.number;
  if (!rule?.host || !path?.path || !service || port === undefined || !isPathType(path.pathType)) {
    return undefined;
  }

  const pathType = path.pathType;
  const rewriteTarget = ingress.metadata?.annotations?.[REWRITE_TARGET_ANNOTATION];
  const pathPrefix =
    rewriteTarget !== undefined && path.path.endsWith(STRIP_PATTERN_SUFFIX)
      ? unescapeRegex(path.path.slice(0, -STRIP_PATTERN_SUFFIX.length))
      : path.path;

  return {
    host: rule.host,
    pathPrefix,
    pathType,
    pathPattern: path.path,
    ...(rewriteTarget !== undefined && { rewriteTarget }),
    serviceName: service.name,
    servicePort: port,
  };
}

/**
 * Render the routing rule onto an Ingress, keeping the metadata of the live
 * object (resourceVersion, foreign labels and annotations) when there is one
 */
export function renderIngress(
  rule: RoutingRule,
  base: { name: string; namespace: string; ingressClassName?: string | undefined; metadata?: V1ObjectMeta | undefined }
): V1Ingress {
  const annotations: Record<string, string> = { ...base.metadata?.annotations };
  delete annotations[REWRITE_TARGET_ANNOTATION];
  delete annotations[USE_REGEX_ANNOTATION];
  if (rule.rewriteTarget !== undefined) {
    annotations[REWRITE_TARGET_ANNOTATION] = rule.rewriteTarget;
    annotations[USE_REGEX_ANNOTATION] = 'true';
  }

  return {
    apiVersion: 'networking.k8s.io/v1',
    kind: 'Ingress',
    metadata: {
      ...base.metadata,
      name: base.name,
      namespace: base.namespace,
      labels: { ...base.metadata?.labels, [MANAGED_BY_LABEL]: MANAGED_BY },
      annotations,
    },
    spec: {
      ...(base.ingressClassName !== undefined && { ingressClassName: base.ingressClassName }),
      rules: [
        {
          host: rule.host,
          http: {
            paths: [
              {
                path: rule.pathPattern,
                pathType: rule.pathType,
                backend: {
                  service: { name: rule.serviceName, port: { number: rule.servicePort } },
                },
              },
            ],
          },
        },
      ],
    },
  };
}

export class KubernetesIngressAdapter implements IngressAdapter {
  readonly supportsCancellation = false;
  private readonly logger: OperatorLogger;

  constructor(private readonly options: KubernetesIngressAdapterOptions) {
    this.logger =
      options.logger ??
      getComponentLogger('ingress-adapter', {
        namespace: options.namespace,
        resourceName: options.ingressName,
      });
  }

  async fetchRoutingRule(_options: AdapterCallOptions): Promise<RoutingRule | undefined> {
    const ingress = await this.readIngress('fetchRoutingRule');
    return ingress ? parseIngress(ingress) : undefined;
  }

  async setRoutingRule(rule: RoutingRule, _options: AdapterCallOptions): Promise<void> {
    const { api, namespace, ingressName, ingressClassName } = this.options;
    const live = await this.readIngress('setRoutingRule');
    const body = renderIngress(rule, {
      name: ingressName,
      namespace,
      ingressClassName: ingressClassName ?? live?.spec?.ingressClassName,
      metadata: live?.metadata,
    });

    try {
      if (live) {
        await api.replaceNamespacedIngress({ name: ingressName, namespace, body });
      } else {
        await api.createNamespacedIngress({ namespace, body });
      }
    } catch (error) {
      throw toAdapterError(error, 'setRoutingRule');
    }

    this.logger.info(live ? 'Updated ingress routing rule' : 'Created ingress routing rule', {
      host: rule.host,
      path: rule.pathPattern,
    });
  }

  private async readIngress(operation: 'fetchRoutingRule' | 'setRoutingRule'): Promise<V1Ingress | undefined> {
    try {
      return await this.options.api.readNamespacedIngress({
        name: this.options.ingressName,
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
