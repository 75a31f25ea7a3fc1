/**
 * Ingress Rule Synthesizer
 *
 * Builds the declarative routing rule for the workload. Prefix stripping is
 * expressed as a regex path plus a rewrite target (the nginx ingress form),
 * so the workload itself never sees the prefix.
 */

import { DEFAULT_SERVER_PORT } from '../config/normalizer.js';
import type { RoutingRule } from '../types/state.js';

export interface RuleBackend {
  serviceName: string;
  servicePort: number;
}

/** Forwards the second capture group of the strip pattern */
export const STRIP_REWRITE_TARGET = '/$2';

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function synthesize(
  host: string,
  stripPrefix?: string,
  backend: RuleBackend = { serviceName: host, servicePort: DEFAULT_SERVER_PORT }
): RoutingRule {
  if (stripPrefix === undefined || stripPrefix === '') {
    return {
      host,
      pathPrefix: '/',
      pathType: 'Prefix',
      pathPattern: '/',
      serviceName: backend.serviceName,
      servicePort: backend.servicePort,
    };
  }

  return {
    host,
    pathPrefix: stripPrefix,
    pathType: 'ImplementationSpecific',
    pathPattern: `${escapeRegex(stripPrefix)}(/|$)(.*)`,
    rewriteTarget: STRIP_REWRITE_TARGET,
    serviceName: backend.serviceName,
    servicePort: backend.servicePort,
  };
}

function matchesPrefix(prefix: string, path: string): boolean {
  return prefix === '/' || path === prefix || path.startsWith(`${prefix}/`);
}

/**
 * Path forwarded to the workload for a request path, as the ingress
 * controller would compute it; null when the rule does not route the path
 */
export function rewritePath(rule: RoutingRule, path: string): string | null {
  if (rule.rewriteTarget === undefined) {
    return matchesPrefix(rule.pathPrefix, path) ? path : null;
  }

  const match = new RegExp(`^${rule.pathPattern}`).exec(path);
  if (!match) {
    return null;
  }

  const rewritten = rule.rewriteTarget.replace(/\$(\d)/g, (_, group: string) => match[Number(group)] ?? '');
  return rewritten === '' ? '/' : rewritten;
}

export function routingRulesEqual(a: RoutingRule | undefined, b: RoutingRule | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return (
    a.host === b.host &&
    a.pathPrefix === b.pathPrefix &&
    a.pathType === b.pathType &&
    a.pathPattern === b.pathPattern &&
    a.rewriteTarget === b.rewriteTarget &&
    a.serviceName === b.serviceName &&
    a.servicePort === b.servicePort
  );
}
