/**
 * Kubernetes Type Guards
 *
 * Shape checks for values read back from the API server, whose typed models
 * leave nearly every field optional.
 */

import type { V1Container, V1Deployment, V1EnvVar, V1Ingress } from '@kubernetes/client-node';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Container of a deployment by name, or the first container when no name is
 * given
 */
export function findContainer(deployment: V1Deployment, name?: string): V1Container | undefined {
  const containers = deployment.spec?.template.spec?.containers ?? [];
  if (name === undefined) {
    return containers[0];
  }
  return containers.find((container) => container.name === name);
}

/**
 * Env var carrying a literal value. Variables sourced through `valueFrom`
 * are not literal and never managed by the operator.
 */
export function isLiteralEnvVar(envVar: V1EnvVar): envVar is V1EnvVar & { value: string } {
  return envVar.valueFrom === undefined && typeof envVar.value === 'string';
}

/**
 * First load balancer address published in the ingress status
 */
export function ingressEndpoint(ingress: V1Ingress): string | undefined {
  const entries = ingress.status?.loadBalancer?.ingress ?? [];
  for (const entry of entries) {
    const address = entry.hostname ?? entry.ip;
    if (address) {
      return address;
    }
  }
  return undefined;
}
