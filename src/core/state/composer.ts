/**
 * Desired-State Composer
 *
 * Combines normalized configuration with relation facts into one immutable
 * DesiredState. Identical inputs always yield the identical revision.
 */

import { createHash } from 'node:crypto';
import { RelationUnavailableError } from '../errors.js';
import { synthesize } from '../ingress/rule-synthesizer.js';
import type { NormalizedConfig, RelationFacts } from '../types/config.js';
import type { DesiredState, HealthCheck, RoutingRule, WorkloadEnv } from '../types/state.js';

export const SPRING_APPLICATION_JSON = 'SPRING_APPLICATION_JSON';
export const JAVA_TOOL_OPTIONS = 'JAVA_TOOL_OPTIONS';

/** Spring Boot actuator health endpoint */
export const HEALTH_CHECK_PATH = '/actuator/health';

/** Workload variables owned by the operator; every other variable is left alone */
export const MANAGED_ENV_KEYS: readonly string[] = [SPRING_APPLICATION_JSON, JAVA_TOOL_OPTIONS];

export interface ComposeOptions {
  /** Service the ingress forwards to; defaults to the workload's default hostname */
  serviceName?: string | undefined;
}

export function composeEnv(config: NormalizedConfig): Record<string, string> {
  const env: Record<string, string> = {
    [SPRING_APPLICATION_JSON]: JSON.stringify(config.appProperties),
  };
  if (config.jvmOptions.length > 0) {
    env[JAVA_TOOL_OPTIONS] = config.jvmOptions.join(' ');
  }
  return env;
}

export function composeHealthCheck(config: NormalizedConfig): HealthCheck {
  return { path: HEALTH_CHECK_PATH, port: config.serverPort };
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, entry]) => entry !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, entry]) => [key, canonicalize(entry)])
    );
  }
  return value;
}

/**
 * JSON with object keys sorted at every level and undefined members dropped
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function computeRevision(env: WorkloadEnv, routingRule: RoutingRule, healthCheck: HealthCheck): string {
  const digest = createHash('sha256').update(canonicalJson({ env, healthCheck, routingRule })).digest('hex');
  return `sha256:${digest}`;
}

export function compose(
  config: NormalizedConfig,
  facts: RelationFacts,
  options: ComposeOptions = {}
): DesiredState {
  const host = config.hostnameOverride || facts.defaultHostname;
  if (host === undefined || host === '') {
    throw new RelationUnavailableError(
      'Waiting for the default hostname of the workload; set ingress-hostname or provide the application identity',
      'defaultHostname'
    );
  }

  const env = Object.freeze(composeEnv(config));
  const routingRule = Object.freeze(
    synthesize(host, config.stripPrefix, {
      serviceName: options.serviceName ?? facts.defaultHostname ?? host,
      servicePort: config.serverPort,
    })
  );

  const healthCheck = Object.freeze(composeHealthCheck(config));

  return Object.freeze({
    env,
    routingRule,
    healthCheck,
    revision: computeRevision(env, routingRule, healthCheck),
  });
}

/**
 * Short revision for status messages
 */
export function shortRevision(revision: string | undefined): string {
  if (revision === undefined) {
    return 'none';
  }
  const digest = revision.startsWith('sha256:') ? revision.slice('sha256:'.length) : revision;
  return digest.slice(0, 12);
}
