import { routingRulesEqual } from '../ingress/rule-synthesizer.js';
import type { ApplyAction } from '../types/reconciliation.js';
import type { ActualState, DesiredState, HealthCheck, WorkloadEnv } from '../types/state.js';

export function envEqual(a: WorkloadEnv | undefined, b: WorkloadEnv | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every((key) => b[key] === a[key]);
}

export function healthChecksEqual(a: HealthCheck | undefined, b: HealthCheck | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return a.path === b.path && a.port === b.port;
}

/**
 * Minimal set of apply actions: env, then health check, then routing rule
 */
export function computeActions(desired: DesiredState, actual: ActualState): ApplyAction[] {
  const actions: ApplyAction[] = [];

  if (!envEqual(desired.env, actual.workload?.env)) {
    actions.push({ type: 'update-env', env: desired.env });
  }
  if (!healthChecksEqual(desired.healthCheck, actual.workload?.healthCheck)) {
    actions.push({ type: 'update-health-check', check: desired.healthCheck });
  }
  if (!routingRulesEqual(desired.routingRule, actual.routingRule)) {
    actions.push({ type: 'update-routing-rule', rule: desired.routingRule });
  }

  return actions;
}
