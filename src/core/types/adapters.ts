/**
 * Narrow capability interfaces between the reconciler and the outside world
 */

import type { RawConfig, RelationFacts } from './config.js';
import type { ReconciliationStatus } from './reconciliation.js';
import type { HealthCheck, ObservedWorkload, RoutingRule, WorkloadEnv } from './state.js';

export interface AdapterCallOptions {
  /** Fires when the pass is preempted or the call timed out */
  signal: AbortSignal;
}

interface CancellationCapability {
  /**
   * True when the adapter stops work once `signal` fires. Otherwise a stale
   * call is allowed to finish and its result is discarded.
   */
  readonly supportsCancellation: boolean;
}

/**
 * Container runtime side: the workload's process environment and liveness check
 */
export interface WorkloadAdapter extends CancellationCapability {
  /** Resolves undefined when the workload does not exist */
  fetchWorkload(options: AdapterCallOptions): Promise<ObservedWorkload | undefined>;
  /**
   * Set exactly the given operator-managed variables; managed variables
   * missing from `env` are removed
   */
  setEnv(env: WorkloadEnv, options: AdapterCallOptions): Promise<void>;
  /** Replace the liveness check of the application container */
  setHealthCheck(check: HealthCheck, options: AdapterCallOptions): Promise<void>;
}

/**
 * Ingress controller side: the routing rule for the workload
 */
export interface IngressAdapter extends CancellationCapability {
  fetchRoutingRule(options: AdapterCallOptions): Promise<RoutingRule | undefined>;
  setRoutingRule(rule: RoutingRule, options: AdapterCallOptions): Promise<void>;
}

export interface ConfigSource {
  readConfig(): Promise<RawConfig>;
}

export interface RelationFactsSource {
  readFacts(): Promise<RelationFacts>;
}

export interface StatusStore {
  load(): Promise<ReconciliationStatus | undefined>;
  save(status: ReconciliationStatus): Promise<void>;
}
