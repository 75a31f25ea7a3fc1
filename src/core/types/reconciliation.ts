/**
 * Reconciliation status and trigger types
 */

import type { RawConfig, RelationFacts } from './config.js';
import type { HealthCheck, RoutingRule } from './state.js';

export type ReconciliationPhase = 'Waiting' | 'Applying' | 'Active' | 'Blocked' | 'Error';

/**
 * Durable record of the last completed or currently attempted pass.
 * Only the reconciliation loop writes it.
 */
export interface ReconciliationStatus {
  phase: ReconciliationPhase;
  message: string;
  lastAppliedRevision?: string | undefined;
  /** Revision of the pass that produced this status, when one was composed */
  attemptedRevision?: string | undefined;
  /** ISO timestamp of the transition */
  updatedAt: string;
}

export type UnitStatusName = 'active' | 'blocked' | 'waiting' | 'maintenance' | 'error';

/**
 * Externally visible status
 */
export interface UnitStatus {
  name: UnitStatusName;
  message: string;
}

export type TriggerReason = 'config-changed' | 'relation-changed' | 'periodic' | 'retry';

export interface ReconcileInputs {
  config: RawConfig;
  facts: RelationFacts;
}

export interface Trigger {
  reason: TriggerReason;
  inputs: ReconcileInputs;
  /** Loop-assigned sequence number; later triggers have larger generations */
  generation: number;
}

export type ApplyAction =
  | { type: 'update-env'; env: Readonly<Record<string, string>> }
  | { type: 'update-health-check'; check: HealthCheck }
  | { type: 'update-routing-rule'; rule: RoutingRule };

export type PassOutcome =
  | { kind: 'applied'; revision: string; actions: ApplyAction['type'][] }
  | { kind: 'unchanged'; revision: string }
  | { kind: 'blocked'; reason: string }
  | { kind: 'waiting'; reason: string; retry: boolean }
  | { kind: 'failed'; reason: string; retry: boolean }
  | { kind: 'preempted'; supersededBy: number };
