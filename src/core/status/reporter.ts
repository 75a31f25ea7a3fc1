import type {
  ReconciliationPhase,
  ReconciliationStatus,
  UnitStatus,
  UnitStatusName,
} from '../types/reconciliation.js';

const PHASE_STATUS: Readonly<Record<ReconciliationPhase, UnitStatusName>> = {
  Waiting: 'waiting',
  Applying: 'maintenance',
  Active: 'active',
  Blocked: 'blocked',
  Error: 'error',
};

/**
 * Externally visible status for the last completed or currently attempted pass
 */
export function reportStatus(status: Readonly<ReconciliationStatus>): UnitStatus {
  return { name: PHASE_STATUS[status.phase], message: status.message };
}

export function formatUnitStatus(status: UnitStatus): string {
  return status.message === '' ? status.name : `${status.name}: ${status.message}`;
}
