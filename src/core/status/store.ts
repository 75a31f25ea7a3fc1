import type { StatusStore } from '../types/adapters.js';
import type { ReconciliationStatus } from '../types/reconciliation.js';

/**
 * Status store for single-process runs and tests; forgets everything on exit
 */
export class InMemoryStatusStore implements StatusStore {
  private status: ReconciliationStatus | undefined;
  private writes = 0;

  constructor(initial?: ReconciliationStatus) {
    this.status = initial ? { ...initial } : undefined;
  }

  async load(): Promise<ReconciliationStatus | undefined> {
    return this.status ? { ...this.status } : undefined;
  }

  async save(status: ReconciliationStatus): Promise<void> {
    this.status = { ...status };
    this.writes++;
  }

  get saveCount(): number {
    return this.writes;
  }
}
