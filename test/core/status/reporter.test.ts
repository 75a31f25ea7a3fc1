import { describe, expect, it } from 'vitest';
import { formatUnitStatus, reportStatus } from '../../../src/core/status/reporter.js';
import { InMemoryStatusStore } from '../../../src/core/status/store.js';
import type { ReconciliationPhase, ReconciliationStatus } from '../../../src/core/types/reconciliation.js';

function status(phase: ReconciliationPhase, message = ''): ReconciliationStatus {
  return { phase, message, updatedAt: '2026-03-01T12:00:00.000Z' };
}

describe('Status Reporter', () => {
  it.each([
    ['Waiting', 'waiting'],
    ['Applying', 'maintenance'],
    ['Active', 'active'],
    ['Blocked', 'blocked'],
    ['Error', 'error'],
  ] as const)('should report %s as %s', (phase, name) => {
    expect(reportStatus(status(phase, 'details'))).toEqual({ name, message: 'details' });
  });

  it('should format the status with and without a message', () => {
    expect(formatUnitStatus({ name: 'active', message: '' })).toBe('active');
    expect(formatUnitStatus({ name: 'blocked', message: 'Invalid JSON' })).toBe('blocked: Invalid JSON');
  });
});

describe('InMemoryStatusStore', () => {
  it('should start empty unless seeded', async () => {
    await expect(new InMemoryStatusStore().load()).resolves.toBeUndefined();
    await expect(new InMemoryStatusStore(status('Active')).load()).resolves.toEqual(status('Active'));
  });

  it('should hand out copies and count writes', async () => {
    const store = new InMemoryStatusStore();
    const saved = status('Active', 'Serving');
    await store.save(saved);
    saved.message = 'changed afterwards';

    const loaded = await store.load();
    expect(loaded?.message).toBe('Serving');
    if (loaded) {
      loaded.phase = 'Error';
    }
    await expect(store.load()).resolves.toMatchObject({ phase: 'Active' });
    expect(store.saveCount).toBe(1);
  });
});
