import { describe, expect, it } from 'vitest';
import { AdapterError } from '../../../src/core/errors.js';
import { ReconcileLoop } from '../../../src/core/reconciler/loop.js';
import { Reconciler } from '../../../src/core/reconciler/reconciler.js';
import type { RetryOptions } from '../../../src/core/reconciler/retry.js';
import { InMemoryStatusStore } from '../../../src/core/status/store.js';
import type {
  PassOutcome,
  ReconcileInputs,
  ReconciliationStatus,
  Trigger,
} from '../../../src/core/types/reconciliation.js';
import { deferred, FakeIngressAdapter, FakeWorkloadAdapter, inputs, waitFor } from '../../utils/fakes.js';

const INPUTS_A = inputs({ applicationConfigJSON: '{"greeting":"hi"}' });
const INPUTS_B = inputs({ applicationConfigJSON: '{"greeting":"hello"}', ingressStripPrefix: '/shop' });
const INPUTS_C = inputs({ applicationConfigJSON: '{"greeting":"hey"}' });

interface LoopHarness {
  loop: ReconcileLoop;
  reconciler: Reconciler;
  workload: FakeWorkloadAdapter;
  ingress: FakeIngressAdapter;
  outcomes: Array<{ outcome: PassOutcome; trigger: Trigger }>;
  transitions: ReconciliationStatus[];
}

function createHarness(
  readInputs?: () => Promise<ReconcileInputs>,
  retry: RetryOptions = { maxAttempts: 1 }
): LoopHarness {
  const workload = new FakeWorkloadAdapter({});
  const ingress = new FakeIngressAdapter();
  const transitions: ReconciliationStatus[] = [];
  const outcomes: LoopHarness['outcomes'] = [];
  const reconciler = new Reconciler({
    workload,
    ingress,
    statusStore: new InMemoryStatusStore(),
    retry,
    onStatus: (status) => transitions.push(status),
  });
  const loop = new ReconcileLoop({
    reconciler,
    readInputs,
    resyncIntervalMs: 60000,
    retryDelayMs: 10,
    onOutcome: (outcome, trigger) => outcomes.push({ outcome, trigger }),
  });
  return { loop, reconciler, workload, ingress, outcomes, transitions };
}

describe('ReconcileLoop', () => {
  it('should ignore triggers until inputs are known', async () => {
    const { loop, outcomes } = createHarness();

    expect(loop.enqueue('periodic')).toBeUndefined();
    await loop.drain();

    expect(outcomes).toHaveLength(0);
  });

  it('should hand out increasing generations', async () => {
    const { loop } = createHarness();
    const first = loop.enqueue('config-changed', INPUTS_A);
    const second = loop.enqueue('periodic');
    await loop.drain();

    expect(first).toBe(1);
    expect(second).toBe(2);
  });

  it('should coalesce pending triggers into the latest one', async () => {
    const { loop, workload, outcomes } = createHarness();

    loop.enqueue('config-changed', INPUTS_A);
    loop.enqueue('config-changed', INPUTS_B);
    const last = loop.enqueue('config-changed', INPUTS_C);
    await loop.drain();

    expect(outcomes).toHaveLength(1);
    expect(outcomes[0]?.trigger.generation).toBe(last);
    expect(workload.setEnvCalls).toEqual([{ SPRING_APPLICATION_JSON: '{"greeting":"hey"}' }]);
  });

  it('should drop a trigger that composes to the revision in flight', async () => {
    const { loop, workload, outcomes } = createHarness();
    const gate = deferred();
    workload.setEnvGate = gate.promise;

    loop.enqueue('config-changed', INPUTS_A);
    await waitFor(() => workload.setEnvCalls.length === 1);
    loop.enqueue('periodic');
    gate.resolve();
    await loop.drain();

    expect(outcomes.map(({ outcome }) => outcome.kind)).toEqual(['applied']);
    expect(workload.setEnvCalls).toHaveLength(1);
  });

  it('should preempt a stale pass without ever reporting its revision as applied', async () => {
    const { loop, reconciler, workload, ingress, outcomes, transitions } = createHarness();
    const revisionA = reconciler.previewRevision(INPUTS_A);
    const revisionB = reconciler.previewRevision(INPUTS_B);
    const gate = deferred();
    workload.setEnvGate = gate.promise;

    loop.enqueue('config-changed', INPUTS_A);
    await waitFor(() => workload.setEnvCalls.length === 1);
    expect(workload.lastSignal?.aborted).toBe(false);

    loop.enqueue('config-changed', INPUTS_B);
    expect(workload.lastSignal?.aborted).toBe(true);
    gate.resolve();
    await loop.drain();

    expect(outcomes).toHaveLength(1);
    expect(outcomes[0]?.outcome).toMatchObject({ kind: 'applied', revision: revisionB });
    expect(transitions.some((status) => status.lastAppliedRevision === revisionA)).toBe(false);
    expect(loop.getStatus()).toMatchObject({ phase: 'Active', lastAppliedRevision: revisionB });
    expect(workload.env).toEqual({ SPRING_APPLICATION_JSON: '{"greeting":"hello"}' });
    expect(ingress.setRuleCalls.map((rule) => rule.pathPrefix)).toEqual(['/shop']);
  });

  it('should not send the stale environment again after preemption during a backoff', async () => {
    const { loop, reconciler, workload, outcomes } = createHarness(undefined, { maxAttempts: 3, baseDelay: 60000 });
    workload.setEnvFailures.push(new AdapterError('connection reset', 'setEnv', true));

    loop.enqueue('config-changed', INPUTS_A);
    await waitFor(() => workload.setEnvCalls.length === 1);
    await new Promise((resolve) => setTimeout(resolve, 5));
    loop.enqueue('config-changed', INPUTS_B);
    await loop.drain();

    expect(workload.setEnvCalls).toEqual([
      { SPRING_APPLICATION_JSON: '{"greeting":"hi"}' },
      { SPRING_APPLICATION_JSON: '{"greeting":"hello"}' },
    ]);
    expect(outcomes).toHaveLength(1);
    expect(outcomes[0]?.outcome).toMatchObject({ kind: 'applied', revision: reconciler.previewRevision(INPUTS_B) });
  });

  it('should not preempt for inputs that cannot be composed', async () => {
    const { loop, workload, outcomes } = createHarness();
    const gate = deferred();
    workload.setEnvGate = gate.promise;

    loop.enqueue('config-changed', INPUTS_A);
    await waitFor(() => workload.setEnvCalls.length === 1);
    loop.enqueue('config-changed', inputs({ applicationConfigJSON: '{' }));
    expect(workload.lastSignal?.aborted).toBe(false);
    gate.resolve();
    await loop.drain();

    expect(outcomes.map(({ outcome }) => outcome.kind)).toEqual(['applied', 'blocked']);
    expect(loop.getStatus().phase).toBe('Blocked');
  });

  it('should derive the trigger reason from what changed on refresh', async () => {
    let current = INPUTS_A;
    const { loop, outcomes } = createHarness(async () => current);

    await loop.refresh();
    await loop.drain();
    await loop.refresh();
    await loop.drain();
    current = { config: INPUTS_A.config, facts: { defaultHostname: 'shop', ingressEndpoint: 'lb.example.com' } };
    await loop.refresh();
    await loop.drain();
    expect(loop.getStatus().message).toBe('Serving on lb.example.com');
    current = INPUTS_B;
    await loop.refresh();
    await loop.drain();

    expect(outcomes.map(({ trigger }) => trigger.reason)).toEqual([
      'config-changed',
      'periodic',
      'relation-changed',
      'config-changed',
    ]);
    expect(outcomes.map(({ outcome }) => outcome.kind)).toEqual(['applied', 'unchanged', 'unchanged', 'applied']);
  });

  it('should read again after a refresh requested while a read was in flight', async () => {
    let current = INPUTS_A;
    let reads = 0;
    const gate = deferred();
    const { loop, workload } = createHarness(async () => {
      reads++;
      const snapshot = current;
      if (reads === 1) {
        await gate.promise;
      }
      return snapshot;
    });

    const first = loop.refresh();
    current = INPUTS_B;
    const second = loop.refresh();
    gate.resolve();
    await Promise.all([first, second]);
    await loop.drain();

    expect(reads).toBe(2);
    expect(workload.env).toEqual({ SPRING_APPLICATION_JSON: '{"greeting":"hello"}' });
  });

  it('should report unreadable inputs and keep the last applied revision', async () => {
    let failing = false;
    const { loop, reconciler, workload, outcomes } = createHarness(async () => {
      if (failing) {
        throw new Error('configmaps "shop-config" is forbidden');
      }
      return INPUTS_A;
    });

    await loop.refresh();
    await loop.drain();
    failing = true;
    await loop.refresh();
    await loop.drain();

    expect(loop.getStatus()).toMatchObject({
      phase: 'Error',
      message: 'Failed to read configuration: configmaps "shop-config" is forbidden',
      lastAppliedRevision: reconciler.previewRevision(INPUTS_A),
    });
    expect(outcomes).toHaveLength(1);
    expect(workload.setEnvCalls).toHaveLength(1);
  });

  it('should read the inputs again after a failed read while running', async () => {
    let reads = 0;
    const { loop, outcomes, transitions } = createHarness(async () => {
      reads++;
      if (reads === 1) {
        throw new Error('connection refused');
      }
      return INPUTS_A;
    });

    loop.start();
    await waitFor(() => loop.getStatus().phase === 'Active');
    await loop.stop();

    expect(transitions.map((status) => status.phase)).toEqual(['Error', 'Applying', 'Active']);
    expect(transitions[0]?.message).toBe('Failed to read configuration: connection refused');
    expect(outcomes.map(({ trigger }) => trigger.reason)).toEqual(['config-changed']);
  });

  it('should retry a failed pass after the retry delay while running', async () => {
    const { loop, workload, outcomes } = createHarness(async () => INPUTS_A);
    workload.fetchFailures.push(new AdapterError('connection refused', 'fetchWorkload', true));

    loop.start();
    await waitFor(() => outcomes.length === 2);
    await loop.stop();

    expect(outcomes.map(({ trigger }) => trigger.reason)).toEqual(['config-changed', 'retry']);
    expect(outcomes.map(({ outcome }) => outcome.kind)).toEqual(['failed', 'applied']);
  });

  it('should not schedule retries when not started', async () => {
    const { loop, workload, outcomes } = createHarness();
    workload.fetchFailures.push(new AdapterError('connection refused', 'fetchWorkload', true));

    loop.enqueue('config-changed', INPUTS_A);
    await loop.drain();
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(outcomes.map(({ outcome }) => outcome.kind)).toEqual(['failed']);
  });

  it('should wait for the pass in flight on stop', async () => {
    const { loop, workload } = createHarness(async () => INPUTS_A);
    const gate = deferred();
    workload.setEnvGate = gate.promise;

    loop.start();
    await waitFor(() => workload.setEnvCalls.length === 1);
    const stopping = loop.stop();
    gate.resolve();
    await stopping;

    expect(loop.getStatus().phase).toBe('Active');
  });
});
