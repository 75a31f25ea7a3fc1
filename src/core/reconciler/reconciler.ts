/**
 * Reconciler
 *
 * Runs one reconciliation pass: observe, compose, diff, apply. Owns the
 * ReconciliationStatus; nothing else writes it.
 */

import { normalize } from '../config/normalizer.js';
import {
  type AdapterOperation,
  ConfigError,
  isRetryableAdapterError,
  PreemptedError,
  RelationUnavailableError,
  toError,
} from '../errors.js';
import { getComponentLogger, type OperatorLogger } from '../logging/index.js';
import { type ComposeOptions, compose, shortRevision } from '../state/composer.js';
import type { AdapterCallOptions, IngressAdapter, StatusStore, WorkloadAdapter } from '../types/adapters.js';
import type {
  ApplyAction,
  PassOutcome,
  ReconcileInputs,
  ReconciliationStatus,
  Trigger,
} from '../types/reconciliation.js';
import type { ActualState, DesiredState } from '../types/state.js';
import { computeActions } from './actions.js';
import { callWithTimeout, DEFAULT_ADAPTER_TIMEOUT_MS, type RetryOptions, withRetry } from './retry.js';

export interface ReconcilerOptions {
  workload: WorkloadAdapter;
  ingress: IngressAdapter;
  statusStore: StatusStore;
  compose?: ComposeOptions | undefined;
  /** Bound on every single adapter call */
  adapterTimeoutMs?: number | undefined;
  retry?: RetryOptions | undefined;
  logger?: OperatorLogger | undefined;
  /** Called after every status transition */
  onStatus?: ((status: ReconciliationStatus) => void) | undefined;
  clock?: (() => Date) | undefined;
}

type StatusUpdate = Omit<ReconciliationStatus, 'updatedAt'>;

export const INITIAL_STATUS_MESSAGE = 'Waiting for the first reconciliation';

function describeAction(action: ApplyAction): string {
  switch (action.type) {
    case 'update-env':
      return 'workload environment';
    case 'update-health-check':
      return 'workload health check';
    case 'update-routing-rule':
      return 'ingress routing rule';
  }
}

export class Reconciler {
  private status: ReconciliationStatus;
  private readonly logger: OperatorLogger;
  private readonly timeoutMs: number;
  private readonly clock: () => Date;

  constructor(private readonly options: ReconcilerOptions) {
    this.logger = options.logger ?? getComponentLogger('reconciler');
    this.timeoutMs = options.adapterTimeoutMs ?? DEFAULT_ADAPTER_TIMEOUT_MS;
    this.clock = options.clock ?? (() => new Date());
    this.status = {
      phase: 'Waiting',
      message: INITIAL_STATUS_MESSAGE,
      updatedAt: this.clock().toISOString(),
    };
  }

  /**
   * Restore the persisted status, if any. A store failure leaves the initial
   * Waiting status in place.
   */
  async initialize(): Promise<ReconciliationStatus> {
    try {
      const stored = await this.options.statusStore.load();
      if (stored) {
        this.status = stored;
        this.logger.debug('Restored reconciliation status', {
          phase: stored.phase,
          lastAppliedRevision: stored.lastAppliedRevision,
        });
      }
    } catch (error) {
      this.logger.error('Failed to load persisted reconciliation status', toError(error));
    }
    return this.getStatus();
  }

  getStatus(): ReconciliationStatus {
    return { ...this.status };
  }

  /**
   * Revision the given inputs would produce, or undefined when they cannot be
   * composed. Pure.
   */
  previewRevision(inputs: ReconcileInputs): string | undefined {
    const normalized = normalize(inputs.config);
    if (!normalized.ok) {
      return undefined;
    }
    try {
      return compose(normalized.value, inputs.facts, this.options.compose).revision;
    } catch (error) {
      if (error instanceof RelationUnavailableError) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Run one pass. Never throws: every failure ends in a status transition
   * and an outcome, except preemption, which leaves the status untouched.
   */
  async reconcile(trigger: Trigger, signal: AbortSignal = new AbortController().signal): Promise<PassOutcome> {
    const passLogger = this.logger.child({ generation: trigger.generation, reason: trigger.reason });
    passLogger.debug('Start reconciliation');

    try {
      return await this.runPass(trigger, signal, passLogger);
    } catch (error) {
      if (error instanceof PreemptedError) {
        passLogger.debug('Reconciliation preempted, discarding result', {
          revision: error.revision,
          supersededBy: error.supersededBy,
        });
        return { kind: 'preempted', supersededBy: error.supersededBy };
      }
      const failure = toError(error);
      passLogger.error('Unexpected reconciliation failure', failure);
      await this.transition({
        phase: 'Error',
        message: `Reconciliation failed: ${failure.message}`,
        lastAppliedRevision: this.status.lastAppliedRevision,
      });
      return { kind: 'failed', reason: failure.message, retry: true };
    }
  }

  /**
   * Record that the inputs of the next pass could not be read. The last
   * applied revision is kept; nothing is applied.
   */
  async reportInputFailure(error: unknown): Promise<ReconciliationStatus> {
    const reason = `Failed to read configuration: ${toError(error).message}`;
    this.logger.warn(reason);
    await this.transition({
      phase: 'Error',
      message: reason,
      lastAppliedRevision: this.status.lastAppliedRevision,
      attemptedRevision: this.status.attemptedRevision,
    });
    return this.getStatus();
  }

  private async runPass(trigger: Trigger, signal: AbortSignal, passLogger: OperatorLogger): Promise<PassOutcome> {
    const lastAppliedRevision = this.status.lastAppliedRevision;

    let actual: ActualState;
    try {
      actual = await this.fetchActualState(signal, passLogger);
    } catch (error) {
      this.throwIfPreempted(signal, undefined);
      const reason = `Failed to observe live state: ${toError(error).message}`;
      passLogger.warn(reason);
      await this.transition({ phase: 'Error', message: reason, lastAppliedRevision });
      return { kind: 'failed', reason, retry: true };
    }
    this.throwIfPreempted(signal, undefined);

    let desired: DesiredState;
    try {
      desired = this.composeDesiredState(trigger.inputs);
    } catch (error) {
      if (error instanceof ConfigError || error instanceof RelationUnavailableError) {
        passLogger.info('Reconciliation blocked', { code: error.code, reason: error.message });
        await this.transition({ phase: 'Blocked', message: error.message, lastAppliedRevision });
        return { kind: 'blocked', reason: error.message };
      }
      throw error;
    }

    if (actual.workload === undefined) {
      const reason = 'Waiting for the workload to be created';
      await this.transition({
        phase: 'Waiting',
        message: reason,
        lastAppliedRevision,
        attemptedRevision: desired.revision,
      });
      return { kind: 'waiting', reason, retry: true };
    }

    const actions = computeActions(desired, actual);
    const activeMessage = trigger.inputs.facts.ingressEndpoint
      ? `Serving on ${trigger.inputs.facts.ingressEndpoint}`
      : '';

    if (actions.length === 0) {
      if (desired.revision !== lastAppliedRevision) {
        passLogger.debug('Live state already matches new revision, recording it', {
          revision: desired.revision,
        });
      }
      await this.transition({
        phase: 'Active',
        message: activeMessage,
        lastAppliedRevision: desired.revision,
        attemptedRevision: desired.revision,
      });
      return { kind: 'unchanged', revision: desired.revision };
    }

    await this.transition({
      phase: 'Applying',
      message: `Applying revision ${shortRevision(desired.revision)}: ${actions.map(describeAction).join(', ')}`,
      lastAppliedRevision,
      attemptedRevision: desired.revision,
    });

    for (const action of actions) {
      this.throwIfPreempted(signal, desired.revision);
      try {
        await this.applyAction(action, signal, passLogger);
      } catch (error) {
        this.throwIfPreempted(signal, desired.revision);
        const failure = toError(error);
        const reason = `Failed to update ${describeAction(action)}: ${failure.message}`;
        passLogger.error('Apply action failed', failure, { action: action.type, revision: desired.revision });
        await this.transition({
          phase: 'Error',
          message: reason,
          lastAppliedRevision,
          attemptedRevision: desired.revision,
        });
        return { kind: 'failed', reason, retry: isRetryableAdapterError(failure) };
      }
    }
    this.throwIfPreempted(signal, desired.revision);

    passLogger.info('Applied revision', {
      revision: desired.revision,
      actions: actions.map((action) => action.type),
    });
    await this.transition({
      phase: 'Active',
      message: activeMessage,
      lastAppliedRevision: desired.revision,
      attemptedRevision: desired.revision,
    });
    return { kind: 'applied', revision: desired.revision, actions: actions.map((action) => action.type) };
  }

  private composeDesiredState(inputs: ReconcileInputs): DesiredState {
    const normalized = normalize(inputs.config);
    if (!normalized.ok) {
      throw normalized.error;
    }
    return compose(normalized.value, inputs.facts, this.options.compose);
  }

  private async fetchActualState(signal: AbortSignal, passLogger: OperatorLogger): Promise<ActualState> {
    const workload = await this.callAdapter(
      'fetchWorkload',
      (call) => this.options.workload.fetchWorkload(call),
      signal,
      passLogger
    );
    const routingRule = await this.callAdapter(
      'fetchRoutingRule',
      (call) => this.options.ingress.fetchRoutingRule(call),
      signal,
      passLogger
    );
    return { workload, routingRule };
  }

  private async applyAction(action: ApplyAction, signal: AbortSignal, passLogger: OperatorLogger): Promise<void> {
    switch (action.type) {
      case 'update-env':
        await this.callAdapter('setEnv', (call) => this.options.workload.setEnv(action.env, call), signal, passLogger);
        return;
      case 'update-health-check':
        await this.callAdapter(
          'setHealthCheck',
          (call) => this.options.workload.setHealthCheck(action.check, call),
          signal,
          passLogger
        );
        return;
      case 'update-routing-rule':
        await this.callAdapter(
          'setRoutingRule',
          (call) => this.options.ingress.setRoutingRule(action.rule, call),
          signal,
          passLogger
        );
        return;
    }
  }

  private callAdapter<T>(
    operation: AdapterOperation,
    call: (options: AdapterCallOptions) => Promise<T>,
    signal: AbortSignal,
    passLogger: OperatorLogger
  ): Promise<T> {
    return withRetry(() => callWithTimeout(operation, call, { timeoutMs: this.timeoutMs, parent: signal }), {
      ...this.options.retry,
      signal,
      logger: passLogger,
      label: operation,
    });
  }

  private throwIfPreempted(signal: AbortSignal, revision: string | undefined): void {
    if (!signal.aborted) {
      return;
    }
    if (signal.reason instanceof PreemptedError) {
      throw signal.reason;
    }
    throw new PreemptedError(revision, -1);
  }

  private async transition(update: StatusUpdate): Promise<void> {
    const current = this.status;
    if (
      current.phase === update.phase &&
      current.message === update.message &&
      current.lastAppliedRevision === update.lastAppliedRevision &&
      current.attemptedRevision === update.attemptedRevision
    ) {
      return;
    }

    const next: ReconciliationStatus = { ...update, updatedAt: this.clock().toISOString() };
    this.status = next;
    this.logger.debug('Status transition', { from: current.phase, to: next.phase, message: next.message });

    try {
      await this.options.statusStore.save(next);
    } catch (error) {
      this.logger.error('Failed to persist reconciliation status', toError(error), { phase: next.phase });
    }
    this.options.onStatus?.({ ...next });
  }
}
