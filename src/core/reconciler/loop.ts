/**
 * Reconcile Loop
 *
 * Serializes every trigger into a single consumer so that no two passes run
 * against the workload and ingress at the same time.
 *
 * - Pending triggers coalesce: only the latest one runs.
 * - A trigger whose inputs compose to a different revision than the pass in
 *   flight preempts it; the stale pass's result is discarded.
 * - A trigger that composes to the in-flight revision is dropped.
 * - Inputs that cannot be read are reported as an Error status and read
 *   again after the retry delay.
 */

import { PreemptedError, toError } from '../errors.js';
import { getComponentLogger, type OperatorLogger } from '../logging/index.js';
import { canonicalJson, shortRevision } from '../state/composer.js';
import type {
  PassOutcome,
  ReconcileInputs,
  ReconciliationStatus,
  Trigger,
  TriggerReason,
} from '../types/reconciliation.js';
import type { Reconciler } from './reconciler.js';

export interface ReconcileLoopOptions {
  reconciler: Reconciler;
  /**
   * Reads fresh inputs for periodic re-checks. Without it the loop re-uses
   * the inputs of the last external trigger.
   */
  readInputs?: (() => Promise<ReconcileInputs>) | undefined;
  /**
   * Interval of periodic re-checks in milliseconds
   * @default 60000
   */
  resyncIntervalMs?: number | undefined;
  /**
   * Delay before a failed or waiting pass is retried
   * @default 10000
   */
  retryDelayMs?: number | undefined;
  logger?: OperatorLogger | undefined;
  /** Called after every pass that was not preempted */
  onOutcome?: ((outcome: PassOutcome, trigger: Trigger) => void) | undefined;
}

interface InFlightPass {
  trigger: Trigger;
  revision: string | undefined;
  controller: AbortController;
}

export const DEFAULT_RESYNC_INTERVAL_MS = 60000;
export const DEFAULT_RETRY_DELAY_MS = 10000;

export class ReconcileLoop {
  private readonly reconciler: Reconciler;
  private readonly logger: OperatorLogger;
  private generation = 0;
  private latestInputs: ReconcileInputs | undefined;
  private pending: Trigger | undefined;
  private inFlight: InFlightPass | undefined;
  private processing: Promise<void> | undefined;
  private resyncTimer: NodeJS.Timeout | undefined;
  private retryTimer: NodeJS.Timeout | undefined;
  private running = false;
  private refreshing: Promise<void> | undefined;
  private refreshAgain = false;

  constructor(private readonly options: ReconcileLoopOptions) {
    this.reconciler = options.reconciler;
    this.logger = options.logger ?? getComponentLogger('reconcile-loop');
  }

  getStatus(): ReconciliationStatus {
    return this.reconciler.getStatus();
  }

  /**
   * Queue a reconciliation. External events pass fresh inputs; periodic and
   * retry triggers re-use the latest ones. Returns the trigger's generation,
   * or undefined when there are no inputs to reconcile yet.
   */
  enqueue(reason: TriggerReason, inputs?: ReconcileInputs): number | undefined {
    if (inputs) {
      this.latestInputs = inputs;
    }
    if (!this.latestInputs) {
      this.logger.debug('Ignoring trigger before any inputs arrived', { reason });
      return undefined;
    }

    const trigger: Trigger = { reason, inputs: this.latestInputs, generation: ++this.generation };

    if (this.pending) {
      this.logger.debug('Coalescing pending trigger', {
        superseded: this.pending.generation,
        by: trigger.generation,
        reason,
      });
    }
    this.pending = trigger;

    if (this.inFlight) {
      this.resolveAgainstInFlight(this.inFlight, trigger);
    }

    this.schedule();
    return trigger.generation;
  }

  /**
   * Read fresh inputs and queue a trigger whose reason reflects what changed.
   * A refresh requested while a read is in flight reads once more after it.
   */
  refresh(): Promise<void> {
    if (this.refreshing) {
      this.refreshAgain = true;
      return this.refreshing;
    }
    this.refreshing = this.runRefreshes();
    return this.refreshing;
  }

  /**
   * Start periodic re-checks and run an initial refresh
   */
  start(): void {
    if (this.running) {
      this.logger.warn('Reconcile loop is already running');
      return;
    }
    this.running = true;

    const interval = this.options.resyncIntervalMs ?? DEFAULT_RESYNC_INTERVAL_MS;
    this.logger.info('Starting reconcile loop', { resyncIntervalMs: interval });

    this.resyncTimer = setInterval(() => {
      void this.refresh();
    }, interval);
    void this.refresh();
  }

  /**
   * Stop timers and wait for the pass in flight to settle
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.resyncTimer) {
      clearInterval(this.resyncTimer);
      this.resyncTimer = undefined;
    }
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = undefined;
    }
    await this.refreshing;
    await this.drain();
    this.logger.info('Reconcile loop stopped');
  }

  /**
   * Resolves once no pass is running and nothing is queued
   */
  async drain(): Promise<void> {
    while (this.processing) {
      await this.processing;
    }
  }

  private resolveAgainstInFlight(inFlight: InFlightPass, trigger: Trigger): void {
    const revision = this.reconciler.previewRevision(trigger.inputs);
    if (revision === undefined) {
      return;
    }

    if (revision === inFlight.revision) {
      this.logger.debug('Trigger matches revision in flight, coalescing', {
        generation: trigger.generation,
        revision: shortRevision(revision),
      });
      this.pending = undefined;
      return;
    }

    if (!inFlight.controller.signal.aborted) {
      this.logger.info('Preempting reconciliation in flight', {
        inFlightGeneration: inFlight.trigger.generation,
        inFlightRevision: shortRevision(inFlight.revision),
        newRevision: shortRevision(revision),
      });
      inFlight.controller.abort(new PreemptedError(inFlight.revision, trigger.generation));
    }
  }

  private schedule(): void {
    if (this.processing) {
      return;
    }
    this.processing = this.consume();
  }

  private async consume(): Promise<void> {
    // yield once so `processing` is assigned before it can be cleared below
    await Promise.resolve();
    try {
      let trigger = this.takePending();
      while (trigger) {
        await this.runPass(trigger);
        trigger = this.takePending();
      }
    } finally {
      this.processing = undefined;
    }
  }

  private takePending(): Trigger | undefined {
    const trigger = this.pending;
    this.pending = undefined;
    return trigger;
  }

  private async runPass(trigger: Trigger): Promise<void> {
    const controller = new AbortController();
    this.inFlight = {
      trigger,
      revision: this.reconciler.previewRevision(trigger.inputs),
      controller,
    };

    try {
      const outcome = await this.reconciler.reconcile(trigger, controller.signal);
      if (outcome.kind === 'preempted') {
        return;
      }
      this.options.onOutcome?.(outcome, trigger);
      if ((outcome.kind === 'failed' || outcome.kind === 'waiting') && outcome.retry) {
        this.scheduleRetry();
      }
    } catch (error) {
      this.logger.error('Reconciliation pass crashed', toError(error), { generation: trigger.generation });
      this.scheduleRetry();
    } finally {
      this.inFlight = undefined;
    }
  }

  /**
   * Retry a failed pass with the latest inputs, or re-read the inputs when
   * reading them was what failed
   */
  private scheduleRetry(kind: 'pass' | 'inputs' = 'pass'): void {
    if (this.retryTimer || !this.running) {
      return;
    }
    const delay = this.options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.logger.debug('Scheduling retry', { delay, kind });
    this.retryTimer = setTimeout(() => {
      this.retryTimer = undefined;
      if (kind === 'inputs') {
        void this.refresh();
      } else {
        this.enqueue('retry');
      }
    }, delay);
    this.retryTimer.unref();
  }

  private async runRefreshes(): Promise<void> {
    try {
      do {
        this.refreshAgain = false;
        await this.readAndEnqueue();
      } while (this.refreshAgain);
    } finally {
      this.refreshing = undefined;
    }
  }

  private async readAndEnqueue(): Promise<void> {
    const { readInputs } = this.options;
    if (!readInputs) {
      this.enqueue('periodic');
      return;
    }

    let inputs: ReconcileInputs;
    try {
      inputs = await readInputs();
    } catch (error) {
      await this.reconciler.reportInputFailure(error);
      this.scheduleRetry('inputs');
      return;
    }

    const previous = this.latestInputs;
    let reason: TriggerReason = 'periodic';
    if (!previous || canonicalJson(previous.config) !== canonicalJson(inputs.config)) {
      reason = 'config-changed';
    } else if (canonicalJson(previous.facts) !== canonicalJson(inputs.facts)) {
      reason = 'relation-changed';
    }
    this.enqueue(reason, inputs);
  }
}
