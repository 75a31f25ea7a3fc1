export { computeActions, envEqual } from './actions.js';
export {
  DEFAULT_RESYNC_INTERVAL_MS,
  DEFAULT_RETRY_DELAY_MS,
  ReconcileLoop,
  type ReconcileLoopOptions,
} from './loop.js';
export { INITIAL_STATUS_MESSAGE, Reconciler, type ReconcilerOptions } from './reconciler.js';
export {
  backoffDelay,
  callWithTimeout,
  DEFAULT_ADAPTER_TIMEOUT_MS,
  type RetryOptions,
  sleep,
  withRetry,
} from './retry.js';
