/**
 * spring-boot-operator - reconcile a Spring Boot workload and its ingress
 * from four declarative options.
 */

// =============================================================================
// CONFIGURATION
// =============================================================================
export * from './core/config/index.js';
export { loadOperatorSettings, DEFAULT_SETTINGS } from './core/settings.js';
export type { OperatorSettings } from './core/settings.js';

// =============================================================================
// DESIRED STATE
// =============================================================================
export * from './core/state/index.js';
export * from './core/ingress/index.js';

// =============================================================================
// RECONCILIATION
// =============================================================================
export * from './core/reconciler/index.js';
export * from './core/status/index.js';

// =============================================================================
// KUBERNETES
// =============================================================================
export * from './core/kubernetes/index.js';

// =============================================================================
// ERRORS AND LOGGING
// =============================================================================
export {
  AdapterError,
  AdapterTimeoutError,
  ConfigError,
  formatArktypeError,
  isRetryableAdapterError,
  OperatorError,
  PreemptedError,
  RelationUnavailableError,
  SettingsError,
  toError,
} from './core/errors.js';
export type { AdapterOperation, ConfigErrorKind } from './core/errors.js';
export * from './core/logging/index.js';

// =============================================================================
// TYPES
// =============================================================================
export type * from './core/types/index.js';

// =============================================================================
// OPERATOR
// =============================================================================
export { createKubernetesDependencies, createOperator, Operator } from './operator.js';
export type { OperatorDependencies, OperatorOptions } from './operator.js';
