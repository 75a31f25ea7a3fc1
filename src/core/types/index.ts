export type {
  AdapterCallOptions,
  ConfigSource,
  IngressAdapter,
  RelationFactsSource,
  StatusStore,
  WorkloadAdapter,
} from './adapters.js';
export type {
  JsonObject,
  JsonValue,
  NormalizedConfig,
  OptionDefinition,
  OptionDefinitions,
  OptionName,
  RawConfig,
  RelationFacts,
  Result,
} from './config.js';
export type {
  ApplyAction,
  PassOutcome,
  ReconcileInputs,
  ReconciliationPhase,
  ReconciliationStatus,
  Trigger,
  TriggerReason,
  UnitStatus,
  UnitStatusName,
} from './reconciliation.js';
export type {
  ActualState,
  DesiredState,
  HealthCheck,
  ObservedWorkload,
  PathType,
  RoutingRule,
  WorkloadEnv,
} from './state.js';
