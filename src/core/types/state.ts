/**
 * Desired and actual state types
 */

export const PATH_TYPES = ['Prefix', 'Exact', 'ImplementationSpecific'] as const;

export type PathType = (typeof PATH_TYPES)[number];

/**
 * Ingress routing rule in the declarative form understood by the ingress adapter
 */
export interface RoutingRule {
  host: string;
  /** Prefix routed by this rule; "/" when nothing is stripped */
  pathPrefix: string;
  pathType: PathType;
  /**
   * Path as written into the ingress. With a strip prefix this is a regular
   * expression whose second capture group is the forwarded remainder.
   */
  pathPattern: string;
  /** Rewrite target referencing capture groups of pathPattern; absent for pass-through */
  rewriteTarget?: string | undefined;
  serviceName: string;
  servicePort: number;
}

export type WorkloadEnv = Readonly<Record<string, string>>;

/**
 * HTTP liveness check of the application container
 */
export interface HealthCheck {
  path: string;
  port: number;
}

/**
 * Immutable target snapshot. A new trigger produces a new DesiredState.
 */
export interface DesiredState {
  readonly env: WorkloadEnv;
  readonly routingRule: Readonly<RoutingRule>;
  readonly healthCheck: Readonly<HealthCheck>;
  /** Deterministic fingerprint of env, healthCheck and routingRule */
  readonly revision: string;
}

export interface ObservedWorkload {
  /** Operator-managed variables currently set on the workload process */
  env: WorkloadEnv;
  /** Undefined when the container has no HTTP liveness check on a numeric port */
  healthCheck?: HealthCheck | undefined;
}

/**
 * Live state fetched at the start of a pass and discarded after it
 */
export interface ActualState {
  /** Undefined when the workload does not exist yet */
  workload: ObservedWorkload | undefined;
  /** Undefined when no routing rule has been applied yet */
  routingRule: RoutingRule | undefined;
}
