/**
 * In-process stand-ins for the container runtime, the ingress controller and
 * the Kubernetes API
 */

import type { RawConfig, RelationFacts } from '../../src/core/types/config.js';
import type { AdapterCallOptions, IngressAdapter, WorkloadAdapter } from '../../src/core/types/adapters.js';
import type { ReconcileInputs, Trigger, TriggerReason } from '../../src/core/types/reconciliation.js';
import type { HealthCheck, ObservedWorkload, RoutingRule, WorkloadEnv } from '../../src/core/types/state.js';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function rawConfig(overrides: Partial<RawConfig> = {}): RawConfig {
  return {
    applicationConfigJSON: '',
    jvmConfig: '',
    ingressHostname: '',
    ingressStripPrefix: '',
    ...overrides,
  };
}

export function inputs(config: Partial<RawConfig> = {}, facts: RelationFacts = { defaultHostname: 'shop' }): ReconcileInputs {
  return { config: rawConfig(config), facts };
}

let nextGeneration = 0;

export function trigger(
  config: Partial<RawConfig> = {},
  facts: RelationFacts = { defaultHostname: 'shop' },
  reason: TriggerReason = 'config-changed'
): Trigger {
  return { reason, inputs: inputs(config, facts), generation: ++nextGeneration };
}

/**
 * Wait until `condition` holds, polling on the macrotask queue
 */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 1));
  }
}

/** Liveness check the composer derives for the default server port */
export const DEFAULT_HEALTH_CHECK: HealthCheck = { path: '/actuator/health', port: 8080 };

/**
 * Workload whose environment lives in memory. `env` undefined means the
 * workload does not exist. Its health check starts out as the default one.
 */
export class FakeWorkloadAdapter implements WorkloadAdapter {
  supportsCancellation = false;
  env: Record<string, string> | undefined;
  fetchCount = 0;
  readonly setEnvCalls: WorkloadEnv[] = [];
  /** Consumed one per call; the call fails with the error */
  readonly fetchFailures: Error[] = [];
  readonly setEnvFailures: Error[] = [];
  /** When set, setEnv waits for it before writing */
  setEnvGate: Promise<void> | undefined;
  /** Signal seen by the last setEnv call */
  lastSignal: AbortSignal | undefined;
  healthCheck: HealthCheck | undefined;
  readonly setHealthCheckCalls: HealthCheck[] = [];

  constructor(env: Record<string, string> | undefined, healthCheck: HealthCheck | undefined = DEFAULT_HEALTH_CHECK) {
    this.env = env;
    this.healthCheck = healthCheck;
  }

  async fetchWorkload(_options: AdapterCallOptions): Promise<ObservedWorkload | undefined> {
    this.fetchCount++;
    const failure = this.fetchFailures.shift();
    if (failure) {
      throw failure;
    }
    if (this.env === undefined) {
      return undefined;
    }
    return { env: { ...this.env }, ...(this.healthCheck && { healthCheck: { ...this.healthCheck } }) };
  }

  async setHealthCheck(check: HealthCheck, _options: AdapterCallOptions): Promise<void> {
    this.setHealthCheckCalls.push({ ...check });
    this.healthCheck = { ...check };
  }

  async setEnv(env: WorkloadEnv, options: AdapterCallOptions): Promise<void> {
    this.setEnvCalls.push({ ...env });
    this.lastSignal = options.signal;
    if (this.setEnvGate) {
      await this.setEnvGate;
    }
    const failure = this.setEnvFailures.shift();
    if (failure) {
      throw failure;
    }
    this.env = { ...env };
  }
}

export class FakeIngressAdapter implements IngressAdapter {
  supportsCancellation = false;
  rule: RoutingRule | undefined;
  fetchCount = 0;
  readonly setRuleCalls: RoutingRule[] = [];
  readonly fetchFailures: Error[] = [];
  readonly setRuleFailures: Error[] = [];

  constructor(rule?: RoutingRule) {
    this.rule = rule;
  }

  async fetchRoutingRule(_options: AdapterCallOptions): Promise<RoutingRule | undefined> {
    this.fetchCount++;
    const failure = this.fetchFailures.shift();
    if (failure) {
      throw failure;
    }
    return this.rule ? { ...this.rule } : undefined;
  }

  async setRoutingRule(rule: RoutingRule, _options: AdapterCallOptions): Promise<void> {
    this.setRuleCalls.push({ ...rule });
    const failure = this.setRuleFailures.shift();
    if (failure) {
      throw failure;
    }
    this.rule = { ...rule };
  }
}

/**
 * Error shaped like the client's ApiException
 */
export class FakeApiException extends Error {
  constructor(
    public readonly code: number,
    public readonly body: unknown = { kind: 'Status', code }
  ) {
    super(`HTTP-Code: ${code}`);
    this.name = 'ApiException';
  }
}

/**
 * Namespaced object store keyed by `namespace/name`, returning deep copies
 * so callers never alias stored objects
 */
export class FakeObjectStore<T extends { metadata?: { name?: string; namespace?: string; resourceVersion?: string } }> {
  private readonly objects = new Map<string, T>();
  private version = 0;
  readonly writes: Array<{ verb: 'create' | 'replace'; body: T }> = [];
  /** Consumed one per call to read */
  readonly readFailures: Error[] = [];

  put(namespace: string, name: string, body: T): T {
    const stored = this.stamp(structuredClone(body));
    this.objects.set(`${namespace}/${name}`, stored);
    return structuredClone(stored);
  }

  get(namespace: string, name: string): T | undefined {
    const object = this.objects.get(`${namespace}/${name}`);
    return object ? structuredClone(object) : undefined;
  }

  read(namespace: string, name: string): T {
    const failure = this.readFailures.shift();
    if (failure) {
      throw failure;
    }
    const object = this.get(namespace, name);
    if (!object) {
      throw new FakeApiException(404);
    }
    return object;
  }

  create(namespace: string, body: T): T {
    const name = body.metadata?.name ?? '';
    if (this.objects.has(`${namespace}/${name}`)) {
      throw new FakeApiException(409);
    }
    this.writes.push({ verb: 'create', body: structuredClone(body) });
    return this.put(namespace, name, body);
  }

  replace(namespace: string, name: string, body: T): T {
    const live = this.objects.get(`${namespace}/${name}`);
    if (!live) {
      throw new FakeApiException(404);
    }
    if (body.metadata?.resourceVersion !== live.metadata?.resourceVersion) {
      throw new FakeApiException(409);
    }
    this.writes.push({ verb: 'replace', body: structuredClone(body) });
    return this.put(namespace, name, body);
  }

  private stamp(body: T): T {
    if (!body.metadata) {
      throw new Error('Stored objects need metadata');
    }
    this.version++;
    body.metadata.resourceVersion = String(this.version);
    return body;
  }
}
