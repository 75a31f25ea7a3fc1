/**
 * Operator assembly
 *
 * Wires the configuration source, relation facts, adapters and status store
 * into a Reconciler driven by a ReconcileLoop.
 */

import { loadOptionDefinitions } from './core/config/options.js';
import {
  ConfigMapConfigSource,
  ConfigMapStatusStore,
  IngressRelationFacts,
  KubernetesClientProvider,
  KubernetesIngressAdapter,
  KubernetesWorkloadAdapter,
} from './core/kubernetes/index.js';
import { getApplicationLogger, type OperatorLogger } from './core/logging/index.js';
import { ReconcileLoop } from './core/reconciler/loop.js';
import { Reconciler } from './core/reconciler/reconciler.js';
import type { OperatorSettings } from './core/settings.js';
import { reportStatus } from './core/status/reporter.js';
import type {
  ConfigSource,
  IngressAdapter,
  RelationFactsSource,
  StatusStore,
  WorkloadAdapter,
} from './core/types/adapters.js';
import type { OptionDefinitions } from './core/types/config.js';
import type {
  PassOutcome,
  ReconcileInputs,
  ReconciliationStatus,
  Trigger,
  UnitStatus,
} from './core/types/reconciliation.js';

export interface OperatorDependencies {
  workload: WorkloadAdapter;
  ingress: IngressAdapter;
  configSource: ConfigSource;
  factsSource: RelationFactsSource;
  statusStore: StatusStore;
}

export interface OperatorOptions {
  /** Called on every status transition with the externally visible status */
  onStatus?: ((status: UnitStatus, detail: ReconciliationStatus) => void) | undefined;
  onOutcome?: ((outcome: PassOutcome, trigger: Trigger) => void) | undefined;
  logger?: OperatorLogger | undefined;
  clock?: (() => Date) | undefined;
}

/**
 * Dependencies backed by a Deployment, an Ingress and two ConfigMaps in the
 * settings' namespace
 */
export function createKubernetesDependencies(
  settings: OperatorSettings,
  provider: KubernetesClientProvider = KubernetesClientProvider.create({
    kubeconfigPath: settings.kubeconfigPath,
    context: settings.kubeContext,
    skipTLSVerify: settings.kubeSkipTLSVerify,
  }),
  definitions: OptionDefinitions = loadOptionDefinitions()
): OperatorDependencies {
  const { namespace } = settings;
  const coreApi = provider.getCoreV1Api();
  const networkingApi = provider.getNetworkingV1Api();

  return {
    workload: new KubernetesWorkloadAdapter({
      api: provider.getAppsV1Api(),
      namespace,
      deploymentName: settings.deploymentName,
      containerName: settings.containerName,
    }),
    ingress: new KubernetesIngressAdapter({
      api: networkingApi,
      namespace,
      ingressName: settings.ingressName,
      ingressClassName: settings.ingressClassName,
    }),
    configSource: new ConfigMapConfigSource({ api: coreApi, namespace, name: settings.configMapName }, definitions),
    factsSource: new IngressRelationFacts({
      api: networkingApi,
      namespace,
      ingressName: settings.ingressName,
      appName: settings.appName,
    }),
    statusStore: new ConfigMapStatusStore({ api: coreApi, namespace, name: settings.statusConfigMapName }),
  };
}

export class Operator {
  private readonly logger: OperatorLogger;
  private readonly reconciler: Reconciler;
  private readonly loop: ReconcileLoop;
  private started = false;

  constructor(
    private readonly settings: OperatorSettings,
    private readonly deps: OperatorDependencies,
    options: OperatorOptions = {}
  ) {
    this.logger = options.logger ?? getApplicationLogger(settings.appName, settings.namespace);

    this.reconciler = new Reconciler({
      workload: deps.workload,
      ingress: deps.ingress,
      statusStore: deps.statusStore,
      compose: { serviceName: settings.appName },
      adapterTimeoutMs: settings.adapterTimeoutMs,
      retry: { maxAttempts: settings.retryMaxAttempts, baseDelay: settings.retryBaseDelayMs },
      logger: this.logger.child({ component: 'reconciler' }),
      onStatus: (status) => {
        const unit = reportStatus(status);
        this.logger.info('Status changed', { status: unit.name, message: unit.message });
        options.onStatus?.(unit, status);
      },
      clock: options.clock,
    });

    this.loop = new ReconcileLoop({
      reconciler: this.reconciler,
      readInputs: () => this.readInputs(),
      resyncIntervalMs: settings.resyncIntervalMs,
      retryDelayMs: settings.retryDelayMs,
      logger: this.logger.child({ component: 'reconcile-loop' }),
      onOutcome: options.onOutcome,
    });
  }

  /**
   * Restore the persisted status, then start periodic re-checks with an
   * immediate first pass
   */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;
    const restored = await this.reconciler.initialize();
    this.logger.info('Starting operator', {
      deployment: this.settings.deploymentName,
      ingress: this.settings.ingressName,
      lastAppliedRevision: restored.lastAppliedRevision,
    });
    this.loop.start();
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    await this.loop.stop();
  }

  /**
   * Re-read configuration and relation facts and queue a pass for whatever
   * changed, e.g. on a ConfigMap watch event
   */
  refresh(): Promise<void> {
    return this.loop.refresh();
  }

  /**
   * Queue a pass with explicit inputs
   */
  trigger(inputs: ReconcileInputs): number | undefined {
    return this.loop.enqueue('config-changed', inputs);
  }

  /** Resolves once nothing is running or queued */
  drain(): Promise<void> {
    return this.loop.drain();
  }

  getStatus(): ReconciliationStatus {
    return this.loop.getStatus();
  }

  getUnitStatus(): UnitStatus {
    return reportStatus(this.loop.getStatus());
  }

  private async readInputs(): Promise<ReconcileInputs> {
    const [config, facts] = await Promise.all([this.deps.configSource.readConfig(), this.deps.factsSource.readFacts()]);
    return { config, facts };
  }
}

export function createOperator(
  settings: OperatorSettings,
  deps: OperatorDependencies = createKubernetesDependencies(settings),
  options: OperatorOptions = {}
): Operator {
  return new Operator(settings, deps, options);
}
