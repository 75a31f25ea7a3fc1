/**
 * Operator settings
 *
 * Process-level settings read from the environment once at start-up. These
 * are distinct from the four application options, which are re-read on every
 * trigger.
 */

import { type } from 'arktype';
import { formatArktypeError, SettingsError } from './errors.js';

export interface OperatorSettings {
  /** Identity of the managed application; its default hostname */
  appName: string;
  namespace: string;
  deploymentName: string;
  /** Application container; the first container of the pod template when unset */
  containerName?: string | undefined;
  ingressName: string;
  ingressClassName?: string | undefined;
  /** ConfigMap holding the application options */
  configMapName: string;
  /** ConfigMap the reconciliation status is persisted to */
  statusConfigMapName: string;
  resyncIntervalMs: number;
  adapterTimeoutMs: number;
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  /** Delay before a failed pass is retried by the loop */
  retryDelayMs: number;
  kubeconfigPath?: string | undefined;
  kubeContext?: string | undefined;
  /** Accept any certificate from the API server; local clusters only */
  kubeSkipTLSVerify?: boolean | undefined;
}

const SettingsSchema = type({
  appName: 'string > 0',
  namespace: 'string > 0',
  deploymentName: 'string > 0',
  'containerName?': 'string > 0',
  ingressName: 'string > 0',
  'ingressClassName?': 'string > 0',
  configMapName: 'string > 0',
  statusConfigMapName: 'string > 0',
  resyncIntervalMs: 'number.integer >= 1000',
  adapterTimeoutMs: 'number.integer >= 1',
  retryMaxAttempts: 'number.integer >= 1',
  retryBaseDelayMs: 'number.integer >= 0',
  retryDelayMs: 'number.integer >= 0',
  'kubeconfigPath?': 'string > 0',
  'kubeContext?': 'string > 0',
  'kubeSkipTLSVerify?': 'boolean',
});

export const DEFAULT_SETTINGS = {
  namespace: 'default',
  resyncIntervalMs: 60000,
  adapterTimeoutMs: 30000,
  retryMaxAttempts: 3,
  retryBaseDelayMs: 1000,
  retryDelayMs: 10000,
} as const;

function text(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

/** Unset means the default; anything else must parse as a number */
function numeric(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const value = text(env, key);
  return value === undefined ? fallback : Number(value);
}

/** "true" or "false"; anything else is left for the schema to reject */
function flag(env: NodeJS.ProcessEnv, key: string): boolean | string | undefined {
  const value = text(env, key)?.toLowerCase();
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

/**
 * Read and validate operator settings from environment variables
 *
 * @throws SettingsError naming the first invalid field
 */
export function loadOperatorSettings(env: NodeJS.ProcessEnv = process.env): OperatorSettings {
  const appName = text(env, 'OPERATOR_APP_NAME');
  if (appName === undefined) {
    throw new SettingsError('OPERATOR_APP_NAME is required', 'appName', [
      'Set OPERATOR_APP_NAME to the name of the managed application',
    ]);
  }

  const candidate = {
    appName,
    namespace: text(env, 'OPERATOR_NAMESPACE') ?? DEFAULT_SETTINGS.namespace,
    deploymentName: text(env, 'OPERATOR_DEPLOYMENT') ?? appName,
    containerName: text(env, 'OPERATOR_CONTAINER'),
    ingressName: text(env, 'OPERATOR_INGRESS') ?? appName,
    ingressClassName: text(env, 'OPERATOR_INGRESS_CLASS'),
    configMapName: text(env, 'OPERATOR_CONFIGMAP') ?? `${appName}-config`,
    statusConfigMapName: text(env, 'OPERATOR_STATUS_CONFIGMAP') ?? `${appName}-operator-status`,
    resyncIntervalMs: numeric(env, 'OPERATOR_RESYNC_INTERVAL_MS', DEFAULT_SETTINGS.resyncIntervalMs),
    adapterTimeoutMs: numeric(env, 'OPERATOR_ADAPTER_TIMEOUT_MS', DEFAULT_SETTINGS.adapterTimeoutMs),
    retryMaxAttempts: numeric(env, 'OPERATOR_RETRY_MAX_ATTEMPTS', DEFAULT_SETTINGS.retryMaxAttempts),
    retryBaseDelayMs: numeric(env, 'OPERATOR_RETRY_BASE_DELAY_MS', DEFAULT_SETTINGS.retryBaseDelayMs),
    retryDelayMs: numeric(env, 'OPERATOR_RETRY_DELAY_MS', DEFAULT_SETTINGS.retryDelayMs),
    kubeconfigPath: text(env, 'OPERATOR_KUBECONFIG'),
    kubeContext: text(env, 'OPERATOR_KUBE_CONTEXT'),
    kubeSkipTLSVerify: flag(env, 'OPERATOR_KUBE_SKIP_TLS_VERIFY'),
  };

  // optional keys must be absent rather than undefined for the schema
  const defined = Object.fromEntries(Object.entries(candidate).filter(([, value]) => value !== undefined));

  const result = SettingsSchema(defined);
  if (result instanceof type.errors) {
    throw formatArktypeError(result, 'operator settings');
  }
  return result;
}
