/**
 * Error taxonomy for the operator
 *
 * Every failure that can end a reconciliation pass is one of these classes, so
 * the reconciler can turn it into a phase and a message without guessing.
 */

import type { ArkErrors } from 'arktype';

export class OperatorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OperatorError';
  }
}

export type ConfigErrorKind = 'InvalidJSON' | 'InvalidPrefix' | 'InvalidPort' | 'InvalidOption';

/**
 * Malformed operator configuration. Never retried; the operator stays blocked
 * until the input changes.
 */
export class ConfigError extends OperatorError {
  constructor(
    public readonly kind: ConfigErrorKind,
    message: string,
    public readonly option: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'CONFIG_ERROR', { kind, option, ...context });
    this.name = 'ConfigError';
  }
}

/**
 * A discovery fact needed to compose the desired state is missing
 */
export class RelationUnavailableError extends OperatorError {
  constructor(
    message: string,
    public readonly fact: string
  ) {
    super(message, 'RELATION_UNAVAILABLE', { fact });
    this.name = 'RelationUnavailableError';
  }
}

export type AdapterOperation =
  | 'fetchWorkload'
  | 'setEnv'
  | 'setHealthCheck'
  | 'fetchRoutingRule'
  | 'setRoutingRule'
  | 'readConfig'
  | 'readRelationFacts'
  | 'loadStatus'
  | 'saveStatus';

/**
 * Failure talking to the container runtime or the ingress controller
 */
export class AdapterError extends OperatorError {
  constructor(
    message: string,
    public readonly operation: AdapterOperation,
    public readonly retryable: boolean,
    options?: { cause?: unknown; statusCode?: number | undefined }
  ) {
    super(message, 'ADAPTER_ERROR', {
      operation,
      retryable,
      ...(options?.statusCode !== undefined && { statusCode: options.statusCode }),
    });
    this.name = 'AdapterError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class AdapterTimeoutError extends AdapterError {
  constructor(
    operation: AdapterOperation,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, operation, true);
    this.name = 'AdapterTimeoutError';
  }
}

/**
 * An in-flight pass was superseded by a trigger with a newer revision.
 * Not a failure: the loop discards it.
 */
export class PreemptedError extends OperatorError {
  constructor(
    public readonly revision: string | undefined,
    public readonly supersededBy: number
  ) {
    super(
      `Reconciliation of ${revision ?? 'unknown revision'} superseded by trigger #${supersededBy}`,
      'PREEMPTED',
      { revision, supersededBy }
    );
    this.name = 'PreemptedError';
  }
}

/**
 * Invalid process-level settings (environment or option definitions)
 */
export class SettingsError extends OperatorError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly suggestions?: string[]
  ) {
    super(message, 'SETTINGS_ERROR', { field, suggestions });
    this.name = 'SettingsError';
  }
}

export function isRetryableAdapterError(error: unknown): boolean {
  return error instanceof AdapterError && error.retryable;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Format arktype validation errors into a SettingsError listing every problem
 */
export function formatArktypeError(errors: ArkErrors, subject: string): SettingsError {
  const problems = [...errors];
  const first = problems[0];

  if (!first) {
    return new SettingsError(`Invalid ${subject}: ${errors.summary}`, undefined, [
      `Check ${subject} against its schema`,
    ]);
  }

  const fieldPath = first.path.length > 0 ? first.path.map(String).join('.') : 'root';
  let message = `Invalid ${subject} at '${fieldPath}': ${first.message}`;

  const suggestions: string[] = [];
  if (first.code === 'required') {
    suggestions.push(`Add the required field '${fieldPath}'`);
  }

  if (problems.length > 1) {
    message += '\n\nAdditional validation errors:';
    problems.slice(1).forEach((problem, index) => {
      const path = problem.path.length > 0 ? problem.path.map(String).join('.') : 'root';
      message += `\n  ${index + 2}. ${path}: ${problem.message}`;
    });
    suggestions.push(`Fix all ${problems.length} validation errors listed above`);
  }

  return new SettingsError(message, fieldPath, suggestions);
}
