/**
 * Kubernetes Error Handling Utilities
 *
 * Status-code extraction and classification for errors thrown by the
 * Kubernetes client. The 1.x fetch-based client throws an ApiException
 * carrying `code`; proxies and older shapes carry `statusCode`,
 * `response.statusCode` or a Status object in `body`.
 */

import { AdapterError, type AdapterOperation } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { isRecord } from './type-guards.js';

const logger = getComponentLogger('kubernetes-errors');

/**
 * HTTP status codes that indicate a temporary condition
 */
const RETRYABLE_STATUS_CODES = [
  408, // Request Timeout
  409, // Conflict (stale resourceVersion on replace)
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
];

const NETWORK_ERROR_MARKERS = [
  'econnrefused',
  'econnreset',
  'enotfound',
  'etimedout',
  'network error',
  'socket hang up',
  'connection reset',
];

function numberAt(value: unknown, key: string): number | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const field = value[key];
  return typeof field === 'number' ? field : undefined;
}

function stringAt(value: unknown, key: string): string | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const field = value[key];
  return typeof field === 'string' ? field : undefined;
}

/**
 * The Kubernetes Status object of an error body, when the body is one.
 * ApiException bodies may also arrive as a JSON string.
 */
function statusBody(error: unknown): Record<string, unknown> | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  const body = error.body;
  if (isRecord(body)) {
    return body;
  }
  if (typeof body === 'string' && body.startsWith('{')) {
    try {
      const parsed: unknown = JSON.parse(body);
      return isRecord(parsed) ? parsed : undefined;
    } catch {
      return undefined;
    }
  }
  return undefined;
}

/**
 * Extract the HTTP status code from a Kubernetes API error
 *
 * @example
 * ```typescript
 * try {
 *   await apps.readNamespacedDeployment({ name, namespace });
 * } catch (error) {
 *   if (getErrorStatusCode(error) === 404) {
 *     // the deployment does not exist yet
 *   }
 * }
 * ```
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  const code =
    numberAt(error, 'code') ??
    numberAt(error, 'statusCode') ??
    numberAt(error.response, 'statusCode') ??
    numberAt(statusBody(error), 'code');

  if (code === undefined) {
    logger.debug('Could not extract status code from error', {
      errorKeys: Object.keys(error),
    });
  }
  return code;
}

export function isNotFoundError(error: unknown): boolean {
  return getErrorStatusCode(error) === 404;
}

/**
 * 409: the object already exists, or the resourceVersion sent with a
 * replace is stale
 */
export function isConflictError(error: unknown): boolean {
  return getErrorStatusCode(error) === 409;
}

export function isRetryableError(error: unknown): boolean {
  const statusCode = getErrorStatusCode(error);
  if (statusCode !== undefined) {
    return RETRYABLE_STATUS_CODES.includes(statusCode);
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (NETWORK_ERROR_MARKERS.some((marker) => message.includes(marker))) {
      return true;
    }
    // fetch reports network failures as TypeError
    if (error instanceof TypeError && message.includes('fetch')) {
      return true;
    }
    if (error.name === 'AbortError') {
      return true;
    }
  }

  return false;
}

/**
 * Format a Kubernetes API error into a single line
 *
 * @example
 * formatKubernetesError(error)
 * // "Kubernetes API error (404): NotFound: deployments.apps \"shop\" not found"
 */
export function formatKubernetesError(error: unknown): string {
  if (!isRecord(error)) {
    return String(error);
  }

  const statusCode = getErrorStatusCode(error);
  const body = statusBody(error);
  const parts = [statusCode !== undefined ? `Kubernetes API error (${statusCode})` : 'Kubernetes API error'];

  const reason = stringAt(body, 'reason');
  if (reason) {
    parts.push(reason);
  }

  const message = stringAt(body, 'message') ?? stringAt(error, 'message');
  if (message) {
    parts.push(message);
  }

  return parts.join(': ');
}

/**
 * Wrap a client error into an AdapterError for the given operation
 */
export function toAdapterError(error: unknown, operation: AdapterOperation): AdapterError {
  if (error instanceof AdapterError) {
    return error;
  }
  return new AdapterError(formatKubernetesError(error), operation, isRetryableError(error), {
    cause: error,
    statusCode: getErrorStatusCode(error),
  });
}
