/**
 * Config Normalizer
 *
 * Turns the four raw operator options into a typed NormalizedConfig. Pure: no
 * I/O, no logging, never throws.
 */

import { ConfigError } from '../errors.js';
import type { JsonObject, JsonValue, NormalizedConfig, RawConfig, Result } from '../types/config.js';

export const DEFAULT_SERVER_PORT = 8080;

const STRIP_PREFIX_PATTERN = /^\/[^/].*[^/]$|^\/[^/]$/;

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeJsonType(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Parse `application-config`. Empty input is an empty mapping.
 */
export function parseApplicationConfig(raw: string): JsonObject {
  if (raw === '') {
    return {};
  }

  let parsed: JsonValue;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    // End-of-input errors carry no position; the parser stopped at the end
    const position = /position (\d+)/.exec(detail)?.[1];
    const offset = position !== undefined ? Number(position) : raw.length;
    throw new ConfigError(
      'InvalidJSON',
      `Invalid application-config value, expecting JSON (parse error at position ${offset})`,
      'application-config',
      { detail, offset }
    );
  }

  if (!isJsonObject(parsed)) {
    throw new ConfigError(
      'InvalidJSON',
      'Invalid application-config value, expecting an object in JSON',
      'application-config',
      { received: describeJsonType(parsed) }
    );
  }

  return parsed;
}

export function parseJvmOptions(raw: string): string[] {
  return raw.split(/\s+/).filter((token) => token.length > 0);
}

export function parseStripPrefix(raw: string): string | undefined {
  if (raw === '') {
    return undefined;
  }

  if (!STRIP_PREFIX_PATTERN.test(raw)) {
    throw new ConfigError(
      'InvalidPrefix',
      `Invalid ingress-strip-url-prefix value '${raw}', expecting a path such as "/foo" (leading slash, no trailing slash)`,
      'ingress-strip-url-prefix',
      { value: raw }
    );
  }

  return raw;
}

function toPort(value: JsonValue): number | undefined {
  const port =
    typeof value === 'number' ? value : typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : NaN;
  return Number.isInteger(port) && port >= 1 && port <= 65535 ? port : undefined;
}

/**
 * Port of the Spring Boot server: `server.port` from the application
 * properties, or 8080
 */
export function resolveServerPort(appProperties: JsonObject): number {
  const server = appProperties.server;
  if (server === undefined || !isJsonObject(server)) {
    return DEFAULT_SERVER_PORT;
  }

  const configured = server.port;
  if (configured === undefined || configured === null) {
    return DEFAULT_SERVER_PORT;
  }

  const port = toPort(configured);
  if (port === undefined) {
    throw new ConfigError(
      'InvalidPort',
      `Invalid server.port in application-config: ${JSON.stringify(configured)}, expecting an integer between 1 and 65535`,
      'application-config',
      { value: configured }
    );
  }
  return port;
}

export function normalize(raw: RawConfig): Result<NormalizedConfig, ConfigError> {
  try {
    const appProperties = parseApplicationConfig(raw.applicationConfigJSON);
    const hostname = raw.ingressHostname.trim();

    return {
      ok: true,
      value: {
        appProperties,
        jvmOptions: parseJvmOptions(raw.jvmConfig),
        hostnameOverride: hostname === '' ? undefined : hostname,
        stripPrefix: parseStripPrefix(raw.ingressStripPrefix),
        serverPort: resolveServerPort(appProperties),
      },
    };
  } catch (error) {
    if (error instanceof ConfigError) {
      return { ok: false, error };
    }
    throw error;
  }
}
