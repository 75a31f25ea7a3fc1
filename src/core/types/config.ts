/**
 * Configuration types
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Operator configuration as supplied by the environment on every trigger.
 * Every field defaults to the empty string.
 */
export interface RawConfig {
  /** Spring Boot properties as a JSON object (`application-config`) */
  applicationConfigJSON: string;
  /** Whitespace separated JVM options (`jvm-config`) */
  jvmConfig: string;
  /** Hostname override for the ingress (`ingress-hostname`) */
  ingressHostname: string;
  /** URL prefix stripped by the ingress (`ingress-strip-url-prefix`) */
  ingressStripPrefix: string;
}

export interface NormalizedConfig {
  /** Parsed application properties; key order follows the input */
  appProperties: JsonObject;
  jvmOptions: string[];
  hostnameOverride?: string | undefined;
  /** Leading slash, no trailing slash, never bare "/" */
  stripPrefix?: string | undefined;
  /** Port the Spring Boot server listens on (`server.port`, default 8080) */
  serverPort: number;
}

/**
 * Facts discovered from relations with other parts of the deployment
 */
export interface RelationFacts {
  /** Hostname derived from the workload's own identity */
  defaultHostname?: string | undefined;
  /** Address the ingress controller publishes for the rule */
  ingressEndpoint?: string | undefined;
}

/**
 * One option declared in options.yaml
 */
export interface OptionDefinition {
  type: 'string';
  description?: string | undefined;
  default: string;
}

export type OptionName =
  | 'application-config'
  | 'jvm-config'
  | 'ingress-hostname'
  | 'ingress-strip-url-prefix';

export type OptionDefinitions = Record<OptionName, OptionDefinition>;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
