/**
 * Option definitions
 *
 * The four recognised options, their defaults and descriptions live in
 * options.yaml at the package root.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { type } from 'arktype';
import * as yaml from 'js-yaml';
import { ConfigError, formatArktypeError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { OptionDefinitions, OptionName, RawConfig } from '../types/config.js';

const logger = getComponentLogger('config-options');

export const DEFAULT_OPTIONS_PATH = fileURLToPath(new URL('../../../options.yaml', import.meta.url));

/** RawConfig field fed by each option */
export const OPTION_FIELDS: Readonly<Record<OptionName, keyof RawConfig>> = {
  'application-config': 'applicationConfigJSON',
  'jvm-config': 'jvmConfig',
  'ingress-hostname': 'ingressHostname',
  'ingress-strip-url-prefix': 'ingressStripPrefix',
};

export const OPTION_NAMES: readonly OptionName[] = [
  'application-config',
  'jvm-config',
  'ingress-hostname',
  'ingress-strip-url-prefix',
];

const OptionDefinitionSchema = type({
  type: "'string'",
  'description?': 'string',
  default: 'string',
});

const OptionsFileSchema = type({
  options: {
    'application-config': OptionDefinitionSchema,
    'jvm-config': OptionDefinitionSchema,
    'ingress-hostname': OptionDefinitionSchema,
    'ingress-strip-url-prefix': OptionDefinitionSchema,
  },
});

/**
 * Parse option definitions from YAML text
 */
export function parseOptionDefinitions(text: string, source = 'options.yaml'): OptionDefinitions {
  const document: unknown = yaml.load(text);
  const result = OptionsFileSchema(document);

  if (result instanceof type.errors) {
    throw formatArktypeError(result, `option definitions in ${source}`);
  }

  return result.options;
}

export function loadOptionDefinitions(path: string = DEFAULT_OPTIONS_PATH): OptionDefinitions {
  return parseOptionDefinitions(readFileSync(path, 'utf8'), path);
}

/**
 * Build a RawConfig from option values keyed by option name. Absent options
 * take their declared default; unknown keys are ignored.
 */
export function rawConfigFromOptions(
  values: Readonly<Record<string, unknown>>,
  definitions: OptionDefinitions
): RawConfig {
  const unknown = Object.keys(values).filter((key) => !(key in OPTION_FIELDS));
  if (unknown.length > 0) {
    logger.warn('Ignoring unrecognised options', { options: unknown });
  }

  const config: RawConfig = {
    applicationConfigJSON: '',
    jvmConfig: '',
    ingressHostname: '',
    ingressStripPrefix: '',
  };

  for (const name of OPTION_NAMES) {
    const value = values[name];
    if (value === undefined || value === null) {
      config[OPTION_FIELDS[name]] = definitions[name].default;
    } else if (typeof value === 'string') {
      config[OPTION_FIELDS[name]] = value;
    } else {
      throw new ConfigError('InvalidOption', `Option ${name} must be a string`, name, {
        received: typeof value,
      });
    }
  }

  return config;
}
