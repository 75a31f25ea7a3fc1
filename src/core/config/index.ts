export {
  DEFAULT_SERVER_PORT,
  normalize,
  parseApplicationConfig,
  parseJvmOptions,
  parseStripPrefix,
  resolveServerPort,
} from './normalizer.js';
export {
  DEFAULT_OPTIONS_PATH,
  loadOptionDefinitions,
  OPTION_FIELDS,
  OPTION_NAMES,
  parseOptionDefinitions,
  rawConfigFromOptions,
} from './options.js';
