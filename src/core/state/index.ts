export {
  canonicalJson,
  compose,
  composeEnv,
  composeHealthCheck,
  computeRevision,
  HEALTH_CHECK_PATH,
  JAVA_TOOL_OPTIONS,
  MANAGED_ENV_KEYS,
  shortRevision,
  SPRING_APPLICATION_JSON,
} from './composer.js';
export type { ComposeOptions } from './composer.js';
