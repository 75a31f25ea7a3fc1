export {
  escapeRegex,
  rewritePath,
  routingRulesEqual,
  STRIP_REWRITE_TARGET,
  synthesize,
} from './rule-synthesizer.js';
export type { RuleBackend } from './rule-synthesizer.js';
