export { Duration, type DurationParts } from './duration.js';
export {
  isLookupType,
  type LookupType,
  LookupTypeSchema,
} from './lookup-type.js';
export {
  isRuleMethod,
  type RuleMethod,
  RuleMethodSchema,
} from './rule-method.js';
export { type RuleValue, type RuleValueKind, toIsoDate } from './rule-value.js';
