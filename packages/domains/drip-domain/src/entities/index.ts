export { type DripContent, type DripProps, DripPropsSchema, Drip } from './drip.js';
export {
  QuerySetRule,
  type QuerySetRuleInput,
  type QuerySetRuleProps,
  QuerySetRulePropsSchema,
} from './queryset-rule.js';
export { SentDrip, type SentDripProps, SentDripPropsSchema } from './sent-drip.js';
