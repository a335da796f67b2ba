export {
  DurationParseError,
  type RuleErrorCategory,
  RuleValidationError,
  UnknownFieldError,
  UnknownLookupError,
} from './rule-errors.js';
