export {
  type AnnotationRequest,
  PATH_SEPARATOR,
  type ResolvedField,
  resolveAnnotation,
} from './annotation-resolver.js';
export {
  buildPredicate,
  type CompiledPredicate,
  compileRule,
  type RuleDefinition,
} from './predicate-compiler.js';
export { RuleSet } from './rule-set.js';
export { type Clock, parseRuleValue } from './value-parser.js';
