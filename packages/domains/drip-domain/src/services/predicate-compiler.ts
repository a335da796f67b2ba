import { UnknownLookupError } from '../errors/rule-errors.js';
import type { Predicate, Queryable } from '../queryable/queryable.js';
import { isLookupType } from '../value-objects/lookup-type.js';
import {
  type AnnotationRequest,
  PATH_SEPARATOR,
  resolveAnnotation,
} from './annotation-resolver.js';
import { type Clock, parseRuleValue } from './value-parser.js';

/**
 * The persisted shape of a rule. `method` and `lookup` stay plain strings
 * here because stored rows are not guaranteed to hold known values.
 */
export interface RuleDefinition {
  id: string;
  method: string;
  fieldName: string;
  lookup: string;
  rawValue: string;
  order: number;
}

export interface CompiledPredicate {
  predicate: Predicate;
  annotation: AnnotationRequest | null;
}

export function buildPredicate(
  rule: Pick<RuleDefinition, 'fieldName' | 'lookup' | 'rawValue'>,
  now: Clock,
): CompiledPredicate {
  const { lookup } = rule;
  if (!isLookupType(lookup)) {
    throw new UnknownLookupError(lookup);
  }

  const { field, annotation } = resolveAnnotation(rule.fieldName);
  return {
    predicate: {
      key: [field, lookup].join(PATH_SEPARATOR),
      field,
      lookup,
      value: parseRuleValue(rule.rawValue, now),
    },
    annotation,
  };
}

/**
 * Narrows `collection` by one rule. `exclude` drops matches; `filter`, and
 * any unrecognized method, keeps them.
 */
export function compileRule<Q extends Queryable<Q>>(
  rule: RuleDefinition,
  collection: Q,
  now: Clock,
): Q {
  const { predicate, annotation } = buildPredicate(rule, now);
  const annotated = annotation
    ? collection.annotate(annotation.alias, annotation.aggregation)
    : collection;

  return rule.method === 'exclude'
    ? annotated.exclude(predicate)
    : annotated.filter(predicate);
}
