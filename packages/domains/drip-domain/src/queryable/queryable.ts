import type { LookupType } from '../value-objects/lookup-type.js';
import type { RuleValue } from '../value-objects/rule-value.js';

/**
 * Lookups a store must understand. `in` never comes out of a rule; it is
 * used to drop records that already received a drip.
 */
export type QueryLookup = LookupType | 'in';

export type PredicateValue =
  | RuleValue
  | { kind: 'list'; values: readonly (string | number)[] };

/** A single `field__lookup = value` condition. */
export interface Predicate {
  /** Store-native composite key, e.g. `num_orders__gt`. */
  key: string;
  field: string;
  lookup: QueryLookup;
  value: PredicateValue;
}

export interface CountAggregation {
  kind: 'count';
  /** Relation path, `__`-separated. */
  relation: string;
  distinct: boolean;
}

export type Aggregation = CountAggregation;

/**
 * A lazy collection that can be narrowed and annotated. Every operation
 * returns a new collection; the receiver is left untouched.
 *
 * Adding the same aggregation twice under the same alias must be a no-op.
 */
export interface Queryable<TSelf> {
  filter(predicate: Predicate): TSelf;
  exclude(predicate: Predicate): TSelf;
  annotate(alias: string, aggregation: Aggregation): TSelf;
}

export interface Materializable<TRow> {
  all(): Promise<TRow[]>;
}

export function sameAggregation(a: Aggregation, b: Aggregation): boolean {
  return a.kind === b.kind && a.relation === b.relation && a.distinct === b.distinct;
}
