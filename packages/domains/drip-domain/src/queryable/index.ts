export {
  InMemoryQueryable,
  type RecordSchema,
} from './in-memory-queryable.js';
export {
  type Aggregation,
  type CountAggregation,
  type Materializable,
  type Predicate,
  type PredicateValue,
  type QueryLookup,
  type Queryable,
  sameAggregation,
} from './queryable.js';
