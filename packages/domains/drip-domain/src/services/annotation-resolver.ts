import type { Aggregation } from '../queryable/queryable.js';

export const PATH_SEPARATOR = '__';
const COUNT_MARKER = 'count';

export interface AnnotationRequest {
  alias: string;
  aggregation: Aggregation;
}

export interface ResolvedField {
  field: string;
  annotation: AnnotationRequest | null;
}

/**
 * `orders__count` becomes the alias `num_orders` backed by a distinct count
 * over `orders`; any other field name passes through untouched.
 */
export function resolveAnnotation(fieldName: string): ResolvedField {
  const markerIndex = fieldName.lastIndexOf(PATH_SEPARATOR);
  const isCount =
    markerIndex > 0 &&
    fieldName.slice(markerIndex + PATH_SEPARATOR.length) === COUNT_MARKER;
  if (!isCount) {
    return { field: fieldName, annotation: null };
  }

  const relation = fieldName.slice(0, markerIndex);
  const alias = `num_${relation.split(PATH_SEPARATOR).join('_')}`;
  return {
    field: alias,
    annotation: {
      alias,
      aggregation: { kind: 'count', relation, distinct: true },
    },
  };
}
