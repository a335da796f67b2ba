import { ConflictError, ValidationError } from '@dripline/domain-kernel';
import { UnknownFieldError } from '../errors/rule-errors.js';
import { PATH_SEPARATOR } from '../services/annotation-resolver.js';
import type {
  Aggregation,
  Materializable,
  Predicate,
  PredicateValue,
  QueryLookup,
  Queryable,
} from './queryable.js';
import { sameAggregation } from './queryable.js';

type Row = Record<string, unknown>;

/**
 * Addressable fields of a row. A relation's value is a nested row (or null)
 * for to-one, an array of rows for to-many.
 */
export interface RecordSchema {
  fields: readonly string[];
  relations?: Readonly<Record<string, RecordSchema>>;
}

type Operation =
  | { type: 'filter' | 'exclude'; predicate: Predicate }
  | { type: 'annotate'; alias: string; aggregation: Aggregation };

/**
 * Queryable over plain rows held in memory. Field paths are validated when
 * an operation is added; rows are only evaluated by `all()`.
 */
export class InMemoryQueryable<TRow extends Row>
  implements Queryable<InMemoryQueryable<TRow>>, Materializable<TRow>
{
  private constructor(
    private readonly rows: readonly TRow[],
    private readonly schema: RecordSchema,
    private readonly operations: readonly Operation[],
    private readonly aliases: ReadonlyMap<string, Aggregation>,
  ) {}

  static of<TRow extends Row>(
    rows: readonly TRow[],
    schema: RecordSchema,
  ): InMemoryQueryable<TRow> {
    return new InMemoryQueryable(rows, schema, [], new Map());
  }

  get annotations(): ReadonlyMap<string, Aggregation> {
    return this.aliases;
  }

  get predicates(): readonly Predicate[] {
    return this.operations.flatMap((op) =>
      op.type === 'annotate' ? [] : [op.predicate],
    );
  }

  filter(predicate: Predicate): InMemoryQueryable<TRow> {
    this.checkPredicate(predicate);
    return this.append({ type: 'filter', predicate }, this.aliases);
  }

  exclude(predicate: Predicate): InMemoryQueryable<TRow> {
    this.checkPredicate(predicate);
    return this.append({ type: 'exclude', predicate }, this.aliases);
  }

  annotate(alias: string, aggregation: Aggregation): InMemoryQueryable<TRow> {
    const existing = this.aliases.get(alias);
    if (existing) {
      if (sameAggregation(existing, aggregation)) return this;
      throw new ConflictError(`Annotation "${alias}" is already defined`);
    }
    if (this.schema.fields.includes(alias)) {
      throw new ConflictError(`Annotation "${alias}" conflicts with a field`);
    }
    this.checkRelation(aggregation.relation);

    const aliases = new Map(this.aliases);
    aliases.set(alias, aggregation);
    return this.append({ type: 'annotate', alias, aggregation }, aliases);
  }

  async all(): Promise<TRow[]> {
    let rows = [...this.rows];
    for (const op of this.operations) {
      if (op.type === 'annotate') continue;
      const keep = op.type === 'filter';
      rows = rows.filter((row) => this.matches(row, op.predicate) === keep);
    }
    return rows;
  }

  private append(
    op: Operation,
    aliases: ReadonlyMap<string, Aggregation>,
  ): InMemoryQueryable<TRow> {
    return new InMemoryQueryable(
      this.rows,
      this.schema,
      [...this.operations, op],
      aliases,
    );
  }

  // ---- Path resolution ----

  private checkPredicate(predicate: Predicate): void {
    this.checkField(predicate.field);
    if (predicate.value.kind === 'field') {
      this.checkField(predicate.value.field);
    }
  }

  private checkField(path: string): void {
    if (this.aliases.has(path)) return;

    const segments = path.split(PATH_SEPARATOR);
    const last = segments.pop() ?? '';
    const owner = segments.reduce<RecordSchema>(
      (schema, segment) => this.relationOf(schema, segment, path),
      this.schema,
    );
    if (!owner.fields.includes(last)) {
      throw new UnknownFieldError(path);
    }
  }

  private checkRelation(path: string): void {
    path
      .split(PATH_SEPARATOR)
      .reduce<RecordSchema>(
        (schema, segment) => this.relationOf(schema, segment, path),
        this.schema,
      );
  }

  private relationOf(
    schema: RecordSchema,
    segment: string,
    path: string,
  ): RecordSchema {
    const relation = schema.relations?.[segment];
    if (!relation) {
      throw new UnknownFieldError(path, 'does not follow a known relation');
    }
    return relation;
  }

  // ---- Evaluation ----

  private matches(row: TRow, predicate: Predicate): boolean {
    const actuals = this.valuesAt(row, predicate.field);
    const expected = this.operand(row, predicate.value);
    return actuals.some((actual) =>
      compare(actual, predicate.lookup, expected),
    );
  }

  private operand(row: TRow, value: PredicateValue): unknown {
    switch (value.kind) {
      case 'field':
        return this.valuesAt(row, value.field)[0];
      case 'list':
        return value.values;
      default:
        return value.value;
    }
  }

  private valuesAt(row: TRow, path: string): unknown[] {
    const aggregation = this.aliases.get(path);
    if (aggregation) {
      return [countRelated(row, aggregation)];
    }

    const segments = path.split(PATH_SEPARATOR);
    const last = segments.pop() ?? '';
    return followPath([row], segments).map((owner) => owner[last]);
  }
}

function followPath(rows: Row[], segments: readonly string[]): Row[] {
  return segments.reduce<Row[]>(
    (current, segment) => current.flatMap((row) => related(row[segment])),
    rows,
  );
}

function related(value: unknown): Row[] {
  if (Array.isArray(value)) return value.filter(isRow);
  return isRow(value) ? [value] : [];
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !(value instanceof Date);
}

function countRelated(row: Row, aggregation: Aggregation): number {
  const members = followPath([row], aggregation.relation.split(PATH_SEPARATOR));
  if (!aggregation.distinct) return members.length;
  return new Set(members.map((member) => member.id ?? member)).size;
}

// ---- Comparison ----

function compare(actual: unknown, lookup: QueryLookup, expected: unknown): boolean {
  if (actual === null || actual === undefined) return false;

  switch (lookup) {
    case 'in':
      return (
        Array.isArray(expected) &&
        expected.some((item) => order(actual, coerce(item, actual)) === 0)
      );
    case 'exact':
      return order(actual, coerce(expected, actual)) === 0;
    case 'iexact':
      return text(actual).toLowerCase() === text(expected).toLowerCase();
    case 'contains':
      return text(actual).includes(text(expected));
    case 'icontains':
      return text(actual).toLowerCase().includes(text(expected).toLowerCase());
    case 'regex':
      return new RegExp(text(expected)).test(text(actual));
    case 'iregex':
      return new RegExp(text(expected), 'i').test(text(actual));
    case 'startswith':
      return text(actual).startsWith(text(expected));
    case 'istartswith':
      return text(actual).toLowerCase().startsWith(text(expected).toLowerCase());
    case 'endswith':
      return text(actual).endsWith(text(expected));
    case 'iendswith':
      return text(actual).toLowerCase().endsWith(text(expected).toLowerCase());
    case 'gt':
      return (order(actual, coerce(expected, actual)) ?? 0) > 0;
    case 'gte':
      return (order(actual, coerce(expected, actual)) ?? -1) >= 0;
    case 'lt':
      return (order(actual, coerce(expected, actual)) ?? 0) < 0;
    case 'lte':
      return (order(actual, coerce(expected, actual)) ?? 1) <= 0;
  }
}

function text(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/** Converts a literal to the type of the value it is compared against. */
function coerce(expected: unknown, actual: unknown): unknown {
  if (typeof expected !== 'string') return expected;

  if (typeof actual === 'number') {
    const parsed = Number(expected);
    if (expected.trim() === '' || Number.isNaN(parsed)) {
      throw new ValidationError(`Expected a number but got "${expected}"`);
    }
    return parsed;
  }
  if (actual instanceof Date) {
    const parsed = new Date(expected);
    if (Number.isNaN(parsed.getTime())) {
      throw new ValidationError(`Expected a date but got "${expected}"`);
    }
    return parsed;
  }
  if (typeof actual === 'boolean') {
    const normalized = expected.toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
    throw new ValidationError(`Expected a boolean but got "${expected}"`);
  }
  return expected;
}

/** Sign of `a - b`, or null when the two cannot be ordered. */
function order(a: unknown, b: unknown): number | null {
  if (a instanceof Date && b instanceof Date) {
    return Math.sign(a.getTime() - b.getTime());
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return Math.sign(a - b);
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Math.sign(Number(a) - Number(b));
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  return null;
}
