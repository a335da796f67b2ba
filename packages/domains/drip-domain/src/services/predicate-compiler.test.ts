import { describe, expect, it } from 'vitest';
import { UnknownLookupError } from '../errors/rule-errors.js';
import { InMemoryQueryable, type RecordSchema } from '../queryable/in-memory-queryable.js';
import { RecordingQueryable } from '../testing/recording-queryable.js';
import { buildPredicate, compileRule, type RuleDefinition } from './predicate-compiler.js';

const clock = () => new Date('2024-01-01T00:00:00Z');

type UserRow = {
  id: string;
  age: number;
  referrer_id: string | null;
  orders: { id: string }[];
};

const SCHEMA: RecordSchema = {
  fields: ['id', 'age', 'referrer_id'],
  relations: { orders: { fields: ['id'] } },
};

const users = InMemoryQueryable.of<UserRow>(
  [
    { id: 'a', age: 15, referrer_id: null, orders: [] },
    { id: 'b', age: 18, referrer_id: 'b', orders: [{ id: 'o1' }] },
    { id: 'c', age: 21, referrer_id: 'a', orders: [{ id: 'o2' }, { id: 'o3' }] },
  ],
  SCHEMA,
);

function makeRule(overrides: Partial<RuleDefinition> = {}): RuleDefinition {
  return {
    id: 'rule-1',
    method: 'filter',
    fieldName: 'age',
    lookup: 'gte',
    rawValue: '18',
    order: 0,
    ...overrides,
  };
}

async function ages(query: InMemoryQueryable<UserRow>): Promise<number[]> {
  return (await query.all()).map((user) => user.age);
}

describe('buildPredicate', () => {
  it('joins the field and lookup into the composite key', () => {
    expect(buildPredicate(makeRule(), clock)).toEqual({
      predicate: {
        key: 'age__gte',
        field: 'age',
        lookup: 'gte',
        value: { kind: 'scalar', value: '18' },
      },
      annotation: null,
    });
  });

  it('targets the annotation alias for count fields', () => {
    const { predicate, annotation } = buildPredicate(
      makeRule({ fieldName: 'orders__count', lookup: 'gt', rawValue: '0' }),
      clock,
    );
    expect(predicate.key).toBe('num_orders__gt');
    expect(annotation?.alias).toBe('num_orders');
  });

  it('rejects lookups outside the supported set', () => {
    expect(() => buildPredicate(makeRule({ lookup: 'in' }), clock)).toThrow(
      UnknownLookupError,
    );
  });
});

describe('compileRule', () => {
  it('keeps matching rows for filter rules', async () => {
    expect(await ages(compileRule(makeRule(), users, clock))).toEqual([18, 21]);
  });

  it('drops matching rows for exclude rules', async () => {
    const rule = makeRule({ method: 'exclude' });
    expect(await ages(compileRule(rule, users, clock))).toEqual([15]);
  });

  it('does not modify the input collection', async () => {
    compileRule(makeRule(), users, clock);
    expect(await ages(users)).toEqual([15, 18, 21]);
  });

  it('treats an unrecognized method as filter', () => {
    const recorder = new RecordingQueryable();
    compileRule(makeRule({ method: 'keep' }), recorder, clock);
    expect(recorder.filter).toHaveBeenCalledTimes(1);
    expect(recorder.exclude).not.toHaveBeenCalled();
  });

  it('requests a single distinct count annotation for count fields', () => {
    const recorder = new RecordingQueryable();
    compileRule(
      makeRule({ fieldName: 'orders__count', lookup: 'gt', rawValue: '0' }),
      recorder,
      clock,
    );

    expect(recorder.annotate).toHaveBeenCalledTimes(1);
    expect(recorder.annotate).toHaveBeenCalledWith('num_orders', {
      kind: 'count',
      relation: 'orders',
      distinct: true,
    });
    expect(recorder.filter.mock.calls[0]?.[0].key).toBe('num_orders__gt');
  });

  it('can apply the same count rule twice', async () => {
    const rule = makeRule({ fieldName: 'orders__count', lookup: 'gt', rawValue: '0' });
    const once = compileRule(rule, users, clock);
    const twice = compileRule(rule, once, clock);

    expect(twice.annotations.size).toBe(1);
    expect(await ages(twice)).toEqual([18, 21]);
  });

  it('compiles F_ values into a same-row field comparison', async () => {
    const rule = makeRule({ fieldName: 'id', lookup: 'exact', rawValue: 'F_referrer_id' });
    const recorder = new RecordingQueryable();
    compileRule(rule, recorder, clock);

    expect(recorder.filter.mock.calls[0]?.[0].value).toEqual({
      kind: 'field',
      field: 'referrer_id',
    });
    expect((await compileRule(rule, users, clock).all()).map((u) => u.id)).toEqual(['b']);
  });

  it('resolves relative values against the given clock', () => {
    const recorder = new RecordingQueryable();
    compileRule(
      makeRule({ fieldName: 'signed_up', lookup: 'lt', rawValue: 'now-1 day' }),
      recorder,
      clock,
    );
    expect(recorder.filter.mock.calls[0]?.[0].value).toEqual({
      kind: 'timestamp',
      value: new Date('2023-12-31T00:00:00Z'),
    });
  });
});
