import { randomUUID } from 'node:crypto';
import { InvariantViolation } from '@dripline/domain-kernel';
import { z } from 'zod';
import type { RuleDefinition } from '../services/predicate-compiler.js';
import { isLookupType } from '../value-objects/lookup-type.js';
import { isRuleMethod } from '../value-objects/rule-method.js';

// method and lookup are kept as stored strings; create() is
// where unknown values are rejected.
export const QuerySetRulePropsSchema = z.object({
  id: z.string().uuid(),
  dripId: z.string().uuid(),
  method: z.string().min(1),
  fieldName: z.string().min(1).max(128),
  lookup: z.string().min(1),
  rawValue: z.string().max(255),
  order: z.number().int().min(0),
  createdAt: z.coerce.date(),
  lastChanged: z.coerce.date(),
});

export type QuerySetRuleProps = z.infer<typeof QuerySetRulePropsSchema>;

export interface QuerySetRuleInput {
  method: string;
  fieldName: string;
  lookup: string;
  rawValue: string;
}

export class QuerySetRule implements RuleDefinition {
  private constructor(private props: QuerySetRuleProps) {}

  // ---- Factory methods ----

  static create(
    input: QuerySetRuleInput & { dripId: string; order: number },
  ): QuerySetRule {
    assertKnownMethod(input.method);
    assertKnownLookup(input.lookup);
    if (input.fieldName.trim().length === 0) {
      throw new InvariantViolation('Rule field name is required');
    }

    const now = new Date();
    return new QuerySetRule(
      QuerySetRulePropsSchema.parse({
        id: randomUUID(),
        dripId: input.dripId,
        method: input.method,
        fieldName: input.fieldName.trim(),
        lookup: input.lookup,
        rawValue: input.rawValue,
        order: input.order,
        createdAt: now,
        lastChanged: now,
      }),
    );
  }

  static reconstitute(props: QuerySetRuleProps): QuerySetRule {
    return new QuerySetRule(QuerySetRulePropsSchema.parse(props));
  }

  // ---- Accessors ----

  get id(): string {
    return this.props.id;
  }
  get dripId(): string {
    return this.props.dripId;
  }
  get method(): string {
    return this.props.method;
  }
  get fieldName(): string {
    return this.props.fieldName;
  }
  get lookup(): string {
    return this.props.lookup;
  }
  get rawValue(): string {
    return this.props.rawValue;
  }
  get order(): number {
    return this.props.order;
  }
  get createdAt(): Date {
    return this.props.createdAt;
  }
  get lastChanged(): Date {
    return this.props.lastChanged;
  }

  // ---- Domain methods ----

  moveTo(order: number): void {
    if (!Number.isInteger(order) || order < 0) {
      throw new InvariantViolation('Rule order must be a non-negative integer');
    }
    this.props.order = order;
    this.props.lastChanged = new Date();
  }

  /** Return a plain object suitable for persistence. */
  toProps(): Readonly<QuerySetRuleProps> {
    return Object.freeze({ ...this.props });
  }
}

function assertKnownMethod(method: string): void {
  if (!isRuleMethod(method)) {
    throw new InvariantViolation(`Unknown rule method "${method}"`);
  }
}

function assertKnownLookup(lookup: string): void {
  if (!isLookupType(lookup)) {
    throw new InvariantViolation(`Unknown lookup "${lookup}"`);
  }
}
