import { ConflictError, Result, ValidationError } from '@dripline/domain-kernel';
import {
  DurationParseError,
  type RuleErrorCategory,
  RuleValidationError,
  UnknownFieldError,
  UnknownLookupError,
} from '../errors/rule-errors.js';
import type { Queryable } from '../queryable/queryable.js';
import { isRuleMethod } from '../value-objects/rule-method.js';
import { compileRule, type RuleDefinition } from './predicate-compiler.js';
import type { Clock } from './value-parser.js';

/**
 * The ordered rules of one drip. Rules apply in ascending `order`; rules
 * sharing an order keep the sequence they were given in.
 */
export class RuleSet {
  private readonly rules: readonly RuleDefinition[];

  constructor(rules: readonly RuleDefinition[]) {
    this.rules = [...rules].sort((a, b) => a.order - b.order);
  }

  get size(): number {
    return this.rules.length;
  }

  toArray(): RuleDefinition[] {
    return [...this.rules];
  }

  apply<Q extends Queryable<Q>>(base: Q, now: Clock): Q {
    return this.rules.reduce((collection, rule) => compileRule(rule, collection, now), base);
  }

  /**
   * Dry-runs every rule against `sample` and reports the first one that
   * cannot be applied. Never throws.
   */
  validate<Q extends Queryable<Q>>(
    sample: Q,
    now: Clock,
  ): Result<void, RuleValidationError> {
    let collection = sample;
    for (const rule of this.rules) {
      if (!isRuleMethod(rule.method)) {
        return Result.fail(
          new RuleValidationError(
            rule.id,
            'unknown_method',
            `Unsupported method "${rule.method}"`,
          ),
        );
      }
      try {
        collection = compileRule(rule, collection, now);
      } catch (err) {
        return Result.fail(toRuleValidationError(rule, err));
      }
    }
    return Result.ok();
  }
}

function toRuleValidationError(
  rule: RuleDefinition,
  err: unknown,
): RuleValidationError {
  if (!(err instanceof Error)) {
    return new RuleValidationError(
      rule.id,
      'unexpected',
      `Applying rule failed: ${String(err)}`,
      err,
    );
  }
  return new RuleValidationError(
    rule.id,
    categorize(err),
    `${err.name} raised trying to apply rule: ${err.message}`,
    err,
  );
}

function categorize(err: Error): RuleErrorCategory {
  if (err instanceof DurationParseError) return 'duration';
  if (err instanceof UnknownLookupError) return 'unknown_lookup';
  if (err instanceof UnknownFieldError) return 'unknown_field';
  if (err instanceof ValidationError) return 'invalid_value';
  if (err instanceof ConflictError) return 'conflict';
  return 'unexpected';
}
