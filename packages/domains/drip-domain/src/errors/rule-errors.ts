import { DomainError } from '@dripline/domain-kernel';

export class DurationParseError extends DomainError {
  constructor(readonly input: string) {
    super('DURATION_PARSE_ERROR', `Could not parse duration "${input}"`, 400, {
      input,
    });
    this.name = 'DurationParseError';
  }
}

export class UnknownLookupError extends DomainError {
  constructor(readonly lookup: string) {
    super('UNKNOWN_LOOKUP', `Unsupported lookup "${lookup}"`, 400, { lookup });
    this.name = 'UnknownLookupError';
  }
}

export class UnknownFieldError extends DomainError {
  constructor(
    readonly field: string,
    reason = 'is not a queryable field',
  ) {
    super('UNKNOWN_FIELD', `"${field}" ${reason}`, 400, { field });
    this.name = 'UnknownFieldError';
  }
}

export type RuleErrorCategory =
  | 'duration'
  | 'unknown_lookup'
  | 'unknown_field'
  | 'unknown_method'
  | 'invalid_value'
  | 'conflict'
  | 'unexpected';

/**
 * A failure raised while dry-running a rule set, attributed to the rule that
 * caused it. The lower-level error is kept as `cause`.
 */
export class RuleValidationError extends DomainError {
  constructor(
    readonly ruleId: string,
    readonly category: RuleErrorCategory,
    message: string,
    cause?: unknown,
  ) {
    super('RULE_VALIDATION_ERROR', message, 422, { ruleId, category }, cause);
    this.name = 'RuleValidationError';
  }
}
