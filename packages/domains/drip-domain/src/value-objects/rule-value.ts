/**
 * A rule's raw value after interpretation. `field` points at another field
 * of the same record instead of carrying a literal.
 */
export type RuleValue =
  | { kind: 'timestamp'; value: Date }
  | { kind: 'date'; value: Date }
  | { kind: 'field'; field: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'scalar'; value: string };

export type RuleValueKind = RuleValue['kind'];

/** `YYYY-MM-DD` of a UTC calendar date. */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
