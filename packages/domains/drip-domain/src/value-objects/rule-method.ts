import { z } from 'zod';

/** `filter` keeps matching records, `exclude` removes them. */
export const RuleMethodSchema = z.enum(['filter', 'exclude']);

export type RuleMethod = z.infer<typeof RuleMethodSchema>;

export function isRuleMethod(value: string): value is RuleMethod {
  return RuleMethodSchema.safeParse(value).success;
}
