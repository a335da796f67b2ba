import { z } from 'zod';
import { LookupTypeSchema } from '../value-objects/lookup-type.js';
import { RuleMethodSchema } from '../value-objects/rule-method.js';

export const AddRuleCommandSchema = z.object({
  dripId: z.string().uuid(),
  method: RuleMethodSchema.default('filter'),
  fieldName: z.string().min(1).max(128),
  lookup: LookupTypeSchema.default('exact'),
  rawValue: z.string().max(255),
});

export type AddRuleCommand = z.input<typeof AddRuleCommandSchema>;

export function addRuleCommand(
  input: AddRuleCommand,
): z.output<typeof AddRuleCommandSchema> {
  return AddRuleCommandSchema.parse(input);
}
