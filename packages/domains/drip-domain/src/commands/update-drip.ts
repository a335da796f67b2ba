import { z } from 'zod';
import { CreateDripCommandSchema } from './create-drip.js';

export const UpdateDripCommandSchema = CreateDripCommandSchema.omit({
  enabled: true,
})
  .partial()
  .extend({
    dripId: z.string().uuid(),
  });

export type UpdateDripCommand = z.infer<typeof UpdateDripCommandSchema>;

export function updateDripCommand(input: UpdateDripCommand): UpdateDripCommand {
  return UpdateDripCommandSchema.parse(input);
}
