import { z } from 'zod';

const optionalEmail = z.string().email().nullable().optional();

export const CreateDripCommandSchema = z.object({
  name: z.string().min(1).max(255),
  enabled: z.boolean().optional(),
  fromEmail: optionalEmail,
  fromEmailName: z.string().max(150).nullable().optional(),
  replyTo: optionalEmail,
  subjectTemplate: z.string().nullable().optional(),
  bodyHtmlTemplate: z.string().nullable().optional(),
  messageClass: z.string().max(120).optional(),
});

export type CreateDripCommand = z.infer<typeof CreateDripCommandSchema>;

export function createDripCommand(input: CreateDripCommand): CreateDripCommand {
  return CreateDripCommandSchema.parse(input);
}
