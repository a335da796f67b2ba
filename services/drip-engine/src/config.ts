import { ValidationError } from '@dripline/domain-kernel';
import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const ConfigSchema = z.object({
  DATABASE_URL: z.string().url(),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  USERS_TABLE: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/, 'must be a plain table name')
    .default('users'),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new ValidationError(`Invalid configuration: ${keys.join(', ')}`, {
      keys,
    });
  }
  return parsed.data;
}
