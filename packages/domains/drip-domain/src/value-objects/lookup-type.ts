import { z } from 'zod';

export const LookupTypeSchema = z.enum([
  'exact',
  'iexact',
  'contains',
  'icontains',
  'regex',
  'iregex',
  'gt',
  'gte',
  'lt',
  'lte',
  'startswith',
  'istartswith',
  'endswith',
  'iendswith',
]);

export type LookupType = z.infer<typeof LookupTypeSchema>;

export function isLookupType(value: string): value is LookupType {
  return LookupTypeSchema.safeParse(value).success;
}
