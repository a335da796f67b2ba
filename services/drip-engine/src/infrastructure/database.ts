import { neon } from '@neondatabase/serverless';
import { drizzle, type NeonHttpDatabase } from 'drizzle-orm/neon-http';

export function createDatabase(url: string): NeonHttpDatabase {
  return drizzle(neon(url));
}
