import { sentDrips } from '@dripline/drip-domain/drizzle';
import { boolean, pgTable, timestamp, varchar } from 'drizzle-orm/pg-core';
import type { NeonHttpDatabase } from 'drizzle-orm/neon-http';
import type { DrizzleSource } from './drizzle-queryable.js';

/**
 * The user store rules are evaluated against. Rule field names address its
 * column names (`date_joined`, `is_staff`, ...).
 */
export function usersTable(name: string) {
  return pgTable(name, {
    id: varchar('id', { length: 64 }).primaryKey(),
    email: varchar('email', { length: 254 }).notNull(),
    firstName: varchar('first_name', { length: 150 }),
    lastName: varchar('last_name', { length: 150 }),
    isActive: boolean('is_active').default(true).notNull(),
    isStaff: boolean('is_staff').default(false).notNull(),
    dateJoined: timestamp('date_joined').defaultNow().notNull(),
    lastLogin: timestamp('last_login'),
  });
}

export type UsersTable = ReturnType<typeof usersTable>;

export function userSource(db: NeonHttpDatabase, users: UsersTable): DrizzleSource {
  return {
    db,
    table: users,
    primaryKey: users.id,
    relations: {
      sent_drips: {
        table: sentDrips,
        foreignKey: sentDrips.userId,
        key: sentDrips.id,
      },
    },
  };
}
