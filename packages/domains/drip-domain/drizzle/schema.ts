import {
  boolean,
  index,
  integer,
  pgSchema,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core';

export const dripSchema = pgSchema('drip');

// Drips table
export const drips = dripSchema.table('drips', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: varchar('name', { length: 255 }).notNull().unique(),
  enabled: boolean('enabled').default(false).notNull(),
  fromEmail: varchar('from_email', { length: 254 }),
  fromEmailName: varchar('from_email_name', { length: 150 }),
  replyTo: varchar('reply_to', { length: 254 }),
  subjectTemplate: text('subject_template'),
  bodyHtmlTemplate: text('body_html_template'),
  messageClass: varchar('message_class', { length: 120 })
    .default('default')
    .notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  lastChanged: timestamp('last_changed').defaultNow().notNull(),
});

// Query rules, owned by a drip
export const querysetRules = dripSchema.table(
  'queryset_rules',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    dripId: uuid('drip_id')
      .notNull()
      .references(() => drips.id, { onDelete: 'cascade' }),
    methodType: varchar('method_type', { length: 12 })
      .default('filter')
      .notNull(), // filter/exclude
    fieldName: varchar('field_name', { length: 128 }).notNull(),
    lookupType: varchar('lookup_type', { length: 12 })
      .default('exact')
      .notNull(),
    fieldValue: varchar('field_value', { length: 255 }).notNull(),
    sortOrder: integer('sort_order').default(0).notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    lastChanged: timestamp('last_changed').defaultNow().notNull(),
  },
  (table) => ({
    dripOrderIdx: index('queryset_rules_drip_order_idx').on(
      table.dripId,
      table.sortOrder,
    ),
  }),
);

// Send log
export const sentDrips = dripSchema.table(
  'sent_drips',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    dripId: uuid('drip_id')
      .notNull()
      .references(() => drips.id, { onDelete: 'cascade' }),
    userId: varchar('user_id', { length: 64 }).notNull(),
    subject: text('subject').notNull(),
    body: text('body').notNull(),
    fromEmail: varchar('from_email', { length: 254 }),
    fromEmailName: varchar('from_email_name', { length: 150 }),
    replyTo: varchar('reply_to', { length: 254 }),
    name: varchar('name', { length: 255 }),
    date: timestamp('date').defaultNow().notNull(),
  },
  (table) => ({
    dripUserIdx: uniqueIndex('sent_drips_drip_user_idx').on(
      table.dripId,
      table.userId,
    ),
  }),
);
