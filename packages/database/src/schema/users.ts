import { pgTable, uuid, text, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Users table
 * Owner of tasks, tags, conversation history and context
 */
export const users = pgTable(
  'users',
  {
    id: uuid('id').primaryKey().defaultRandom(),

    /** Contact email, optional until authentication is added */
    email: text('email').unique(),

    /** User's timezone (IANA format) */
    timezone: text('timezone').default('UTC').notNull(),

    // Timestamps
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index('idx_users_email').on(table.email)]
);

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
