/**
 * User Context Schema
 *
 * One row per user holding what the agent and the parser read for prompt
 * context:
 * - preferences: explicit settings (timezone, work hours, default priority)
 * - productivity_patterns: summary of how the user works
 * - ai_context: free-form notes for the assistant
 *
 * Written only through an explicit user action, never by the agent.
 */

import { pgTable, uuid, timestamp, jsonb } from 'drizzle-orm/pg-core';
import type { AiContext, ProductivityPatterns, UserPreferences } from '@taskpilot/shared-types';
import { users } from './users.js';

export const userContexts = pgTable('user_contexts', {
  /** User ID (primary key, references users) */
  userId: uuid('user_id')
    .primaryKey()
    .references(() => users.id, { onDelete: 'cascade' }),

  preferences: jsonb('preferences').$type<UserPreferences>().default({}).notNull(),

  productivityPatterns: jsonb('productivity_patterns')
    .$type<ProductivityPatterns>()
    .default({})
    .notNull(),

  aiContext: jsonb('ai_context').$type<AiContext>().default({}).notNull(),

  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

export type UserContextRecord = typeof userContexts.$inferSelect;
export type NewUserContextRecord = typeof userContexts.$inferInsert;
