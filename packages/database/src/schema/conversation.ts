import { pgTable, uuid, text, timestamp, pgEnum, jsonb, index } from 'drizzle-orm/pg-core';
import { users } from './users.js';

/**
 * Message role enum
 */
export const messageRoleEnum = pgEnum('message_role', ['user', 'assistant']);

/**
 * Conversation messages table
 * Append-only log of chat turns, read back as conversation history.
 * Rows are never updated or deleted by the application.
 */
export const conversationMessages = pgTable(
  'conversation_messages',
  {
    id: uuid('id').primaryKey().defaultRandom(),

    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),

    role: messageRoleEnum('role').notNull(),
    content: text('content').notNull(),

    /**
     * Turn metadata: intent, state changes, pending destructive actions,
     * resolved action ids
     */
    metadata: jsonb('metadata').$type<Record<string, unknown>>().default({}).notNull(),

    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index('idx_conversation_user_created').on(table.userId, table.createdAt)]
);

export type ConversationMessage = typeof conversationMessages.$inferSelect;
export type NewConversationMessage = typeof conversationMessages.$inferInsert;
