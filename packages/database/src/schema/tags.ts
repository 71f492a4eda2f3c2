import { pgTable, uuid, text, primaryKey, uniqueIndex, index } from 'drizzle-orm/pg-core';
import { users } from './users.js';
import { tasks } from './tasks.js';

/**
 * Tags table
 * Names are stored lower-cased and unique per user
 */
export const tags = pgTable(
  'tags',
  {
    id: uuid('id').primaryKey().defaultRandom(),

    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),

    name: text('name').notNull(),

    /** Hex color for UI display (#RRGGBB) */
    color: text('color'),
  },
  (table) => [uniqueIndex('uq_tags_user_name').on(table.userId, table.name)]
);

/**
 * Task <-> tag links (many-to-many)
 */
export const taskTags = pgTable(
  'task_tags',
  {
    taskId: uuid('task_id')
      .notNull()
      .references(() => tasks.id, { onDelete: 'cascade' }),
    tagId: uuid('tag_id')
      .notNull()
      .references(() => tags.id, { onDelete: 'cascade' }),
  },
  (table) => [
    primaryKey({ columns: [table.taskId, table.tagId] }),
    index('idx_task_tags_tag').on(table.tagId),
  ]
);

export type Tag = typeof tags.$inferSelect;
export type NewTag = typeof tags.$inferInsert;
export type TaskTag = typeof taskTags.$inferSelect;
