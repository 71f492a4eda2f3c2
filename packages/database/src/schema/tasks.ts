import {
  pgTable,
  uuid,
  text,
  timestamp,
  integer,
  jsonb,
  pgEnum,
  index,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';
import type { TaskMetadata } from '@taskpilot/shared-types';
import { users } from './users.js';

/**
 * Task status enum
 */
export const taskStatusEnum = pgEnum('task_status', ['todo', 'in_progress', 'completed']);

/**
 * Task priority enum
 */
export const taskPriorityEnum = pgEnum('task_priority', ['low', 'medium', 'high']);

/**
 * Tasks table
 * Self-referential through parentTaskId for subtasks
 */
export const tasks = pgTable(
  'tasks',
  {
    id: uuid('id').primaryKey().defaultRandom(),

    /** Reference to the owning user */
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),

    // Task Content
    title: text('title').notNull(),
    description: text('description'),

    status: taskStatusEnum('status').default('todo').notNull(),
    priority: taskPriorityEnum('priority').default('medium').notNull(),

    // Time tracking
    dueDate: timestamp('due_date', { withTimezone: true }),
    /** Estimated minutes */
    estimatedDuration: integer('estimated_duration'),
    /** Actual minutes spent */
    actualDuration: integer('actual_duration'),

    // Relationships
    /**
     * Parent task for subtasks. The cascade flag is enforced in the service
     * layer; the FK only rejects orphaned rows.
     */
    parentTaskId: uuid('parent_task_id').references((): AnyPgColumn => tasks.id),

    /** AI reasoning, estimation accuracy, parse provenance */
    metadata: jsonb('metadata').$type<TaskMetadata>().default({}).notNull(),

    // Timestamps
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
    completedAt: timestamp('completed_at', { withTimezone: true }),
  },
  (table) => [
    index('idx_tasks_user_id').on(table.userId),
    index('idx_tasks_user_status').on(table.userId, table.status),
    index('idx_tasks_user_priority').on(table.userId, table.priority),
    index('idx_tasks_user_due').on(table.userId, table.dueDate),
    index('idx_tasks_parent').on(table.parentTaskId),
  ]
);

export type Task = typeof tasks.$inferSelect;
export type NewTask = typeof tasks.$inferInsert;
