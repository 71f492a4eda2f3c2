/**
 * Drizzle-backed Task Store
 */

import {
  and,
  asc,
  count,
  desc,
  eq,
  gte,
  ilike,
  inArray,
  isNotNull,
  isNull,
  lt,
  ne,
  or,
  sql,
  type SQL,
} from 'drizzle-orm';
import type { TaskStatus } from '@taskpilot/shared-types';
import type { DbClient } from './client.js';
import { tasks } from './schema/tasks.js';
import { tags, taskTags } from './schema/tags.js';
import { conversationMessages } from './schema/conversation.js';
import { userContexts } from './schema/user-contexts.js';
import { users } from './schema/users.js';
import type {
  MessageRepository,
  TagRepository,
  TaskFilter,
  TaskRepository,
  TaskStore,
  UserContextRepository,
  UserRepository,
} from './store.js';

const MAX_PAGE_SIZE = 100;

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export class DrizzleTaskStore implements TaskStore {
  readonly users: UserRepository;
  readonly tasks: TaskRepository;
  readonly tags: TagRepository;
  readonly messages: MessageRepository;
  readonly userContexts: UserContextRepository;

  constructor(private readonly db: DbClient) {
    this.users = createUserRepository(db);
    this.tasks = createTaskRepository(db);
    this.tags = createTagRepository(db);
    this.messages = createMessageRepository(db);
    this.userContexts = createUserContextRepository(db);
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`select 1`);
  }

  async close(): Promise<void> {
    await this.db.$client.end();
  }
}

function createUserRepository(db: DbClient): UserRepository {
  return {
    async ensure(id, timezone) {
      await db
        .insert(users)
        .values({ id, ...(timezone ? { timezone } : {}) })
        .onConflictDoNothing({ target: users.id });
    },
  };
}

function taskConditions(db: DbClient, userId: string, filter: TaskFilter): SQL[] {
  const conditions: SQL[] = [eq(tasks.userId, userId)];

  if (filter.status) {
    conditions.push(eq(tasks.status, filter.status));
  }
  if (filter.excludeCompleted) {
    conditions.push(ne(tasks.status, 'completed'));
  }
  if (filter.priority) {
    conditions.push(eq(tasks.priority, filter.priority));
  }
  if (filter.parentTaskId === null) {
    conditions.push(isNull(tasks.parentTaskId));
  } else if (filter.parentTaskId !== undefined) {
    conditions.push(eq(tasks.parentTaskId, filter.parentTaskId));
  }
  if (filter.dueBefore) {
    conditions.push(lt(tasks.dueDate, filter.dueBefore));
  }
  if (filter.dueAfter) {
    conditions.push(gte(tasks.dueDate, filter.dueAfter));
  }
  if (filter.search) {
    const pattern = `%${escapeLike(filter.search)}%`;
    const match = or(ilike(tasks.title, pattern), ilike(tasks.description, pattern));
    if (match) {
      conditions.push(match);
    }
  }
  if (filter.tag) {
    const tagged = db
      .select({ taskId: taskTags.taskId })
      .from(taskTags)
      .innerJoin(tags, eq(tags.id, taskTags.tagId))
      .where(and(eq(tags.userId, userId), eq(tags.name, filter.tag.trim().toLowerCase())));
    conditions.push(inArray(tasks.id, tagged));
  }

  return conditions;
}

function createTaskRepository(db: DbClient): TaskRepository {
  return {
    async insert(values) {
      const [row] = await db.insert(tasks).values(values).returning();
      if (!row) {
        throw new Error('Task insert returned no row');
      }
      return row;
    },

    async findById(userId, id) {
      const row = await db.query.tasks.findFirst({
        where: and(eq(tasks.id, id), eq(tasks.userId, userId)),
      });
      return row ?? null;
    },

    async findMany(userId, filter) {
      const order =
        filter.orderBy === 'dueDate'
          ? [sql`${tasks.dueDate} asc nulls last`, asc(tasks.createdAt)]
          : [desc(tasks.createdAt)];

      return db
        .select()
        .from(tasks)
        .where(and(...taskConditions(db, userId, filter)))
        .orderBy(...order)
        .limit(Math.min(filter.limit ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE))
        .offset(filter.offset ?? 0);
    },

    async findChildren(userId, parentId) {
      return db
        .select()
        .from(tasks)
        .where(and(eq(tasks.userId, userId), eq(tasks.parentTaskId, parentId)))
        .orderBy(asc(tasks.createdAt));
    },

    async update(userId, id, patch) {
      const [row] = await db
        .update(tasks)
        .set(patch)
        .where(and(eq(tasks.id, id), eq(tasks.userId, userId)))
        .returning();
      return row ?? null;
    },

    async deleteMany(userId, ids) {
      if (ids.length === 0) {
        return 0;
      }
      const removed = await db
        .delete(tasks)
        .where(and(eq(tasks.userId, userId), inArray(tasks.id, ids)))
        .returning({ id: tasks.id });
      return removed.length;
    },

    async countByStatus(userId) {
      const rows = await db
        .select({ status: tasks.status, value: count() })
        .from(tasks)
        .where(eq(tasks.userId, userId))
        .groupBy(tasks.status);

      const counts: Record<TaskStatus, number> = { todo: 0, in_progress: 0, completed: 0 };
      for (const row of rows) {
        counts[row.status] = Number(row.value);
      }
      return counts;
    },

    async countOverdue(userId, now) {
      const [row] = await db
        .select({ value: count() })
        .from(tasks)
        .where(
          and(
            eq(tasks.userId, userId),
            ne(tasks.status, 'completed'),
            isNotNull(tasks.dueDate),
            lt(tasks.dueDate, now)
          )
        );
      return Number(row?.value ?? 0);
    },
  };
}

function createTagRepository(db: DbClient): TagRepository {
  return {
    async list(userId) {
      return db.select().from(tags).where(eq(tags.userId, userId)).orderBy(asc(tags.name));
    },

    async findByName(userId, name) {
      const row = await db.query.tags.findFirst({
        where: and(eq(tags.userId, userId), eq(tags.name, name)),
      });
      return row ?? null;
    },

    async insert(values) {
      const [row] = await db.insert(tags).values(values).returning();
      if (!row) {
        throw new Error('Tag insert returned no row');
      }
      return row;
    },

    async ensure(userId, names) {
      if (names.length === 0) {
        return [];
      }
      await db
        .insert(tags)
        .values(names.map((name) => ({ userId, name })))
        .onConflictDoNothing({ target: [tags.userId, tags.name] });

      return db
        .select()
        .from(tags)
        .where(and(eq(tags.userId, userId), inArray(tags.name, names)));
    },

    async namesForTasks(taskIds) {
      const result = new Map<string, string[]>();
      if (taskIds.length === 0) {
        return result;
      }
      const rows = await db
        .select({ taskId: taskTags.taskId, name: tags.name })
        .from(taskTags)
        .innerJoin(tags, eq(tags.id, taskTags.tagId))
        .where(inArray(taskTags.taskId, taskIds))
        .orderBy(asc(tags.name));

      for (const row of rows) {
        const names = result.get(row.taskId) ?? [];
        names.push(row.name);
        result.set(row.taskId, names);
      }
      return result;
    },

    async replaceTaskTags(taskId, tagIds) {
      await db.delete(taskTags).where(eq(taskTags.taskId, taskId));
      if (tagIds.length > 0) {
        await db
          .insert(taskTags)
          .values(tagIds.map((tagId) => ({ taskId, tagId })))
          .onConflictDoNothing();
      }
    },
  };
}

function createMessageRepository(db: DbClient): MessageRepository {
  return {
    async append(values) {
      const [row] = await db.insert(conversationMessages).values(values).returning();
      if (!row) {
        throw new Error('Message insert returned no row');
      }
      return row;
    },

    async listRecent(userId, limit) {
      const rows = await db
        .select()
        .from(conversationMessages)
        .where(eq(conversationMessages.userId, userId))
        .orderBy(desc(conversationMessages.createdAt))
        .limit(limit);
      return rows.reverse();
    },

    async findByPendingActionId(userId, actionId) {
      const row = await db.query.conversationMessages.findFirst({
        where: and(
          eq(conversationMessages.userId, userId),
          sql`${conversationMessages.metadata} -> 'pendingActions' @> ${JSON.stringify([
            { id: actionId },
          ])}::jsonb`
        ),
      });
      return row ?? null;
    },

    async findResolution(userId, actionId) {
      const row = await db.query.conversationMessages.findFirst({
        where: and(
          eq(conversationMessages.userId, userId),
          sql`${conversationMessages.metadata} ->> 'resolvedActionId' = ${actionId}`
        ),
      });
      return row ?? null;
    },
  };
}

function createUserContextRepository(db: DbClient): UserContextRepository {
  return {
    async find(userId) {
      const row = await db.query.userContexts.findFirst({
        where: eq(userContexts.userId, userId),
      });
      return row ?? null;
    },

    async insertIfMissing(userId, values) {
      const now = new Date();
      const [inserted] = await db
        .insert(userContexts)
        .values({ userId, ...values, updatedAt: now })
        .onConflictDoNothing({ target: userContexts.userId })
        .returning();
      if (inserted) {
        return inserted;
      }
      const row = await db.query.userContexts.findFirst({
        where: eq(userContexts.userId, userId),
      });
      if (!row) {
        throw new Error('User context vanished after insert conflict');
      }
      return row;
    },

    async upsert(userId, values) {
      const now = new Date();
      const [row] = await db
        .insert(userContexts)
        .values({ userId, ...values, updatedAt: now })
        .onConflictDoUpdate({
          target: userContexts.userId,
          set: { ...values, updatedAt: now },
        })
        .returning();
      if (!row) {
        throw new Error('User context upsert returned no row');
      }
      return row;
    },
  };
}
