/**
 * Task Service
 *
 * Validated task operations on top of the Task Store. Owns the task tree
 * invariants (parent exists, no cycles, cascade guard on delete) and the
 * completion bookkeeping (completedAt, estimation accuracy).
 */

import type { Tag, Task, TaskPatch, TaskStore, TaskWithTags } from '@taskpilot/database';
import { normalizeTagNames } from '@taskpilot/database';
import { getLogger, type Logger } from '@taskpilot/logging';
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  type TaskStatistics,
} from '@taskpilot/shared-types';
import {
  createTagInputSchema,
  createTaskInputSchema,
  listTasksQuerySchema,
  subtaskTitlesSchema,
  updateTaskInputSchema,
  validateInput,
  type CreateTagInput,
  type CreateTaskInput,
  type ListTasksQuery,
  type UpdateTaskInput,
} from './schemas.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface TaskServiceOptions {
  now?: () => Date;
  logger?: Logger;
}

export interface Pagination {
  limit?: number;
  offset?: number;
}

export interface DeleteTaskResult {
  task: TaskWithTags;
  /** Ids removed, the task itself first */
  deletedIds: string[];
  deleted: Array<Pick<Task, 'id' | 'title'>>;
}

/**
 * Accuracy of an estimate as a percentage (100 = exact), two decimals
 */
export function calculateEstimationAccuracy(estimated: number, actual: number): number {
  if (estimated === 0) {
    return 0;
  }
  const difference = Math.abs(estimated - actual);
  const accuracy = Math.max(0, 100 - (difference / estimated) * 100);
  return Math.round(accuracy * 100) / 100;
}

export class TaskService {
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly store: TaskStore,
    options: TaskServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? getLogger('TaskService');
  }

  async createTask(userId: string, input: CreateTaskInput): Promise<TaskWithTags> {
    const data = validateInput(createTaskInputSchema, input, 'task');

    if (data.parentTaskId) {
      await this.requireTask(userId, data.parentTaskId);
    }

    const status = data.status ?? 'todo';
    const task = await this.store.tasks.insert({
      userId,
      title: data.title,
      description: data.description ?? null,
      status,
      priority: data.priority ?? 'medium',
      dueDate: data.dueDate ?? null,
      estimatedDuration: data.estimatedDuration ?? null,
      actualDuration: data.actualDuration ?? null,
      parentTaskId: data.parentTaskId ?? null,
      metadata: data.metadata ?? {},
      completedAt: status === 'completed' ? this.now() : null,
    });

    const tags = await this.setTags(userId, task.id, data.tags ?? []);
    this.log.info({ userId, taskId: task.id }, 'Task created');
    return { ...task, tags };
  }

  async getTask(userId: string, id: string): Promise<TaskWithTags> {
    const task = await this.requireTask(userId, id);
    const [withTags] = await this.withTags([task]);
    return withTags ?? { ...task, tags: [] };
  }

  async listTasks(userId: string, query: ListTasksQuery = {}): Promise<TaskWithTags[]> {
    const data = validateInput(listTasksQuerySchema, query, 'task query');
    const rows = await this.store.tasks.findMany(userId, {
      status: data.status,
      priority: data.priority,
      parentTaskId: data.parentTaskId === 'root' ? null : data.parentTaskId,
      dueBefore: data.overdue ? this.now() : data.dueBefore,
      dueAfter: data.dueAfter,
      excludeCompleted: data.overdue || data.openOnly,
      tag: data.tag,
      orderBy: data.overdue || data.dueBefore || data.dueAfter ? 'dueDate' : 'createdAt',
      limit: data.limit,
      offset: data.offset,
    });
    return this.withTags(rows);
  }

  async searchTasks(userId: string, query: string, page: Pagination = {}): Promise<TaskWithTags[]> {
    const text = query.trim();
    if (text.length < 2) {
      throw new ValidationError('Search query must be at least 2 characters', { query });
    }
    const rows = await this.store.tasks.findMany(userId, {
      search: text,
      limit: page.limit ?? 50,
      offset: page.offset,
    });
    return this.withTags(rows);
  }

  async getOverdueTasks(userId: string, page: Pagination = {}): Promise<TaskWithTags[]> {
    return this.listTasks(userId, { overdue: true, ...page });
  }

  /** Open tasks due between now and now + days */
  async getUpcomingTasks(userId: string, days = 7, page: Pagination = {}): Promise<TaskWithTags[]> {
    if (!Number.isInteger(days) || days < 1 || days > 365) {
      throw new ValidationError('days must be an integer between 1 and 365', { days });
    }
    const now = this.now();
    const rows = await this.store.tasks.findMany(userId, {
      dueAfter: now,
      dueBefore: new Date(now.getTime() + days * DAY_MS),
      excludeCompleted: true,
      orderBy: 'dueDate',
      limit: page.limit,
      offset: page.offset,
    });
    return this.withTags(rows);
  }

  /**
   * Apply only the fields present in the patch. An empty patch performs no
   * write and returns the task as stored.
   */
  async updateTask(userId: string, id: string, input: UpdateTaskInput): Promise<TaskWithTags> {
    const data = validateInput(updateTaskInputSchema, input, 'task update');
    const current = await this.requireTask(userId, id);

    const patch: TaskPatch = {};
    if (data.title !== undefined) patch.title = data.title;
    if (data.description !== undefined) patch.description = data.description;
    if (data.priority !== undefined) patch.priority = data.priority;
    if (data.dueDate !== undefined) patch.dueDate = data.dueDate;
    if (data.estimatedDuration !== undefined) patch.estimatedDuration = data.estimatedDuration;
    if (data.actualDuration !== undefined) patch.actualDuration = data.actualDuration;
    if (data.metadata !== undefined) patch.metadata = { ...current.metadata, ...data.metadata };

    if (data.status !== undefined) {
      patch.status = data.status;
      if (data.status === 'completed' && current.status !== 'completed') {
        patch.completedAt = this.now();
      } else if (data.status !== 'completed' && current.status === 'completed') {
        patch.completedAt = null;
      }
    }

    if (data.parentTaskId !== undefined) {
      if (data.parentTaskId !== null) {
        await this.assertValidParent(userId, id, data.parentTaskId);
      }
      patch.parentTaskId = data.parentTaskId;
    }

    const hasFieldChanges = Object.keys(patch).length > 0;
    if (!hasFieldChanges && data.tags === undefined) {
      return this.getTask(userId, id);
    }

    let updated: Task = current;
    if (hasFieldChanges) {
      patch.updatedAt = this.now();
      const row = await this.store.tasks.update(userId, id, patch);
      if (!row) {
        throw new NotFoundError('Task', id);
      }
      updated = row;
    }

    if (data.tags !== undefined) {
      const tags = await this.setTags(userId, id, data.tags);
      this.log.info({ userId, taskId: id, fields: Object.keys(patch) }, 'Task updated');
      return { ...updated, tags };
    }

    this.log.info({ userId, taskId: id, fields: Object.keys(patch) }, 'Task updated');
    const [withTags] = await this.withTags([updated]);
    return withTags ?? { ...updated, tags: [] };
  }

  /**
   * Delete a task. With subtasks present this fails unless cascade is set,
   * in which case every descendant goes too.
   */
  async deleteTask(
    userId: string,
    id: string,
    options: { cascade?: boolean } = {}
  ): Promise<DeleteTaskResult> {
    const task = await this.getTask(userId, id);
    const descendants = await this.collectDescendants(userId, id);

    if (descendants.length > 0 && !options.cascade) {
      throw new ConflictError(
        `Task "${task.title}" has ${descendants.length} subtask(s); delete with cascade to remove them`,
        { taskId: id, descendantCount: descendants.length }
      );
    }

    const deleted = [task, ...descendants].map(({ id: taskId, title }) => ({ id: taskId, title }));
    const deletedIds = deleted.map((entry) => entry.id);
    await this.store.tasks.deleteMany(userId, deletedIds);
    this.log.info({ userId, taskId: id, removed: deletedIds.length }, 'Task deleted');
    return { task, deletedIds, deleted };
  }

  /**
   * Mark completed, optionally recording the time actually spent
   */
  async completeTask(
    userId: string,
    id: string,
    options: { actualDuration?: number } = {}
  ): Promise<TaskWithTags> {
    const { actualDuration } = options;
    if (actualDuration !== undefined && (!Number.isInteger(actualDuration) || actualDuration < 0)) {
      throw new ValidationError('actualDuration must be a non-negative integer', { actualDuration });
    }

    const current = await this.requireTask(userId, id);
    const now = this.now();
    const patch: TaskPatch = {
      status: 'completed',
      completedAt: current.completedAt ?? now,
      updatedAt: now,
    };

    if (actualDuration !== undefined) {
      patch.actualDuration = actualDuration;
      if (current.estimatedDuration != null) {
        patch.metadata = {
          ...current.metadata,
          estimationAccuracy: calculateEstimationAccuracy(current.estimatedDuration, actualDuration),
        };
      }
    }

    const row = await this.store.tasks.update(userId, id, patch);
    if (!row) {
      throw new NotFoundError('Task', id);
    }
    this.log.info({ userId, taskId: id }, 'Task completed');
    const [withTags] = await this.withTags([row]);
    return withTags ?? { ...row, tags: [] };
  }

  /**
   * One child per title, inheriting the parent's priority and due date.
   * The parent itself is not modified.
   */
  async createSubtasks(userId: string, parentId: string, titles: string[]): Promise<TaskWithTags[]> {
    const validTitles = validateInput(subtaskTitlesSchema, titles, 'subtask titles');
    const parent = await this.requireTask(userId, parentId);

    const created: TaskWithTags[] = [];
    for (const title of validTitles) {
      created.push(
        await this.createTask(userId, {
          title,
          parentTaskId: parent.id,
          priority: parent.priority,
          dueDate: parent.dueDate,
        })
      );
    }
    return created;
  }

  async getStatistics(userId: string): Promise<TaskStatistics> {
    const counts = await this.store.tasks.countByStatus(userId);
    const overdue = await this.store.tasks.countOverdue(userId, this.now());
    const total = counts.todo + counts.in_progress + counts.completed;

    return {
      total,
      todo: counts.todo,
      in_progress: counts.in_progress,
      completed: counts.completed,
      overdue,
      completionRate: total > 0 ? Math.round((counts.completed / total) * 10000) / 100 : 0,
    };
  }

  /** Open tasks, nearest deadline first */
  async listOpenTasks(userId: string, limit = 100): Promise<TaskWithTags[]> {
    const rows = await this.store.tasks.findMany(userId, {
      excludeCompleted: true,
      orderBy: 'dueDate',
      limit,
    });
    return this.withTags(rows);
  }

  listTags(userId: string): Promise<Tag[]> {
    return this.store.tags.list(userId);
  }

  async createTag(userId: string, input: CreateTagInput): Promise<Tag> {
    const data = validateInput(createTagInputSchema, input, 'tag');
    const name = data.name.toLowerCase();
    if (await this.store.tags.findByName(userId, name)) {
      throw new ConflictError(`Tag "${name}" already exists`, { name });
    }
    const tag = await this.store.tags.insert({ userId, name, color: data.color ?? null });
    this.log.info({ userId, tagId: tag.id }, 'Tag created');
    return tag;
  }

  private async requireTask(userId: string, id: string): Promise<Task> {
    if (!UUID_PATTERN.test(id)) {
      throw new NotFoundError('Task', id);
    }
    const task = await this.store.tasks.findById(userId, id);
    if (!task) {
      throw new NotFoundError('Task', id);
    }
    return task;
  }

  /**
   * A new parent must exist and must not be the task or one of its
   * descendants
   */
  private async assertValidParent(userId: string, id: string, parentId: string): Promise<void> {
    if (parentId === id) {
      throw new ConflictError('A task cannot be its own parent', { taskId: id });
    }

    let cursor: Task | null = await this.requireTask(userId, parentId);
    const visited = new Set<string>();
    while (cursor) {
      if (cursor.id === id) {
        throw new ConflictError('Moving the task there would create a cycle', {
          taskId: id,
          parentTaskId: parentId,
        });
      }
      if (visited.has(cursor.id) || !cursor.parentTaskId) {
        return;
      }
      visited.add(cursor.id);
      cursor = await this.store.tasks.findById(userId, cursor.parentTaskId);
    }
  }

  private async collectDescendants(userId: string, id: string): Promise<Task[]> {
    const found: Task[] = [];
    const seen = new Set<string>([id]);
    const queue = [id];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const child of await this.store.tasks.findChildren(userId, current)) {
        if (!seen.has(child.id)) {
          seen.add(child.id);
          found.push(child);
          queue.push(child.id);
        }
      }
    }
    return found;
  }

  private async setTags(userId: string, taskId: string, names: string[]): Promise<string[]> {
    const normalized = normalizeTagNames(names);
    const tags = await this.store.tags.ensure(userId, normalized);
    await this.store.tags.replaceTaskTags(
      taskId,
      tags.map((tag) => tag.id)
    );
    return tags.map((tag) => tag.name).sort();
  }

  private async withTags(rows: Task[]): Promise<TaskWithTags[]> {
    const names = await this.store.tags.namesForTasks(rows.map((row) => row.id));
    return rows.map((row) => ({ ...row, tags: names.get(row.id) ?? [] }));
  }
}
