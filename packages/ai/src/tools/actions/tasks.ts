/**
 * Task Action Tools
 * Create, update, complete, delete and break down tasks
 */

import type { UpdateTaskInput } from '@taskpilot/tasks';
import type { StateChange } from '@taskpilot/shared-types';
import { createTaskArgs, updateTaskArgs, completeTaskArgs, deleteTaskArgs, breakDownTaskArgs } from '../schemas.js';
import { resolveDueDate, toTaskView } from '../format.js';
import { success, type Tool } from '../types.js';

/**
 * Create a new task
 */
export const createTask: Tool<'create_task'> = {
  name: 'create_task',
  description:
    'Create one new task. Only set dueDate or priority when the user actually gave them.',
  destructive: false,
  argsSchema: createTaskArgs,
  async execute(args, context, deps) {
    const task = await deps.tasks.createTask(context.userId, {
      title: args.title,
      description: args.description,
      priority: args.priority,
      dueDate: args.dueDate ? resolveDueDate(args.dueDate, context.timezone) : undefined,
      estimatedDuration: args.estimatedDuration,
      tags: args.tags,
      parentTaskId: args.parentTaskId,
      metadata: context.provenance,
    });

    return success(toTaskView(task, context.timezone), `Created "${task.title}"`, [
      { type: 'task_created', taskId: task.id, title: task.title },
    ]);
  },
};

/**
 * Update fields of an existing task
 */
export const updateTask: Tool<'update_task'> = {
  name: 'update_task',
  description:
    'Change fields of an existing task. Pass only the fields to change; null clears a field.',
  destructive: false,
  argsSchema: updateTaskArgs,
  async execute(args, context, deps) {
    const { taskId, dueDate, ...fields } = args;
    const patch: UpdateTaskInput = { ...fields };
    if (dueDate !== undefined) {
      patch.dueDate = dueDate === null ? null : resolveDueDate(dueDate, context.timezone);
    }

    const changed = Object.values(patch).some((value) => value !== undefined);
    const task = await deps.tasks.updateTask(context.userId, taskId, patch);
    const view = toTaskView(task, context.timezone);

    if (!changed) {
      return success(view, `No changes to "${task.title}"`);
    }
    return success(view, `Updated "${task.title}"`, [
      { type: 'task_updated', taskId: task.id, title: task.title },
    ]);
  },
};

/**
 * Mark a task completed
 */
export const completeTask: Tool<'complete_task'> = {
  name: 'complete_task',
  description: 'Mark a task as completed, optionally with the minutes actually spent.',
  destructive: false,
  argsSchema: completeTaskArgs,
  async execute(args, context, deps) {
    const task = await deps.tasks.completeTask(context.userId, args.taskId, {
      actualDuration: args.actualDuration,
    });

    return success(toTaskView(task, context.timezone), `Completed "${task.title}"`, [
      { type: 'task_completed', taskId: task.id, title: task.title },
    ]);
  },
};

/**
 * Delete a task (destructive, runs only after confirmation)
 */
export const deleteTask: Tool<'delete_task'> = {
  name: 'delete_task',
  description:
    'Delete a task. Set cascade to true to also delete its subtasks. The user must confirm before it runs.',
  destructive: true,
  argsSchema: deleteTaskArgs,
  async execute(args, context, deps) {
    const result = await deps.tasks.deleteTask(context.userId, args.taskId, {
      cascade: args.cascade,
    });

    const extra = result.deleted.length - 1;
    const summary =
      extra > 0
        ? `Deleted "${result.task.title}" and ${extra} subtask(s)`
        : `Deleted "${result.task.title}"`;
    const changes: StateChange[] = result.deleted.map((entry) => ({
      type: 'task_deleted',
      taskId: entry.id,
      title: entry.title,
    }));

    return success({ deletedIds: result.deletedIds }, summary, changes);
  },
};

/**
 * Split a task into subtasks
 */
export const breakDownTask: Tool<'break_down_task'> = {
  name: 'break_down_task',
  description:
    'Create subtasks under a task. Give subtask titles, or omit them to have them suggested.',
  destructive: false,
  argsSchema: breakDownTaskArgs,
  async execute(args, context, deps) {
    const parent = await deps.tasks.getTask(context.userId, args.taskId);

    let titles = args.subtasks;
    let source = 'user';
    if (!titles) {
      const suggestion = await deps.intelligence.suggestBreakdown(parent, {
        signal: context.signal,
      });
      titles = suggestion.subtasks;
      source = suggestion.source;
    }

    const children = await deps.tasks.createSubtasks(context.userId, parent.id, titles);

    return success(
      {
        parentTaskId: parent.id,
        source,
        subtasks: children.map((child) => toTaskView(child, context.timezone)),
      },
      `Added ${children.length} subtask(s) to "${parent.title}"`,
      children.map((child) => ({ type: 'task_created', taskId: child.id, title: child.title }))
    );
  },
};
