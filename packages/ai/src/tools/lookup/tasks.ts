/**
 * Task Lookup Tools
 * Read-only listing and search
 */

import type { ListTasksQuery } from '@taskpilot/tasks';
import { listTasksArgs, searchTasksArgs } from '../schemas.js';
import { toTaskView } from '../format.js';
import { success, type Tool } from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const listTasks: Tool<'list_tasks'> = {
  name: 'list_tasks',
  description:
    'List tasks with optional filters. Use overdue or dueWithinDays for deadline questions.',
  destructive: false,
  argsSchema: listTasksArgs,
  async execute(args, context, deps) {
    const query: ListTasksQuery = {
      status: args.status,
      priority: args.priority,
      parentTaskId: args.parentTaskId,
      tag: args.tag,
      limit: args.limit,
    };
    if (args.overdue) {
      query.overdue = true;
    } else if (args.dueWithinDays) {
      query.openOnly = true;
      query.dueAfter = context.now;
      query.dueBefore = new Date(context.now.getTime() + args.dueWithinDays * DAY_MS);
    }

    const found = await deps.tasks.listTasks(context.userId, query);
    return success(
      found.map((task) => toTaskView(task, context.timezone)),
      found.length === 0 ? 'No matching tasks' : `Found ${found.length} task(s)`
    );
  },
};

export const searchTasks: Tool<'search_tasks'> = {
  name: 'search_tasks',
  description: 'Find tasks whose title or description contains the query text.',
  destructive: false,
  argsSchema: searchTasksArgs,
  async execute(args, context, deps) {
    const found = await deps.tasks.searchTasks(context.userId, args.query, { limit: args.limit });
    return success(
      found.map((task) => toTaskView(task, context.timezone)),
      found.length === 0 ? `No tasks match "${args.query}"` : `Found ${found.length} task(s) matching "${args.query}"`
    );
  },
};
