import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import {
  createTaskInputSchema,
  listTasksQuerySchema,
  tagNameSchema,
  taskPrioritySchema,
  taskStatusSchema,
  taskTitleSchema,
  updateTaskInputSchema,
} from '@taskpilot/tasks';
import { isValidTimeZone } from '@taskpilot/shared-types';
import { booleanFlag, idParams, ok, paginationQuery, zonedDate } from '../http.js';
import type { AppServices } from '../services.js';

const listQuery = paginationQuery.extend({
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  parentTaskId: listTasksQuerySchema.shape.parentTaskId,
  overdue: booleanFlag.optional(),
  tag: tagNameSchema.optional(),
});

/** Date fields of task bodies and queries, read in the user's timezone */
function withZonedDates(timeZone: string) {
  return {
    create: createTaskInputSchema.extend({ dueDate: zonedDate(timeZone).nullish() }),
    update: updateTaskInputSchema.extend({ dueDate: zonedDate(timeZone).nullish() }),
    list: listQuery.extend({
      dueBefore: zonedDate(timeZone).optional(),
      dueAfter: zonedDate(timeZone).optional(),
    }),
  };
}

const searchQuery = paginationQuery.extend({ q: z.string({ required_error: 'q is required' }) });

const upcomingQuery = paginationQuery.extend({
  days: z.coerce.number().int().min(1).max(90).default(7),
});

const deleteQuery = z.object({ cascade: booleanFlag.optional() });

const completeBody = z.object({ actualDuration: z.number().int().min(0).optional() });

const nlCreateBody = z.object({
  text: z.string().trim().min(1, 'text is required').max(2000),
  timezone: z.string().refine(isValidTimeZone, 'Unknown IANA timezone').optional(),
});

const breakdownBody = z.object({ subtasks: z.array(taskTitleSchema).min(1).max(20).optional() });

/**
 * Task routes
 *
 * Plain CRUD goes straight to the TaskService; date fields are read in the
 * user's timezone first. Natural-language creation,
 * breakdown and insights go through the agent so they share the tool
 * functions the chat uses.
 */
export function createTaskRoutes({ tasks, agent }: AppServices): FastifyPluginAsync {
  return async (fastify) => {
    fastify.post('/', async (request, reply) => {
      const schemas = withZonedDates(await agent.userTimezone(request.userId));
      const input = schemas.create.parse(request.body);
      const task = await tasks.createTask(request.userId, input);
      reply.status(201);
      return ok(task, `Created "${task.title}"`);
    });

    fastify.get('/', async (request) => {
      const schemas = withZonedDates(await agent.userTimezone(request.userId));
      const query = schemas.list.parse(request.query);
      return ok(await tasks.listTasks(request.userId, query));
    });

    fastify.get('/search', async (request) => {
      const { q, ...page } = searchQuery.parse(request.query);
      return ok(await tasks.searchTasks(request.userId, q, page));
    });

    fastify.get('/overdue', async (request) => {
      const page = paginationQuery.parse(request.query);
      return ok(await tasks.getOverdueTasks(request.userId, page));
    });

    fastify.get('/upcoming', async (request) => {
      const { days, ...page } = upcomingQuery.parse(request.query);
      return ok(await tasks.getUpcomingTasks(request.userId, days, page));
    });

    fastify.get('/statistics', async (request) => ok(await tasks.getStatistics(request.userId)));

    /**
     * POST /tasks/nl-create
     *
     * Free text in, one task out. Falls back to local rules when the model
     * is unavailable; `parse.confidence` is then "low".
     */
    fastify.post('/nl-create', async (request, reply) => {
      const { text, timezone } = nlCreateBody.parse(request.body);
      const { task, parsed } = await agent.parseAndCreateTask(request.userId, text, { timezone });
      reply.status(201);
      return ok(
        {
          task,
          parse: { source: parsed.source, confidence: parsed.confidence, notes: parsed.notes },
        },
        `Created "${task.title}"`
      );
    });

    fastify.get('/:id', async (request) => {
      const { id } = idParams.parse(request.params);
      return ok(await tasks.getTask(request.userId, id));
    });

    fastify.patch('/:id', async (request) => {
      const { id } = idParams.parse(request.params);
      const schemas = withZonedDates(await agent.userTimezone(request.userId));
      const input = schemas.update.parse(request.body);
      const task = await tasks.updateTask(request.userId, id, input);
      return ok(task, `Updated "${task.title}"`);
    });

    fastify.delete('/:id', async (request) => {
      const { id } = idParams.parse(request.params);
      const { cascade } = deleteQuery.parse(request.query);
      const result = await tasks.deleteTask(request.userId, id, { cascade });
      return ok(
        { deletedIds: result.deletedIds },
        `Deleted ${result.deletedIds.length} task(s)`
      );
    });

    fastify.post('/:id/complete', async (request) => {
      const { id } = idParams.parse(request.params);
      const { actualDuration } = completeBody.parse(request.body ?? {});
      const task = await tasks.completeTask(request.userId, id, { actualDuration });
      return ok(task, `Completed "${task.title}"`);
    });

    fastify.post('/:id/breakdown', async (request, reply) => {
      const { id } = idParams.parse(request.params);
      const { subtasks } = breakdownBody.parse(request.body ?? {});
      const result = await agent.runTool(request.userId, {
        name: 'break_down_task',
        arguments: { taskId: id, subtasks },
      });
      reply.status(201);
      return ok(result.data, result.summary);
    });

    fastify.get('/:id/insights', async (request) => {
      const { id } = idParams.parse(request.params);
      const result = await agent.runTool(request.userId, {
        name: 'get_task_insights',
        arguments: { taskId: id },
      });
      return ok(result.data, result.summary);
    });
  };
}
