import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { ok } from '../http.js';
import type { AppServices } from '../services.js';

const scheduleQuery = z.object({ days: z.coerce.number().int().optional() });

/**
 * Advisory routes. Results carry `requiresConfirmation`; nothing here
 * changes a task.
 */
export function createInsightRoutes({ agent }: AppServices): FastifyPluginAsync {
  return async (fastify) => {
    fastify.get('/insights/productivity', async (request) => {
      const result = await agent.runTool(request.userId, { name: 'get_task_insights', arguments: {} });
      return ok(result.data, result.summary);
    });

    fastify.get('/schedule/suggestions', async (request) => {
      const { days } = scheduleQuery.parse(request.query);
      const result = await agent.runTool(request.userId, {
        name: 'suggest_schedule',
        arguments: days === undefined ? {} : { days },
      });
      return ok(result.data, result.summary);
    });
  };
}
