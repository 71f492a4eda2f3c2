import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { idParams, ok } from '../http.js';
import type { AppServices } from '../services.js';

const chatBody = z.object({
  message: z.string().trim().min(1, 'message is required').max(4000),
});

const historyQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

/**
 * Chat routes
 *
 * POST /chat runs one agent turn. Deletions proposed in a turn come back in
 * `pendingActions` and only run through POST /chat/actions/:id/confirm.
 */
export function createChatRoutes({ agent, context }: AppServices): FastifyPluginAsync {
  return async (fastify) => {
    fastify.post('/', async (request) => {
      const { message } = chatBody.parse(request.body);
      const turn = await agent.handleChatTurn(request.userId, message);
      return ok(turn, turn.reply);
    });

    fastify.get('/history', async (request) => {
      const { limit } = historyQuery.parse(request.query);
      return ok(await context.listHistory(request.userId, limit));
    });

    fastify.post('/actions/:id/confirm', async (request) => {
      const { id } = idParams.parse(request.params);
      const resolution = await agent.confirmAction(request.userId, id);
      return ok(resolution, resolution.reply);
    });

    fastify.post('/actions/:id/reject', async (request) => {
      const { id } = idParams.parse(request.params);
      const resolution = await agent.rejectAction(request.userId, id);
      return ok(resolution, resolution.reply);
    });
  };
}
