import type { FastifyPluginAsync } from 'fastify';
import { createTagInputSchema } from '@taskpilot/tasks';
import { ok } from '../http.js';
import type { AppServices } from '../services.js';

export function createTagRoutes({ tasks }: AppServices): FastifyPluginAsync {
  return async (fastify) => {
    fastify.get('/', async (request) => ok(await tasks.listTags(request.userId)));

    fastify.post('/', async (request, reply) => {
      const tag = await tasks.createTag(request.userId, createTagInputSchema.parse(request.body));
      reply.status(201);
      return ok(tag);
    });
  };
}
