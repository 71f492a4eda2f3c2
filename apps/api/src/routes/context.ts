import type { FastifyPluginAsync } from 'fastify';
import { userContextPatchSchema } from '@taskpilot/tasks';
import { ok } from '../http.js';
import type { AppServices } from '../services.js';

/**
 * The user's context singleton. PATCH merges each section it names into
 * the stored one; sending the same patch twice leaves the same result.
 */
export function createContextRoutes({ context }: AppServices): FastifyPluginAsync {
  return async (fastify) => {
    fastify.get('/', async (request) => ok(await context.getUserContext(request.userId)));

    fastify.patch('/', async (request) => {
      const patch = userContextPatchSchema.parse(request.body);
      return ok(await context.updateUserContext(request.userId, patch), 'Context updated');
    });
  };
}
