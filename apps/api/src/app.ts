import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { z } from 'zod';
import { getLogger } from '@taskpilot/logging';
import { ValidationError } from '@taskpilot/shared-types';
import { toFailure } from './http.js';
import type { AppServices } from './services.js';
import { healthRoutes } from './routes/health.js';
import { createTaskRoutes } from './routes/tasks.js';
import { createInsightRoutes } from './routes/insights.js';
import { createTagRoutes } from './routes/tags.js';
import { createChatRoutes } from './routes/chat.js';
import { createContextRoutes } from './routes/context.js';

declare module 'fastify' {
  interface FastifyRequest {
    /** Acting user, from the x-user-id header or the configured default */
    userId: string;
  }
}

export interface BuildAppOptions {
  corsOrigins?: true | string[];
}

const userIdHeader = z.string().uuid();

/**
 * Taskpilot API
 *
 * - /health - liveness and readiness probes
 * - /tasks, /tags - task CRUD and queries
 * - /insights, /schedule - advisory endpoints (never modify tasks)
 * - /chat - agent turns and pending action confirmation
 * - /context - the user's preferences and AI context
 */
export async function buildApp(
  services: AppServices,
  options: BuildAppOptions = {}
): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = getLogger('http');
  const app = Fastify({ loggerInstance });

  await app.register(cors, { origin: options.corsOrigins ?? true });

  app.decorateRequest('userId', '');

  app.setErrorHandler((error, request, reply) => {
    const { status, body } = toFailure(error);
    if (status >= 500) {
      request.log.error({ err: error }, 'Request failed');
    } else {
      request.log.info({ code: body.error.code, status }, body.error.message);
    }
    return reply.status(status).send(body);
  });

  app.setNotFoundHandler((request, reply) =>
    reply.status(404).send({
      success: false,
      error: { code: 'NOT_FOUND', message: `Route ${request.method} ${request.url} not found` },
    })
  );

  await app.register(healthRoutes(services), { prefix: '/health' });

  // Everything below acts on behalf of one user
  await app.register(async (scoped) => {
    scoped.addHook('preHandler', async (request) => {
      const header = request.headers['x-user-id'];
      const raw = Array.isArray(header) ? header[0] : header;
      if (raw === undefined || raw === '') {
        request.userId = services.settings.defaultUserId;
      } else {
        const parsed = userIdHeader.safeParse(raw);
        if (!parsed.success) {
          throw new ValidationError('x-user-id must be a UUID', { header: raw });
        }
        request.userId = parsed.data;
      }
      await services.store.users.ensure(request.userId, services.settings.defaultTimezone);
    });

    await scoped.register(createTaskRoutes(services), { prefix: '/tasks' });
    await scoped.register(createTagRoutes(services), { prefix: '/tags' });
    await scoped.register(createInsightRoutes(services));
    await scoped.register(createChatRoutes(services), { prefix: '/chat' });
    await scoped.register(createContextRoutes(services), { prefix: '/context' });
  });

  return app;
}
