import type { FastifyPluginAsync } from 'fastify';
import type { HealthCheck } from '@taskpilot/shared-types';
import type { AppServices } from '../services.js';

/**
 * Health check routes
 *
 * - /health/live - Liveness probe (is the server running?)
 * - /health/ready - Readiness probe (can it reach the database?)
 */
export function healthRoutes(services: AppServices): FastifyPluginAsync {
  return async (fastify) => {
    fastify.get('/live', async (): Promise<HealthCheck> => ({
      status: 'ok',
      timestamp: new Date().toISOString(),
    }));

    fastify.get('/ready', async (request, reply) => {
      const checks: Record<string, boolean> = { server: true };

      try {
        await services.store.ping();
        checks['database'] = true;
      } catch (error) {
        request.log.warn({ err: error }, 'Database ping failed');
        checks['database'] = false;
      }

      const allHealthy = Object.values(checks).every(Boolean);
      const body: HealthCheck = {
        status: allHealthy ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        checks,
      };
      return reply.status(allHealthy ? 200 : 503).send(body);
    });
  };
}
