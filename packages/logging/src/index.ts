import { pino, type Logger } from 'pino';

/**
 * Shared logger
 *
 * One pino instance for the whole process. The API server hands it to
 * Fastify; packages log through component child loggers.
 *
 * Level resolution: LOG_LEVEL, else "silent" under tests, else "info".
 */
function resolveLevel(): string {
  const explicit = process.env['LOG_LEVEL'];
  if (explicit) {
    return explicit;
  }
  return process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

export const logger: Logger = pino({
  level: resolveLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
  transport:
    process.env['NODE_ENV'] === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
            translateTime: 'SYS:standard',
          },
        }
      : undefined,
});

/**
 * Child logger tagged with the component name, e.g. getLogger('AgentLoop')
 */
export function getLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ component, ...bindings });
}

export type { Logger };
