import type { Logger as QueryLogger } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { getLogger } from '@taskpilot/logging';
import * as schema from './schema/index.js';

const log = getLogger('database');

export interface DbClientOptions {
  /** Pool size (default 10) */
  maxConnections?: number;
  /** Seconds before an idle connection is closed */
  idleTimeout?: number;
  /** Log every statement at debug level */
  logQueries?: boolean;
}

const queryLogger: QueryLogger = {
  logQuery(query, params) {
    log.debug({ query, params: params.length }, 'SQL');
  },
};

/**
 * Create the Drizzle client over a postgres.js pool. The pool is reachable
 * as `$client` so the store can end it on shutdown.
 */
export function createDbClient(connectionString: string, options: DbClientOptions = {}) {
  const queryClient = postgres(connectionString, {
    max: options.maxConnections ?? 10,
    idle_timeout: options.idleTimeout ?? 30,
    connect_timeout: 10,
    onnotice: (notice) => log.debug({ notice: notice.message }, 'Postgres notice'),
  });

  return drizzle(queryClient, {
    schema,
    logger: options.logQueries ? queryLogger : false,
  });
}

export type DbClient = ReturnType<typeof createDbClient>;
