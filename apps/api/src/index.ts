import { createDbClient, DrizzleTaskStore } from '@taskpilot/database';
import { createGeminiClient } from '@taskpilot/ai';
import { getLogger } from '@taskpilot/logging';
import { buildApp } from './app.js';
import { ConfigError, loadConfig } from './config.js';
import { createServices } from './services.js';

const log = getLogger('server');

/**
 * Taskpilot API Server
 *
 * Handles:
 * - Task CRUD, search and statistics
 * - Natural-language task creation and agent chat turns
 * - Insights and schedule suggestions
 * - Health checks
 */
async function main(): Promise<void> {
  const config = loadConfig();

  const db = createDbClient(config.databaseUrl, {
    maxConnections: config.databasePoolSize,
    logQueries: config.logQueries,
  });
  const store = new DrizzleTaskStore(db);
  log.info('Database client initialized');

  const llm = createGeminiClient({
    apiKey: config.googleApiKey,
    model: config.geminiModel,
    timeoutMs: config.llmTimeoutMs,
  });
  log.info({ model: llm.getModelName() }, 'Gemini client initialized');

  const services = createServices(store, llm, config);
  const app = await buildApp(services, { corsOrigins: config.corsOrigins });

  // Graceful shutdown
  let closing = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (closing) {
      return;
    }
    closing = true;
    log.info({ signal }, 'Shutting down...');
    try {
      await app.close();
      await store.close();
      process.exit(0);
    } catch (error) {
      log.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGTERM', (signal) => void shutdown(signal));
  process.on('SIGINT', (signal) => void shutdown(signal));

  await app.listen({ port: config.port, host: config.host });
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    log.fatal(error.message);
  } else {
    log.fatal({ err: error }, 'Server failed to start');
  }
  process.exit(1);
});
