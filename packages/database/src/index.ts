/**
 * @taskpilot/database
 * Schema, client and the Task Store contract
 */

export * from './schema/index.js';
export { createDbClient, type DbClient } from './client.js';
export * from './store.js';
export { DrizzleTaskStore } from './drizzle-store.js';
