import { z } from 'zod';
import { isValidTimeZone } from '@taskpilot/shared-types';

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

/**
 * LOG_LEVEL and NODE_ENV are validated here; @taskpilot/logging reads them
 * itself when the shared logger is created.
 */
const envSchema = z.object({
  DATABASE_URL: z.string().url('DATABASE_URL must be a postgres:// URL'),
  DATABASE_POOL_SIZE: intFromEnv(10, 1, 100),
  LOG_QUERIES: z.enum(['true', 'false']).default('false'),
  GOOGLE_AI_API_KEY: z.string().min(1, 'GOOGLE_AI_API_KEY is required'),
  PORT: intFromEnv(3000, 1, 65_535),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  GEMINI_MODEL: z.string().default('gemini-2.0-flash'),
  LLM_TIMEOUT_MS: intFromEnv(20_000, 1000, 120_000),
  LLM_MAX_ATTEMPTS: intFromEnv(3, 1, 5),
  TURN_TIMEOUT_MS: intFromEnv(30_000, 1000, 300_000),
  HISTORY_WINDOW: intFromEnv(20, 1, 100),
  CONTEXT_CHAR_BUDGET: intFromEnv(8000, 500, 100_000),
  MAX_TOOL_CALLS: intFromEnv(5, 1, 10),
  DEFAULT_TIMEZONE: z.string().refine(isValidTimeZone, 'DEFAULT_TIMEZONE must be an IANA timezone').default('UTC'),
  DEFAULT_USER_ID: z.string().uuid().default('00000000-0000-4000-8000-000000000001'),
  /** Comma-separated origins, or "*" */
  CORS_ORIGINS: z.string().default('*'),
});

/**
 * Agent and service settings, the part of the config the app itself reads
 */
export interface ServiceSettings {
  defaultTimezone: string;
  defaultUserId: string;
  llmMaxAttempts: number;
  turnTimeoutMs: number;
  historyWindow: number;
  contextCharBudget: number;
  maxToolCalls: number;
}

export interface AppConfig extends ServiceSettings {
  databaseUrl: string;
  databasePoolSize: number;
  logQueries: boolean;
  googleApiKey: string;
  port: number;
  host: string;
  geminiModel: string;
  llmTimeoutMs: number;
  corsOrigins: true | string[];
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((problem) => `  - ${problem}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Read the environment once at startup
 *
 * @throws ConfigError listing every missing or malformed variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const vars = result.data;
  const origins = vars.CORS_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    databaseUrl: vars.DATABASE_URL,
    databasePoolSize: vars.DATABASE_POOL_SIZE,
    logQueries: vars.LOG_QUERIES === 'true',
    googleApiKey: vars.GOOGLE_AI_API_KEY,
    port: vars.PORT,
    host: vars.HOST,
    geminiModel: vars.GEMINI_MODEL,
    llmTimeoutMs: vars.LLM_TIMEOUT_MS,
    llmMaxAttempts: vars.LLM_MAX_ATTEMPTS,
    turnTimeoutMs: vars.TURN_TIMEOUT_MS,
    historyWindow: vars.HISTORY_WINDOW,
    contextCharBudget: vars.CONTEXT_CHAR_BUDGET,
    maxToolCalls: vars.MAX_TOOL_CALLS,
    defaultTimezone: vars.DEFAULT_TIMEZONE,
    defaultUserId: vars.DEFAULT_USER_ID,
    corsOrigins: origins.length === 0 || origins.includes('*') ? true : origins,
  };
}
