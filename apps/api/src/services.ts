/**
 * Service wiring
 *
 * Builds the object graph the routes use from a Task Store and an LLM
 * client. The server passes the Drizzle store and the Gemini client; tests
 * pass the in-memory store and a scripted client.
 */

import type { TaskStore } from '@taskpilot/database';
import { TaskService } from '@taskpilot/tasks';
import {
  AgentLoop,
  ContextManager,
  TaskIntelligence,
  TaskParser,
  type LLMClient,
  type RetryOptions,
} from '@taskpilot/ai';
import type { ServiceSettings } from './config.js';

export interface AppServices {
  settings: ServiceSettings;
  store: TaskStore;
  tasks: TaskService;
  context: ContextManager;
  agent: AgentLoop;
}

export interface ServiceOverrides {
  now?: () => Date;
  retry?: RetryOptions;
}

export function createServices(
  store: TaskStore,
  llm: LLMClient,
  settings: ServiceSettings,
  overrides: ServiceOverrides = {}
): AppServices {
  const retry: RetryOptions = { maxAttempts: settings.llmMaxAttempts, ...overrides.retry };
  const { now } = overrides;

  const tasks = new TaskService(store, { now });
  const intelligence = new TaskIntelligence(llm, { retry, now });
  const parser = new TaskParser(llm, { retry, defaultTimezone: settings.defaultTimezone });
  const context = new ContextManager(store, {
    windowSize: settings.historyWindow,
    contextCharBudget: settings.contextCharBudget,
  });
  const agent = new AgentLoop(
    { llm, store, tasks, intelligence, parser, context },
    {
      maxToolCalls: settings.maxToolCalls,
      turnTimeoutMs: settings.turnTimeoutMs,
      historyWindow: settings.historyWindow,
      defaultTimezone: settings.defaultTimezone,
      retry,
      now,
    }
  );

  return { settings, store, tasks, context, agent };
}
