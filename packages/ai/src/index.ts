// LLM client
export {
  GeminiClient,
  createGeminiClient,
  parseJsonText,
  toProviderError,
  type GeminiClientConfig,
  type GenerateOptions,
  type LLMClient,
} from './gemini-client.js';
export { withRetry, generateWithRetry, backoffDelay, type RetryOptions } from './retry.js';

// Natural-language parsing
export * from './parser/index.js';

// Advisory helpers
export * from './intelligence.js';

// Tools
export * from './tools/index.js';

// Agent
export * from './agent/loop.js';
export * from './agent/context.js';
export { AGENT_INTENTS, buildReasonPrompt, buildRespondPrompt, type AgentIntent } from './agent/prompts.js';
