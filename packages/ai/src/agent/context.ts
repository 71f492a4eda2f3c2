/**
 * Conversation Context Manager
 *
 * Reads the persisted message log and the per-user context singleton to
 * build what a turn's prompts see. Long windows are compacted into one
 * synthetic summary message for the prompt only; the log itself is
 * append-only and never rewritten here.
 */

import type { ConversationMessage, TaskStore, UserContextRecord } from '@taskpilot/database';
import { getLogger, type Logger } from '@taskpilot/logging';
import { userContextPatchSchema, validateInput, type UserContextPatchInput } from '@taskpilot/tasks';

export type PromptRole = 'user' | 'assistant' | 'summary';

export interface PromptMessage {
  role: PromptRole;
  content: string;
  createdAt: Date;
}

export interface PromptContext {
  /** Oldest to newest */
  messages: PromptMessage[];
  userContext: UserContextRecord;
  /** Number of log messages folded into the summary message */
  summarizedCount: number;
}

export interface ContextManagerOptions {
  /** Messages read per turn (default: 20) */
  windowSize?: number;
  /** Characters of message content allowed before compaction (default: 8000) */
  contextCharBudget?: number;
  logger?: Logger;
}

export type UserContextPatch = UserContextPatchInput;

const SUMMARY_SNIPPET_CHARS = 120;
const SUMMARY_MAX_CHARS = 1200;

function snippet(content: string): string {
  const flat = content.replace(/\s+/g, ' ').trim();
  return flat.length > SUMMARY_SNIPPET_CHARS ? `${flat.slice(0, SUMMARY_SNIPPET_CHARS - 3)}...` : flat;
}

/**
 * Fold older messages into one summary line per message, oldest first
 */
export function summarizeMessages(messages: readonly ConversationMessage[]): string {
  const lines = messages.map(
    (message) => `${message.role === 'user' ? 'User' : 'Assistant'}: ${snippet(message.content)}`
  );
  let text = `Earlier in this conversation (${messages.length} messages):\n${lines.join('\n')}`;
  if (text.length > SUMMARY_MAX_CHARS) {
    text = `${text.slice(0, SUMMARY_MAX_CHARS - 3)}...`;
  }
  return text;
}

/**
 * Keep the newest messages that fit the budget (always at least the newest
 * one) and replace the rest with a summary message
 */
export function compactWindow(
  messages: readonly ConversationMessage[],
  charBudget: number
): { messages: PromptMessage[]; summarizedCount: number } {
  let used = 0;
  let keepFrom = messages.length;
  for (let i = messages.length - 1; i >= 0; i--) {
    const length = messages[i]?.content.length ?? 0;
    if (keepFrom < messages.length && used + length > charBudget) {
      break;
    }
    used += length;
    keepFrom = i;
  }

  const kept: PromptMessage[] = messages.slice(keepFrom).map((message) => ({
    role: message.role,
    content: message.content,
    createdAt: message.createdAt,
  }));
  const folded = messages.slice(0, keepFrom);
  const first = folded[0];
  if (!first) {
    return { messages: kept, summarizedCount: 0 };
  }

  return {
    messages: [{ role: 'summary', content: summarizeMessages(folded), createdAt: first.createdAt }, ...kept],
    summarizedCount: folded.length,
  };
}

export class ContextManager {
  private readonly windowSize: number;
  private readonly charBudget: number;
  private readonly log: Logger;

  constructor(
    private readonly store: TaskStore,
    options: ContextManagerOptions = {}
  ) {
    this.windowSize = options.windowSize ?? 20;
    this.charBudget = options.contextCharBudget ?? 8000;
    this.log = options.logger ?? getLogger('ContextManager');
  }

  async buildPromptContext(userId: string, windowSize = this.windowSize): Promise<PromptContext> {
    const [recent, userContext] = await Promise.all([
      this.store.messages.listRecent(userId, windowSize),
      this.getUserContext(userId),
    ]);

    const compacted = compactWindow(recent, this.charBudget);
    if (compacted.summarizedCount > 0) {
      this.log.debug({ userId, summarized: compacted.summarizedCount }, 'Compacted prompt context');
    }
    return { ...compacted, userContext };
  }

  recordTurn(
    userId: string,
    role: ConversationMessage['role'],
    content: string,
    metadata?: Record<string, unknown>
  ): Promise<ConversationMessage> {
    return this.store.messages.append({ userId, role, content, metadata });
  }

  listHistory(userId: string, limit = this.windowSize): Promise<ConversationMessage[]> {
    return this.store.messages.listRecent(userId, limit);
  }

  /**
   * The user's context singleton, created empty on first access
   */
  async getUserContext(userId: string): Promise<UserContextRecord> {
    const existing = await this.store.userContexts.find(userId);
    if (existing) {
      return existing;
    }
    return this.store.userContexts.insertIfMissing(userId, {
      preferences: {},
      productivityPatterns: {},
      aiContext: {},
    });
  }

  /**
   * Shallow-merge each supplied section into the stored one
   *
   * @throws ValidationError for unknown keys or malformed values
   */
  async updateUserContext(userId: string, input: UserContextPatch): Promise<UserContextRecord> {
    const patch = validateInput(userContextPatchSchema, input, 'user context');
    const current = await this.getUserContext(userId);
    const updated = await this.store.userContexts.upsert(userId, {
      preferences: { ...current.preferences, ...patch.preferences },
      productivityPatterns: { ...current.productivityPatterns, ...patch.productivityPatterns },
      aiContext: { ...current.aiContext, ...patch.aiContext },
    });
    this.log.info({ userId, sections: Object.keys(patch) }, 'User context updated');
    return updated;
  }
}
