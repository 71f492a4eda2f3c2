/**
 * Agent Loop
 *
 * One chat turn as an explicit state machine:
 * perceive → reason → act → observe → respond → done.
 *
 * Each turn owns a WorkingMemory object; nothing carries over between
 * turns except what is persisted in the message log. Destructive tool
 * calls are never run inside a turn. They are stored as pending actions
 * on the assistant message and run by confirmAction.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { TaskStore, TaskWithTags } from '@taskpilot/database';
import { getLogger, type Logger } from '@taskpilot/logging';
import type { TaskService } from '@taskpilot/tasks';
import {
  ConflictError,
  NotFoundError,
  ParseError,
  ProviderError,
  TaskpilotError,
  TimeoutError,
  ValidationError,
  errorFromPayload,
  formatLocalDateTime,
  isValidTimeZone,
  toErrorPayload,
  toPublicErrorPayload,
  type ErrorPayload,
  type StateChange,
  type UserPreferences,
} from '@taskpilot/shared-types';
import { parseJsonText, type LLMClient } from '../gemini-client.js';
import { generateWithRetry, type RetryOptions } from '../retry.js';
import type { TaskIntelligence } from '../intelligence.js';
import type { ParsedTask, TaskParser } from '../parser/index.js';
import { executeToolCall, parseToolCall, type ToolObservation } from '../tools/executor.js';
import { isDestructive } from '../tools/registry.js';
import type { ToolCall, ToolName } from '../tools/schemas.js';
import type { ToolContext, ToolDeps, ToolResult, ToolSuccess } from '../tools/types.js';
import type { ContextManager, PromptContext } from './context.js';
import { AGENT_INTENTS, buildReasonPrompt, buildRespondPrompt, type AgentIntent } from './prompts.js';

export type AgentState = 'perceive' | 'reason' | 'act' | 'observe' | 'respond' | 'done';

/**
 * A destructive call held until the user confirms it
 */
export interface PendingAction {
  id: string;
  tool: ToolName;
  arguments: unknown;
  summary: string;
  createdAt: string;
}

/**
 * Per-turn scratch state
 */
export interface WorkingMemory {
  userId: string;
  message: string;
  now: Date;
  timezone: string;
  preferences: UserPreferences;
  context?: PromptContext;
  intent: AgentIntent;
  proposedCalls: unknown[];
  skippedCalls: number;
  /** Outcomes of the last act step, not yet observed */
  outcomes: ToolObservation[];
  observations: ToolObservation[];
  changes: StateChange[];
  pendingActions: PendingAction[];
  draftReply?: string;
  reply?: string;
  degraded: boolean;
  error?: ErrorPayload;
  transitions: number;
}

export interface TurnResult {
  reply: string;
  intent: AgentIntent;
  changes: StateChange[];
  pendingActions: PendingAction[];
  degraded: boolean;
  error?: ErrorPayload;
}

export interface ActionResolution {
  actionId: string;
  status: 'confirmed' | 'rejected';
  reply: string;
  changes: StateChange[];
  result?: ToolResult;
}

export interface ParseAndCreateResult {
  task: TaskWithTags;
  parsed: ParsedTask;
}

export interface AgentLoopDeps {
  llm: LLMClient;
  store: TaskStore;
  tasks: TaskService;
  intelligence: TaskIntelligence;
  parser: TaskParser;
  context: ContextManager;
}

export interface AgentLoopOptions {
  /** Tool calls run per turn (default: 5) */
  maxToolCalls?: number;
  /** Wall-clock budget per turn (default: 30000) */
  turnTimeoutMs?: number;
  /** Messages of history read per turn (default: 20) */
  historyWindow?: number;
  defaultTimezone?: string;
  retry?: RetryOptions;
  logger?: Logger;
  now?: () => Date;
}

const MAX_TRANSITIONS = 12;

const FALLBACK_REPLY = "I'm not sure what you'd like me to do. Could you rephrase that?";

const reasonOutputSchema = z.object({
  intent: z.enum(AGENT_INTENTS).catch('chit-chat'),
  tool_calls: z.array(z.unknown()).nullish(),
  reply: z.string().nullish(),
});

const pendingActionSchema = z.object({
  id: z.string(),
  tool: z.string(),
  arguments: z.unknown(),
  summary: z.string(),
  createdAt: z.string(),
});

const pendingActionsSchema = z.array(pendingActionSchema).catch([]);

/**
 * Deterministic account of what a turn did, used when the model cannot
 * compose the reply
 */
export function summarizeObservations(observations: readonly ToolObservation[]): string {
  return observations
    .map((observation) => {
      if (observation.status === 'pending') {
        return `Waiting for your confirmation: ${observation.summary}.`;
      }
      const { result } = observation;
      return result.success ? `${result.summary}.` : `${observation.tool} failed: ${result.error.message}`;
    })
    .join(' ');
}

function degradedReply(opening: string, observations: readonly ToolObservation[]): string {
  const done = summarizeObservations(observations);
  return done ? `${opening} Here is what I did: ${done}` : `${opening} Please try again in a moment.`;
}

export class AgentLoop {
  private readonly maxToolCalls: number;
  private readonly turnTimeoutMs: number;
  private readonly historyWindow: number;
  private readonly defaultTimezone: string;
  private readonly retry: RetryOptions;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly toolDeps: ToolDeps;

  constructor(
    private readonly deps: AgentLoopDeps,
    options: AgentLoopOptions = {}
  ) {
    this.maxToolCalls = options.maxToolCalls ?? 5;
    this.turnTimeoutMs = options.turnTimeoutMs ?? 30_000;
    this.historyWindow = options.historyWindow ?? 20;
    this.defaultTimezone = options.defaultTimezone ?? 'UTC';
    this.retry = options.retry ?? {};
    this.log = options.logger ?? getLogger('AgentLoop');
    this.now = options.now ?? (() => new Date());
    this.toolDeps = { tasks: deps.tasks, intelligence: deps.intelligence };
  }

  /**
   * Run one chat turn. Every failure after input validation comes back as a
   * degraded reply that still lists the changes already made.
   */
  async handleChatTurn(userId: string, message: string): Promise<TurnResult> {
    const text = message.trim();
    if (!text) {
      throw new ValidationError('Message must not be empty');
    }

    const memory = this.createMemory(userId, text);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.turnTimeoutMs);

    try {
      let state: AgentState = 'perceive';
      while (state !== 'done') {
        memory.transitions++;
        if (memory.transitions > MAX_TRANSITIONS) {
          throw new TaskpilotError(`Turn exceeded ${MAX_TRANSITIONS} transitions`, {
            code: 'INTERNAL_ERROR',
            statusCode: 500,
          });
        }
        if (controller.signal.aborted) {
          throw new TimeoutError(`Turn exceeded ${this.turnTimeoutMs}ms`, this.turnTimeoutMs);
        }
        this.log.debug({ userId, state }, 'Agent step');
        state = await this.step(state, memory, controller.signal);
      }
    } catch (error) {
      this.collect(memory);
      memory.degraded = true;
      if (error instanceof TimeoutError) {
        this.log.warn({ userId, timeoutMs: this.turnTimeoutMs }, 'Turn timed out');
        memory.error = error.toJSON();
        memory.reply = degradedReply('Sorry, that took too long and I had to stop.', memory.observations);
      } else {
        this.log.error({ userId, err: error }, 'Turn failed');
        memory.error = toPublicErrorPayload(error);
        memory.reply = degradedReply('Sorry, something went wrong on my side.', memory.observations);
      }
    } finally {
      clearTimeout(timer);
    }

    const result: TurnResult = {
      reply: memory.reply ?? FALLBACK_REPLY,
      intent: memory.intent,
      changes: memory.changes,
      pendingActions: memory.pendingActions,
      degraded: memory.degraded,
      ...(memory.error ? { error: memory.error } : {}),
    };

    try {
      await this.deps.context.recordTurn(userId, 'assistant', result.reply, {
        intent: result.intent,
        changes: result.changes,
        pendingActions: result.pendingActions,
        degraded: result.degraded,
        ...(result.error ? { error: result.error } : {}),
      });
    } catch (error) {
      this.log.error({ userId, err: error }, 'Failed to record assistant reply');
    }

    this.log.info(
      {
        userId,
        intent: result.intent,
        changes: result.changes.length,
        pending: result.pendingActions.length,
        degraded: result.degraded,
      },
      'Turn complete'
    );

    return result;
  }

  /**
   * Run a pending destructive action the user has confirmed
   */
  async confirmAction(userId: string, actionId: string): Promise<ActionResolution> {
    const { call } = await this.findUnresolved(userId, actionId);

    const context = await this.toolContext(userId);
    const result = await executeToolCall(call, context, this.toolDeps);
    const changes = result.success ? result.changes : [];
    const reply = result.success
      ? `${result.summary}.`
      : `I couldn't do that: ${result.error.message}`;

    await this.deps.context.recordTurn(userId, 'assistant', reply, {
      resolvedActionId: actionId,
      resolution: 'confirmed',
      changes,
      ...(result.success ? {} : { error: result.error }),
    });
    this.log.info({ userId, actionId, success: result.success }, 'Pending action confirmed');

    return { actionId, status: 'confirmed', reply, changes, result };
  }

  /**
   * Resolve a pending action without running it
   */
  async rejectAction(userId: string, actionId: string): Promise<ActionResolution> {
    const { action } = await this.findUnresolved(userId, actionId);
    const reply = `Okay, I won't do that: ${action.summary}.`;

    await this.deps.context.recordTurn(userId, 'assistant', reply, {
      resolvedActionId: actionId,
      resolution: 'rejected',
      changes: [],
    });
    this.log.info({ userId, actionId }, 'Pending action rejected');

    return { actionId, status: 'rejected', reply, changes: [] };
  }

  /**
   * Natural-language task creation: a turn whose single create_task call
   * comes from the parser instead of the Reason step
   */
  async parseAndCreateTask(
    userId: string,
    text: string,
    options: { timezone?: string } = {}
  ): Promise<ParseAndCreateResult> {
    const context = await this.toolContext(userId, options.timezone);
    const parsed = await this.deps.parser.parse(text, {
      timezone: context.timezone,
      now: context.now,
      preferences: context.preferences,
    });

    const call: ToolCall = {
      name: 'create_task',
      arguments: {
        title: parsed.title,
        description: parsed.description,
        priority: parsed.priority,
        dueDate: parsed.dueDate ? formatLocalDateTime(parsed.dueDate, context.timezone) : undefined,
        estimatedDuration: parsed.estimatedDuration,
        tags: parsed.tags,
      },
    };

    const result = await executeToolCall(
      call,
      {
        ...context,
        provenance: { parsedFrom: text.trim(), parseConfidence: parsed.confidence },
      },
      this.toolDeps
    );
    if (!result.success) {
      throw errorFromPayload(result.error);
    }

    const created = result.changes.find((change) => change.type === 'task_created');
    if (!created) {
      throw new ParseError('Task creation reported no new task');
    }
    const task = await this.deps.tasks.getTask(userId, created.taskId);
    this.log.info({ userId, taskId: task.id, source: parsed.source }, 'Task created from text');
    return { task, parsed };
  }

  /**
   * Run one tool call the user asked for directly, outside a chat turn.
   * Destructive tools run immediately here; no pending action is created.
   *
   * @throws ValidationError for an unknown tool or bad arguments, otherwise
   * the tool's own error rebuilt from its payload
   */
  async runTool(userId: string, raw: unknown): Promise<ToolSuccess> {
    const parsed = parseToolCall(raw);
    if (!parsed.ok) {
      throw new ValidationError(parsed.error.message, parsed.error.details);
    }
    const result = await executeToolCall(parsed.call, await this.toolContext(userId), this.toolDeps);
    if (!result.success) {
      throw errorFromPayload(result.error);
    }
    return result;
  }

  /**
   * The user's timezone from their preferences, or the default
   */
  async userTimezone(userId: string): Promise<string> {
    const userContext = await this.deps.context.getUserContext(userId);
    return this.resolveTimezone(userContext.preferences.timezone);
  }

  private createMemory(userId: string, message: string): WorkingMemory {
    return {
      userId,
      message,
      now: this.now(),
      timezone: this.defaultTimezone,
      preferences: {},
      intent: 'chit-chat',
      proposedCalls: [],
      skippedCalls: 0,
      outcomes: [],
      observations: [],
      changes: [],
      pendingActions: [],
      degraded: false,
      transitions: 0,
    };
  }

  private step(state: AgentState, memory: WorkingMemory, signal: AbortSignal): Promise<AgentState> {
    switch (state) {
      case 'perceive':
        return this.perceive(memory);
      case 'reason':
        return this.reason(memory, signal);
      case 'act':
        return this.act(memory, signal);
      case 'observe':
        return Promise.resolve(this.observe(memory));
      case 'respond':
        return this.respond(memory, signal);
      case 'done':
        return Promise.resolve('done');
    }
  }

  private async perceive(memory: WorkingMemory): Promise<AgentState> {
    memory.context = await this.deps.context.buildPromptContext(memory.userId, this.historyWindow);
    memory.preferences = memory.context.userContext.preferences;
    memory.timezone = this.resolveTimezone(memory.preferences.timezone);
    await this.deps.context.recordTurn(memory.userId, 'user', memory.message);
    return 'reason';
  }

  private async reason(memory: WorkingMemory, signal: AbortSignal): Promise<AgentState> {
    const notes = memory.context?.userContext.aiContext.notes;
    const prompt = buildReasonPrompt({
      message: memory.message,
      history: memory.context?.messages ?? [],
      now: memory.now,
      timezone: memory.timezone,
      preferences: memory.preferences,
      notes: typeof notes === 'string' ? notes : undefined,
      maxToolCalls: this.maxToolCalls,
    });

    let raw: string;
    try {
      raw = await this.generate(prompt, 'reason', true, signal);
    } catch (error) {
      if (!(error instanceof ProviderError)) {
        throw error;
      }
      memory.degraded = true;
      memory.error = error.toJSON();
      memory.reply = degradedReply("Sorry, I'm having trouble reaching the assistant right now.", []);
      return 'done';
    }

    const json = parseJsonText(raw);
    if (!json.ok) {
      memory.reply = raw.trim() || FALLBACK_REPLY;
      return 'done';
    }
    const output = reasonOutputSchema.safeParse(json.value);
    if (!output.success) {
      this.log.warn({ userId: memory.userId }, 'Reason output did not match the expected shape');
      memory.reply = FALLBACK_REPLY;
      return 'done';
    }

    memory.intent = output.data.intent;
    memory.proposedCalls = output.data.tool_calls ?? [];
    memory.draftReply = output.data.reply ?? undefined;

    if (memory.proposedCalls.length === 0) {
      if (memory.draftReply) {
        memory.reply = memory.draftReply;
        return 'done';
      }
      return 'respond';
    }
    return 'act';
  }

  private async act(memory: WorkingMemory, signal: AbortSignal): Promise<AgentState> {
    const calls = memory.proposedCalls.slice(0, this.maxToolCalls);
    memory.skippedCalls = memory.proposedCalls.length - calls.length;
    const context = this.contextFromMemory(memory, signal);

    for (const raw of calls) {
      if (signal.aborted) {
        throw new TimeoutError(`Turn exceeded ${this.turnTimeoutMs}ms`, this.turnTimeoutMs);
      }

      const parsed = parseToolCall(raw);
      if (!parsed.ok) {
        memory.outcomes.push({
          tool: parsed.name,
          arguments: parsed.arguments,
          status: 'done',
          result: { success: false, error: parsed.error },
        });
        continue;
      }

      const { call } = parsed;
      if (isDestructive(call.name)) {
        memory.outcomes.push(await this.holdForConfirmation(call, context, memory));
        continue;
      }

      const result = await executeToolCall(call, context, this.toolDeps);
      memory.outcomes.push({ tool: call.name, arguments: call.arguments, status: 'done', result });
    }
    return 'observe';
  }

  private observe(memory: WorkingMemory): AgentState {
    this.collect(memory);
    return 'respond';
  }

  private async respond(memory: WorkingMemory, signal: AbortSignal): Promise<AgentState> {
    if (memory.reply) {
      return 'done';
    }

    const prompt = buildRespondPrompt({
      message: memory.message,
      observations: memory.observations,
      draftReply: memory.draftReply,
      skippedCalls: memory.skippedCalls,
    });

    try {
      const text = (await this.generate(prompt, 'respond', false, signal)).trim();
      memory.reply = text || summarizeObservations(memory.observations) || FALLBACK_REPLY;
    } catch (error) {
      if (!(error instanceof ProviderError)) {
        throw error;
      }
      memory.degraded = true;
      memory.error = error.toJSON();
      memory.reply = degradedReply(
        "Sorry, I'm having trouble reaching the assistant right now.",
        memory.observations
      );
    }
    return 'done';
  }

  /**
   * Move act outcomes into observations, collecting state changes and
   * pending actions
   */
  private collect(memory: WorkingMemory): void {
    for (const outcome of memory.outcomes) {
      memory.observations.push(outcome);
      if (outcome.status === 'pending') {
        continue;
      }
      if (outcome.result.success) {
        memory.changes.push(...outcome.result.changes);
      } else {
        this.log.info(
          { userId: memory.userId, tool: outcome.tool, code: outcome.result.error.code },
          'Tool call failed'
        );
      }
    }
    memory.outcomes = [];
  }

  private async holdForConfirmation(
    call: ToolCall,
    context: ToolContext,
    memory: WorkingMemory
  ): Promise<ToolObservation> {
    let summary: string;
    try {
      summary = await this.describeAction(call, context.userId);
    } catch (error) {
      return {
        tool: call.name,
        arguments: call.arguments,
        status: 'done',
        result: { success: false, error: toErrorPayload(error) },
      };
    }

    const action: PendingAction = {
      id: randomUUID(),
      tool: call.name,
      arguments: call.arguments,
      summary,
      createdAt: this.now().toISOString(),
    };
    memory.pendingActions.push(action);
    return { tool: call.name, arguments: call.arguments, status: 'pending', actionId: action.id, summary };
  }

  private async describeAction(call: ToolCall, userId: string): Promise<string> {
    if (call.name !== 'delete_task') {
      return call.name;
    }
    const task = await this.deps.tasks.getTask(userId, call.arguments.taskId);
    return call.arguments.cascade
      ? `delete "${task.title}" and all of its subtasks`
      : `delete "${task.title}"`;
  }

  private async findUnresolved(
    userId: string,
    actionId: string
  ): Promise<{ action: PendingAction; call: ToolCall }> {
    const message = await this.deps.store.messages.findByPendingActionId(userId, actionId);
    const stored = message
      ? pendingActionsSchema.parse(message.metadata['pendingActions']).find((action) => action.id === actionId)
      : undefined;
    if (!stored) {
      throw new NotFoundError('Pending action', actionId);
    }

    const resolution = await this.deps.store.messages.findResolution(userId, actionId);
    if (resolution) {
      const how = resolution.metadata['resolution'];
      throw new ConflictError(
        `Action ${actionId} was already ${typeof how === 'string' ? how : 'resolved'}`,
        { actionId }
      );
    }

    const parsed = parseToolCall({ name: stored.tool, arguments: stored.arguments });
    if (!parsed.ok) {
      throw new ValidationError(parsed.error.message, parsed.error.details);
    }
    const { call } = parsed;
    return { action: { ...stored, tool: call.name, arguments: call.arguments }, call };
  }

  private async toolContext(userId: string, timezone?: string): Promise<ToolContext> {
    const userContext = await this.deps.context.getUserContext(userId);
    return {
      userId,
      timezone: this.resolveTimezone(timezone ?? userContext.preferences.timezone),
      now: this.now(),
      preferences: userContext.preferences,
    };
  }

  private contextFromMemory(memory: WorkingMemory, signal: AbortSignal): ToolContext {
    return {
      userId: memory.userId,
      timezone: memory.timezone,
      now: memory.now,
      preferences: memory.preferences,
      signal,
    };
  }

  private resolveTimezone(candidate: string | undefined): string {
    return candidate && isValidTimeZone(candidate) ? candidate : this.defaultTimezone;
  }

  /**
   * One completion with retry; an abort of the turn surfaces as a timeout
   */
  private async generate(
    prompt: string,
    label: string,
    json: boolean,
    signal: AbortSignal
  ): Promise<string> {
    try {
      return await generateWithRetry(this.deps.llm, prompt, { ...this.retry, json, signal, label });
    } catch (error) {
      if (signal.aborted) {
        throw new TimeoutError(`Turn exceeded ${this.turnTimeoutMs}ms`, this.turnTimeoutMs);
      }
      throw error;
    }
  }
}
