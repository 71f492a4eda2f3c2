/**
 * Natural-Language Task Parser
 *
 * Turns free text into a structured task. The LLM does the extraction; its
 * JSON is validated, repaired once if invalid, and the due date it proposes
 * is kept only when the text itself mentions a date or time. When the model
 * is unavailable or keeps producing unusable output, the local rules take
 * over and the result is flagged low-confidence.
 */

import { z } from 'zod';
import { getLogger, type Logger } from '@taskpilot/logging';
import {
  ParseError,
  ProviderError,
  TASK_PRIORITIES,
  dayOfWeekName,
  formatLocalDateTime,
  getZonedParts,
  parseDueDate,
  type TaskPriority,
  type UserPreferences,
} from '@taskpilot/shared-types';
import { normalizeTagNames } from '@taskpilot/database';
import { parseJsonText, type LLMClient } from '../gemini-client.js';
import { generateWithRetry, type RetryOptions } from '../retry.js';
import { buildParsePrompt, buildRepairPrompt } from './prompts.js';
import { detectPriority, mentionsTime, parseWithRules, type RuleContext } from './rules.js';

export interface ParseContext {
  /** IANA timezone used to resolve relative dates */
  timezone?: string;
  now?: Date;
  preferences?: UserPreferences;
  /** Set to false to surface ParseError instead of falling back to rules */
  allowFallback?: boolean;
  signal?: AbortSignal;
}

export interface ParsedTask {
  title: string;
  description?: string;
  dueDate?: Date;
  priority: TaskPriority;
  tags: string[];
  estimatedDuration?: number;
  confidence: 'high' | 'low';
  source: 'llm' | 'rules';
  notes: string[];
}

export interface TaskParserOptions {
  defaultTimezone?: string;
  retry?: RetryOptions;
  logger?: Logger;
}

const llmTaskSchema = z.object({
  title: z.string().trim().min(1, 'title is required').max(255),
  description: z.string().trim().max(2000).nullish(),
  due_date: z
    .string()
    .nullish()
    .refine(
      (value) => value === null || value === undefined || parseDueDate(value, 'UTC') !== null,
      { message: 'due_date must be "YYYY-MM-DDTHH:mm" local time or null' }
    ),
  priority: z.enum(TASK_PRIORITIES).nullish(),
  tags: z.array(z.string()).max(10).nullish(),
  estimated_duration: z.number().int().min(0).max(10_080).nullish(),
});

type LlmTask = z.infer<typeof llmTaskSchema>;

type Validation = { ok: true; value: LlmTask } | { ok: false; problem: string };

function validateOutput(raw: string): Validation {
  const json = parseJsonText(raw);
  if (!json.ok) {
    return { ok: false, problem: `Output is not valid JSON (${json.error})` };
  }
  const result = llmTaskSchema.safeParse(json.value);
  if (!result.success) {
    return {
      ok: false,
      problem: result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; '),
    };
  }
  return { ok: true, value: result.data };
}

export class TaskParser {
  private readonly defaultTimezone: string;
  private readonly retry: RetryOptions;
  private readonly log: Logger;

  constructor(
    private readonly llm: LLMClient,
    options: TaskParserOptions = {}
  ) {
    this.defaultTimezone = options.defaultTimezone ?? 'UTC';
    this.retry = options.retry ?? {};
    this.log = options.logger ?? getLogger('TaskParser');
  }

  /**
   * Parse free text into a task
   *
   * @throws ParseError when the text is empty, or when the model output is
   * unusable and fallback is disabled
   */
  async parse(text: string, context: ParseContext = {}): Promise<ParsedTask> {
    const trimmed = text.trim();
    if (!trimmed) {
      throw new ParseError('Cannot create a task from empty text');
    }

    const ruleContext: RuleContext = {
      now: context.now ?? new Date(),
      timezone: context.timezone ?? context.preferences?.timezone ?? this.defaultTimezone,
      defaultPriority: context.preferences?.defaultPriority,
    };

    try {
      return await this.parseWithLlm(trimmed, ruleContext, context);
    } catch (error) {
      if (
        !(error instanceof ParseError || error instanceof ProviderError) ||
        context.allowFallback === false
      ) {
        throw error;
      }
      this.log.warn({ err: error }, 'LLM parse failed, falling back to rules');
      return this.parseWithFallback(trimmed, ruleContext, error.message);
    }
  }

  private async parseWithLlm(
    text: string,
    ruleContext: RuleContext,
    context: ParseContext
  ): Promise<ParsedTask> {
    const parts = getZonedParts(ruleContext.now, ruleContext.timezone);
    const prompt = buildParsePrompt(text, {
      localNow: formatLocalDateTime(ruleContext.now, ruleContext.timezone),
      weekday: dayOfWeekName(parts.weekday),
      timezone: ruleContext.timezone,
      preferences: context.preferences,
    });
    const options = { ...this.retry, json: true, signal: context.signal, label: 'parse' };

    const first = await generateWithRetry(this.llm, prompt, options);
    let validation = validateOutput(first);
    let notes: string[] = [];

    if (!validation.ok) {
      this.log.info({ problem: validation.problem }, 'Invalid parse output, sending repair prompt');
      const repaired = await generateWithRetry(
        this.llm,
        buildRepairPrompt(prompt, first, validation.problem),
        options
      );
      validation = validateOutput(repaired);
      if (!validation.ok) {
        throw new ParseError(`Model output unusable after repair: ${validation.problem}`, repaired);
      }
      notes = ['Model output repaired once'];
    }

    return this.toParsedTask(text, validation.value, ruleContext, notes);
  }

  private toParsedTask(
    text: string,
    output: LlmTask,
    ruleContext: RuleContext,
    notes: string[]
  ): ParsedTask {
    let dueDate: Date | undefined;
    if (output.due_date) {
      if (!mentionsTime(text, ruleContext)) {
        notes.push('Dropped a due date the text does not mention');
      } else {
        dueDate = parseDueDate(output.due_date, ruleContext.timezone) ?? undefined;
      }
    }

    const priority =
      output.priority ?? detectPriority(text) ?? ruleContext.defaultPriority ?? 'medium';
    const description = output.description ?? undefined;

    return {
      title: output.title,
      ...(description ? { description } : {}),
      ...(dueDate ? { dueDate } : {}),
      priority,
      tags: normalizeTagNames(output.tags ?? []).slice(0, 5),
      ...(output.estimated_duration != null ? { estimatedDuration: output.estimated_duration } : {}),
      confidence: 'high',
      source: 'llm',
      notes,
    };
  }

  private parseWithFallback(text: string, ruleContext: RuleContext, reason: string): ParsedTask {
    const result = parseWithRules(text, ruleContext);
    if (!result.title) {
      throw new ParseError('Could not find a task title in the text');
    }

    return {
      title: result.title,
      ...(result.description ? { description: result.description } : {}),
      ...(result.dueDate ? { dueDate: result.dueDate } : {}),
      priority: result.priority,
      tags: result.tags,
      ...(result.estimatedDuration !== null ? { estimatedDuration: result.estimatedDuration } : {}),
      confidence: 'low',
      source: 'rules',
      notes: [...result.notes, `Fallback reason: ${reason}`],
    };
  }
}

export { parseWithRules, mentionsTime, resolveDueDate, findTemporal } from './rules.js';
export type { RuleContext, RuleParseResult } from './rules.js';
