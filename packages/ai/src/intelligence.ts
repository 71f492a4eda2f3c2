/**
 * Task Intelligence
 *
 * LLM-backed advisory helpers: per-task analysis, productivity insights and
 * subtask breakdown. Each has a deterministic fallback used when the model
 * fails or returns something unusable. Nothing here writes to the store.
 */

import { z } from 'zod';
import type { TaskWithTags } from '@taskpilot/database';
import { getLogger, type Logger } from '@taskpilot/logging';
import {
  ProviderError,
  TASK_PRIORITIES,
  formatForHumans,
  type TaskPriority,
  type TaskStatistics,
} from '@taskpilot/shared-types';
import { parseJsonText, type LLMClient } from './gemini-client.js';
import { generateWithRetry, type RetryOptions } from './retry.js';
import { estimateDuration } from './parser/rules.js';

export type Complexity = 'low' | 'medium' | 'high';
export type Trend = 'improving' | 'stable' | 'declining';
export type AdvisorySource = 'llm' | 'rules';

export interface TaskAnalysis {
  suggestedPriority: TaskPriority;
  estimatedDuration: number;
  complexity: Complexity;
  recommendations: string[];
  rationale: string;
  source: AdvisorySource;
}

export interface ProductivityInsights {
  productivityScore: number;
  insights: string[];
  recommendations: string[];
  trend: Trend;
  source: AdvisorySource;
}

export interface BreakdownSuggestion {
  subtasks: string[];
  source: AdvisorySource;
}

export interface TaskIntelligenceOptions {
  retry?: RetryOptions;
  logger?: Logger;
  now?: () => Date;
}

export interface AdvisoryCallOptions {
  timezone?: string;
  signal?: AbortSignal;
}

export const MAX_SUBTASKS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

const analysisSchema = z.object({
  suggested_priority: z.enum(TASK_PRIORITIES),
  estimated_duration_minutes: z.number().int().positive().max(10_080),
  complexity: z.enum(['low', 'medium', 'high']),
  recommendations: z.array(z.string().trim().min(1)).max(5),
  reasoning: z.string().trim().min(1),
});

const insightsSchema = z.object({
  productivity_score: z.number().min(0).max(100),
  insights: z.array(z.string().trim().min(1)).max(5),
  recommendations: z.array(z.string().trim().min(1)).max(5),
  trend: z.enum(['improving', 'stable', 'declining']),
});

const breakdownSchema = z.union([
  z.array(z.string()),
  z.object({ subtasks: z.array(z.string()) }),
]);

/**
 * Rule-based analysis: priority from days until due (1 or less high, more
 * than 7 low), duration from the estimate or keywords
 */
export function fallbackAnalysis(task: TaskWithTags, now: Date): TaskAnalysis {
  let priority: TaskPriority = 'medium';
  if (task.dueDate) {
    const daysUntilDue = Math.floor((task.dueDate.getTime() - now.getTime()) / DAY_MS);
    if (daysUntilDue <= 1) {
      priority = 'high';
    } else if (daysUntilDue > 7) {
      priority = 'low';
    }
  }

  const recommendations = ['Break it into smaller subtasks'];
  if (!task.dueDate) {
    recommendations.push('Set a specific due date');
  }
  if (!task.estimatedDuration) {
    recommendations.push('Record a time estimate so scheduling can plan it');
  }

  return {
    suggestedPriority: priority,
    estimatedDuration:
      task.estimatedDuration ??
      estimateDuration(`${task.title} ${task.description ?? ''}`) ??
      60,
    complexity: 'medium',
    recommendations,
    rationale: 'Based on due date analysis',
    source: 'rules',
  };
}

/**
 * Score bands on completion rate: 70%+ scores 80, 40%+ scores 60, else 40
 */
export function fallbackInsights(stats: TaskStatistics): ProductivityInsights {
  const base = { trend: 'stable' as const, source: 'rules' as const };
  if (stats.completionRate >= 70) {
    return {
      ...base,
      productivityScore: 80,
      insights: ['Good task completion rate'],
      recommendations: ['Keep up the good work'],
    };
  }
  if (stats.completionRate >= 40) {
    return {
      ...base,
      productivityScore: 60,
      insights: ['Moderate completion rate'],
      recommendations: ['Focus on completing existing tasks'],
    };
  }
  return {
    ...base,
    productivityScore: 40,
    insights: ['Low completion rate'],
    recommendations: ['Consider reducing task load', 'Break tasks into smaller pieces'],
  };
}

export function fallbackBreakdown(title: string): string[] {
  return [`Plan ${title}`, `Execute ${title}`, `Review ${title}`].map((item) => item.slice(0, 255));
}

export class TaskIntelligence {
  private readonly retry: RetryOptions;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly llm: LLMClient,
    options: TaskIntelligenceOptions = {}
  ) {
    this.retry = options.retry ?? {};
    this.log = options.logger ?? getLogger('TaskIntelligence');
    this.now = options.now ?? (() => new Date());
  }

  async analyzeTask(task: TaskWithTags, options: AdvisoryCallOptions = {}): Promise<TaskAnalysis> {
    const timezone = options.timezone ?? 'UTC';
    const prompt = `Analyze this task and give practical advice.

Task title: ${task.title}
Description: ${task.description ?? 'No description'}
Current priority: ${task.priority}
Status: ${task.status}
Due: ${task.dueDate ? formatForHumans(task.dueDate, timezone) : 'Not set'}
Estimate: ${task.estimatedDuration ? `${task.estimatedDuration} minutes` : 'Not set'}
Now: ${formatForHumans(this.now(), timezone)}

Return ONLY a JSON object with:
- suggested_priority: "low" | "medium" | "high"
- estimated_duration_minutes: integer
- complexity: "low" | "medium" | "high"
- recommendations: 2-3 short actionable strings
- reasoning: one or two sentences`;

    const output = await this.ask(prompt, analysisSchema, 'analyze', options.signal);
    if (!output) {
      return fallbackAnalysis(task, this.now());
    }
    return {
      suggestedPriority: output.suggested_priority,
      estimatedDuration: output.estimated_duration_minutes,
      complexity: output.complexity,
      recommendations: output.recommendations,
      rationale: output.reasoning,
      source: 'llm',
    };
  }

  async productivityInsights(
    stats: TaskStatistics,
    options: AdvisoryCallOptions = {}
  ): Promise<ProductivityInsights> {
    const prompt = `Analyze these task statistics and give productivity insights.

- Total tasks: ${stats.total}
- Completed: ${stats.completed}
- In progress: ${stats.in_progress}
- Todo: ${stats.todo}
- Overdue: ${stats.overdue}
- Completion rate: ${stats.completionRate}%

Return ONLY a JSON object with:
- productivity_score: number 0-100
- insights: 2-3 key observations
- recommendations: 2-3 actionable suggestions
- trend: "improving" | "stable" | "declining"

Be encouraging but honest.`;

    const output = await this.ask(prompt, insightsSchema, 'insights', options.signal);
    if (!output) {
      return fallbackInsights(stats);
    }
    return {
      productivityScore: Math.round(output.productivity_score),
      insights: output.insights,
      recommendations: output.recommendations,
      trend: output.trend,
      source: 'llm',
    };
  }

  async suggestBreakdown(
    task: { title: string; description?: string | null },
    options: AdvisoryCallOptions = {}
  ): Promise<BreakdownSuggestion> {
    const prompt = `Break this task down into 3-${MAX_SUBTASKS} manageable subtasks.

Task: ${task.title}
Description: ${task.description ?? 'No description'}

Each subtask must be specific, actionable and at most 10 words, in a sensible order.
Return ONLY a JSON array of strings, e.g. ["Research requirements", "Create draft outline", "Write first section"]`;

    const output = await this.ask(prompt, breakdownSchema, 'breakdown', options.signal);
    const items = (Array.isArray(output) ? output : (output?.subtasks ?? []))
      .map((item) => item.trim().slice(0, 255))
      .filter((item) => item.length > 0)
      .slice(0, MAX_SUBTASKS);

    if (items.length === 0) {
      return { subtasks: fallbackBreakdown(task.title), source: 'rules' };
    }
    return { subtasks: items, source: 'llm' };
  }

  /**
   * One JSON completion validated against a schema; null when the provider
   * fails or the output does not fit
   */
  private async ask<T>(
    prompt: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: string,
    signal: AbortSignal | undefined
  ): Promise<T | null> {
    let raw: string;
    try {
      raw = await generateWithRetry(this.llm, prompt, { ...this.retry, json: true, signal, label });
    } catch (error) {
      if (error instanceof ProviderError) {
        this.log.warn({ label, err: error }, 'Provider failed, using fallback');
        return null;
      }
      throw error;
    }

    const json = parseJsonText(raw);
    const result = json.ok ? schema.safeParse(json.value) : null;
    if (!result?.success) {
      this.log.warn({ label }, 'Unusable model output, using fallback');
      return null;
    }
    return result.data;
  }
}
