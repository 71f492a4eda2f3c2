/**
 * Tool Executor
 * Validates raw tool calls and runs them, turning every failure into a result
 */

import { z } from 'zod';
import { getLogger } from '@taskpilot/logging';
import { isTaskpilotError, toErrorPayload, type ErrorPayload } from '@taskpilot/shared-types';
import { TOOL_NAMES, isToolName, toolCallSchema, type ToolCall } from './schemas.js';
import { toolRegistry } from './registry.js';
import type { ToolContext, ToolDeps, ToolResult, ToolSuccess } from './types.js';

const log = getLogger('ToolExecutor');

const rawCallSchema = z.object({
  name: z.string(),
  arguments: z.unknown().optional(),
});

export type ParsedToolCall =
  | { ok: true; call: ToolCall }
  | { ok: false; name: string; arguments: unknown; error: ErrorPayload };

/**
 * Validate a proposed call: known tool name, then its argument record
 */
export function parseToolCall(raw: unknown): ParsedToolCall {
  const envelope = rawCallSchema.safeParse(raw);
  if (!envelope.success) {
    return {
      ok: false,
      name: 'unknown',
      arguments: raw,
      error: { code: 'VALIDATION_ERROR', message: 'Tool call must be an object with a name' },
    };
  }

  const { name, arguments: args } = envelope.data;
  if (!isToolName(name)) {
    return {
      ok: false,
      name,
      arguments: args,
      error: {
        code: 'VALIDATION_ERROR',
        message: `Unknown tool: ${name}`,
        details: { available: [...TOOL_NAMES] },
      },
    };
  }

  const parsed = toolCallSchema.safeParse({ name, arguments: args });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.filter((part) => part !== 'arguments').join('.'),
      message: issue.message,
    }));
    return {
      ok: false,
      name,
      arguments: args,
      error: {
        code: 'VALIDATION_ERROR',
        message: `Invalid arguments for ${name}: ${issues
          .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
          .join('; ')}`,
        details: { issues },
      },
    };
  }

  return { ok: true, call: parsed.data };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled tool call: ${JSON.stringify(value)}`);
}

function dispatch(call: ToolCall, context: ToolContext, deps: ToolDeps): Promise<ToolSuccess> {
  switch (call.name) {
    case 'create_task':
      return toolRegistry.create_task.execute(call.arguments, context, deps);
    case 'update_task':
      return toolRegistry.update_task.execute(call.arguments, context, deps);
    case 'complete_task':
      return toolRegistry.complete_task.execute(call.arguments, context, deps);
    case 'delete_task':
      return toolRegistry.delete_task.execute(call.arguments, context, deps);
    case 'list_tasks':
      return toolRegistry.list_tasks.execute(call.arguments, context, deps);
    case 'search_tasks':
      return toolRegistry.search_tasks.execute(call.arguments, context, deps);
    case 'get_task_insights':
      return toolRegistry.get_task_insights.execute(call.arguments, context, deps);
    case 'suggest_schedule':
      return toolRegistry.suggest_schedule.execute(call.arguments, context, deps);
    case 'break_down_task':
      return toolRegistry.break_down_task.execute(call.arguments, context, deps);
    default:
      return assertNever(call);
  }
}

/**
 * Execute a single validated tool call
 */
export async function executeToolCall(
  call: ToolCall,
  context: ToolContext,
  deps: ToolDeps
): Promise<ToolResult> {
  try {
    return await dispatch(call, context, deps);
  } catch (error) {
    if (isTaskpilotError(error)) {
      log.warn({ tool: call.name, code: error.code, userId: context.userId }, error.message);
    } else {
      log.error({ tool: call.name, err: error, userId: context.userId }, 'Tool failed');
    }
    return { success: false, error: toErrorPayload(error) };
  }
}

export type ToolObservation =
  | { tool: string; arguments: unknown; status: 'done'; result: ToolResult }
  | { tool: string; arguments: unknown; status: 'pending'; actionId: string; summary: string };

/**
 * Format tool results for LLM consumption
 */
export function formatToolResults(observations: readonly ToolObservation[]): string {
  return observations
    .map((observation) => {
      if (observation.status === 'pending') {
        return `Tool: ${observation.tool}\nPending confirmation (action ${observation.actionId}): ${observation.summary}`;
      }
      const { result } = observation;
      if (result.success) {
        return `Tool: ${observation.tool}\nResult: ${result.summary}\n${JSON.stringify(result.data, null, 2)}`;
      }
      return `Tool: ${observation.tool}\nError (${result.error.code}): ${result.error.message}`;
    })
    .join('\n\n');
}
