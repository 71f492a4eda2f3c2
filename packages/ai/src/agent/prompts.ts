/**
 * Agent Prompts
 * Prompts for the Reason and Respond steps of a turn
 */

import {
  dayOfWeekName,
  formatLocalDateTime,
  getZonedParts,
  type UserPreferences,
} from '@taskpilot/shared-types';
import { formatToolsForPrompt } from '../tools/registry.js';
import { formatToolResults, type ToolObservation } from '../tools/executor.js';
import type { PromptMessage } from './context.js';

export const AGENT_INTENTS = [
  'create',
  'query',
  'update',
  'delete',
  'breakdown',
  'insight',
  'chit-chat',
] as const;

export type AgentIntent = (typeof AGENT_INTENTS)[number];

export interface ReasonPromptInput {
  message: string;
  history: readonly PromptMessage[];
  now: Date;
  timezone: string;
  preferences: UserPreferences;
  notes?: string;
  maxToolCalls: number;
}

function formatHistory(history: readonly PromptMessage[]): string {
  if (history.length === 0) {
    return '(no earlier messages)';
  }
  return history
    .map((message) => {
      switch (message.role) {
        case 'user':
          return `USER: ${message.content}`;
        case 'assistant':
          return `ASSISTANT: ${message.content}`;
        case 'summary':
          return `SUMMARY: ${message.content}`;
      }
    })
    .join('\n\n');
}

function formatPreferences(preferences: UserPreferences): string {
  const lines: string[] = [];
  if (preferences.workHours) {
    lines.push(`Work hours: ${preferences.workHours.start}-${preferences.workHours.end}`);
  }
  if (preferences.workingDays?.length) {
    lines.push(`Working days: ${preferences.workingDays.join(', ')}`);
  }
  if (preferences.defaultPriority) {
    lines.push(`Default priority: ${preferences.defaultPriority}`);
  }
  if (preferences.commonCategories?.length) {
    lines.push(`Common tags: ${preferences.commonCategories.join(', ')}`);
  }
  return lines.length > 0 ? lines.join('\n') : '(none set)';
}

/**
 * Reason step: decide intent and the tool calls to make
 */
export function buildReasonPrompt(input: ReasonPromptInput): string {
  const parts = getZonedParts(input.now, input.timezone);

  return `You are a task management assistant with access to tools.
You help one user capture, organize, schedule and finish their tasks.

═══════════════════════════════════════════════════════════════
CURRENT CONTEXT
═══════════════════════════════════════════════════════════════

Now: ${formatLocalDateTime(input.now, input.timezone)} (${dayOfWeekName(parts.weekday)})
Timezone: ${input.timezone}

User preferences:
${formatPreferences(input.preferences)}
${input.notes ? `\nNotes about the user:\n${input.notes}\n` : ''}
═══════════════════════════════════════════════════════════════
AVAILABLE TOOLS
═══════════════════════════════════════════════════════════════

${formatToolsForPrompt()}

═══════════════════════════════════════════════════════════════
GUIDELINES
═══════════════════════════════════════════════════════════════

1. Only use task ids that appear in the conversation or in tool results.
   To act on a task by name, look it up with search_tasks or list_tasks first
   and act on it in a later turn.
2. Dates are local wall-clock time in the user's timezone, "YYYY-MM-DDTHH:mm".
   Never invent a due date or priority the user did not give.
3. Insight and schedule tools only suggest. Never apply their suggestions
   without the user saying so.
4. delete_task is held for the user's confirmation; call it when asked to
   delete and say that confirmation is needed.
5. At most ${input.maxToolCalls} tool calls per message. Use none for greetings
   and small talk.

═══════════════════════════════════════════════════════════════
RESPONSE FORMAT
═══════════════════════════════════════════════════════════════

Respond with ONLY a JSON object:
{
  "intent": "${AGENT_INTENTS.join('" | "')}",
  "tool_calls": [
    { "name": "tool_name", "arguments": { "param": "value" } }
  ],
  "reply": "text for the user when no tools are needed, otherwise null"
}

═══════════════════════════════════════════════════════════════
CONVERSATION
═══════════════════════════════════════════════════════════════

${formatHistory(input.history)}

USER: ${input.message}`;
}

export interface RespondPromptInput {
  message: string;
  observations: readonly ToolObservation[];
  draftReply?: string;
  skippedCalls: number;
}

/**
 * Respond step: compose the reply from what the tools did
 */
export function buildRespondPrompt(input: RespondPromptInput): string {
  const skipped =
    input.skippedCalls > 0
      ? `\n${input.skippedCalls} further tool call(s) were not run (limit per message).\n`
      : '';

  return `You are a task management assistant. You just ran tools for the user's message.

USER: ${input.message}

═══════════════════════════════════════════════════════════════
TOOL RESULTS
═══════════════════════════════════════════════════════════════

${input.observations.length > 0 ? formatToolResults(input.observations) : '(no tools ran)'}
${skipped}${input.draftReply ? `\nYour earlier draft: ${input.draftReply}\n` : ''}
═══════════════════════════════════════════════════════════════
INSTRUCTIONS
═══════════════════════════════════════════════════════════════

Write a short, plain text reply (no JSON, no markdown headings).
- Confirm what was done, using task titles not ids
- If a tool failed, say so briefly and suggest what to try
- For pending confirmations, ask the user to confirm
- For suggestions, present them as suggestions the user can accept
- Answer the actual question first`;
}
