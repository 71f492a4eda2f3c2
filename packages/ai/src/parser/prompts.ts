/**
 * Task Parsing Prompts
 */

import type { UserPreferences } from '@taskpilot/shared-types';

export interface ParsePromptContext {
  /** Local wall-clock "YYYY-MM-DDTHH:mm" */
  localNow: string;
  weekday: string;
  timezone: string;
  preferences?: UserPreferences;
}

function formatPreferences(preferences: UserPreferences | undefined): string {
  if (!preferences) {
    return '(none)';
  }
  const lines: string[] = [];
  if (preferences.workHours) {
    lines.push(`- Work hours: ${preferences.workHours.start}-${preferences.workHours.end}`);
  }
  if (preferences.defaultPriority) {
    lines.push(`- Default priority: ${preferences.defaultPriority}`);
  }
  if (preferences.commonCategories && preferences.commonCategories.length > 0) {
    lines.push(`- Common categories: ${preferences.commonCategories.join(', ')}`);
  }
  return lines.length > 0 ? lines.join('\n') : '(none)';
}

/**
 * Build the extraction prompt for one piece of free text
 */
export function buildParsePrompt(text: string, context: ParsePromptContext): string {
  return `You extract a single structured task from a user's free-text request.

═══════════════════════════════════════════════════════════════
CURRENT CONTEXT
═══════════════════════════════════════════════════════════════

Now (local): ${context.localNow} (${context.weekday})
Timezone: ${context.timezone}

User preferences:
${formatPreferences(context.preferences)}

═══════════════════════════════════════════════════════════════
OUTPUT
═══════════════════════════════════════════════════════════════

Return ONLY a JSON object with these fields:
- title: short actionable title, no date/time/priority words (required)
- description: the fuller request, or null
- due_date: LOCAL wall-clock time "YYYY-MM-DDTHH:mm", or null
- priority: "low" | "medium" | "high", or null if the user gave no signal
- tags: 0-5 lowercase category words
- estimated_duration: minutes as an integer, or null

Rules:
- Resolve relative dates ("tomorrow", "friday", "in 3 days") against Now.
- A date without a time is due at 23:59 that day.
- If the text has NO date or time language, due_date MUST be null.
- Only use "high" for explicit urgency (urgent, asap, high priority, critical).

Examples (Now = 2026-03-02T10:00, Monday):
"Remind me to email Priya tomorrow at 9am"
→ {"title":"Email Priya","description":null,"due_date":"2026-03-03T09:00","priority":null,"tags":["communication"],"estimated_duration":15}

"Buy printer ink"
→ {"title":"Buy printer ink","description":null,"due_date":null,"priority":null,"tags":["errands"],"estimated_duration":null}

"Finish the budget slides by friday, it's urgent"
→ {"title":"Finish the budget slides","description":"Finish the budget slides by friday, it's urgent","due_date":"2026-03-06T23:59","priority":"high","tags":["work"],"estimated_duration":120}

Text: ${JSON.stringify(text)}`;
}

/**
 * Ask the model to fix its own invalid output
 */
export function buildRepairPrompt(originalPrompt: string, invalidOutput: string, problem: string): string {
  return `${originalPrompt}

═══════════════════════════════════════════════════════════════
CORRECTION NEEDED
═══════════════════════════════════════════════════════════════

Your previous answer could not be used.

Previous answer:
${invalidOutput.slice(0, 2000)}

Problem:
${problem}

Return ONLY the corrected JSON object.`;
}
