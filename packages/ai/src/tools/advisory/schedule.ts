/**
 * Schedule Tool
 * Proposes time blocks for open tasks; accepted items are applied later
 * through update_task
 */

import { planSchedule } from '@taskpilot/tasks';
import { formatLocalDateTime } from '@taskpilot/shared-types';
import { suggestScheduleArgs } from '../schemas.js';
import { success, type Tool } from '../types.js';

export const suggestSchedule: Tool<'suggest_schedule'> = {
  name: 'suggest_schedule',
  description:
    'Propose when to work on open tasks over the next few days within working hours. Changes nothing.',
  destructive: false,
  argsSchema: suggestScheduleArgs,
  async execute(args, context, deps) {
    const open = await deps.tasks.listOpenTasks(context.userId);
    const proposal = planSchedule(open, {
      now: context.now,
      timezone: context.timezone,
      days: args.days,
      preferences: context.preferences,
    });

    return success(
      {
        ...proposal,
        suggestions: proposal.suggestions.map((item) => ({
          ...item,
          start: formatLocalDateTime(item.start, context.timezone),
          end: formatLocalDateTime(item.end, context.timezone),
        })),
      },
      proposal.rationale
    );
  },
};
