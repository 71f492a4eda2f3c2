/**
 * Insight Tool
 * Advisory only: suggestions are returned for the user to accept, never applied
 */

import { getTaskInsightsArgs } from '../schemas.js';
import { success, type Tool } from '../types.js';

export const getTaskInsights: Tool<'get_task_insights'> = {
  name: 'get_task_insights',
  description:
    'Advice for one task (priority, estimate, complexity) when taskId is given, otherwise overall productivity insights. Changes nothing.',
  destructive: false,
  argsSchema: getTaskInsightsArgs,
  async execute(args, context, deps) {
    if (args.taskId) {
      const task = await deps.tasks.getTask(context.userId, args.taskId);
      const analysis = await deps.intelligence.analyzeTask(task, {
        timezone: context.timezone,
        signal: context.signal,
      });
      return success(
        { taskId: task.id, ...analysis, requiresConfirmation: true },
        `Suggested ${analysis.suggestedPriority} priority and ${analysis.estimatedDuration} minutes for "${task.title}"`
      );
    }

    const statistics = await deps.tasks.getStatistics(context.userId);
    const insights = await deps.intelligence.productivityInsights(statistics, {
      signal: context.signal,
    });
    return success(
      {
        statistics,
        ...insights,
        rationale: insights.insights.join(' '),
        requiresConfirmation: true,
      },
      `Productivity score ${insights.productivityScore}/100`
    );
  },
};
