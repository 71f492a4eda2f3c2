/**
 * Tool Call Schemas
 *
 * The tool set is a closed union discriminated on `name`; each variant
 * carries its own validated argument record.
 */

import { z } from 'zod';
import {
  durationSchema,
  tagNameSchema,
  taskDescriptionSchema,
  taskPrioritySchema,
  taskStatusSchema,
  taskTitleSchema,
} from '@taskpilot/tasks';

const taskId = z.string().uuid().describe('Task id (UUID) from an earlier result');
const dueDate = z
  .string()
  .describe('Local "YYYY-MM-DDTHH:mm" or "YYYY-MM-DD" in the user\'s timezone');

export const createTaskArgs = z.object({
  title: taskTitleSchema.describe('Short actionable title'),
  description: taskDescriptionSchema.optional().describe('Longer details'),
  priority: taskPrioritySchema.optional().describe('Only when the user signals urgency'),
  dueDate: dueDate.optional(),
  estimatedDuration: durationSchema.optional().describe('Estimated minutes'),
  tags: z.array(tagNameSchema).max(10).optional().describe('Lowercase category words'),
  parentTaskId: taskId.optional().describe('Parent task id for a subtask'),
});

export const updateTaskArgs = z.object({
  taskId,
  title: taskTitleSchema.optional(),
  description: taskDescriptionSchema.nullable().optional().describe('null clears it'),
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  dueDate: dueDate.nullable().optional().describe('null clears the due date'),
  estimatedDuration: durationSchema.nullable().optional().describe('Estimated minutes'),
  tags: z.array(tagNameSchema).max(10).optional().describe('Replaces all tags'),
  parentTaskId: taskId.nullable().optional().describe('Move under another task, null for top level'),
});

export const completeTaskArgs = z.object({
  taskId,
  actualDuration: durationSchema.optional().describe('Minutes actually spent'),
});

export const deleteTaskArgs = z.object({
  taskId,
  cascade: z.boolean().default(false).describe('Also delete all subtasks'),
});

export const listTasksArgs = z
  .object({
    status: taskStatusSchema.optional(),
    priority: taskPrioritySchema.optional(),
    overdue: z.boolean().optional().describe('Only open tasks past their due date'),
    dueWithinDays: z.number().int().min(1).max(365).optional().describe('Open tasks due in the next N days'),
    parentTaskId: taskId.optional().describe('Subtasks of this task'),
    tag: tagNameSchema.optional(),
    limit: z.number().int().min(1).max(50).default(20),
  })
  .default({});

export const searchTasksArgs = z.object({
  query: z.string().trim().min(2).describe('Text to find in titles and descriptions'),
  limit: z.number().int().min(1).max(50).default(20),
});

export const getTaskInsightsArgs = z
  .object({
    taskId: taskId.optional().describe('Analyze one task; omit for overall productivity insights'),
  })
  .default({});

export const suggestScheduleArgs = z
  .object({
    days: z.number().int().min(1).max(14).default(5).describe('Days ahead to plan'),
  })
  .default({});

export const breakDownTaskArgs = z.object({
  taskId,
  subtasks: z
    .array(taskTitleSchema)
    .min(1)
    .max(20)
    .optional()
    .describe('Subtask titles; omit to have them suggested'),
});

export const toolCallSchema = z.discriminatedUnion('name', [
  z.object({ name: z.literal('create_task'), arguments: createTaskArgs }),
  z.object({ name: z.literal('update_task'), arguments: updateTaskArgs }),
  z.object({ name: z.literal('complete_task'), arguments: completeTaskArgs }),
  z.object({ name: z.literal('delete_task'), arguments: deleteTaskArgs }),
  z.object({ name: z.literal('list_tasks'), arguments: listTasksArgs }),
  z.object({ name: z.literal('search_tasks'), arguments: searchTasksArgs }),
  z.object({ name: z.literal('get_task_insights'), arguments: getTaskInsightsArgs }),
  z.object({ name: z.literal('suggest_schedule'), arguments: suggestScheduleArgs }),
  z.object({ name: z.literal('break_down_task'), arguments: breakDownTaskArgs }),
]);

export type ToolCall = z.infer<typeof toolCallSchema>;
export type ToolName = ToolCall['name'];
export type ToolArgs<N extends ToolName> = Extract<ToolCall, { name: N }>['arguments'];

export const TOOL_NAMES = [
  'create_task',
  'update_task',
  'complete_task',
  'delete_task',
  'list_tasks',
  'search_tasks',
  'get_task_insights',
  'suggest_schedule',
  'break_down_task',
] as const satisfies readonly ToolName[];

export function isToolName(value: unknown): value is ToolName {
  return typeof value === 'string' && TOOL_NAMES.some((name) => name === value);
}
