/**
 * Input schemas for task operations
 *
 * Shared by the service, the agent's tool arguments and the REST routes.
 */

import { z } from 'zod';
import {
  DAYS_OF_WEEK,
  TASK_PRIORITIES,
  TASK_STATUSES,
  ValidationError,
  isValidTimeZone,
  parseInstant,
} from '@taskpilot/shared-types';

export const taskTitleSchema = z
  .string()
  .trim()
  .min(1, 'Title is required')
  .max(255, 'Title must be at most 255 characters');

export const taskDescriptionSchema = z
  .string()
  .trim()
  .max(2000, 'Description must be at most 2000 characters');

export const tagNameSchema = z
  .string()
  .trim()
  .min(1)
  .max(50, 'Tag names must be at most 50 characters');

export const durationSchema = z.number().int().min(0, 'Durations are non-negative minutes');

/** A Date, or an ISO timestamp with an explicit offset */
export const instantSchema = z.union([
  z.date(),
  z.string().transform((value, ctx) => {
    const instant = parseInstant(value);
    if (!instant) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Expected an ISO timestamp with an offset, e.g. 2026-10-20T18:00:00Z',
      });
      return z.NEVER;
    }
    return instant;
  }),
]);

export const taskStatusSchema = z.enum(TASK_STATUSES);
export const taskPrioritySchema = z.enum(TASK_PRIORITIES);

export const taskMetadataSchema = z
  .object({
    aiReasoning: z.string().optional(),
    estimationAccuracy: z.number().optional(),
    parsedFrom: z.string().optional(),
    parseConfidence: z.enum(['high', 'low']).optional(),
  })
  .catchall(z.unknown());

export const createTaskInputSchema = z.object({
  title: taskTitleSchema,
  description: taskDescriptionSchema.nullish(),
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  dueDate: instantSchema.nullish(),
  estimatedDuration: durationSchema.nullish(),
  actualDuration: durationSchema.nullish(),
  parentTaskId: z.string().uuid().nullish(),
  tags: z.array(tagNameSchema).max(20).optional(),
  metadata: taskMetadataSchema.optional(),
});

export type CreateTaskInput = z.input<typeof createTaskInputSchema>;

export const updateTaskInputSchema = z.object({
  title: taskTitleSchema.optional(),
  description: taskDescriptionSchema.nullish(),
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  dueDate: instantSchema.nullish(),
  estimatedDuration: durationSchema.nullish(),
  actualDuration: durationSchema.nullish(),
  parentTaskId: z.string().uuid().nullish(),
  tags: z.array(tagNameSchema).max(20).optional(),
  metadata: taskMetadataSchema.optional(),
});

export type UpdateTaskInput = z.input<typeof updateTaskInputSchema>;

export const listTasksQuerySchema = z.object({
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  /** "root" lists top-level tasks only */
  parentTaskId: z.union([z.string().uuid(), z.literal('root')]).optional(),
  overdue: z.boolean().optional(),
  /** Leave out completed tasks */
  openOnly: z.boolean().optional(),
  dueBefore: instantSchema.optional(),
  dueAfter: instantSchema.optional(),
  tag: tagNameSchema.optional(),
  limit: z.number().int().min(1).max(100).optional(),
  offset: z.number().int().min(0).optional(),
});

export type ListTasksQuery = z.input<typeof listTasksQuerySchema>;

export const subtaskTitlesSchema = z
  .array(taskTitleSchema)
  .min(1, 'At least one subtask title is required')
  .max(20, 'At most 20 subtasks at a time');

export const createTagInputSchema = z.object({
  name: tagNameSchema,
  color: z
    .string()
    .regex(/^#[0-9a-fA-F]{6}$/, 'Color must be a hex value like #1E90FF')
    .nullish(),
});

export type CreateTagInput = z.input<typeof createTagInputSchema>;

const clockTimeSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Times are HH:MM (24h)');

export const userPreferencesSchema = z
  .object({
    timezone: z.string().refine(isValidTimeZone, 'Unknown IANA timezone').optional(),
    workHours: z.object({ start: clockTimeSchema, end: clockTimeSchema }).optional(),
    workingDays: z.array(z.enum(DAYS_OF_WEEK)).max(7).optional(),
    defaultPriority: taskPrioritySchema.optional(),
    commonCategories: z.array(tagNameSchema).max(20).optional(),
  })
  .strict();

export const productivityPatternsSchema = z
  .object({
    peakHours: z.array(clockTimeSchema).max(24).optional(),
    averageTaskDuration: z.number().min(0).optional(),
    completionRate: z.number().min(0).max(100).optional(),
  })
  .strict();

export const aiContextSchema = z
  .object({
    conversationSummary: z.string().max(4000).optional(),
    notes: z.string().max(4000).optional(),
  })
  .catchall(z.unknown());

/** Sections present are merged into the stored user context */
export const userContextPatchSchema = z
  .object({
    preferences: userPreferencesSchema.optional(),
    productivityPatterns: productivityPatternsSchema.optional(),
    aiContext: aiContextSchema.optional(),
  })
  .strict();

export type UserContextPatchInput = z.input<typeof userContextPatchSchema>;

/**
 * Parse input against a schema, throwing ValidationError with the zod issues
 */
export function validateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  label: string
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid ${label}: ${summary}`, { issues });
  }
  return result.data;
}
