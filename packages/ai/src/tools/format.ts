/**
 * Shapes shared by the task tools
 */

import type { TaskWithTags } from '@taskpilot/database';
import { ValidationError, formatLocalDateTime, parseDueDate } from '@taskpilot/shared-types';

export interface TaskView {
  id: string;
  title: string;
  description: string | null;
  status: TaskWithTags['status'];
  priority: TaskWithTags['priority'];
  /** Local wall-clock "YYYY-MM-DDTHH:mm" in the user's timezone */
  dueDate: string | null;
  estimatedDuration: number | null;
  actualDuration: number | null;
  parentTaskId: string | null;
  tags: string[];
  completedAt: string | null;
}

/**
 * Compact task representation for observations and API replies
 */
export function toTaskView(task: TaskWithTags, timezone: string): TaskView {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    priority: task.priority,
    dueDate: task.dueDate ? formatLocalDateTime(task.dueDate, timezone) : null,
    estimatedDuration: task.estimatedDuration,
    actualDuration: task.actualDuration,
    parentTaskId: task.parentTaskId,
    tags: task.tags,
    completedAt: task.completedAt ? task.completedAt.toISOString() : null,
  };
}

export function resolveDueDate(value: string, timezone: string): Date {
  const dueDate = parseDueDate(value, timezone);
  if (!dueDate) {
    throw new ValidationError(`Unrecognized due date "${value}"; use YYYY-MM-DDTHH:mm`, {
      dueDate: value,
    });
  }
  return dueDate;
}
