/**
 * Schedule planner
 *
 * Deterministic, read-only placement of open tasks into the user's working
 * hours. Tasks are ranked by a weighted score (priority 0.7, deadline
 * urgency 0.3) and packed greedily, earliest free slot first. Nothing here
 * writes to the store; callers present the proposal and apply accepted items
 * through ordinary task updates.
 */

import type { TaskWithTags } from '@taskpilot/database';
import {
  addDaysToDate,
  dayOfWeekName,
  formatForHumans,
  getZonedParts,
  parseClockTime,
  weekdayOf,
  zonedTimeToUtc,
  type DayOfWeek,
  type LocalDate,
  type TaskPriority,
  type UserPreferences,
} from '@taskpilot/shared-types';

export interface SchedulingRules {
  priorityWeight: number;
  timeWeight: number;
  /** Minutes used when a task has no estimate */
  defaultDuration: number;
  /** Longest block given to one task */
  maxTaskDuration: number;
  /** Shortest block given to one task */
  minTaskDuration: number;
  workHours: { start: string; end: string };
  workingDays: DayOfWeek[];
}

export function getDefaultRules(): SchedulingRules {
  return {
    priorityWeight: 0.7,
    timeWeight: 0.3,
    defaultDuration: 30,
    maxTaskDuration: 120,
    minTaskDuration: 15,
    workHours: { start: '09:00', end: '17:00' },
    workingDays: ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'],
  };
}

export interface ScheduleSuggestion {
  taskId: string;
  title: string;
  priority: TaskPriority;
  score: number;
  start: Date;
  end: Date;
  durationMinutes: number;
  reason: string;
}

export interface UnscheduledTask {
  taskId: string;
  title: string;
  reason: string;
}

export interface ScheduleProposal {
  suggestions: ScheduleSuggestion[];
  unscheduled: UnscheduledTask[];
  rationale: string;
  requiresConfirmation: true;
}

export interface PlanScheduleOptions {
  now: Date;
  timezone: string;
  /** Days ahead to plan, today included */
  days: number;
  preferences?: UserPreferences;
}

const PRIORITY_SCORE: Record<TaskPriority, number> = {
  high: 1,
  medium: 0.6,
  low: 0.3,
};

const SLOT_GRANULARITY = 15;
const HOUR_MS = 60 * 60 * 1000;

interface DayWindow {
  date: LocalDate;
  /** Next free minute after midnight */
  cursor: number;
  end: number;
}

function resolveRules(preferences: UserPreferences | undefined): SchedulingRules {
  const rules = getDefaultRules();
  const start = preferences?.workHours?.start;
  const end = preferences?.workHours?.end;
  if (start && end) {
    const startMinutes = parseClockTime(start);
    const endMinutes = parseClockTime(end);
    if (startMinutes !== null && endMinutes !== null && endMinutes > startMinutes) {
      rules.workHours = { start, end };
    }
  }
  if (preferences?.workingDays && preferences.workingDays.length > 0) {
    rules.workingDays = preferences.workingDays;
  }
  return rules;
}

/**
 * Deadline urgency in [0, 1]: overdue is 1, no due date is 0, otherwise
 * linear over the planning horizon
 */
export function urgencyScore(dueDate: Date | null, now: Date, horizonHours: number): number {
  if (!dueDate) {
    return 0;
  }
  const hoursUntil = (dueDate.getTime() - now.getTime()) / HOUR_MS;
  if (hoursUntil <= 0) {
    return 1;
  }
  return 1 - Math.min(hoursUntil, horizonHours) / horizonHours;
}

export function scoreTask(
  task: Pick<TaskWithTags, 'priority' | 'dueDate'>,
  now: Date,
  horizonHours: number,
  rules: SchedulingRules = getDefaultRules()
): number {
  const score =
    rules.priorityWeight * PRIORITY_SCORE[task.priority] +
    rules.timeWeight * urgencyScore(task.dueDate, now, horizonHours);
  return Math.round(score * 100) / 100;
}

function taskDuration(task: TaskWithTags, rules: SchedulingRules): number {
  const estimate = task.estimatedDuration ?? rules.defaultDuration;
  return Math.min(Math.max(estimate, rules.minTaskDuration), rules.maxTaskDuration);
}

function describeReason(task: TaskWithTags, now: Date, timezone: string): string {
  if (!task.dueDate) {
    return `${task.priority} priority, no due date`;
  }
  if (task.dueDate.getTime() <= now.getTime()) {
    return `${task.priority} priority, overdue since ${formatForHumans(task.dueDate, timezone)}`;
  }
  return `${task.priority} priority, due ${formatForHumans(task.dueDate, timezone)}`;
}

function buildWindows(options: PlanScheduleOptions, rules: SchedulingRules): DayWindow[] {
  const start = parseClockTime(rules.workHours.start) ?? 9 * 60;
  const end = parseClockTime(rules.workHours.end) ?? 17 * 60;

  const nowParts = getZonedParts(options.now, options.timezone);
  const today: LocalDate = { year: nowParts.year, month: nowParts.month, day: nowParts.day };
  const nowMinutes = nowParts.hour * 60 + nowParts.minute + (nowParts.second > 0 ? 1 : 0);
  const roundedNow = Math.ceil(nowMinutes / SLOT_GRANULARITY) * SLOT_GRANULARITY;

  const windows: DayWindow[] = [];
  for (let offset = 0; offset < options.days; offset++) {
    const date = addDaysToDate(today, offset);
    if (!rules.workingDays.includes(dayOfWeekName(weekdayOf(date)))) {
      continue;
    }
    const cursor = offset === 0 ? Math.max(start, roundedNow) : start;
    if (cursor < end) {
      windows.push({ date, cursor, end });
    }
  }
  return windows;
}

function toInstant(date: LocalDate, minutes: number, timezone: string): Date {
  return zonedTimeToUtc(
    { ...date, hour: Math.floor(minutes / 60), minute: minutes % 60 },
    timezone
  );
}

/**
 * Plan open tasks into working time over the next `days` days
 */
export function planSchedule(tasks: TaskWithTags[], options: PlanScheduleOptions): ScheduleProposal {
  const rules = resolveRules(options.preferences);
  const horizonHours = options.days * 24;
  const open = tasks.filter((task) => task.status !== 'completed');

  if (open.length === 0) {
    return {
      suggestions: [],
      unscheduled: [],
      rationale: 'No open tasks to schedule.',
      requiresConfirmation: true,
    };
  }

  const ranked = open
    .map((task) => ({ task, score: scoreTask(task, options.now, horizonHours, rules) }))
    .sort(
      (a, b) =>
        b.score - a.score ||
        (a.task.dueDate?.getTime() ?? Infinity) - (b.task.dueDate?.getTime() ?? Infinity) ||
        a.task.createdAt.getTime() - b.task.createdAt.getTime()
    );

  const windows = buildWindows(options, rules);
  const suggestions: ScheduleSuggestion[] = [];
  const unscheduled: UnscheduledTask[] = [];

  for (const { task, score } of ranked) {
    const duration = taskDuration(task, rules);
    const window = windows.find((candidate) => candidate.end - candidate.cursor >= duration);
    if (!window) {
      unscheduled.push({
        taskId: task.id,
        title: task.title,
        reason: `No free ${duration}-minute block in working hours over the next ${options.days} day(s)`,
      });
      continue;
    }

    const startMinutes = window.cursor;
    window.cursor += duration;
    suggestions.push({
      taskId: task.id,
      title: task.title,
      priority: task.priority,
      score,
      start: toInstant(window.date, startMinutes, options.timezone),
      end: toInstant(window.date, startMinutes + duration, options.timezone),
      durationMinutes: duration,
      reason: describeReason(task, options.now, options.timezone),
    });
  }

  const days = rules.workingDays.join(', ');
  return {
    suggestions,
    unscheduled,
    rationale:
      `Planned ${suggestions.length} of ${open.length} open task(s) into working hours ` +
      `(${rules.workHours.start}-${rules.workHours.end} on ${days}) over the next ${options.days} day(s), ` +
      `highest priority and nearest deadline first. Nothing has been changed; confirm to apply.`,
    requiresConfirmation: true,
  };
}
