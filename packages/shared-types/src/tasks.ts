/**
 * Task Domain Types
 * Core types shared by the store, the services and the agent
 */

/** Task lifecycle status */
export type TaskStatus = 'todo' | 'in_progress' | 'completed';

/** Task priority levels */
export type TaskPriority = 'low' | 'medium' | 'high';

/** Conversation roles persisted in the message log */
export type MessageRole = 'user' | 'assistant';

/** Days of the week */
export type DayOfWeek =
  | 'sunday'
  | 'monday'
  | 'tuesday'
  | 'wednesday'
  | 'thursday'
  | 'friday'
  | 'saturday';

export const TASK_STATUSES = ['todo', 'in_progress', 'completed'] as const satisfies readonly TaskStatus[];
export const TASK_PRIORITIES = ['low', 'medium', 'high'] as const satisfies readonly TaskPriority[];
export const DAYS_OF_WEEK = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
] as const satisfies readonly DayOfWeek[];

/**
 * Free-form task metadata
 * Known keys are typed, anything else is kept as-is
 */
export interface TaskMetadata {
  /** Reasoning the AI gave when it created or changed the task */
  aiReasoning?: string;
  /** 0-100, how close estimatedDuration was to actualDuration */
  estimationAccuracy?: number;
  /** Original natural-language text the task was parsed from */
  parsedFrom?: string;
  /** Confidence of the parse that produced the task */
  parseConfidence?: 'high' | 'low';
  [key: string]: unknown;
}

/**
 * Working hours in HH:MM (24h) local time
 */
export interface WorkHours {
  start: string;
  end: string;
}

/**
 * Explicit user preferences
 */
export interface UserPreferences {
  /** IANA timezone, e.g. America/New_York */
  timezone?: string;
  workHours?: WorkHours;
  workingDays?: DayOfWeek[];
  defaultPriority?: TaskPriority;
  commonCategories?: string[];
}

/**
 * Productivity pattern summary
 */
export interface ProductivityPatterns {
  peakHours?: string[];
  averageTaskDuration?: number;
  completionRate?: number;
}

/**
 * AI context blob
 */
export interface AiContext {
  conversationSummary?: string;
  notes?: string;
  [key: string]: unknown;
}

/**
 * Kinds of state change a tool can make
 */
export type StateChangeType = 'task_created' | 'task_updated' | 'task_completed' | 'task_deleted';

/**
 * A state change reported back to the caller of a turn
 */
export interface StateChange {
  type: StateChangeType;
  taskId: string;
  title: string;
}

/**
 * Task statistics for a user
 */
export interface TaskStatistics {
  total: number;
  todo: number;
  in_progress: number;
  completed: number;
  overdue: number;
  /** Percentage 0-100, two decimals */
  completionRate: number;
}
