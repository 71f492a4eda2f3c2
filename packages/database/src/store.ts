/**
 * Task Store contract
 *
 * Repository interface the services and the agent talk to. The Drizzle
 * implementation backs production; an in-memory one (./testing) backs tests.
 * Every read and write is scoped by userId.
 */

import type {
  AiContext,
  ProductivityPatterns,
  TaskMetadata,
  TaskPriority,
  TaskStatus,
  UserPreferences,
} from '@taskpilot/shared-types';
import type { Task } from './schema/tasks.js';
import type { Tag } from './schema/tags.js';
import type { ConversationMessage } from './schema/conversation.js';
import type { UserContextRecord } from './schema/user-contexts.js';

/** A task together with its tag names */
export type TaskWithTags = Task & { tags: string[] };

export interface TaskInsert {
  userId: string;
  title: string;
  description?: string | null;
  status?: TaskStatus;
  priority?: TaskPriority;
  dueDate?: Date | null;
  estimatedDuration?: number | null;
  actualDuration?: number | null;
  parentTaskId?: string | null;
  metadata?: TaskMetadata;
  completedAt?: Date | null;
}

export type TaskPatch = Partial<
  Pick<
    Task,
    | 'title'
    | 'description'
    | 'status'
    | 'priority'
    | 'dueDate'
    | 'estimatedDuration'
    | 'actualDuration'
    | 'parentTaskId'
    | 'metadata'
    | 'completedAt'
    | 'updatedAt'
  >
>;

export interface TaskFilter {
  status?: TaskStatus;
  priority?: TaskPriority;
  /** null selects top-level tasks only */
  parentTaskId?: string | null;
  dueBefore?: Date;
  dueAfter?: Date;
  excludeCompleted?: boolean;
  /** Case-insensitive match on title or description */
  search?: string;
  tag?: string;
  orderBy?: 'createdAt' | 'dueDate';
  limit?: number;
  offset?: number;
}

export interface TaskRepository {
  insert(values: TaskInsert): Promise<Task>;
  findById(userId: string, id: string): Promise<Task | null>;
  findMany(userId: string, filter: TaskFilter): Promise<Task[]>;
  findChildren(userId: string, parentId: string): Promise<Task[]>;
  /** Returns null when the task does not exist for this user */
  update(userId: string, id: string, patch: TaskPatch): Promise<Task | null>;
  /** Returns the number of rows removed */
  deleteMany(userId: string, ids: string[]): Promise<number>;
  countByStatus(userId: string): Promise<Record<TaskStatus, number>>;
  countOverdue(userId: string, now: Date): Promise<number>;
}

export interface TagRepository {
  list(userId: string): Promise<Tag[]>;
  findByName(userId: string, name: string): Promise<Tag | null>;
  insert(values: { userId: string; name: string; color?: string | null }): Promise<Tag>;
  /** Get-or-create tags by name */
  ensure(userId: string, names: string[]): Promise<Tag[]>;
  namesForTasks(taskIds: string[]): Promise<Map<string, string[]>>;
  replaceTaskTags(taskId: string, tagIds: string[]): Promise<void>;
}

export interface MessageRepository {
  append(values: {
    userId: string;
    role: ConversationMessage['role'];
    content: string;
    metadata?: Record<string, unknown>;
  }): Promise<ConversationMessage>;
  /** Most recent messages, ordered oldest to newest */
  listRecent(userId: string, limit: number): Promise<ConversationMessage[]>;
  /** Assistant message whose metadata.pendingActions holds the action */
  findByPendingActionId(userId: string, actionId: string): Promise<ConversationMessage | null>;
  /** Message whose metadata.resolvedActionId is the action */
  findResolution(userId: string, actionId: string): Promise<ConversationMessage | null>;
}

export interface UserContextValues {
  preferences: UserPreferences;
  productivityPatterns: ProductivityPatterns;
  aiContext: AiContext;
}

export interface UserContextRepository {
  find(userId: string): Promise<UserContextRecord | null>;
  /** Insert the row unless one exists; returns the stored row either way */
  insertIfMissing(userId: string, values: UserContextValues): Promise<UserContextRecord>;
  upsert(userId: string, values: UserContextValues): Promise<UserContextRecord>;
}

export interface UserRepository {
  /** Insert the user if missing */
  ensure(id: string, timezone?: string): Promise<void>;
}

export interface TaskStore {
  users: UserRepository;
  tasks: TaskRepository;
  tags: TagRepository;
  messages: MessageRepository;
  userContexts: UserContextRepository;
  /** Connectivity check for readiness probes */
  ping(): Promise<void>;
  close(): Promise<void>;
}

/** Tag names are trimmed and lower-cased, duplicates dropped */
export function normalizeTagNames(names: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const raw of names) {
    const name = raw.trim().toLowerCase();
    if (name) {
      seen.add(name);
    }
  }
  return [...seen];
}
