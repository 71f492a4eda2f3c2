/**
 * Tool Types
 * Shared types for the agent's tool system
 */

import type { z } from 'zod';
import type { TaskService } from '@taskpilot/tasks';
import type {
  ErrorPayload,
  StateChange,
  TaskMetadata,
  UserPreferences,
} from '@taskpilot/shared-types';
import type { TaskIntelligence } from '../intelligence.js';
import type { ToolArgs, ToolName } from './schemas.js';

/**
 * Per-call context: who is asking, and where they are
 */
export interface ToolContext {
  userId: string;
  /** IANA timezone used to read and show dates */
  timezone: string;
  now: Date;
  preferences: UserPreferences;
  /** Metadata stamped on tasks created under this context */
  provenance?: TaskMetadata;
  signal?: AbortSignal;
}

/**
 * Services the tools call into
 */
export interface ToolDeps {
  tasks: TaskService;
  intelligence: TaskIntelligence;
}

export interface ToolSuccess {
  success: true;
  data: unknown;
  /** One line for the model and the user */
  summary: string;
  changes: StateChange[];
}

export interface ToolFailure {
  success: false;
  error: ErrorPayload;
}

export type ToolResult = ToolSuccess | ToolFailure;

/**
 * Tool definition
 */
export interface Tool<N extends ToolName> {
  name: N;
  description: string;
  /** Destructive tools are never run without explicit confirmation */
  destructive: boolean;
  argsSchema: z.ZodType<ToolArgs<N>, z.ZodTypeDef, unknown>;
  execute: (args: ToolArgs<N>, context: ToolContext, deps: ToolDeps) => Promise<ToolSuccess>;
}

/** Any one tool of the closed set */
export type AnyTool = { [N in ToolName]: Tool<N> }[ToolName];

export function success(data: unknown, summary: string, changes: StateChange[] = []): ToolSuccess {
  return { success: true, data, summary, changes };
}
