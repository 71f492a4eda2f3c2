/**
 * API Types
 * Response envelope shared by every REST route
 */

import type { ErrorPayload } from './errors.js';

export interface ApiSuccess<T> {
  success: true;
  data: T;
  /** Human-readable summary, e.g. the agent's reply or a tool summary */
  message?: string;
}

export interface ApiFailure {
  success: false;
  error: ErrorPayload;
}

export type ApiResponse<T> = ApiSuccess<T> | ApiFailure;

export interface HealthCheck {
  status: 'ok' | 'degraded';
  timestamp: string;
  checks?: Record<string, boolean>;
}
