/**
 * Route helpers: response envelope, error mapping, query coercion
 */

import { ZodError, z } from 'zod';
import {
  INTERNAL_ERROR_MESSAGE,
  TaskpilotError,
  parseDueDate,
  type ApiFailure,
  type ApiSuccess,
} from '@taskpilot/shared-types';

export function ok<T>(data: T, message?: string): ApiSuccess<T> {
  return message === undefined ? { success: true, data } : { success: true, data, message };
}

/** "true" / "false" in a query string */
export const booleanFlag = z.enum(['true', 'false']).transform((value) => value === 'true');

export const paginationQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

export const idParams = z.object({ id: z.string().min(1) });

/**
 * A date read in the user's timezone: "YYYY-MM-DD" (end of that day),
 * "YYYY-MM-DDTHH:mm", or an ISO timestamp with an offset
 */
export function zonedDate(timeZone: string) {
  return z.string().transform((value, ctx) => {
    const date = parseDueDate(value, timeZone);
    if (!date) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Expected YYYY-MM-DD, YYYY-MM-DDTHH:mm or an ISO timestamp with an offset',
      });
      return z.NEVER;
    }
    return date;
  });
}

function hasStatusCode(error: unknown): error is Error & { statusCode: number } {
  return (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  );
}

/**
 * Map anything a route throws to a status code and failure envelope
 */
export function toFailure(error: unknown): { status: number; body: ApiFailure } {
  if (error instanceof TaskpilotError) {
    return { status: error.statusCode, body: { success: false, error: error.toJSON() } };
  }

  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    return {
      status: 400,
      body: {
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; '),
          details: { issues },
        },
      },
    };
  }

  // Fastify's own client errors: bad JSON, unsupported media type, body too large
  if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 500) {
    return {
      status: error.statusCode,
      body: {
        success: false,
        error: {
          code: error.statusCode === 404 ? 'NOT_FOUND' : 'VALIDATION_ERROR',
          message: error.message,
        },
      },
    };
  }

  return {
    status: 500,
    body: { success: false, error: { code: 'INTERNAL_ERROR', message: INTERNAL_ERROR_MESSAGE } },
  };
}
