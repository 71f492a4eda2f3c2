/**
 * Error Taxonomy
 *
 * Every failure the core can report is one of these classes. Each carries a
 * stable `code` for JSON payloads and tool observations, and the HTTP status
 * the API maps it to.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'PARSE_ERROR'
  | 'PROVIDER_ERROR'
  | 'TIMEOUT'
  | 'INTERNAL_ERROR';

export interface ErrorPayload {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class TaskpilotError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code: ErrorCode;
      statusCode: number;
      details?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = 'TaskpilotError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.details = options.details;
  }

  toJSON(): ErrorPayload {
    return {
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

/** Bad input shape or constraint violation */
export class ValidationError extends TaskpilotError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: 'VALIDATION_ERROR', statusCode: 400, details });
    this.name = 'ValidationError';
  }
}

/** Referenced entity does not exist (or belongs to another user) */
export class NotFoundError extends TaskpilotError {
  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`, {
      code: 'NOT_FOUND',
      statusCode: 404,
      details: { entity, id },
    });
    this.name = 'NotFoundError';
  }
}

/** Operation would violate an invariant */
export class ConflictError extends TaskpilotError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: 'CONFLICT', statusCode: 409, details });
    this.name = 'ConflictError';
  }
}

/** LLM output unusable after the repair attempt */
export class ParseError extends TaskpilotError {
  readonly rawOutput?: string;

  constructor(message: string, rawOutput?: string, cause?: unknown) {
    super(message, { code: 'PARSE_ERROR', statusCode: 422, cause });
    this.name = 'ParseError';
    this.rawOutput = rawOutput;
  }
}

/** LLM provider failure; `transient` marks errors worth retrying */
export class ProviderError extends TaskpilotError {
  readonly transient: boolean;
  readonly status?: number;

  constructor(
    message: string,
    options: { transient: boolean; status?: number; cause?: unknown }
  ) {
    super(message, {
      code: 'PROVIDER_ERROR',
      statusCode: 503,
      details: options.status !== undefined ? { status: options.status } : undefined,
      cause: options.cause,
    });
    this.name = 'ProviderError';
    this.transient = options.transient;
    this.status = options.status;
  }
}

/** A turn or request exceeded its wall-clock budget */
export class TimeoutError extends TaskpilotError {
  constructor(message: string, timeoutMs: number) {
    super(message, { code: 'TIMEOUT', statusCode: 504, details: { timeoutMs } });
    this.name = 'TimeoutError';
  }
}

export function isTaskpilotError(error: unknown): error is TaskpilotError {
  return error instanceof TaskpilotError;
}

/**
 * Normalize anything thrown into an error payload
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof TaskpilotError) {
    return error.toJSON();
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : 'Unknown error',
  };
}

export const INTERNAL_ERROR_MESSAGE = 'Internal server error';

/**
 * Payload safe to show a caller: internal failures keep their code but not
 * the underlying message
 */
export function toPublicErrorPayload(error: unknown): ErrorPayload {
  const payload = toErrorPayload(error);
  return payload.code === 'INTERNAL_ERROR' ? { code: 'INTERNAL_ERROR', message: INTERNAL_ERROR_MESSAGE } : payload;
}

function detailString(details: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = details?.[key];
  return typeof value === 'string' ? value : undefined;
}

function detailNumber(details: Record<string, unknown> | undefined, key: string): number | undefined {
  const value = details?.[key];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Rebuild a throwable error from a payload, e.g. a failed tool result.
 * Known codes come back as their own class.
 */
export function errorFromPayload(payload: ErrorPayload): TaskpilotError {
  const { message, details } = payload;
  switch (payload.code) {
    case 'VALIDATION_ERROR':
      return new ValidationError(message, details);
    case 'NOT_FOUND': {
      const entity = detailString(details, 'entity');
      const id = detailString(details, 'id');
      if (entity !== undefined && id !== undefined) {
        return new NotFoundError(entity, id);
      }
      return new TaskpilotError(message, { code: 'NOT_FOUND', statusCode: 404, details });
    }
    case 'CONFLICT':
      return new ConflictError(message, details);
    case 'PARSE_ERROR':
      return new ParseError(message);
    case 'PROVIDER_ERROR':
      return new ProviderError(message, { transient: false, status: detailNumber(details, 'status') });
    case 'TIMEOUT':
      return new TimeoutError(message, detailNumber(details, 'timeoutMs') ?? 0);
    case 'INTERNAL_ERROR':
      return new TaskpilotError(INTERNAL_ERROR_MESSAGE, { code: 'INTERNAL_ERROR', statusCode: 500 });
  }
}
