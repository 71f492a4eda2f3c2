import { describe, it, expect } from 'vitest';
import {
  ConflictError,
  NotFoundError,
  ParseError,
  ProviderError,
  TaskpilotError,
  TimeoutError,
  ValidationError,
  errorFromPayload,
  toErrorPayload,
  toPublicErrorPayload,
} from './errors.js';

describe('error taxonomy', () => {
  it('gives each class a stable code and status', () => {
    expect(new ValidationError('bad').statusCode).toBe(400);
    expect(new NotFoundError('Task', 'abc').statusCode).toBe(404);
    expect(new ConflictError('nope').statusCode).toBe(409);
    expect(new ProviderError('down', { transient: true }).statusCode).toBe(503);
  });

  it('describes missing entities', () => {
    const error = new NotFoundError('Task', 'abc');
    expect(error.message).toBe('Task abc not found');
    expect(error.toJSON()).toEqual({
      code: 'NOT_FOUND',
      message: 'Task abc not found',
      details: { entity: 'Task', id: 'abc' },
    });
  });

  it('normalizes unknown errors', () => {
    expect(toErrorPayload(new Error('boom'))).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'boom',
    });
    expect(toErrorPayload('boom')).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'Unknown error',
    });
  });

  it('rebuilds an error from its payload', () => {
    const error = errorFromPayload({ code: 'CONFLICT', message: 'Task has subtasks' });
    expect(error.statusCode).toBe(409);
    expect(error.code).toBe('CONFLICT');
    expect(error.message).toBe('Task has subtasks');
  });

  it('rebuilds the matching error class', () => {
    const missing = errorFromPayload(new NotFoundError('Task', 'abc').toJSON());
    const parse = errorFromPayload({ code: 'PARSE_ERROR', message: 'Unreadable output' });
    const timeout = errorFromPayload({ code: 'TIMEOUT', message: 'Too slow', details: { timeoutMs: 500 } });

    expect(missing).toBeInstanceOf(NotFoundError);
    expect(missing.message).toBe('Task abc not found');
    expect(parse).toBeInstanceOf(ParseError);
    expect(parse.statusCode).toBe(422);
    expect(timeout).toBeInstanceOf(TimeoutError);
    expect(timeout.toJSON()).toEqual({ code: 'TIMEOUT', message: 'Too slow', details: { timeoutMs: 500 } });
    expect(errorFromPayload({ code: 'VALIDATION_ERROR', message: 'bad' })).toBeInstanceOf(ValidationError);
    expect(errorFromPayload({ code: 'CONFLICT', message: 'taken' })).toBeInstanceOf(ConflictError);
  });

  it('hides internal messages', () => {
    const error = errorFromPayload({ code: 'INTERNAL_ERROR', message: 'connection terminated' });

    expect(error).toBeInstanceOf(TaskpilotError);
    expect(error.statusCode).toBe(500);
    expect(error.message).toBe('Internal server error');
    expect(toPublicErrorPayload(new Error('connection terminated'))).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    });
    expect(toPublicErrorPayload(new ConflictError('taken'))).toEqual({ code: 'CONFLICT', message: 'taken' });
  });
});
