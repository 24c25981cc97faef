import { describe, test, expect } from 'vitest';
import { formatErrorResponse, NotFoundError, PersistenceError, TurnProcessingError } from './errors';
import { maskEmail, maskPhone, truncate } from './logging';

describe('formatErrorResponse', () => {
  test('turn failures are retryable 503s', () => {
    const { status, body } = formatErrorResponse(new TurnProcessingError('session-1', 3, new Error('down')));

    expect(status).toBe(503);
    expect(body).toEqual({
      error: 'Service Unavailable',
      code: 'TURN_PROCESSING_FAILED',
      message: 'Failed to record turn for session session-1 after 3 attempt(s)',
      retryable: true,
      context: { sessionId: 'session-1', attempts: 3 },
    });
  });

  test('application errors keep their status and code', () => {
    expect(formatErrorResponse(new NotFoundError('Session', 'abc'))).toEqual({
      status: 404,
      body: {
        error: 'NotFoundError',
        code: 'NOT_FOUND',
        message: "Session with id 'abc' not found",
        context: { resource: 'Session', id: 'abc' },
      },
    });

    const persistence = formatErrorResponse(new PersistenceError('session-1', 'write failed'));
    expect(persistence.status).toBe(503);
    expect(persistence.body.code).toBe('PERSISTENCE_FAILURE');
  });

  test('unknown errors become 500s', () => {
    expect(formatErrorResponse(new Error('boom'))).toEqual({
      status: 500,
      body: { error: 'Internal Server Error', code: 'INTERNAL_ERROR', message: 'boom' },
    });
  });
});

describe('log masking', () => {
  test('masks emails and phones', () => {
    expect(maskEmail('john@example.com')).toBe('j***@example.com');
    expect(maskEmail(null)).toBe('none');
    expect(maskEmail('no-at-sign')).toBe('***');
    expect(maskPhone('+1-305-555-1234')).toBe('***1234');
    expect(maskPhone(undefined)).toBe('none');
  });

  test('truncates long text', () => {
    expect(truncate('abcdef', 3)).toBe('abc...');
    expect(truncate('abc', 3)).toBe('abc');
  });
});
