/**
 * Error types
 *
 * Typed application errors with HTTP status codes. Route handlers and the
 * app-level error handler format these into JSON responses.
 */

import type { ContentfulStatusCode } from 'hono/utils/http-status';

/**
 * Base application error with typed error codes
 */
export class AppError extends Error {
  public readonly statusCode: ContentfulStatusCode;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: ContentfulStatusCode = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.context = context;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super(
      id ? `${resource} with id '${id}' not found` : `${resource} not found`,
      404,
      'NOT_FOUND',
      true,
      { resource, id }
    );
  }
}

/**
 * The event store could not durably write or read a session's events
 */
export class PersistenceError extends AppError {
  public readonly sessionId: string;

  constructor(sessionId: string, message: string, options?: { cause?: unknown }) {
    super(message, 503, 'PERSISTENCE_FAILURE', true, { sessionId });
    this.sessionId = sessionId;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * A turn could not be processed; the caller may submit the message again
 */
export class TurnProcessingError extends AppError {
  public readonly sessionId: string;
  public readonly attempts: number;
  public readonly retryable = true;

  constructor(sessionId: string, attempts: number, cause: unknown) {
    super(
      `Failed to record turn for session ${sessionId} after ${attempts} attempt(s)`,
      503,
      'TURN_PROCESSING_FAILED',
      true,
      { sessionId, attempts }
    );
    this.sessionId = sessionId;
    this.attempts = attempts;
    this.cause = cause;
  }
}

export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  retryable?: boolean;
  context?: Record<string, unknown>;
}

export function formatErrorResponse(error: unknown): { status: ContentfulStatusCode; body: ErrorResponse } {
  if (error instanceof TurnProcessingError) {
    return {
      status: error.statusCode,
      body: {
        error: 'Service Unavailable',
        code: error.code,
        message: error.message,
        retryable: true,
        context: error.context,
      },
    };
  }

  if (error instanceof AppError) {
    return {
      status: error.statusCode,
      body: {
        error: error.name,
        code: error.code,
        message: error.message,
        context: error.isOperational ? error.context : undefined,
      },
    };
  }

  return {
    status: 500,
    body: {
      error: 'Internal Server Error',
      code: 'INTERNAL_ERROR',
      message: error instanceof Error ? error.message : 'Unknown error',
    },
  };
}
