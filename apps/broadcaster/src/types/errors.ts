/**
 * Error and validation types for the broadcaster and its express host.
 */

import type { ZodType } from 'zod';

export type { ValidationErrorDetail } from '@sse-broadcaster/types/api';

/**
 * Extended Error with HTTP status code for error handling middleware.
 */
export type AppError = Error & {
  /** HTTP status code to return */
  statusCode?: number;
  /** Error code (e.g., 'ENOENT', 'EVENT_SOURCE_CLOSED') */
  code?: string;
};

/**
 * Schema configuration for request validation middleware.
 * Defines Zod schemas for body, query, and params validation.
 */
export type ValidationSchema = {
  /** Schema for request body validation */
  body?: ZodType;
  /** Schema for query parameters validation */
  query?: ZodType;
  /** Schema for URL parameters validation */
  params?: ZodType;
};

/**
 * Base class for every failure raised by the event source.
 */
export class EventSourceError extends Error {
  readonly code: string;
  readonly statusCode?: number;

  constructor(
    message: string,
    code: string,
    options: ErrorOptions & { statusCode?: number } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.statusCode = options.statusCode;
  }
}

/**
 * The response head could not be written; no session was created.
 */
export class HandshakeError extends EventSourceError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Event stream handshake failed: ${detail}`, 'HANDSHAKE_FAILED', {
      cause,
    });
  }
}

/**
 * A frame write did not complete within the session's write deadline.
 */
export class WriteTimeoutError extends EventSourceError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Write did not complete within ${timeoutMs}ms`, 'WRITE_TIMEOUT');
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Write attempted on a connection that is already closed.
 */
export class ConnectionClosedError extends EventSourceError {
  constructor() {
    super('Connection is closed', 'CONNECTION_CLOSED');
  }
}

/**
 * Operation attempted after the event source was shut down.
 */
export class EventSourceClosedError extends EventSourceError {
  constructor() {
    super('Event source is shut down', 'EVENT_SOURCE_CLOSED', {
      statusCode: 503,
    });
  }
}
