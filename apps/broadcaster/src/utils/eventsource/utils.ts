/**
 * Shared types and helpers for the event source module
 * No I/O - can be used standalone
 */

import type { IncomingHttpHeaders } from 'node:http';
import { v4 as uuidv4 } from 'uuid';

// Re-export shared types for convenience
export type {
  Message,
  EventMessage,
  RetryMessage,
  EventSourceSettings,
} from '@sse-broadcaster/types';
export type { EventSourceSettingsInput } from '@sse-broadcaster/types/validation';

// ========================================================================
// TYPE DEFINITIONS
// ========================================================================

/** Metadata of the request that opened a stream */
export interface RequestMeta {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
}

/** Extra response header lines for a new stream, e.g. `X-Accel-Buffering: no` */
export type HeaderDecorator = (request: RequestMeta) => readonly string[];

/** Per-connection options decided by the host */
export interface AcceptOptions {
  /** Wrap frames in gzip; the host negotiates this from Accept-Encoding */
  compress?: boolean;
}

/**
 * What the coordinator sees of a session: an identity it can enqueue
 * frames to and close, never the connection itself
 */
export interface Consumer {
  readonly id: string;
  readonly isStale: boolean;
  /** Non-blocking; false when the frame was dropped */
  enqueue(frame: Buffer): boolean;
  /** Ask the delivery loop to close its connection and exit */
  closeQueue(): void;
  /** Resolves once the delivery loop has exited */
  whenClosed(): Promise<void>;
}

/** Callback a session uses to report itself unusable */
export type StaleReporter = (consumer: Consumer) => void;

// ========================================================================
// HELPERS
// ========================================================================

/**
 * Generate unique consumer ID using UUID v4
 */
export function generateConsumerId(): string {
  return uuidv4();
}

/**
 * Remove CR and LF from a header line so it stays a single line
 */
export function sanitizeHeaderLine(line: string): string {
  return line.replace(/[\r\n]/g, '');
}

/**
 * Assemble the response head: status line, content type, optional
 * compression headers, caller lines, and the terminating blank line
 */
export function buildResponseHead(
  extraHeaders: readonly string[],
  compress: boolean,
): Buffer {
  const lines = ['HTTP/1.1 200 OK', 'Content-Type: text/event-stream'];

  if (compress) {
    lines.push('Vary: Accept-Encoding', 'Content-Encoding: gzip');
  }

  for (const header of extraHeaders) {
    const line = sanitizeHeaderLine(header);
    if (line.length > 0) {
      lines.push(line);
    }
  }

  return Buffer.from(lines.join('\r\n') + '\r\n\r\n', 'latin1');
}
