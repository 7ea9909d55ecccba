/**
 * Event stream frame encoding
 * Renders a message to the bytes written to every consumer. Pure and
 * deterministic, so a broadcast encodes once regardless of consumer count.
 */

import type {
  Message,
  EventMessage,
  RetryMessage,
} from '@sse-broadcaster/types';

const LINE_BREAKS = /[\r\n]/g;

/**
 * Remove line terminators so a single-line field cannot open a new one
 */
export function stripLineBreaks(value: string): string {
  return value.replace(LINE_BREAKS, '');
}

/**
 * Build an event message, defaulting event type and id to empty
 */
export function createEventMessage(
  data: string,
  event = '',
  id = '',
): EventMessage {
  return { type: 'event', id, event, data };
}

/**
 * Build a retry directive from a millisecond interval
 * @throws RangeError when the interval is negative or not finite
 */
export function createRetryMessage(intervalMs: number): RetryMessage {
  if (!Number.isFinite(intervalMs) || intervalMs < 0) {
    throw new RangeError(
      `Retry interval must be a non-negative number of milliseconds, got ${intervalMs}`,
    );
  }
  return { type: 'retry', intervalMs: Math.trunc(intervalMs) };
}

function encodeEvent(message: EventMessage): string {
  let frame = '';
  if (message.id.length > 0) {
    frame += `id: ${stripLineBreaks(message.id)}\n`;
  }
  if (message.event.length > 0) {
    frame += `event: ${stripLineBreaks(message.event)}\n`;
  }
  if (message.data.length > 0) {
    // A trailing newline yields a final empty data line on purpose
    for (const line of message.data.split('\n')) {
      frame += `data: ${line}\n`;
    }
  }
  return frame + '\n';
}

function encodeRetry(message: RetryMessage): string {
  return `retry: ${Math.trunc(message.intervalMs)}\n\n`;
}

/**
 * Encode a message into a self-terminated frame
 */
export function encodeMessage(message: Message): Buffer {
  switch (message.type) {
    case 'event':
      return Buffer.from(encodeEvent(message), 'utf8');
    case 'retry':
      return Buffer.from(encodeRetry(message), 'utf8');
  }
}
