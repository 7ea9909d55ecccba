/**
 * Message Type Guards
 *
 * Runtime type guards for message discrimination.
 */

import type {
  Message,
  EventMessage,
  RetryMessage,
} from '../domain/message.js';

/** Check if value is an object with string-keyed fields */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Type guard for event message */
export function isEventMessage(value: unknown): value is EventMessage {
  return (
    isObject(value) &&
    value.type === 'event' &&
    typeof value.id === 'string' &&
    typeof value.event === 'string' &&
    typeof value.data === 'string'
  );
}

/** Type guard for retry message */
export function isRetryMessage(value: unknown): value is RetryMessage {
  return (
    isObject(value) &&
    value.type === 'retry' &&
    typeof value.intervalMs === 'number' &&
    Number.isInteger(value.intervalMs) &&
    value.intervalMs >= 0
  );
}

/** Check if value is any publishable message */
export function isMessage(value: unknown): value is Message {
  return isEventMessage(value) || isRetryMessage(value);
}
