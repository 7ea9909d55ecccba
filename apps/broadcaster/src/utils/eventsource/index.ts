/**
 * Event Source Module - Public API
 *
 * Server-sent events broadcaster: accepts handed-over sockets and fans
 * published messages out to every connected consumer.
 */

// ========================================================================
// Primary Exports (most commonly used)
// ========================================================================

export { EventSource, createEventSource } from './EventSource.ts';
export { hijackConnection, type HijackedConnection } from './hijack.ts';

// ========================================================================
// Building Blocks (for testing and advanced use)
// ========================================================================

export { BroadcastCoordinator, type PublishResult } from './BroadcastCoordinator.ts';
export { ConsumerSession, type ConsumerSessionOptions } from './ConsumerSession.ts';
export { EventStreamConnection } from './EventStreamConnection.ts';
export { BoundedQueue, type QueueReceipt } from './BoundedQueue.ts';
export {
  encodeMessage,
  createEventMessage,
  createRetryMessage,
  stripLineBreaks,
} from './messageEncoder.ts';

// ========================================================================
// Errors, Types and Helpers
// ========================================================================

export {
  EventSourceError,
  HandshakeError,
  WriteTimeoutError,
  ConnectionClosedError,
  EventSourceClosedError,
} from '../../types/errors.ts';

export * from './utils.ts';
