/**
 * Message Domain Types
 *
 * Wire-encodable units published to every connected event-stream consumer.
 */

/** Named event carrying an optional id and multi-line data */
export type EventMessage = {
  readonly type: 'event';
  readonly id: string;
  readonly event: string;
  readonly data: string;
};

/** Reconnection delay directive for clients */
export type RetryMessage = {
  readonly type: 'retry';
  /** Whole milliseconds */
  readonly intervalMs: number;
};

/** Union of every publishable message */
export type Message = EventMessage | RetryMessage;

/** Message discriminator values */
export type MessageType = Message['type'];
