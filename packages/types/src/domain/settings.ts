/**
 * Event Source Settings
 *
 * Per-instance delivery policy read by every consumer session at construction time.
 */

/** Default values applied when a setting is omitted */
export const EVENT_SOURCE_DEFAULTS = {
  /** Bound on a single frame write */
  WRITE_TIMEOUT_MS: 2000,
  /** Consumer is dropped after this long without traffic */
  IDLE_TIMEOUT_MS: 30 * 60 * 1000,
  /** A timed-out write closes the consumer instead of dropping the frame */
  CLOSE_ON_WRITE_TIMEOUT: true,
  /** Frames buffered per consumer before new ones are dropped */
  QUEUE_CAPACITY: 10,
} as const;

/** Largest delay a Node.js timer accepts */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Resolved, immutable settings */
export type EventSourceSettings = {
  readonly writeTimeoutMs: number;
  readonly idleTimeoutMs: number;
  readonly closeOnWriteTimeout: boolean;
  readonly queueCapacity: number;
};
