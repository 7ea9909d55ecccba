/**
 * Settings Validation Schemas
 *
 * Zod schemas for event source settings. Omitted fields take their defaults.
 */

import { z } from 'zod';
import {
  EVENT_SOURCE_DEFAULTS,
  MAX_TIMER_DELAY_MS,
} from '../domain/settings.js';

/** Positive millisecond delay a timer can honour */
export const timerDelaySchema = z
  .number()
  .int('Must be a whole number of milliseconds')
  .min(1, 'Must be at least 1 millisecond')
  .max(MAX_TIMER_DELAY_MS, `Must not exceed ${MAX_TIMER_DELAY_MS} milliseconds`);

/** Event source settings schema */
export const eventSourceSettingsSchema = z
  .object({
    writeTimeoutMs: timerDelaySchema.default(
      EVENT_SOURCE_DEFAULTS.WRITE_TIMEOUT_MS,
    ),
    idleTimeoutMs: timerDelaySchema.default(
      EVENT_SOURCE_DEFAULTS.IDLE_TIMEOUT_MS,
    ),
    closeOnWriteTimeout: z
      .boolean()
      .default(EVENT_SOURCE_DEFAULTS.CLOSE_ON_WRITE_TIMEOUT),
    queueCapacity: z
      .number()
      .int()
      .min(1, 'Queue capacity must be at least 1')
      .max(10_000, 'Queue capacity must not exceed 10000')
      .default(EVENT_SOURCE_DEFAULTS.QUEUE_CAPACITY),
  })
  .strict();

/** Export types from schemas */
export type EventSourceSettingsInput = z.input<
  typeof eventSourceSettingsSchema
>;
