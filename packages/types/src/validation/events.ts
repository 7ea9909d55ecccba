/**
 * Event Publishing Validation Schemas
 *
 * Zod schemas for the host's publish and stream endpoints.
 */

import { z } from 'zod';
import { MAX_TIMER_DELAY_MS } from '../domain/settings.js';

/** Largest accepted data payload, in characters */
export const MAX_EVENT_DATA_LENGTH = 65_536;

/** Empty strict object schema for endpoints with no parameters */
export const emptyStrictSchema = z.object({}).strict();

/** Publish event request schema */
export const publishEventSchema = z
  .object({
    data: z
      .string()
      .max(
        MAX_EVENT_DATA_LENGTH,
        `data must not exceed ${MAX_EVENT_DATA_LENGTH} characters`,
      ),
    event: z.string().max(256, 'event must not exceed 256 characters').default(''),
    id: z.string().max(256, 'id must not exceed 256 characters').default(''),
  })
  .strict();

/** Publish retry request schema */
export const publishRetrySchema = z
  .object({
    intervalMs: z
      .number()
      .int('intervalMs must be a whole number')
      .min(0, 'intervalMs must not be negative')
      .max(MAX_TIMER_DELAY_MS),
  })
  .strict();

/** Export types from schemas */
export type PublishEventInput = z.infer<typeof publishEventSchema>;
export type PublishRetryInput = z.infer<typeof publishRetrySchema>;
