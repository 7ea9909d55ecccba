// validation/eventSchemas.ts
import {
  emptyStrictSchema,
  publishEventSchema,
  publishRetrySchema,
} from '@sse-broadcaster/types/validation';

/**
 * Validation schemas for the event stream and publish endpoints
 * Uses shared schemas from @sse-broadcaster/types for consistency
 */
export const eventValidationSchemas = {
  /**
   * GET /events - Open an event stream
   * No query parameters accepted
   */
  connect: {
    query: emptyStrictSchema,
  },

  /**
   * POST /api/events - Broadcast an event
   * data is required; event and id default to empty strings
   */
  publishEvent: {
    body: publishEventSchema,
  },

  /**
   * POST /api/events/retry - Broadcast a reconnection delay
   */
  publishRetry: {
    body: publishRetrySchema,
  },
} as const;
