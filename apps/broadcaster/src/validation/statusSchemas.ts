// validation/statusSchemas.ts
import { emptyStrictSchema } from '@sse-broadcaster/types/validation';

export const statusValidationSchemas = {
  /**
   * GET /api/status - Broadcaster status
   * Validates that no query parameters are provided (strict empty object)
   */
  getStatus: {
    query: emptyStrictSchema,
  },
} as const;
