/**
 * @sse-broadcaster/types
 *
 * Shared TypeScript types for the event-stream broadcaster monorepo.
 *
 * @example
 * ```typescript
 * // Import domain types
 * import type { Message, EventSourceSettings } from '@sse-broadcaster/types';
 *
 * // Import API types
 * import type { StatusResponse } from '@sse-broadcaster/types/api';
 *
 * // Import validation schemas
 * import { eventSourceSettingsSchema } from '@sse-broadcaster/types/validation';
 *
 * // Import type guards
 * import { isEventMessage } from '@sse-broadcaster/types/guards';
 * ```
 */

// Domain types
export * from './domain/index.js';

// API types
export * from './api/index.js';
