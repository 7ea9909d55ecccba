/**
 * Status API Types
 *
 * Request/response types for the broadcaster host endpoints.
 */

/** Broadcaster lifecycle as reported by the host */
export type BroadcasterStatus = 'ready' | 'shutting_down';

/** GET /api/status response */
export type StatusResponse = {
  status: BroadcasterStatus;
  consumers: number;
  uptime: {
    seconds: number;
    formatted: string;
  };
  serverTime: string;
};

/** POST /api/events and /api/events/retry response */
export type PublishResponse = {
  success: true;
  /** Consumers the frame was queued for */
  consumers: number;
};
