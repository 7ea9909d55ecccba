/**
 * Event source construction for the host process
 */
import {
  createEventSource,
  type EventSource,
  type EventSourceSettings,
  type HeaderDecorator,
} from '../utils/eventsource/index.ts';

/**
 * Header lines added to every stream: no caching, no proxy buffering,
 * and the configured CORS origin
 */
export function createStreamHeaderDecorator(corsOrigin: string): HeaderDecorator {
  return () => [
    'Cache-Control: no-cache',
    'X-Accel-Buffering: no',
    `Access-Control-Allow-Origin: ${corsOrigin}`,
  ];
}

export interface BroadcasterOptions {
  eventSource: EventSourceSettings;
  corsOrigin: string;
}

export function createBroadcaster(options: BroadcasterOptions): EventSource {
  return createEventSource(
    options.eventSource,
    createStreamHeaderDecorator(options.corsOrigin),
  );
}
