/**
 * Event Source - public entry point
 *
 * Turns handed-over sockets into consumer sessions and forwards publish,
 * count and shutdown calls to the broadcast coordinator.
 */

import type { Duplex } from 'node:stream';
import { eventSourceSettingsSchema } from '@sse-broadcaster/types/validation';
import { createChildLogger } from '../logging/logger.ts';
import { EventSourceClosedError, HandshakeError } from '../../types/errors.ts';
import { BroadcastCoordinator } from './BroadcastCoordinator.ts';
import { ConsumerSession } from './ConsumerSession.ts';
import { createEventMessage, createRetryMessage } from './messageEncoder.ts';
import type {
  AcceptOptions,
  EventSourceSettings,
  EventSourceSettingsInput,
  HeaderDecorator,
  RequestMeta,
} from './utils.ts';

const logger = createChildLogger('eventsource');

export class EventSource {
  readonly settings: EventSourceSettings;
  private readonly headerDecorator: HeaderDecorator | null;
  private readonly coordinator: BroadcastCoordinator;

  /**
   * @param settings - partial settings, completed with defaults
   * @param headerDecorator - extra header lines per new stream
   * @throws ZodError when a setting is out of bounds
   */
  constructor(
    settings: EventSourceSettingsInput = {},
    headerDecorator: HeaderDecorator | null = null,
  ) {
    this.settings = Object.freeze(eventSourceSettingsSchema.parse(settings));
    this.headerDecorator = headerDecorator;
    this.coordinator = new BroadcastCoordinator();
  }

  get isClosed(): boolean {
    return this.coordinator.isClosed;
  }

  /**
   * Take ownership of a client socket: write the handshake, register the
   * session and start its delivery loop.
   *
   * @throws EventSourceClosedError after shutdown (the socket is destroyed)
   * @throws HandshakeError when the head cannot be written
   */
  async accept(
    socket: Duplex,
    request: RequestMeta,
    options: AcceptOptions = {},
  ): Promise<ConsumerSession> {
    if (this.coordinator.isClosed) {
      socket.destroy();
      throw new EventSourceClosedError();
    }

    let extraHeaders: readonly string[] = [];
    if (this.headerDecorator) {
      try {
        extraHeaders = this.headerDecorator(request);
      } catch (error) {
        socket.destroy();
        logger.warn({ err: error }, 'Header decorator failed');
        throw new HandshakeError(error);
      }
    }

    const session = await ConsumerSession.open(socket, {
      settings: this.settings,
      compress: options.compress ?? false,
      extraHeaders,
      onStale: (consumer) => this.coordinator.markStale(consumer),
    });

    try {
      this.coordinator.register(session);
    } catch (error) {
      // Shut down while the handshake was in flight; close like any other consumer
      session.closeQueue();
      session.start();
      throw error;
    }

    session.start();
    return session;
  }

  /**
   * Broadcast an event to every consumer
   * @returns number of consumers the frame was queued for
   */
  publishEvent(data: string, event = '', id = ''): number {
    return this.coordinator.publish(createEventMessage(data, event, id))
      .delivered;
  }

  /**
   * Broadcast a reconnection delay
   * @throws RangeError for a negative or non-finite interval
   */
  publishRetry(intervalMs: number): number {
    return this.coordinator.publish(createRetryMessage(intervalMs)).delivered;
  }

  consumerCount(): number {
    return this.coordinator.count();
  }

  /**
   * Close all consumers; resolves when every connection is closed
   */
  shutdown(): Promise<void> {
    return this.coordinator.shutdown();
  }
}

/**
 * Create an event source with validated settings
 */
export function createEventSource(
  settings?: EventSourceSettingsInput,
  headerDecorator?: HeaderDecorator,
): EventSource {
  return new EventSource(settings, headerDecorator ?? null);
}
