/**
 * Single authority over the consumer registry
 *
 * Registration, publish fan-out, stale removal and shutdown all run as
 * synchronous steps on the event loop, so none of them can observe another
 * half-applied and count() never sees a torn registry. The coordinator holds
 * consumers by identity only and never performs connection I/O.
 */

import { isMessage } from '@sse-broadcaster/types/guards';
import { createChildLogger } from '../logging/logger.ts';
import { EventSourceClosedError } from '../../types/errors.ts';
import { encodeMessage } from './messageEncoder.ts';
import type { Consumer, Message } from './utils.ts';

const logger = createChildLogger('eventsource:coordinator');

export type CoordinatorState = 'running' | 'closed';

/** Outcome of one publish */
export interface PublishResult {
  /** Consumers the frame was queued for */
  delivered: number;
  /** Consumers whose queue was full */
  dropped: number;
}

export class BroadcastCoordinator {
  // Set keeps insertion order and holds each consumer at most once
  private readonly registry = new Set<Consumer>();
  private state: CoordinatorState = 'running';
  private shutdownPromise: Promise<void> | null = null;

  get isClosed(): boolean {
    return this.state === 'closed';
  }

  /**
   * Current registry size
   */
  count(): number {
    return this.registry.size;
  }

  /**
   * Add a consumer to the registry
   * @returns false when the consumer already went stale and was not added
   * @throws EventSourceClosedError after shutdown
   */
  register(consumer: Consumer): boolean {
    if (this.state === 'closed') {
      throw new EventSourceClosedError();
    }

    // Peer vanished between handshake and registration
    if (consumer.isStale) {
      logger.debug(
        { consumerId: consumer.id },
        'Skipping registration of stale consumer',
      );
      return false;
    }

    this.registry.add(consumer);
    logger.info(
      { consumerId: consumer.id, consumers: this.registry.size },
      'Consumer registered',
    );
    return true;
  }

  /**
   * Encode once and offer the frame to every live consumer.
   * A full queue drops the frame for that consumer only.
   * @throws TypeError when an untyped caller passes something else
   */
  publish(message: Message): PublishResult {
    if (!isMessage(message)) {
      throw new TypeError('publish expects an event or retry message');
    }

    if (this.state === 'closed') {
      logger.debug({ messageType: message.type }, 'Publish after shutdown ignored');
      return { delivered: 0, dropped: 0 };
    }

    const frame = encodeMessage(message);
    let delivered = 0;
    let dropped = 0;

    for (const consumer of this.registry) {
      if (consumer.isStale) continue;

      if (consumer.enqueue(frame)) {
        delivered++;
      } else {
        dropped++;
        logger.debug(
          { consumerId: consumer.id, messageType: message.type },
          'Consumer queue full, frame dropped',
        );
      }
    }

    return { delivered, dropped };
  }

  /**
   * Remove a consumer by identity and release its delivery loop.
   * Unknown or already removed consumers are ignored.
   */
  markStale(consumer: Consumer): void {
    if (this.state === 'closed') return;
    if (!this.registry.delete(consumer)) return;

    consumer.closeQueue();
    logger.info(
      { consumerId: consumer.id, consumers: this.registry.size },
      'Stale consumer removed',
    );
  }

  /**
   * Close every consumer and clear the registry. Terminal.
   * Resolves once every delivery loop has closed its connection; repeated
   * calls return the same promise.
   */
  shutdown(): Promise<void> {
    if (this.shutdownPromise) return this.shutdownPromise;

    this.state = 'closed';
    const consumers = Array.from(this.registry);
    this.registry.clear();

    logger.info({ consumers: consumers.length }, 'Shutting down event source');

    for (const consumer of consumers) {
      consumer.closeQueue();
    }

    this.shutdownPromise = Promise.all(
      consumers.map((consumer) => consumer.whenClosed()),
    ).then(() => {
      logger.info({ consumers: consumers.length }, 'Event source shut down');
    });

    return this.shutdownPromise;
  }
}
