/**
 * One connected client: response handshake plus its delivery loop
 *
 * The loop is the only code that touches the connection after the
 * handshake. It drains a bounded queue filled by the coordinator, writes each
 * frame under a deadline, and reports the session stale at most once.
 */

import type { Duplex } from 'node:stream';
import type { Logger } from 'pino';
import { createChildLogger } from '../logging/logger.ts';
import { HandshakeError, WriteTimeoutError } from '../../types/errors.ts';
import { BoundedQueue } from './BoundedQueue.ts';
import { EventStreamConnection } from './EventStreamConnection.ts';
import {
  buildResponseHead,
  generateConsumerId,
  type Consumer,
  type EventSourceSettings,
  type StaleReporter,
} from './utils.ts';

const moduleLogger = createChildLogger('eventsource:session');

export interface ConsumerSessionOptions {
  settings: EventSourceSettings;
  compress: boolean;
  extraHeaders: readonly string[];
  onStale: StaleReporter;
}

type SessionState = 'handshaken' | 'running' | 'closed';

export class ConsumerSession implements Consumer {
  readonly id: string;
  private readonly connection: EventStreamConnection;
  private readonly queue: BoundedQueue<Buffer>;
  private readonly settings: EventSourceSettings;
  private readonly onStale: StaleReporter;
  private readonly logger: Logger;
  private state: SessionState = 'handshaken';
  private stale = false;
  private loop: Promise<void> | null = null;

  private constructor(
    id: string,
    connection: EventStreamConnection,
    options: ConsumerSessionOptions,
    logger: Logger,
  ) {
    this.id = id;
    this.connection = connection;
    this.settings = options.settings;
    this.onStale = options.onStale;
    this.logger = logger;
    this.queue = new BoundedQueue<Buffer>(options.settings.queueCapacity);
  }

  /**
   * Write the response head and return a session ready to start.
   * On any failure the socket is destroyed and a HandshakeError thrown.
   */
  static async open(
    socket: Duplex,
    options: ConsumerSessionOptions,
  ): Promise<ConsumerSession> {
    const id = generateConsumerId();
    const logger = moduleLogger.child({ consumerId: id });
    const connection = new EventStreamConnection(socket, {
      compress: options.compress,
      writeTimeoutMs: options.settings.writeTimeoutMs,
      logger,
    });

    // Errors surface as failed writes or 'close'; an unhandled 'error' event would crash the process
    const onEarlyError = (error: Error): void => {
      logger.debug({ err: error }, 'Socket error during handshake');
    };
    socket.on('error', onEarlyError);

    try {
      await connection.writeHead(
        buildResponseHead(options.extraHeaders, options.compress),
      );
    } catch (error) {
      connection.destroy();
      logger.warn({ err: error }, 'Event stream handshake failed');
      throw new HandshakeError(error);
    }
    socket.off('error', onEarlyError);

    const session = new ConsumerSession(id, connection, options, logger);
    session.watchConnection();

    logger.debug({ compressed: options.compress }, 'Event stream session opened');
    return session;
  }

  get isStale(): boolean {
    return this.stale;
  }

  get isCompressed(): boolean {
    return this.connection.compressed;
  }

  /**
   * Begin the delivery loop. Idempotent.
   */
  start(): void {
    if (this.loop) return;
    this.state = 'running';
    this.loop = this.run();
  }

  enqueue(frame: Buffer): boolean {
    if (this.stale) return false;
    return this.queue.offer(frame);
  }

  closeQueue(): void {
    this.queue.close();
  }

  whenClosed(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  private watchConnection(): void {
    // Peer may have hung up between the head write and now
    if (this.connection.isClosed) {
      this.markStale('connection closed by peer');
      return;
    }

    const onError = (error: Error): void => {
      this.markStale('connection error', error);
    };
    this.connection.socket.on('error', onError);
    this.connection.encoder?.on('error', onError);

    this.connection.socket.once('close', () => {
      if (this.state !== 'closed') {
        this.markStale('connection closed by peer');
      }
    });
  }

  private async run(): Promise<void> {
    try {
      await this.deliver();
    } catch (error) {
      this.markStale('delivery loop failed', error);
    }
  }

  private async deliver(): Promise<void> {
    for (;;) {
      const receipt = await this.queue.take(this.settings.idleTimeoutMs);
      if (this.stale) return;

      if (receipt.kind === 'closed') {
        this.state = 'closed';
        this.connection.close();
        this.logger.debug('Event stream session closed');
        return;
      }

      if (receipt.kind === 'timeout') {
        this.markStale('idle timeout');
        return;
      }

      // Only reachable after a tolerated timeout left a frame on the socket
      if (this.connection.isWritePending) {
        this.logger.debug('Previous write still pending, frame dropped');
        continue;
      }

      try {
        await this.connection.write(receipt.value);
      } catch (error) {
        if (this.stale) return;

        if (
          error instanceof WriteTimeoutError &&
          !this.settings.closeOnWriteTimeout
        ) {
          this.logger.warn(
            { timeoutMs: error.timeoutMs },
            'Write timed out, frame dropped',
          );
          continue;
        }

        this.markStale('write failed', error);
        return;
      }
    }
  }

  /**
   * First failure wins: close the connection and report upward once
   */
  private markStale(reason: string, error?: unknown): void {
    if (this.stale) return;
    this.stale = true;
    this.state = 'closed';

    this.connection.destroy();
    this.queue.close();

    this.logger.info(
      { reason, ...(error !== undefined && { err: error }) },
      'Event stream session is stale',
    );
    this.onStale(this);
  }
}
