/**
 * Periodic example publisher: broadcasts "hello" on a fixed interval
 */
import type { Logger } from 'pino';
import type { EventSource } from '../utils/eventsource/index.ts';
import { createChildLogger } from '../utils/logging/logger.ts';
import { GREETER } from '../constants.ts';

const moduleLogger = createChildLogger('greeter-service');

export class GreeterService {
  private readonly eventSource: EventSource;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;

  /**
   * @param intervalMs - delay between greetings; 0 disables the greeter
   */
  constructor(
    eventSource: EventSource,
    intervalMs: number,
    logger: Logger = moduleLogger,
  ) {
    this.eventSource = eventSource;
    this.intervalMs = intervalMs;
    this.logger = logger;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;

    if (this.intervalMs <= 0) {
      this.logger.info('Greeter disabled');
      return;
    }

    this.timer = setInterval(() => this.greet(), this.intervalMs);
    this.logger.info({ intervalMs: this.intervalMs }, 'Greeter started');
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info('Greeter stopped');
  }

  /**
   * Publish one greeting
   * @returns consumers it was queued for
   */
  greet(): number {
    const consumers = this.eventSource.publishEvent(GREETER.MESSAGE);
    this.logger.info({ consumers }, 'Hello has been sent');
    return consumers;
  }
}
