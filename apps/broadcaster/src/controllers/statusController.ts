// controllers/statusController.ts
import type { Request, Response } from 'express';
import ms from 'ms';
import type { StatusResponse } from '@sse-broadcaster/types/api';
import type { EventSource } from '../utils/eventsource/index.ts';
import { getRequestLogger } from '../types/request.ts';
import { createChildLogger } from '../utils/logging/logger.ts';

const moduleLogger = createChildLogger('http:status');

/**
 * Human-readable uptime, e.g. "5 minutes"
 */
export function formatUptime(uptimeMs: number): string {
  return uptimeMs > 0 ? ms(uptimeMs, { long: true }) : '0 seconds';
}

/**
 * Controller for broadcaster health checks
 * Reports lifecycle state, connected consumers and uptime.
 */
export class StatusController {
  private readonly eventSource: EventSource;
  private readonly startedAt: Date;

  constructor(eventSource: EventSource, startedAt: Date = new Date()) {
    this.eventSource = eventSource;
    this.startedAt = startedAt;
  }

  /**
   * GET /api/status
   */
  getStatus = async (req: Request, res: Response): Promise<void> => {
    const logger = getRequestLogger(req, moduleLogger);

    const uptimeMs = Date.now() - this.startedAt.getTime();
    const status: StatusResponse = {
      status: this.eventSource.isClosed ? 'shutting_down' : 'ready',
      consumers: this.eventSource.consumerCount(),
      uptime: {
        seconds: Math.max(0, Math.floor(uptimeMs / 1000)),
        formatted: formatUptime(uptimeMs),
      },
      serverTime: new Date().toString(),
    };

    logger.debug(
      { action: 'getStatus', status: status.status, consumers: status.consumers },
      'Status retrieved',
    );

    res.status(200).json(status);
  };
}
