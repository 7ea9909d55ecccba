// controllers/eventsController.ts
import type { Request, Response } from 'express';
import type { PublishResponse } from '@sse-broadcaster/types/api';
import {
  publishEventSchema,
  publishRetrySchema,
} from '@sse-broadcaster/types/validation';
import {
  hijackConnection,
  type EventSource,
} from '../utils/eventsource/index.ts';
import { negotiateEventStreamCompression } from '../middleware/compression.ts';
import { getRequestLogger } from '../types/request.ts';
import { createChildLogger } from '../utils/logging/logger.ts';

const moduleLogger = createChildLogger('http:events');

export interface EventsControllerOptions {
  /** Offer gzip to clients that accept it */
  compression: boolean;
}

/**
 * Controller for the event stream and the publish API
 *
 * Handlers are bound arrow properties so routers can mount them directly.
 * Request-scoped logging is available via req.log.
 */
export class EventsController {
  private readonly eventSource: EventSource;
  private readonly options: EventsControllerOptions;

  constructor(eventSource: EventSource, options: EventsControllerOptions) {
    this.eventSource = eventSource;
    this.options = options;
  }

  /**
   * GET /events
   * Hands the request's socket to the event source. After the hijack the
   * response object is never touched again.
   *
   * HTTP Status Codes:
   * - 200: written by the consumer session itself
   * - 503: broadcaster is shutting down
   */
  connect = async (req: Request, res: Response): Promise<void> => {
    const logger = getRequestLogger(req, moduleLogger);

    if (this.eventSource.isClosed) {
      res.status(503).json({
        error: 'Event source is shut down',
        code: 'EVENT_SOURCE_CLOSED',
      });
      return;
    }

    const compress = negotiateEventStreamCompression(
      req,
      this.options.compression,
    );
    const { socket, request } = hijackConnection(req);

    try {
      const session = await this.eventSource.accept(socket, request, {
        compress,
      });
      logger.debug(
        { action: 'connect', consumerId: session.id, compress },
        'Event stream opened',
      );
    } catch (error) {
      // The socket is already destroyed; there is no response left to send
      logger.warn({ action: 'connect', err: error }, 'Event stream rejected');
    }
  };

  /**
   * POST /api/events
   * Body has already been validated by validateRequest.
   */
  publishEvent = async (req: Request, res: Response): Promise<void> => {
    const logger = getRequestLogger(req, moduleLogger);
    const { data, event, id } = publishEventSchema.parse(req.body);

    const consumers = this.eventSource.publishEvent(data, event, id);
    logger.debug(
      { action: 'publishEvent', event, id, consumers },
      'Event published',
    );

    const response: PublishResponse = { success: true, consumers };
    res.status(202).json(response);
  };

  /**
   * POST /api/events/retry
   */
  publishRetry = async (req: Request, res: Response): Promise<void> => {
    const logger = getRequestLogger(req, moduleLogger);
    const { intervalMs } = publishRetrySchema.parse(req.body);

    const consumers = this.eventSource.publishRetry(intervalMs);
    logger.debug(
      { action: 'publishRetry', intervalMs, consumers },
      'Retry interval published',
    );

    const response: PublishResponse = { success: true, consumers };
    res.status(202).json(response);
  };
}
