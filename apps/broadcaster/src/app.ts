import type { IncomingMessage, ServerResponse } from 'node:http';
import express from 'express';
import type { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { pinoHttp } from 'pino-http';
import type { Config } from './config/default.ts';
import { EventsController } from './controllers/eventsController.ts';
import { StatusController } from './controllers/statusController.ts';
import { apiCompression } from './middleware/compression.ts';
import { errorHandler } from './middleware/errorHandler.ts';
import * as routes from './routes/index.ts';
import type { EventSource } from './utils/eventsource/index.ts';
import { logger } from './utils/logging/logger.ts';

// Api prefix
const API_PREFIX = '/api';

/** Request body limit for the publish API */
const JSON_BODY_LIMIT = '100kb';

export interface AppOptions {
  eventSource: EventSource;
  config: Pick<Config, 'server' | 'compression'>;
  startedAt?: Date;
}

/**
 * Routes skipped by access logging: health checks, and streams that only
 * "complete" when the client goes away
 */
function isQuietRoute(req: IncomingMessage): boolean {
  return !!(
    req.url?.startsWith('/events') ||
    req.url?.startsWith(`${API_PREFIX}/status`)
  );
}

/**
 * Build the express application around an event source
 */
export function createApp(options: AppOptions): Application {
  const { eventSource, config } = options;
  const app = express();

  const eventsController = new EventsController(eventSource, {
    compression: config.compression.enabled,
  });
  const statusController = new StatusController(
    eventSource,
    options.startedAt,
  );

  // HTTP request logging middleware (using pino-http)
  app.use(
    pinoHttp({
      logger,
      autoLogging: { ignore: isQuietRoute },
      customLogLevel: function (
        _req: IncomingMessage,
        res: ServerResponse,
        err?: Error,
      ) {
        if (res.statusCode >= 500 || err) {
          return 'error';
        }
        // Client errors (400, 404, etc.) are usually expected
        return 'debug';
      },
      serializers: {
        req: (req: IncomingMessage) => ({
          method: req.method,
          url: req.url,
          headers: {
            'user-agent': req.headers?.['user-agent'],
            'content-type': req.headers?.['content-type'],
          },
        }),
        res: (res: ServerResponse) => ({
          statusCode: res.statusCode,
        }),
      },
    }),
  );

  app.use(helmet());
  app.use(cors({ origin: config.server.corsOrigin }));

  // Event stream: the session writes its own head and gzip
  app.use(routes.createStreamRouter(eventsController));

  // JSON API
  app.use(API_PREFIX, apiCompression());
  app.use(API_PREFIX, express.json({ limit: JSON_BODY_LIMIT }));
  app.use(`${API_PREFIX}/events`, routes.createEventRouter(eventsController));
  app.use(`${API_PREFIX}/status`, routes.createStatusRouter(statusController));

  // Error handling (must be after routes)
  app.use(errorHandler);

  return app;
}
