/**
 * Express request types with Pino logger integration.
 */

import type { Request } from 'express';
import type { Logger } from 'pino';

/**
 * Express request with the request-scoped Pino logger attached by
 * pino-http. Optional so handlers also run without that middleware.
 */
export type RequestWithLogger = Omit<Request, 'log'> & {
  log?: Logger;
};

/**
 * Request-scoped logger, or the given module logger when pino-http is absent
 */
export function getRequestLogger(
  req: RequestWithLogger,
  fallback: Logger,
): Logger {
  return req.log ?? fallback;
}
