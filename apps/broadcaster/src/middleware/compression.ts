/**
 * Compression Middleware
 *
 * JSON API responses go through the `compression` package. The event stream
 * writes its own gzip, so for that route only the decision is made here.
 */

import compression from 'compression';
import { constants as zlibConstants } from 'node:zlib';
import type { Request, Response, RequestHandler } from 'express';

/** Paths that bypass response compression */
const EVENT_STREAM_PATHS = ['/events'];

/**
 * Compression filter for API responses
 * Exported separately for testability
 */
export function apiCompressionFilter(req: Request, res: Response): boolean {
  if (EVENT_STREAM_PATHS.includes(req.path)) {
    return false;
  }
  return compression.filter(req, res);
}

/**
 * Create compression middleware for the JSON API
 *
 * Configuration:
 * - filter: never the event stream, default filter otherwise
 * - threshold: 1kb (status and publish replies are tiny)
 * - level: 6
 */
export function apiCompression(): RequestHandler {
  return compression({
    filter: apiCompressionFilter,
    threshold: 1024,
    level: 6,
    strategy: zlibConstants.Z_DEFAULT_STRATEGY,
  });
}

/**
 * Whether a new event stream should be gzip-encoded
 *
 * @param req - the request opening the stream
 * @param enabled - host-level switch (EVENTSOURCE_GZIP)
 */
export function negotiateEventStreamCompression(
  req: Request,
  enabled: boolean,
): boolean {
  if (!enabled) return false;
  return req.acceptsEncodings('gzip') === 'gzip';
}
