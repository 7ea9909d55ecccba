import pino from 'pino';
import type { Logger } from 'pino';
import { createConsoleStream, createFileStream } from './streamFactories.ts';

// Determine environment from NODE_ENV
const env = process.env.NODE_ENV || 'development';

interface ErrorInfo {
  constructor: { name: string };
  message: string;
  stack?: string;
  code?: string;
  errno?: number;
  syscall?: string;
}

interface RequestInfo {
  method?: string;
  url?: string;
  headers?: Record<string, string | string[] | undefined>;
  socket?: {
    remoteAddress?: string;
    remotePort?: number;
  };
}

// Custom serializers for enhanced logging
export const serializers = {
  // Error serializer with socket-level context, applied to `{ err }`
  err: (err: ErrorInfo | null | undefined) => {
    if (!err) return err;
    return {
      type: err.constructor.name,
      message: err.message,
      stack: err.stack,
      code: err.code,
      errno: err.errno,
      syscall: err.syscall,
    };
  },

  // HTTP request serializer
  req: (req: RequestInfo | null | undefined) => {
    if (!req) return req;
    return {
      method: req.method,
      url: req.url,
      headers: {
        'user-agent': req.headers?.['user-agent'],
        accept: req.headers?.['accept'],
        'accept-encoding': req.headers?.['accept-encoding'],
      },
      remoteAddress: req.socket?.remoteAddress,
      remotePort: req.socket?.remotePort,
    };
  },
};

const level =
  process.env.LOG_LEVEL || (env === 'development' ? 'debug' : 'info');

// Configure streams for multistream using factory functions
const streams: pino.StreamEntry[] = [createConsoleStream(env)];

// Add file stream if configured
const fileStream = createFileStream(process.env.LOG_FILE);
if (fileStream) {
  streams.push(fileStream);
}

// Create the main logger with multistream
const logger: Logger = pino(
  {
    level,
    serializers,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {}, // Remove all base fields for cleaner logs
  },
  pino.multistream(streams),
);

/**
 * Create child logger factory
 */
export const createChildLogger = (
  name: string,
  additionalContext: Record<string, unknown> = {},
): Logger => {
  // module is always present so log aggregation can filter on it
  return logger.child({ ...additionalContext, module: name });
};

// Export main logger
export { logger };
