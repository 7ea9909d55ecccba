import pino from 'pino';
import { createPrettyStream } from './prettyStream.ts';

type Environment = 'development' | 'production' | 'test';

// Streams pass everything through; the logger's own level does the filtering
const STREAM_LEVEL: pino.Level = 'trace';

/**
 * Creates a console stream with colored formatting for development
 * or NDJSON on stdout for production
 */
export function createConsoleStream(
  env: Environment | string,
): pino.StreamEntry {
  if (env === 'development') {
    const pretty = createPrettyStream({
      includeModule: process.env.LOG_INCLUDE_MODULE === 'true',
    });
    pretty.pipe(process.stdout);
    return { level: STREAM_LEVEL, stream: pretty };
  }

  return { level: STREAM_LEVEL, stream: process.stdout };
}

/**
 * Creates an asynchronous file stream when a log file is configured
 */
export function createFileStream(
  logFilePath: string | undefined,
): pino.StreamEntry | null {
  if (!logFilePath) {
    return null;
  }

  return {
    level: STREAM_LEVEL,
    stream: pino.destination({
      dest: logFilePath,
      sync: false, // Async for better performance
      mkdir: true,
    }),
  };
}
