import http from 'node:http';
import type { Server } from 'node:http';
import { config } from './config/default.ts';
import { createApp } from './app.ts';
import { createBroadcaster } from './services/broadcaster.ts';
import { GreeterService } from './services/greeterService.ts';
import { SERVER_SHUTDOWN } from './constants.ts';
import { createChildLogger } from './utils/logging/logger.ts';

const serverLogger = createChildLogger('server');

const broadcaster = createBroadcaster({
  eventSource: config.eventSource,
  corsOrigin: config.server.corsOrigin,
});
const greeter = new GreeterService(broadcaster, config.greeter.intervalMs);
const app = createApp({ eventSource: broadcaster, config });
const server: Server = http.createServer(app);

let shuttingDown = false;

/** Resolve when the promise settles or the timeout elapses, whichever is first */
function withTimeout(promise: Promise<void>, timeoutMs: number): Promise<boolean> {
  return new Promise<boolean>((resolve, reject) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    promise.then(
      () => {
        clearTimeout(timer);
        resolve(true);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

function closeServer(): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    // Hijacked stream sockets are gone by now; drop idle keep-alive ones
    server.closeIdleConnections();
  });
}

function startServer(): void {
  serverLogger.info(
    { settings: config.eventSource, gzip: config.compression.enabled },
    `Starting server in ${config.env} mode`,
  );

  server.listen(config.server.port, config.server.host, () => {
    serverLogger.info(
      `HTTP Server is running on ${config.server.host}:${config.server.port}`,
    );
    greeter.start();
  });

  server.on('error', (error) => {
    serverLogger.fatal({ err: error }, 'HTTP server failed');
    process.exit(1);
  });
}

/**
 * Graceful shutdown: stop publishing, close every consumer, then the listener
 */
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  serverLogger.info(`Received ${signal}, initiating graceful shutdown`);

  // 1. Stop the example publisher
  greeter.stop();

  // 2. Close every event stream
  const consumersClosed = await withTimeout(
    broadcaster.shutdown(),
    SERVER_SHUTDOWN.CLOSE_CONSUMERS_TIMEOUT_MS,
  );
  if (!consumersClosed) {
    serverLogger.warn('Timed out waiting for event streams to close');
  }

  // 3. Stop accepting connections
  const serverClosed = await withTimeout(
    closeServer(),
    SERVER_SHUTDOWN.CLOSE_SERVER_TIMEOUT_MS,
  );
  if (!serverClosed) {
    serverLogger.warn('Timed out waiting for the HTTP server to close');
    server.closeAllConnections();
  }

  serverLogger.info('Graceful shutdown completed');
}

function handleSignal(signal: NodeJS.Signals): void {
  gracefulShutdown(signal)
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      serverLogger.error({ err: error }, 'Error during graceful shutdown');
      process.exit(1);
    });
}

process.on('SIGTERM', handleSignal);
process.on('SIGINT', handleSignal);

startServer();
