// constants.ts
// Host-level timing constants; event source defaults live in @sse-broadcaster/types

export const SERVER = {
  DEFAULT_PORT: 3000,
  DEFAULT_HOST: '0.0.0.0',
  DEFAULT_CORS_ORIGIN: '*',
} as const;

export const GREETER = {
  DEFAULT_INTERVAL: '2s',
  MESSAGE: 'hello',
} as const;

export const SERVER_SHUTDOWN = {
  /** Upper bound on waiting for consumers to close */
  CLOSE_CONSUMERS_TIMEOUT_MS: 5000,
  /** Upper bound on waiting for the HTTP server to close */
  CLOSE_SERVER_TIMEOUT_MS: 5000,
} as const;
