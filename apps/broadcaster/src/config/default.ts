// config/default.ts
import ms from 'ms';
import { eventSourceSettingsSchema } from '@sse-broadcaster/types/validation';
import type { EventSourceSettings } from '@sse-broadcaster/types';
import { GREETER, SERVER } from '../constants.ts';

type Env = Record<string, string | undefined>;

interface ServerConfig {
  port: number;
  host: string;
  corsOrigin: string;
}

interface CompressionConfig {
  /** Offer gzip to clients that accept it */
  enabled: boolean;
}

interface GreeterConfig {
  /** Milliseconds between greetings; 0 disables the greeter */
  intervalMs: number;
}

export interface Config {
  env: string;
  server: ServerConfig;
  eventSource: EventSourceSettings;
  compression: CompressionConfig;
  greeter: GreeterConfig;
}

/**
 * Parse a duration such as "2s", "30m" or "1500" into milliseconds
 */
export function parseDuration(
  name: string,
  value: string | undefined,
): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;

  const trimmed = value.trim();
  const parsed = /^\d+$/.test(trimmed) ? Number(trimmed) : ms(trimmed);
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${name} must be a duration like "2s" or "1500", got "${value}"`);
  }
  return parsed;
}

/**
 * Parse "true"/"false" (case-insensitive)
 */
export function parseBoolean(
  name: string,
  value: string | undefined,
): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new Error(`${name} must be "true" or "false", got "${value}"`);
}

function parseInteger(
  name: string,
  value: string | undefined,
): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;

  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return Number(value.trim());
}

function parseGreeterInterval(value: string | undefined): number {
  if (value?.trim().toLowerCase() === 'off') return 0;
  return (
    parseDuration('GREETER_INTERVAL', value) ??
    ms(GREETER.DEFAULT_INTERVAL)
  );
}

/**
 * Build the host configuration from environment variables
 * @throws Error when a variable is malformed or a setting out of bounds
 */
export function loadConfig(env: Env = process.env): Config {
  const settings = eventSourceSettingsSchema.safeParse({
    writeTimeoutMs: parseDuration(
      'EVENTSOURCE_WRITE_TIMEOUT',
      env.EVENTSOURCE_WRITE_TIMEOUT,
    ),
    idleTimeoutMs: parseDuration(
      'EVENTSOURCE_IDLE_TIMEOUT',
      env.EVENTSOURCE_IDLE_TIMEOUT,
    ),
    closeOnWriteTimeout: parseBoolean(
      'EVENTSOURCE_CLOSE_ON_WRITE_TIMEOUT',
      env.EVENTSOURCE_CLOSE_ON_WRITE_TIMEOUT,
    ),
    queueCapacity: parseInteger(
      'EVENTSOURCE_QUEUE_CAPACITY',
      env.EVENTSOURCE_QUEUE_CAPACITY,
    ),
  });

  if (!settings.success) {
    const details = settings.error.issues
      .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid event source configuration (${details})`);
  }

  return {
    env: env.NODE_ENV || 'development',
    server: {
      port: parseInteger('PORT', env.PORT) ?? SERVER.DEFAULT_PORT,
      host: env.HOST || SERVER.DEFAULT_HOST,
      corsOrigin: env.CORS_ORIGIN || SERVER.DEFAULT_CORS_ORIGIN,
    },
    eventSource: settings.data,
    compression: {
      enabled: parseBoolean('EVENTSOURCE_GZIP', env.EVENTSOURCE_GZIP) ?? true,
    },
    greeter: {
      intervalMs: parseGreeterInterval(env.GREETER_INTERVAL),
    },
  };
}

export const config: Config = loadConfig();
