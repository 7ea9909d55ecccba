import { describe, it, expect } from 'vitest';
import {
  loadConfig,
  parseBoolean,
  parseDuration,
} from '../../src/config/default.ts';

describe('config', () => {
  describe('parseDuration', () => {
    it('should read bare digits as milliseconds', () => {
      expect(parseDuration('TIMEOUT', '1500')).toBe(1500);
    });

    it('should read unit suffixes', () => {
      expect(parseDuration('TIMEOUT', '5s')).toBe(5000);
      expect(parseDuration('TIMEOUT', '30m')).toBe(1_800_000);
      expect(parseDuration('TIMEOUT', ' 2s ')).toBe(2000);
    });

    it('should treat missing or blank values as unset', () => {
      expect(parseDuration('TIMEOUT', undefined)).toBeUndefined();
      expect(parseDuration('TIMEOUT', '  ')).toBeUndefined();
    });

    it('should reject values it cannot read', () => {
      expect(() => parseDuration('TIMEOUT', 'soon')).toThrow(
        'TIMEOUT must be a duration like "2s" or "1500", got "soon"',
      );
      expect(() => parseDuration('TIMEOUT', '-5s')).toThrow(
        'TIMEOUT must be a duration like "2s" or "1500", got "-5s"',
      );
    });
  });

  describe('parseBoolean', () => {
    it('should read true and false in any case', () => {
      expect(parseBoolean('FLAG', 'true')).toBe(true);
      expect(parseBoolean('FLAG', 'FALSE')).toBe(false);
    });

    it('should treat a missing value as unset', () => {
      expect(parseBoolean('FLAG', undefined)).toBeUndefined();
    });

    it('should reject anything else', () => {
      expect(() => parseBoolean('FLAG', 'yes')).toThrow(
        'FLAG must be "true" or "false", got "yes"',
      );
    });
  });

  describe('loadConfig', () => {
    it('should apply defaults for an empty environment', () => {
      expect(loadConfig({})).toEqual({
        env: 'development',
        server: { port: 3000, host: '0.0.0.0', corsOrigin: '*' },
        eventSource: {
          writeTimeoutMs: 2000,
          idleTimeoutMs: 1_800_000,
          closeOnWriteTimeout: true,
          queueCapacity: 10,
        },
        compression: { enabled: true },
        greeter: { intervalMs: 2000 },
      });
    });

    it('should read every variable', () => {
      const config = loadConfig({
        NODE_ENV: 'production',
        PORT: '8080',
        HOST: '127.0.0.1',
        CORS_ORIGIN: 'https://example.test',
        EVENTSOURCE_WRITE_TIMEOUT: '500',
        EVENTSOURCE_IDLE_TIMEOUT: '30m',
        EVENTSOURCE_CLOSE_ON_WRITE_TIMEOUT: 'false',
        EVENTSOURCE_QUEUE_CAPACITY: '64',
        EVENTSOURCE_GZIP: 'false',
        GREETER_INTERVAL: '5s',
      });

      expect(config).toEqual({
        env: 'production',
        server: { port: 8080, host: '127.0.0.1', corsOrigin: 'https://example.test' },
        eventSource: {
          writeTimeoutMs: 500,
          idleTimeoutMs: 1_800_000,
          closeOnWriteTimeout: false,
          queueCapacity: 64,
        },
        compression: { enabled: false },
        greeter: { intervalMs: 5000 },
      });
    });

    it('should disable the greeter with off or zero', () => {
      expect(loadConfig({ GREETER_INTERVAL: 'OFF' }).greeter.intervalMs).toBe(0);
      expect(loadConfig({ GREETER_INTERVAL: '0' }).greeter.intervalMs).toBe(0);
    });

    it('should reject malformed variables', () => {
      expect(() => loadConfig({ PORT: 'eighty' })).toThrow(
        'PORT must be a non-negative integer, got "eighty"',
      );
      expect(() => loadConfig({ EVENTSOURCE_GZIP: 'on' })).toThrow(
        'EVENTSOURCE_GZIP must be "true" or "false", got "on"',
      );
    });

    it('should reject settings out of bounds', () => {
      expect(() => loadConfig({ EVENTSOURCE_WRITE_TIMEOUT: '0' })).toThrow(
        'Invalid event source configuration (writeTimeoutMs: Must be at least 1 millisecond)',
      );
      expect(() => loadConfig({ EVENTSOURCE_QUEUE_CAPACITY: '0' })).toThrow(
        'Invalid event source configuration (queueCapacity: Queue capacity must be at least 1)',
      );
    });
  });
});
