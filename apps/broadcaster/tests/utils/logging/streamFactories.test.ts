import { describe, it, expect } from 'vitest';
import { Transform } from 'node:stream';
import {
  createConsoleStream,
  createFileStream,
} from '../../../src/utils/logging/streamFactories.ts';

describe('Stream Factories', () => {
  describe('createConsoleStream', () => {
    it('should write NDJSON to stdout outside development', () => {
      expect(createConsoleStream('production')).toEqual({
        level: 'trace',
        stream: process.stdout,
      });
    });

    it('should format lines in development', () => {
      const entry = createConsoleStream('development');

      expect(entry.level).toBe('trace');
      expect(entry.stream).toBeInstanceOf(Transform);
    });
  });

  describe('createFileStream', () => {
    it('should return null without a log file', () => {
      expect(createFileStream(undefined)).toBeNull();
      expect(createFileStream('')).toBeNull();
    });
  });
});
