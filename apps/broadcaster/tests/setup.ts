/**
 * Test Setup
 *
 * Runs before each test file. Loggers are real but silent
 * (set TEST_LOG_LEVEL=debug to see their output).
 */

import { vi, afterEach } from 'vitest';

// Set test environment variables BEFORE any imports
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL || 'silent';

afterEach(() => {
  // Clean up any lingering fake timers
  vi.useRealTimers();
});
