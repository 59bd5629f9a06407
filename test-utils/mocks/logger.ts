import { vi } from 'vitest';
import type { Logger } from '../../utils/logger';

/**
 * Logger whose every level is a spy, so tests can assert on what was logged.
 */
export function createMockLogger(): Logger {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export const mockLogger = createMockLogger();

/**
 * Factory result for the logger module.
 * Usage: vi.mock('../../utils/logger', async () => (await import('../../test-utils/mocks/logger')).mockLoggerModule)
 */
export const mockLoggerModule = {
  logger: mockLogger,
};
