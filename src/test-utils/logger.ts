/**
 * Logger stub for tests.
 */

import type { Logger } from 'pino';
import { vi } from 'vitest';

/** Logger whose level methods are spies. */
export interface TestLogger {
  /** Stub to hand to components under test. */
  logger: Logger;
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
}

/** Create a logger stub that records calls instead of writing. */
export function createTestLogger(): TestLogger {
  const stub = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  };
  return {
    logger: stub as unknown as Logger,
    debug: stub.debug,
    info: stub.info,
    warn: stub.warn,
    error: stub.error,
  };
}
