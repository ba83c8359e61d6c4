import { vi, type Mock } from 'vitest';

export interface MockLogger {
  info: Mock;
  error: Mock;
  warn: Mock;
  debug: Mock;
  verbose: Mock;
  silly: Mock;
  log: Mock;
  child: Mock;
}

export function createMockLogger(): MockLogger {
  const logger: MockLogger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    verbose: vi.fn(),
    silly: vi.fn(),
    log: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}
