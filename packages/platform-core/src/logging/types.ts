/**
 * Logging Types
 *
 * Interfaces and types for logging functionality
 */

import type { Logger } from 'winston';

export type { Logger } from 'winston';

/**
 * The subset of a winston logger that application code calls.
 * Lets tests hand in a mock without building a full winston instance.
 */
export type StructuredLogger = Pick<Logger, 'error' | 'warn' | 'info' | 'debug'>;

export interface LogContext {
  correlationId?: string;
  service?: string;
  module?: string;
  action?: string;
  [key: string]: unknown;
}

export interface LoggerMeta {
  service: string;
  env: string;
  version?: string;
  instanceId?: string;
}

export interface LoggerOptions {
  level?: string;
  logFile?: string;
  meta?: Partial<LoggerMeta>;
}
