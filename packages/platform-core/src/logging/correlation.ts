/**
 * Correlation Context
 *
 * Async correlation ID management across shell actions
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import type { LogContext } from './types.js';

export const correlationStorage = new AsyncLocalStorage<LogContext>();

/**
 * Run function with correlation context
 */
export function runWithContext<T>(context: LogContext, fn: () => T): T {
  return correlationStorage.run(context, fn);
}

export function generateCorrelationId(): string {
  return randomUUID();
}
