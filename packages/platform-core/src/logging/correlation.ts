/**
 * Correlation Context
 *
 * Async correlation ID management across analysis runs
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types';

export const correlationStorage = new AsyncLocalStorage<LogContext>();

export function getCorrelationContext(): LogContext | undefined {
  return correlationStorage.getStore();
}

/**
 * Run function with correlation context.
 * Every log line written inside `fn` (sync or async) carries the context fields.
 */
export function runWithContext<T>(context: LogContext, fn: () => T): T {
  return correlationStorage.run(context, fn);
}
