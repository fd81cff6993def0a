/**
 * Correlation Context
 *
 * Carries a correlation id through async work (requests, background jobs)
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomBytes } from 'crypto';
import type { LogContext } from './types.js';

export const correlationStorage = new AsyncLocalStorage<LogContext>();

export function getCorrelationContext(): LogContext | undefined {
  return correlationStorage.getStore();
}

export function runWithContext<T>(context: LogContext, fn: () => T): T {
  return correlationStorage.run(context, fn);
}

export function generateCorrelationId(): string {
  return randomBytes(8).toString('hex');
}
