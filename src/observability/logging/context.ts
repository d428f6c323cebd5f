// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING CONTEXT — Request-Scoped Fields via AsyncLocalStorage
// ═══════════════════════════════════════════════════════════════════════════════

import { AsyncLocalStorage } from 'node:async_hooks';

export interface LoggingContext {
  requestId?: string;
  userId?: string;
}

const storage = new AsyncLocalStorage<LoggingContext>();

/**
 * Run `fn` with the given context visible to every logger call beneath it.
 */
export function runWithLoggingContext<T>(context: LoggingContext, fn: () => T): T {
  return storage.run({ ...context }, fn);
}

/**
 * Current request context, or an empty object outside a request.
 */
export function getLoggingContext(): LoggingContext {
  return storage.getStore() ?? {};
}

/**
 * Attach the authenticated user to the active context, if one is running.
 */
export function setContextUserId(userId: string): void {
  const current = storage.getStore();
  if (current) {
    current.userId = userId;
  }
}
