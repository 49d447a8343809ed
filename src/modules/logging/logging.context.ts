import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped logging context, carried through AsyncLocalStorage so any
 * log line written while serving a request can be tied back to it.
 */
export interface RequestContext {
  traceId: string;
  userId?: string;
  role?: string;
}

export const loggingContext = new AsyncLocalStorage<RequestContext>();

/**
 * Current trace/correlation ID, or undefined outside a request scope.
 */
export function getTraceId(): string | undefined {
  return loggingContext.getStore()?.traceId;
}

export function getUserId(): string | undefined {
  return loggingContext.getStore()?.userId;
}

export function getRole(): string | undefined {
  return loggingContext.getStore()?.role;
}

/**
 * Attach the authenticated caller to the current request context.
 * The JWT guard runs after middleware, so this happens in the interceptor.
 * No-op outside a request scope.
 */
export function bindActorToContext(userId: string, role: string): void {
  const store = loggingContext.getStore();
  if (store) {
    store.userId = userId;
    store.role = role;
  }
}
