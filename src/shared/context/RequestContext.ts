/**
 * RequestContext - Request-scoped data storage using AsyncLocalStorage
 *
 * Carries the correlation ID and the authenticated principal through the
 * request lifecycle without polluting function signatures. The logger reads
 * the correlation ID from here on every line.
 *
 * Usage:
 *   // In a hook:
 *   RequestContext.run({ correlationId: 'req_0123456789abcdef' }, () => done());
 *
 *   // Anywhere in the call stack:
 *   const correlationId = RequestContext.getCorrelationId();
 *
 * @see https://nodejs.org/api/async_context.html
 */
import { AsyncLocalStorage } from 'async_hooks';

// ============================================
// TYPES
// ============================================

/**
 * Authenticated caller resolved from a verified bearer token
 */
export interface Principal {
  /** Token subject (`sub` claim) */
  subject: string;
  /** Granted authorities, e.g. `SCOPE_read` */
  authorities: string[];
  /** All verified token claims */
  claims: Record<string, unknown>;
}

export interface RequestContextData {
  /** Correlation ID shared by every log line of the request */
  correlationId: string;
  /** Authenticated principal (set by the resource server hook) */
  principal?: Principal;
}

// ============================================
// ASYNC LOCAL STORAGE INSTANCE
// ============================================

const asyncLocalStorage = new AsyncLocalStorage<RequestContextData>();

// ============================================
// REQUEST CONTEXT API
// ============================================

export const RequestContext = {
  /**
   * Run a function within a request context
   * All code executed within the callback will have access to the context
   */
  run<T>(context: RequestContextData, fn: () => T): T {
    return asyncLocalStorage.run(context, fn);
  },

  /**
   * Get the current request context (or undefined if not in a context)
   */
  get(): RequestContextData | undefined {
    return asyncLocalStorage.getStore();
  },

  getCorrelationId(): string | undefined {
    return asyncLocalStorage.getStore()?.correlationId;
  },

  getPrincipal(): Principal | undefined {
    return asyncLocalStorage.getStore()?.principal;
  },

  /**
   * Attach the principal to the active context.
   * No-op outside a request.
   */
  setPrincipal(principal: Principal): void {
    const store = asyncLocalStorage.getStore();
    if (store) {
      store.principal = principal;
    }
  },
};

export default RequestContext;
