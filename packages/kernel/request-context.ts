import { randomUUID } from 'crypto';

import { AsyncLocalStorage } from 'async_hooks';

/**
* Request Context Module
* Carries the request ID of a summarize run across async boundaries so that
* log entries and captured failure reports can be correlated.
*/

export interface RequestContext {
  requestId: string;
  startTime: number;
  /** Logical operation name (e.g. 'summarize') */
  operation?: string | undefined;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
* Get current request context
* @returns Current request context or undefined if not in a context
*/
export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
* Run function within a request context
* @param context - Request context to use
* @param fn - Function to execute
* @returns Promise that resolves with the function result
*/
export function runWithContext<T>(context: RequestContext, fn: () => Promise<T>): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
* Generate new request context
* @param options - Optional context properties to override defaults
*/
export function createRequestContext(options?: Partial<RequestContext>): RequestContext {
  return {
    requestId: options?.requestId || randomUUID(),
    startTime: options?.startTime ?? Date.now(),
    operation: options?.operation,
  };
}

/**
* Get request ID from current context or generate new one
*/
export function getRequestId(): string {
  return getRequestContext()?.requestId || randomUUID();
}
