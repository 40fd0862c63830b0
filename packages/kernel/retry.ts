/**
* Retry Utilities
*
* Backoff primitives shared by the HTTP retry helper: abortable sleep,
* exponential delay with jitter, and Retry-After parsing.
*/

// ============================================================================
// AbortError
// ============================================================================

/**
* Error thrown when an operation is aborted via AbortSignal
*/
export class AbortError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

// ============================================================================
// Delays
// ============================================================================

/**
* Sleep for specified milliseconds, abortable via signal
* @param ms - Milliseconds to sleep
* @param signal - Optional AbortSignal to cancel the sleep
* @returns Promise that resolves after the delay or rejects on abort
*/
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new AbortError());
  if (!signal) return new Promise(resolve => setTimeout(resolve, ms));

  return new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    function onAbort() {
      clearTimeout(timeoutId);
      reject(new AbortError());
    }

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
* Exponential backoff capped at maxDelayMs, with ±25% jitter
* @param attempt - Zero-based attempt number
*/
export function calculateBackoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = cappedDelay * 0.25 * (Math.random() * 2 - 1);
  return Math.max(0, Math.floor(cappedDelay + jitter));
}

/**
* Parse Retry-After header value
* @param headerValue - Header value string (seconds or HTTP date)
* @returns Delay in milliseconds, or undefined when absent or unparsable
*/
export function parseRetryAfter(headerValue: string | null): number | undefined {
  if (!headerValue) return undefined;

  const seconds = Number(headerValue.trim());
  if (Number.isInteger(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = new Date(headerValue);
  if (!isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return undefined;
}
