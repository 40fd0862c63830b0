import { retryConfig } from '@config/retry';
import { getLogger } from '@kernel/logger';
import { calculateBackoffDelay, parseRetryAfter, sleep } from '@kernel/retry';

/**
* Fetch with Retry Utility
* Retry with exponential backoff and per-attempt timeouts for every external API call
*/

const logger = getLogger('fetch-retry');

const DEFAULT_RETRY_OPTIONS = {
  maxRetries: retryConfig.maxRetries,
  baseDelayMs: retryConfig.baseDelayMs,
  maxDelayMs: retryConfig.maxDelayMs,
  retryableStatuses: retryConfig.retryableStatuses,
  retryableErrorCodes: retryConfig.retryableErrorCodes,
};

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  retryableStatuses?: readonly number[];
  retryableErrorCodes?: readonly string[];
  /**
   * Retry thrown failures (timeouts, resets) as well as retryable statuses.
   * Turn off for non-idempotent requests the server may already have applied.
   */
  retryOnNetworkError?: boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export type FetchWithRetryOptions = RequestInit & {
  retry?: RetryOptions;
  /** Per-attempt timeout in milliseconds */
  timeout?: number;
};

/**
* Failure of one attempt that may succeed when repeated
*/
export class RetryableError extends Error {
  public readonly retryAfterMs: number | undefined;
  constructor(
    message: string,
    public readonly status?: number,
    public readonly code?: string,
    retryAfterMs?: number | undefined
  ) {
    super(message);
    this.name = 'RetryableError';
    this.retryAfterMs = retryAfterMs;
  }
}

function getErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  // undici reports network failures as TypeError('fetch failed') with the errno on `cause`
  const { cause } = error;
  if (cause instanceof Error) {
    return getErrorCode(cause);
  }
  return undefined;
}

function isRetryableError(
  error: unknown,
  statuses: readonly number[],
  errorCodes: readonly string[],
  retryOnNetworkError: boolean
): boolean {
  if (error instanceof RetryableError && error.status !== undefined) {
    return statuses.includes(error.status);
  }

  if (!retryOnNetworkError || !(error instanceof Error)) {
    return false;
  }

  const code = getErrorCode(error);
  if (code && errorCodes.includes(code)) {
    return true;
  }

  // Per-attempt timeouts surface as AbortError
  if (error.name === 'AbortError') {
    return true;
  }

  const message = error.message.toLowerCase();
  return (
    message.includes('timeout') ||
    message.includes('network') ||
    message.includes('connection') ||
    message.includes('fetch failed')
  );
}

/**
* Fetch with automatic retry and exponential backoff.
* Non-retryable error statuses are returned to the caller as responses.
*
* @param url - URL to fetch
* @param options - Fetch options with optional retry configuration
* @returns Fetch response
* @throws The last error once retries are exhausted, or the first non-retryable error
*/
export async function fetchWithRetry(
  url: string,
  options: FetchWithRetryOptions = {}
): Promise<Response> {
  const { retry, timeout, ...fetchOptions } = options;
  const maxRetries = retry?.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries;
  const baseDelayMs = retry?.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs;
  const maxDelayMs = retry?.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  const statuses = retry?.retryableStatuses ?? DEFAULT_RETRY_OPTIONS.retryableStatuses;
  const errorCodes = retry?.retryableErrorCodes ?? DEFAULT_RETRY_OPTIONS.retryableErrorCodes;
  const retryOnNetworkError = retry?.retryOnNetworkError ?? true;

  // Per-attempt AbortController so a timeout on one attempt doesn't abort the next
  const originalSignal = fetchOptions.signal;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (originalSignal?.aborted) {
      throw new Error('Request aborted by caller');
    }

    const attemptController = new AbortController();
    let attemptTimeoutId: NodeJS.Timeout | undefined;

    if (timeout) {
      attemptTimeoutId = setTimeout(() => attemptController.abort(), timeout);
    }

    let abortListener: (() => void) | undefined;
    if (originalSignal) {
      abortListener = () => attemptController.abort();
      originalSignal.addEventListener('abort', abortListener);
    }

    try {
      const response = await fetch(url, {
        ...fetchOptions,
        signal: attemptController.signal,
      });

      if (!response.ok && statuses.includes(response.status)) {
        // Release the connection before the response is dropped
        await response.body?.cancel();
        throw new RetryableError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          undefined,
          parseRetryAfter(response.headers.get('retry-after'))
        );
      }

      return response;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= maxRetries) {
        break;
      }

      if (originalSignal?.aborted || !isRetryableError(error, statuses, errorCodes, retryOnNetworkError)) {
        throw lastError;
      }

      // Server-specified Retry-After wins over exponential backoff
      const serverRetryAfter = lastError instanceof RetryableError ? lastError.retryAfterMs : undefined;
      const delayMs = Math.min(
        serverRetryAfter ?? calculateBackoffDelay(attempt, baseDelayMs, maxDelayMs),
        maxDelayMs
      );

      logger.warn(`Retry attempt ${attempt + 1}/${maxRetries} after ${delayMs}ms`, {
        delayMs,
        reason: lastError.message,
      });

      retry?.onRetry?.(attempt + 1, lastError, delayMs);

      await sleep(delayMs);
    } finally {
      if (attemptTimeoutId) {
        clearTimeout(attemptTimeoutId);
      }
      if (originalSignal && abortListener) {
        originalSignal.removeEventListener('abort', abortListener);
      }
    }
  }

  throw lastError ?? new Error(`Fetch failed after ${maxRetries} retries`);
}

export { DEFAULT_RETRY_OPTIONS };
