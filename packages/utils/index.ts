/**
 * Utility exports
 */

export {
  fetchWithRetry,
  RetryableError,
  DEFAULT_RETRY_OPTIONS,
  type RetryOptions,
  type FetchWithRetryOptions,
} from './fetchWithRetry';
