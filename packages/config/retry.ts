/**
 * Retry Configuration
 *
 * Retry settings for calls to the summarization and note services.
 */

import { parseIntEnv } from './env';

export const retryConfig = {
  /** Maximum retry attempts */
  maxRetries: parseIntEnv('RETRY_MAX_RETRIES', 3),

  /** Base delay in milliseconds */
  baseDelayMs: parseIntEnv('RETRY_BASE_DELAY_MS', 1000),

  /** Maximum delay in milliseconds */
  maxDelayMs: parseIntEnv('RETRY_MAX_DELAY_MS', 30000),

  /** HTTP status codes that trigger retry */
  retryableStatuses: [408, 429, 500, 502, 503, 504] as readonly number[],

  /** Error codes that trigger retry */
  retryableErrorCodes: ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'ECONNABORTED'] as readonly string[],
} as const;

// Fail at load time rather than retrying in a tight loop or not at all
(function validateRetryConfig() {
  if (retryConfig.maxRetries < 0) {
    throw new Error('RETRY_MAX_RETRIES must be >= 0');
  }
  if (retryConfig.baseDelayMs <= 0) {
    throw new Error('RETRY_BASE_DELAY_MS must be > 0');
  }
  if (retryConfig.baseDelayMs > retryConfig.maxDelayMs) {
    throw new Error('RETRY_BASE_DELAY_MS must be <= RETRY_MAX_DELAY_MS');
  }
})();
