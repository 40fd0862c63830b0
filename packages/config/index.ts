/**
 * Shared Configuration Package
 *
 * Environment variable validation and configuration utilities.
 *
 * @example
 * ```typescript
 * import { loadConfig } from '@config';
 *
 * // Validate at startup
 * const config = loadConfig();
 *
 * // Use configuration
 * const timeout = config.gemini.timeoutMs;
 * ```
 *
 * @module @config
 */

import { ValidationError } from '@errors';

import type { EnvSource } from './env';
import { envSchema } from './schema';

// ============================================================================
// Environment Utilities
// ============================================================================
export {
  isPlaceholder,
  parseIntEnv,
  splitList,
  type EnvSource,
} from './env';

// ============================================================================
// Environment Validation Schema
// ============================================================================
export { envSchema, type EnvConfig } from './schema';

// ============================================================================
// Retry Configuration
// ============================================================================
export { retryConfig } from './retry';

// ============================================================================
// Note Service Configuration
// ============================================================================
export {
  NotionConfigSchema,
  NotionConfigLoader,
  type NotionConfig,
  type NotionConfigSource,
  type ContentSection,
  type StaticProperty,
} from './notion';

// ============================================================================
// Application Configuration
// ============================================================================

export interface SmtpConfig {
  host: string | undefined;
  port: number;
  secure: boolean;
  user: string | undefined;
  pass: string | undefined;
}

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  serviceName: string;
  gemini: {
    model: string;
    timeoutMs: number;
  };
  notion: {
    timeoutMs: number;
    configPath: string | undefined;
    configJson: string | undefined;
  };
  email: {
    enabled: boolean;
    from: string | undefined;
    to: string[];
    smtp: SmtpConfig;
  };
  /** Source the secret provider reads API keys from */
  env: EnvSource;
}

/**
 * Validate the environment and build the typed application configuration.
 *
 * @throws ValidationError listing every invalid variable
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw ValidationError.fromZodIssues(result.error.issues);
  }

  const data = result.data;
  return {
    nodeEnv: data.NODE_ENV,
    serviceName: data.SERVICE_NAME,
    gemini: {
      model: data.GEMINI_MODEL,
      timeoutMs: data.GEMINI_TIMEOUT_MS,
    },
    notion: {
      timeoutMs: data.NOTION_TIMEOUT_MS,
      configPath: data.NOTION_CONFIG_PATH,
      configJson: data.NOTION_CONFIG_JSON,
    },
    email: {
      enabled: data.NOTIFY_ENABLED,
      from: data.EMAIL_FROM,
      to: data.EMAIL_TO,
      smtp: {
        host: data.SMTP_HOST,
        port: data.SMTP_PORT,
        secure: data.SMTP_SECURE,
        user: data.SMTP_USER,
        pass: data.SMTP_PASS,
      },
    },
    env,
  };
}
