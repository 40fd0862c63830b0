/**
 * Configuration Tests
 *
 * Environment helpers, the environment schema, and loadConfig().
 */

import { describe, it, expect } from 'vitest';

import { ValidationError } from '@errors';

import { isPlaceholder, parseIntEnv, splitList } from '../env';
import { envSchema } from '../schema';
import { loadConfig } from '../index';

describe('Environment Utilities', () => {
  describe('isPlaceholder', () => {
    it('should flag empty and very short values', () => {
      expect(isPlaceholder(undefined)).toBe(true);
      expect(isPlaceholder('')).toBe(true);
      expect(isPlaceholder('ab')).toBe(true);
    });

    it('should flag template values', () => {
      expect(isPlaceholder('your_api_key')).toBe(true);
      expect(isPlaceholder('PASTE_YOUR_DATABASE_ID_HERE')).toBe(true);
      expect(isPlaceholder('changeme')).toBe(true);
      expect(isPlaceholder('test')).toBe(true);
    });

    it('should accept real-looking values', () => {
      expect(isPlaceholder('test-secret')).toBe(false);
      expect(isPlaceholder('a1b2c3d4e5f6')).toBe(false);
    });
  });

  describe('parseIntEnv', () => {
    it('should parse a trimmed integer', () => {
      expect(parseIntEnv('X', 5, { X: ' 42 ' })).toBe(42);
    });

    it('should fall back on missing, blank and fractional values', () => {
      expect(parseIntEnv('X', 5, {})).toBe(5);
      expect(parseIntEnv('X', 5, { X: '   ' })).toBe(5);
      expect(parseIntEnv('X', 5, { X: '4.2' })).toBe(5);
    });
  });

  describe('splitList', () => {
    it('should trim entries and drop empty ones', () => {
      expect(splitList(' a, ,b ')).toEqual(['a', 'b']);
    });
  });
});

describe('envSchema', () => {
  it('should parse an empty environment with defaults', () => {
    const result = envSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.NODE_ENV).toBe('production');
      expect(result.data.GEMINI_MODEL).toBe('gemini-2.5-pro');
      expect(result.data.GEMINI_TIMEOUT_MS).toBe(300000);
      expect(result.data.NOTIFY_ENABLED).toBe(false);
      expect(result.data.EMAIL_TO).toEqual([]);
    }
  });

  it('should coerce numeric variables', () => {
    const result = envSchema.safeParse({ SMTP_PORT: '2525', GEMINI_TIMEOUT_MS: '60000' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.SMTP_PORT).toBe(2525);
      expect(result.data.GEMINI_TIMEOUT_MS).toBe(60000);
    }
  });

  it('should reject an unknown log level', () => {
    expect(envSchema.safeParse({ LOG_LEVEL: 'verbose' }).success).toBe(false);
  });

  it('should reject a model name with a path separator', () => {
    expect(envSchema.safeParse({ GEMINI_MODEL: '../models/x' }).success).toBe(false);
  });

  it('should accept 1 and 0 as boolean flags', () => {
    const result = envSchema.safeParse({ SMTP_SECURE: '1' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.SMTP_SECURE).toBe(true);
    }
  });
});

describe('loadConfig', () => {
  const notifyEnv = {
    NOTIFY_ENABLED: 'true',
    EMAIL_FROM: 'digest@example.org',
    EMAIL_TO: 'a@example.org, b@example.org',
    SMTP_HOST: 'smtp.example.org',
    SMTP_USER: 'mailer',
    SMTP_PASS: 'test-password',
  };

  it('should build the typed configuration', () => {
    const env = { ...notifyEnv, NODE_ENV: 'test', GEMINI_MODEL: 'gemini-2.5-flash', NOTION_CONFIG_PATH: '/etc/notion.json' };
    const config = loadConfig(env);

    expect(config).toEqual({
      nodeEnv: 'test',
      serviceName: 'video-digest',
      gemini: { model: 'gemini-2.5-flash', timeoutMs: 300000 },
      notion: { timeoutMs: 30000, configPath: '/etc/notion.json', configJson: undefined },
      email: {
        enabled: true,
        from: 'digest@example.org',
        to: ['a@example.org', 'b@example.org'],
        smtp: {
          host: 'smtp.example.org',
          port: 587,
          secure: false,
          user: 'mailer',
          pass: 'test-password',
        },
      },
      env,
    });
  });

  it('should require the mail settings when notifications are enabled', () => {
    expect(() => loadConfig({ NOTIFY_ENABLED: 'true' })).toThrow(
      'Validation failed: EMAIL_FROM: Required when NOTIFY_ENABLED is set, ' +
      'EMAIL_TO: Required when NOTIFY_ENABLED is set, ' +
      'SMTP_HOST: Required when NOTIFY_ENABLED is set'
    );
  });

  it('should reject placeholder API keys with issue details', () => {
    expect.assertions(2);
    try {
      loadConfig({ GEMINI_API_KEY: 'your_api_key' });
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.details).toEqual([
          { path: ['GEMINI_API_KEY'], message: 'Value appears to be a placeholder', code: 'custom' },
        ]);
      }
    }
  });

  it('should reject an invalid recipient address', () => {
    expect(() => loadConfig({ EMAIL_TO: 'not-an-address' })).toThrow(ValidationError);
  });
});
