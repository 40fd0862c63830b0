/**
 * Environment Validation Schema
 *
 * Zod-based schema providing type-safe validation for all environment variables.
 * Used by loadConfig() for fail-fast boot validation.
 *
 * @module @config/schema
 */

import { z } from 'zod';

import { isPlaceholder, splitList } from './env';

// ============================================================================
// Reusable validators
// ============================================================================

const nonPlaceholder = z.string().min(3).refine(
  (val) => !isPlaceholder(val),
  { message: 'Value appears to be a placeholder' }
);

const secretString = nonPlaceholder.pipe(z.string().min(8));

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((val) => val === 'true' || val === '1');

const positiveInt = (defaultValue: number) =>
  z.coerce.number().int().positive().default(defaultValue);

const emailList = z
  .string()
  .optional()
  .transform((val) => (val ? splitList(val) : []))
  .pipe(z.array(z.string().email()));

// ============================================================================
// Environment schema
// ============================================================================

export const envSchema = z.object({
  // -- Core --
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  SERVICE_NAME: z.string().min(2).regex(/^[a-zA-Z0-9_-]+$/, {
    message: 'SERVICE_NAME must contain only alphanumeric characters, hyphens, and underscores',
  }).default('video-digest'),

  // -- Summarization (Gemini) --
  GEMINI_API_KEY: secretString.optional(),
  GEMINI_MODEL: z.string().min(1).regex(/^[a-zA-Z0-9._-]+$/, {
    message: 'GEMINI_MODEL must be a bare model name',
  }).default('gemini-2.5-pro'),
  GEMINI_TIMEOUT_MS: positiveInt(300000),

  // -- Notes (Notion) --
  NOTION_API_KEY: secretString.optional(),
  NOTION_CONFIG_PATH: z.string().min(1).optional(),
  NOTION_CONFIG_JSON: z.string().min(2).optional(),
  NOTION_TIMEOUT_MS: positiveInt(30000),

  // -- Email --
  NOTIFY_ENABLED: booleanFlag,
  EMAIL_FROM: z.string().email().optional(),
  EMAIL_TO: emailList,
  SMTP_HOST: z.string().min(1).optional(),
  SMTP_PORT: positiveInt(587),
  SMTP_USER: z.string().min(1).optional(),
  SMTP_PASS: z.string().min(1).optional(),
  SMTP_SECURE: booleanFlag,
}).superRefine((data, ctx) => {
  if (!data.NOTIFY_ENABLED) return;

  if (!data.EMAIL_FROM) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['EMAIL_FROM'], message: 'Required when NOTIFY_ENABLED is set' });
  }
  if (data.EMAIL_TO.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['EMAIL_TO'], message: 'Required when NOTIFY_ENABLED is set' });
  }
  if (!data.SMTP_HOST) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SMTP_HOST'], message: 'Required when NOTIFY_ENABLED is set' });
  }
});

export type EnvConfig = z.infer<typeof envSchema>;
