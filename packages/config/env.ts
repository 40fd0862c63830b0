/**
 * Environment Variable Utilities
 *
 * Provides safe parsing and validation of environment variables.
 * Every helper reads from `process.env` unless an explicit source is given.
 */

export type EnvSource = Record<string, string | undefined>;

// `^test$` rather than `\btest\b`: values such as "test-secret" are real test fixtures
const PLACEHOLDER_PATTERN = /\bplaceholder\b|\byour_|\bxxx\b|\bexample\b|^test$|\bdemo\b|\bfake\b|\bchangeme\b|^PASTE_YOUR_|^\s*$/i;

/**
 * Check if a value is a placeholder
 */
export function isPlaceholder(value: string | undefined): boolean {
  if (!value) return true;
  const trimmed = value.trim();
  if (trimmed.length < 3) return true;
  return PLACEHOLDER_PATTERN.test(trimmed);
}

/**
 * Parse integer environment variable with default.
 * Whitespace-only and non-integer values fall back to the default.
 */
export function parseIntEnv(name: string, defaultValue: number, env: EnvSource = process.env): number {
  const value = env[name];
  if (!value) return defaultValue;
  const trimmed = value.trim();
  if (!trimmed) return defaultValue;
  const parsed = Number(trimmed);
  return Number.isInteger(parsed) ? parsed : defaultValue;
}

/**
 * Split a delimited list, trimming entries and dropping empty ones
 */
export function splitList(value: string, separator = ','): string[] {
  return value.split(separator).map(s => s.trim()).filter(Boolean);
}
