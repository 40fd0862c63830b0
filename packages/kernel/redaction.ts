/**
 * Sensitive Data Redaction Engine
 *
 * Field-name and value-pattern redaction for all logging and for the
 * request data captured into failure reports. Keeps API keys for the
 * summarization and note services out of log output.
 */

// Patterns for detecting sensitive fields (by key name)
const SENSITIVE_FIELD_PATTERNS: readonly RegExp[] = [
  /^password$/i,
  /^passwd$/i,
  /^secret$/i,
  /^token$/i,
  /^api[_-]?key$/i,
  /^apikey$/i,
  /^auth[_-]?token$/i,
  /^access[_-]?token$/i,
  /^private[_-]?key$/i,
  /^client[_-]?secret$/i,
  /^jwt$/i,
  /^bearer$/i,
  /^authorization$/i,
  /^cookie$/i,
  /^connection[_-]?string$/i,
  /_key$/i,
  /_secret$/i,
  /_token$/i,
  /_password$/i,
  /_pass$/i,
];

// Patterns for detecting sensitive values (by content)
const SENSITIVE_VALUE_PATTERNS: readonly RegExp[] = [
  /^AIza[0-9A-Za-z_-]{35}$/,        // Google API key
  /^secret_[A-Za-z0-9]{32,}$/,      // Notion internal integration token
  /^ntn_[A-Za-z0-9]{32,}$/,         // Notion integration token (new prefix)
  /^[a-zA-Z0-9_-]+\.eyJ/,           // JWT token
  /^Bearer\s+[a-zA-Z0-9_.-]+/,      // Bearer token
  /^Basic\s+[a-zA-Z0-9=]+$/,        // Basic auth
  /^-----BEGIN (RSA |EC |OPENSSH )?PRIVATE KEY-----/, // PEM keys
];

/** Request headers that never reach a log line or a failure report */
const SENSITIVE_HEADERS: readonly string[] = [
  'authorization',
  'cookie',
  'set-cookie',
  'x-api-key',
  'x-functions-key',
  'x-ms-client-principal',
  'x-auth-token',
];

/**
 * Check if a field name indicates sensitive data
 */
export function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some(pattern => pattern.test(fieldName));
}

/**
 * Check if a value looks like sensitive data
 */
export function isSensitiveValue(value: unknown): boolean {
  if (typeof value !== 'string') {
    return false;
  }
  return SENSITIVE_VALUE_PATTERNS.some(pattern => pattern.test(value));
}

/**
 * Mask a sensitive value, showing only first 2 and last 2 characters
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '****';
  }
  return value.substring(0, 2) + '****' + value.substring(value.length - 2);
}

/** Type for sanitized output */
export type SanitizedData =
  | string
  | number
  | boolean
  | null
  | undefined
  | SanitizedData[]
  | { [key: string]: SanitizedData };

/**
 * Recursively sanitize a value for logging.
 * Removes or masks sensitive fields and values.
 */
export function sanitizeForLogging(
  data: unknown,
  options: {
    depth?: number;
    maxDepth?: number;
    redactKeys?: string[];
  } = {}
): SanitizedData {
  const maxDepth = options.maxDepth ?? 10;
  const currentDepth = options.depth ?? 0;
  const redactKeys = options.redactKeys ?? [];

  if (currentDepth > maxDepth) {
    return '[Max Depth Exceeded]';
  }

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    return isSensitiveValue(data) ? maskValue(data) : data;
  }

  if (typeof data === 'number' || typeof data === 'boolean') {
    return data;
  }

  if (typeof data === 'function') {
    return '[Function]';
  }

  if (typeof data === 'symbol') {
    return '[Symbol]';
  }

  if (typeof data === 'bigint') {
    return data.toString();
  }

  if (data instanceof Date) {
    return data.toISOString();
  }

  if (data instanceof Error) {
    return {
      name: data.name,
      message: sanitizeErrorMessage(data),
      stack: process.env['NODE_ENV'] === 'development' ? data.stack : undefined,
    };
  }

  if (Array.isArray(data)) {
    return data.map(item =>
      sanitizeForLogging(item, { ...options, depth: currentDepth + 1 })
    );
  }

  const sanitized: Record<string, SanitizedData> = {};
  for (const [key, value] of Object.entries(data)) {
    if (isSensitiveField(key) || redactKeys.includes(key)) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = sanitizeForLogging(value, { ...options, depth: currentDepth + 1 });
    }
  }

  return sanitized;
}

/**
 * Sanitize HTTP headers for logging and failure reports.
 * Header values are replaced wholesale; names are matched case-insensitively.
 */
export function sanitizeHeaders(
  headers: Record<string, string | string[] | undefined>
): Record<string, string> {
  const sanitized: Record<string, string> = {};

  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const lowerKey = key.toLowerCase();

    if (SENSITIVE_HEADERS.includes(lowerKey) || isSensitiveField(key)) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = Array.isArray(value) ? value.join(', ') : value;
    }
  }

  return sanitized;
}

/**
 * Sanitize error message to prevent information leakage.
 * Strips API keys, tokens, and credentials from error text.
 */
export function sanitizeErrorMessage(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error';
  }

  let message: string;
  if (error instanceof Error) {
    message = error.message;
  } else if (typeof error === 'string') {
    message = error;
  } else {
    message = String(error);
  }

  const patterns = [
    { pattern: /AIza[0-9A-Za-z_-]{35}/g, replacement: 'AIza***' },
    { pattern: /secret_[A-Za-z0-9]{32,}/g, replacement: 'secret_***' },
    { pattern: /ntn_[A-Za-z0-9]{32,}/g, replacement: 'ntn_***' },
    { pattern: /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g, replacement: '[JWT]' },
    { pattern: /Bearer\s+[a-zA-Z0-9_.-]+/gi, replacement: 'Bearer ***' },
    { pattern: /([?&]key=)[^&\s]+/gi, replacement: '$1***' },
    { pattern: /(smtps?):\/\/[^:@/]+:[^@/]+@/gi, replacement: '$1://***:***@' },
  ];

  for (const { pattern, replacement } of patterns) {
    message = message.replace(pattern, replacement);
  }

  return message;
}
