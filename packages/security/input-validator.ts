/**
 * Input Validation Utilities
 * Character-based checks on untrusted strings (no backtracking regex).
 */

// ============================================================================
// URL/URI Validation
// ============================================================================

const HEX_DIGITS = '0123456789abcdefABCDEF';

function isHexDigit(char: string | undefined): boolean {
  return char !== undefined && char.length === 1 && HEX_DIGITS.includes(char);
}

/**
 * Validate URL percent-encoding without regex.
 * Every `%` must be followed by two hex digits.
 *
 * @param input - Input to check
 * @returns True if valid URL encoding
 */
export function isValidUrlEncoding(input: string): boolean {
  for (let i = 0; i < input.length; i++) {
    if (input[i] !== '%') continue;

    if (!isHexDigit(input[i + 1]) || !isHexDigit(input[i + 2])) {
      return false;
    }

    i += 2;
  }

  return true;
}

// ============================================================================
// Content-Type Validation
// ============================================================================

/**
 * Extract the media type from a Content-Type header value, lower-cased and
 * without parameters.
 * @returns Media type or null if the value is malformed
 */
export function getNormalizedContentType(contentType: string): string | null {
  const mediaType = contentType.split(';')[0]?.trim().toLowerCase();
  if (!mediaType) return null;

  const parts = mediaType.split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) return null;

  return mediaType;
}

/**
 * Check whether a Content-Type header declares a JSON payload.
 */
export function isJsonContentType(contentType: string | undefined): boolean {
  if (!contentType) return false;
  const mediaType = getNormalizedContentType(contentType);
  return mediaType === 'application/json' || (mediaType?.endsWith('+json') ?? false);
}
