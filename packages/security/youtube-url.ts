/**
 * YouTube URL Validation and Canonicalization
 *
 * Turns an untrusted string that claims to be a YouTube video URL into the
 * single canonical form `https://www.youtube.com/watch?<sorted-query>`, or
 * rejects it with an InvalidYouTubeUrlError naming the reason.
 *
 * Checks run in a fixed order:
 * 1. non-empty string input
 * 2. pre-parse pattern rejection (traversal, script injection, foreign protocols)
 * 3. embedded credentials before the scheme separator
 * 4. RFC 3986 component split
 * 5. https scheme only
 * 6. literal host allow-list
 * 7. video ID extraction by host variant and path shape
 * 8. video ID format
 * 9. query parameter allow-list with character-class filtering
 * 10. canonical reconstruction with `v` forced to the validated ID
 *
 * Pure and synchronous: no I/O, no shared mutable state.
 */

import { z } from 'zod';

import { InvalidYouTubeUrlError } from '@errors';

import { isValidUrlEncoding } from './input-validator';

// ============================================================================
// Allow-lists and Grammar
// ============================================================================

/** Host variants accepted as YouTube (compared after lower-casing) */
export const ALLOWED_YOUTUBE_HOSTS: ReadonlySet<string> = new Set([
  'youtube.com',
  'www.youtube.com',
  'm.youtube.com',
  'youtu.be',
]);

/** Short-link host; the video ID is the only path segment */
const SHORT_LINK_HOST = 'youtu.be';

/** Host used in every canonical URL */
export const CANONICAL_HOST = 'www.youtube.com';

/**
 * Extra query parameters carried into the canonical URL:
 * time offset, playlist ID, playlist index, start time.
 */
export const ALLOWED_EXTRA_PARAMS: ReadonlySet<string> = new Set(['t', 'list', 'index', 'start']);

/** Video ID: exactly 11 characters of [A-Za-z0-9_-] */
export const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;

/** Values of allow-listed extra parameters */
const SAFE_PARAM_VALUE_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Substrings rejected before any parsing (matched against the lower-cased input).
 * Intentionally coarse: `data:` anywhere in the string is rejected, even inside
 * an otherwise harmless query value.
 */
const MALICIOUS_PATTERNS: readonly string[] = [
  '../',
  './',
  '%2e%2e',
  '%2e%2f',
  '<script',
  'javascript:',
  'data:',
  'file:',
  'ftp:',
];

/** RFC 3986 Appendix B component split */
const URI_COMPONENTS = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/;

// ASCII control characters, whitespace and DEL
// eslint-disable-next-line no-control-regex
const FORBIDDEN_URL_CHARS = /[\u0000- \u007f]/;

// ============================================================================
// Types
// ============================================================================

/** Components of a URL split per RFC 3986, without decoding */
export interface UrlComponents {
  scheme: string;
  authority: string;
  path: string;
  query: string;
}

/** A validated YouTube URL */
export interface ParsedYouTubeUrl {
  videoId: string;
  /** Allow-listed extra query parameters, including `v` */
  params: Readonly<Record<string, string>>;
  canonicalUrl: string;
}

export type YouTubeUrlValidationResult =
  | { ok: true; url: string; videoId: string }
  | { ok: false; error: InvalidYouTubeUrlError };

// ============================================================================
// Structural Parsing
// ============================================================================

/**
 * Split a URL into scheme, authority, path and query per RFC 3986.
 * Scheme and authority are lower-cased; nothing is decoded or normalized.
 * Only scheme, authority and path are checked for forbidden characters and
 * broken escapes; unusable query values are dropped later, not rejected here.
 *
 * @throws Error with a parse message on malformed syntax
 */
export function splitUrl(url: string): UrlComponents {
  const match = URI_COMPONENTS.exec(url);
  if (!match) {
    throw new Error('URL does not match RFC 3986 grammar');
  }

  const [, scheme = '', authority = '', path = '', query = ''] = match;
  const head = `${scheme}${authority}${path}`;

  if (FORBIDDEN_URL_CHARS.test(head)) {
    throw new Error('URL contains whitespace or control characters');
  }

  if (!isValidUrlEncoding(head)) {
    throw new Error('URL contains malformed percent-encoding');
  }

  const opens = authority.split('[').length - 1;
  const closes = authority.split(']').length - 1;
  if (opens !== closes || opens > 1) {
    throw new Error('Invalid IPv6 URL');
  }

  return {
    scheme: scheme.toLowerCase(),
    authority: authority.toLowerCase(),
    path,
    query,
  };
}

/**
 * Parse a query string into name → values, keeping duplicates in order and
 * dropping blank values.
 */
function parseQuery(query: string): Map<string, string[]> {
  const params = new Map<string, string[]>();
  for (const [name, value] of new URLSearchParams(query)) {
    if (!value) continue;
    const values = params.get(name);
    if (values) {
      values.push(value);
    } else {
      params.set(name, [value]);
    }
  }
  return params;
}

function pathSegments(path: string): string[] {
  return path.replace(/^\/+|\/+$/g, '').split('/');
}

// ============================================================================
// Extraction
// ============================================================================

function extractVideoId(host: string, path: string, query: string): string {
  if (host === SHORT_LINK_HOST) {
    const parts = pathSegments(path);
    if (parts.length === 1 && parts[0]) {
      return parts[0];
    }
    throw new InvalidYouTubeUrlError('Invalid youtu.be URL format. Expected: https://youtu.be/VIDEO_ID');
  }

  if (path.startsWith('/watch')) {
    const videoId = parseQuery(query).get('v')?.[0];
    if (!videoId) {
      throw new InvalidYouTubeUrlError("Missing 'v' parameter in YouTube watch URL");
    }
    return videoId;
  }

  if (path.startsWith('/embed/')) {
    const parts = pathSegments(path);
    const [prefix, videoId] = parts;
    if (parts.length === 2 && prefix === 'embed' && videoId) {
      return videoId;
    }
    throw new InvalidYouTubeUrlError('Invalid YouTube embed URL format');
  }

  throw new InvalidYouTubeUrlError(
    'Invalid YouTube URL format. Expected /watch?v=... or /embed/... path'
  );
}

function collectSafeParams(query: string): Record<string, string> {
  const safe: Record<string, string> = {};
  if (!query) return safe;

  for (const [name, values] of parseQuery(query)) {
    const value = values[0];
    if (ALLOWED_EXTRA_PARAMS.has(name) && value !== undefined && SAFE_PARAM_VALUE_PATTERN.test(value)) {
      safe[name] = value;
    }
  }
  return safe;
}

function buildCanonicalUrl(params: Record<string, string>): string {
  const sorted = Object.keys(params)
    .sort()
    .map((name): [string, string] => [name, params[name] ?? '']);
  return `https://${CANONICAL_HOST}/watch?${new URLSearchParams(sorted).toString()}`;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Validate a raw YouTube URL and return its parts along with the canonical URL.
 *
 * @throws InvalidYouTubeUrlError on any rejection
 */
export function parseYouTubeUrl(raw: unknown): ParsedYouTubeUrl {
  if (typeof raw !== 'string' || !raw.trim()) {
    throw new InvalidYouTubeUrlError('URL must be a non-empty string');
  }

  const url = raw.trim();
  const lowered = url.toLowerCase();

  for (const pattern of MALICIOUS_PATTERNS) {
    if (lowered.includes(pattern)) {
      throw new InvalidYouTubeUrlError(`URL contains potentially malicious pattern: ${pattern}`);
    }
  }

  const separator = url.indexOf('://');
  const beforeScheme = separator === -1 ? url : url.slice(0, separator);
  if (beforeScheme.includes('@')) {
    throw new InvalidYouTubeUrlError('URL must not contain authentication credentials');
  }

  let components: UrlComponents;
  try {
    components = splitUrl(url);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidYouTubeUrlError(`Failed to parse URL: ${reason}`);
  }

  if (components.scheme !== 'https') {
    throw new InvalidYouTubeUrlError('Only HTTPS URLs are allowed. YouTube uses HTTPS.');
  }

  const host = components.authority;
  if (!ALLOWED_YOUTUBE_HOSTS.has(host)) {
    throw new InvalidYouTubeUrlError(
      `Invalid domain '${host}'. Must be one of: ${[...ALLOWED_YOUTUBE_HOSTS].join(', ')}`
    );
  }

  const videoId = extractVideoId(host, components.path, components.query);

  if (!VIDEO_ID_PATTERN.test(videoId)) {
    throw new InvalidYouTubeUrlError(
      `Invalid video ID format: '${videoId}'. Must be 11 alphanumeric characters, underscores, or hyphens.`
    );
  }

  const params = { ...collectSafeParams(components.query), v: videoId };

  return {
    videoId,
    params,
    canonicalUrl: buildCanonicalUrl(params),
  };
}

/**
 * Validate and sanitize a YouTube URL.
 *
 * @example
 * validateYouTubeUrl('https://youtu.be/dQw4w9WgXcQ')
 * // => 'https://www.youtube.com/watch?v=dQw4w9WgXcQ'
 *
 * @throws InvalidYouTubeUrlError on any rejection
 */
export function validateYouTubeUrl(raw: unknown): string {
  return parseYouTubeUrl(raw).canonicalUrl;
}

/**
 * Non-throwing variant of validateYouTubeUrl.
 * Errors other than InvalidYouTubeUrlError are not expected and propagate.
 */
export function safeValidateYouTubeUrl(raw: unknown): YouTubeUrlValidationResult {
  try {
    const parsed = parseYouTubeUrl(raw);
    return { ok: true, url: parsed.canonicalUrl, videoId: parsed.videoId };
  } catch (error) {
    if (error instanceof InvalidYouTubeUrlError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Zod schema that validates a YouTube URL and outputs its canonical form.
 */
export const YouTubeUrlSchema = z.string().transform((val, ctx) => {
  const result = safeValidateYouTubeUrl(val);
  if (!result.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error.message });
    return z.NEVER;
  }
  return result.url;
});
