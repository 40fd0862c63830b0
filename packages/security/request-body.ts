/**
 * Summarize Request Body Validation
 *
 * Structural gate in front of the YouTube URL validator: the payload must be a
 * JSON object carrying a non-empty `url`. The URL itself is not inspected here.
 */

import { InvalidYouTubeUrlError, ValidationError } from '@errors';

import { isJsonContentType } from './input-validator';

/** A request body that has passed the structural check */
export interface SummarizeRequestBody {
  url: unknown;
  [key: string]: unknown;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate the structure of a summarize request body.
 *
 * @throws InvalidYouTubeUrlError when the body is not an object, lacks `url`,
 * or `url` is falsy
 */
export function validateRequestBody(body: unknown): SummarizeRequestBody {
  if (!isPlainObject(body)) {
    throw new InvalidYouTubeUrlError('Request body must be a JSON object');
  }

  if (!('url' in body)) {
    throw new InvalidYouTubeUrlError("Missing 'url' field in request body");
  }

  const { url } = body;
  if (!url) {
    throw new InvalidYouTubeUrlError("'url' field cannot be empty");
  }

  return { ...body, url };
}

/**
 * Parse a raw request payload as JSON.
 *
 * @param raw - Raw body text
 * @param contentType - Content-Type header, checked when present
 * @throws ValidationError on a non-JSON content type or unparsable text
 */
export function parseJsonBody(raw: string, contentType?: string): unknown {
  if (contentType !== undefined && !isJsonContentType(contentType)) {
    throw new ValidationError('Content-Type must be application/json');
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ValidationError('Invalid JSON format', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}
