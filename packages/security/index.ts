/**
 * Security Package
 * YouTube URL validation, request body checks, and input validation utilities
 */

// YouTube URL validation
export {
  ALLOWED_YOUTUBE_HOSTS,
  ALLOWED_EXTRA_PARAMS,
  CANONICAL_HOST,
  VIDEO_ID_PATTERN,
  parseYouTubeUrl,
  validateYouTubeUrl,
  safeValidateYouTubeUrl,
  splitUrl,
  YouTubeUrlSchema,
  type ParsedYouTubeUrl,
  type UrlComponents,
  type YouTubeUrlValidationResult,
} from './youtube-url';

// Request body validation
export {
  validateRequestBody,
  parseJsonBody,
  type SummarizeRequestBody,
} from './request-body';

// Input validation
export {
  isValidUrlEncoding,
  getNormalizedContentType,
  isJsonContentType,
} from './input-validator';
