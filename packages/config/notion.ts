/**
 * Note Service Configuration
 *
 * Describes the target Notion database: its id, how summary fields map onto
 * database properties, fixed select values set on every page, and which
 * summary fields become sections of the page body.
 *
 * Loaded from inline JSON (NOTION_CONFIG_JSON) or, failing that, from a JSON
 * file (NOTION_CONFIG_PATH). The first successful load is cached on the loader.
 */

import { promises as fs } from 'fs';

import { z } from 'zod';

import { ConfigurationError, ValidationError, getErrorMessage } from '@errors';
import { getLogger } from '@kernel/logger';

import { isPlaceholder } from './env';

const logger = getLogger('config:notion');

// ============================================================================
// Schema
// ============================================================================

/** One property name, or several that receive the same value */
const PropertyTargetSchema = z.union([
  z.string().min(1),
  z.array(z.string().min(1)).min(1),
]);

const StaticPropertySchema = z.object({
  property_name: z.string().min(1),
  value: z.string().min(1),
});

const ContentSectionSchema = z.object({
  field: z.string().min(1),
  heading: z.string().min(1).optional(),
});

export const NotionConfigSchema = z.object({
  database_id: z.string().min(1),
  database_name: z.string().optional(),
  property_mapping: z.object({
    title: PropertyTargetSchema.optional(),
    tags: PropertyTargetSchema.optional(),
    url: PropertyTargetSchema.optional(),
  }).default({}),
  static_properties: z.record(StaticPropertySchema).default({}),
  content_sections: z.record(ContentSectionSchema).default({}),
});

export type NotionConfig = z.infer<typeof NotionConfigSchema>;
export type StaticProperty = z.infer<typeof StaticPropertySchema>;
export type ContentSection = z.infer<typeof ContentSectionSchema>;

export interface NotionConfigSource {
  /** Inline JSON document, tried first */
  configJson?: string | undefined;
  /** Path to a JSON file, tried when inline JSON is absent or unreadable */
  configPath?: string | undefined;
}

// ============================================================================
// Loader
// ============================================================================

function parseJson(text: string, origin: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    logger.error('Invalid JSON in Notion configuration', undefined, { origin, reason: getErrorMessage(error) });
    return undefined;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class NotionConfigLoader {
  private cache: NotionConfig | null = null;

  constructor(private readonly source: NotionConfigSource) {}

  /**
   * Load and validate the configuration, reusing a cached copy when present.
   *
   * @throws ConfigurationError when no source yields a document or the
   * database id is missing or a placeholder
   * @throws ValidationError when the document does not match the schema
   */
  async load(): Promise<NotionConfig> {
    if (this.cache) {
      logger.debug('Using cached Notion configuration');
      return this.cache;
    }

    let raw: unknown;
    if (this.source.configJson) {
      raw = parseJson(this.source.configJson, 'NOTION_CONFIG_JSON');
    }
    if (raw === undefined && this.source.configPath) {
      raw = await this.readFile(this.source.configPath);
    }

    if (raw === undefined || raw === null) {
      throw new ConfigurationError(
        'Notion configuration not found. Set NOTION_CONFIG_JSON or NOTION_CONFIG_PATH.'
      );
    }

    const databaseId = typeof raw === 'object' && 'database_id' in raw ? raw.database_id : undefined;
    if (typeof databaseId !== 'string' || isPlaceholder(databaseId)) {
      throw new ConfigurationError('database_id not configured in Notion configuration');
    }

    const result = NotionConfigSchema.safeParse(raw);
    if (!result.success) {
      throw ValidationError.fromZodIssues(result.error.issues);
    }

    this.cache = result.data;
    logger.info('Notion config loaded', { database: result.data.database_name ?? 'Unknown' });
    return result.data;
  }

  /** Drop the cached configuration so the next load reads the source again */
  clearCache(): void {
    this.cache = null;
    logger.debug('Notion configuration cache cleared');
  }

  private async readFile(path: string): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        logger.warn('Notion config file not found', { path });
        return undefined;
      }
      throw new ConfigurationError(`Failed to read Notion configuration: ${getErrorMessage(error)}`);
    }
    return parseJson(text, path);
  }
}
