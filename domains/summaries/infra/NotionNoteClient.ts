import { z } from 'zod';

import type { ContentSection, NotionConfig, NotionConfigLoader, StaticProperty } from '@config';
import { AppError, NoteServiceError, getErrorMessage, toError } from '@errors';
import { getLogger } from '@kernel/logger';
import { fetchWithRetry, type RetryOptions } from '@utils';

import type { NoteClient } from '../application/ports/NoteClient';
import type { SecretProvider } from '../application/ports/SecretProvider';
import {
  UNTITLED_VIDEO,
  isRawSummary,
  type StructuredSummary,
  type VideoSummary,
} from '../domain/VideoSummary';

const logger = getLogger('notion');

export const NOTION_API_BASE_URL = 'https://api.notion.com/v1';
export const NOTION_API_VERSION = '2022-06-28';

/** Notion rejects multi_select option names longer than this */
export const MAX_TAG_LENGTH = 100;
/** Notion rejects rich text content longer than this */
export const MAX_TEXT_LENGTH = 2000;

/**
* Page creation is not idempotent: a timed-out request may still have created
* the page. Only rate limiting, which Notion answers before applying, is retried.
*/
const CREATE_PAGE_RETRY: RetryOptions = {
  retryableStatuses: [429],
  retryOnNetworkError: false,
};

export interface NotionClientOptions {
  timeoutMs: number;
  baseUrl?: string | undefined;
  retry?: RetryOptions | undefined;
}

// ============================================================================
// Page model
// ============================================================================

export interface RichText {
  type: 'text';
  text: { content: string };
}

export type PropertyValue =
  | { title: RichText[] }
  | { rich_text: RichText[] }
  | { multi_select: Array<{ name: string }> }
  | { url: string }
  | { select: { name: string } };

export type PageProperties = Record<string, PropertyValue>;

export type Block =
  | { object: 'block'; type: 'heading_2'; heading_2: { rich_text: RichText[] } }
  | { object: 'block'; type: 'paragraph'; paragraph: { rich_text: RichText[] } }
  | { object: 'block'; type: 'bulleted_list_item'; bulleted_list_item: { rich_text: RichText[] } };

const richText = (content: string): RichText[] => [{ type: 'text', text: { content } }];

const heading = (content: string): Block => ({
  object: 'block', type: 'heading_2', heading_2: { rich_text: richText(content) },
});

const paragraph = (content: string): Block => ({
  object: 'block', type: 'paragraph', paragraph: { rich_text: richText(content.slice(0, MAX_TEXT_LENGTH)) },
});

const bullet = (content: string): Block => ({
  object: 'block', type: 'bulleted_list_item', bulleted_list_item: { rich_text: richText(content.slice(0, MAX_TEXT_LENGTH)) },
});

function targets(mapping: string | string[] | undefined, fallback: string): string[] {
  if (mapping === undefined) return [fallback];
  return typeof mapping === 'string' ? [mapping] : mapping;
}

/**
* Cut a tag to the length limit, at the last word boundary when there is one
*/
export function truncateTag(tag: string, maxLength = MAX_TAG_LENGTH): string {
  const value = tag.trim();
  if (value.length <= maxLength) return value;

  let truncated = value.slice(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');
  if (lastSpace > 0) {
    truncated = truncated.slice(0, lastSpace);
  }
  return truncated.trim() || value.slice(0, maxLength).trim();
}

function staticSelects(staticProperties: Record<string, StaticProperty>): PageProperties {
  const properties: PageProperties = {};
  for (const { property_name, value } of Object.values(staticProperties)) {
    properties[property_name] = { select: { name: value } };
  }
  return properties;
}

/**
* Database properties for a summary page.
* The first title target is the page title; further targets get the title as rich text.
*/
export function buildPageProperties(summary: VideoSummary, config: NotionConfig): PageProperties {
  const mapping = config.property_mapping;
  const properties: PageProperties = {};

  const title = isRawSummary(summary) ? UNTITLED_VIDEO : summary.title || UNTITLED_VIDEO;
  targets(mapping.title, 'Title').forEach((name, index) => {
    properties[name] = index === 0 ? { title: richText(title) } : { rich_text: richText(title) };
  });

  if (!isRawSummary(summary)) {
    const tags = summary.tags.filter(Boolean).map(tag => ({ name: truncateTag(tag) }));
    for (const name of targets(mapping.tags, 'Tags')) {
      properties[name] = { multi_select: tags };
    }

    if (summary.url) {
      for (const name of targets(mapping.url, 'URL')) {
        properties[name] = { url: summary.url };
      }
    }
  }

  return { ...properties, ...staticSelects(config.static_properties) };
}

function headingFor(key: string, section: ContentSection): string {
  if (section.heading) return section.heading;
  return key
    .replace(/_/g, ' ')
    .replace(/[A-Za-z]+/g, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function sectionBlocks(summary: StructuredSummary, field: string): Block[] {
  switch (field) {
    case 'title':
    case 'url':
    case 'brief_summary':
      return summary[field] ? [paragraph(summary[field])] : [];
    case 'tags':
    case 'summary_bullets':
      return summary[field].filter(Boolean).map(bullet);
    case 'tools_and_technologies':
      return summary.tools_and_technologies
        .map(({ tool, purpose }) => (purpose ? `${tool}: ${purpose}` : tool))
        .filter(Boolean)
        .map(bullet);
    default:
      return [];
  }
}

/**
* Page body: one heading per configured section followed by its content.
* Sections whose field is unknown or empty are left out. A summary that could
* not be parsed is stored as its raw text.
*/
export function buildContentBlocks(summary: VideoSummary, sections: Record<string, ContentSection>): Block[] {
  if (isRawSummary(summary)) {
    return [heading('Raw Response'), paragraph(summary.raw_response), paragraph(summary.note)];
  }

  const blocks: Block[] = [];
  for (const [key, section] of Object.entries(sections)) {
    const content = sectionBlocks(summary, section.field);
    if (content.length === 0) continue;
    blocks.push(heading(headingFor(key, section)), ...content);
  }
  return blocks;
}

// ============================================================================
// Client
// ============================================================================

const CreatePageResponseSchema = z.object({
  id: z.string().optional(),
  url: z.string().optional(),
});

const NotionErrorSchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
});

async function describeFailure(response: Response): Promise<string> {
  const fallback = `HTTP ${response.status}`;
  const text = await response.text().catch(() => '');

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return fallback;
  }

  const parsed = NotionErrorSchema.safeParse(body);
  return parsed.success && parsed.data.message ? parsed.data.message : fallback;
}

/**
* Note client that creates one page per summary in the configured Notion database
*/
export class NotionNoteClient implements NoteClient {
  private apiKey: string | null = null;

  constructor(
    private readonly secrets: SecretProvider,
    private readonly configLoader: NotionConfigLoader,
    private readonly options: NotionClientOptions
  ) {}

  async createPage(summary: VideoSummary): Promise<string> {
    const apiKey = await this.getApiKey();
    const config = await this.loadConfig();

    const properties = buildPageProperties(summary, config);
    const children = buildContentBlocks(summary, config.content_sections);

    logger.info('Creating Notion page', {
      title: isRawSummary(summary) ? UNTITLED_VIDEO : summary.title,
      blocks: children.length,
    });

    try {
      const response = await fetchWithRetry(`${this.options.baseUrl ?? NOTION_API_BASE_URL}/pages`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
          'Notion-Version': NOTION_API_VERSION,
        },
        body: JSON.stringify({
          parent: { database_id: config.database_id },
          properties,
          children,
        }),
        timeout: this.options.timeoutMs,
        retry: { ...this.options.retry, ...CREATE_PAGE_RETRY },
      });

      if (!response.ok) {
        const reason = await describeFailure(response);
        throw new NoteServiceError(`Failed to create Notion page: ${reason}`, undefined, { status: response.status });
      }

      const parsed = CreatePageResponseSchema.safeParse(await response.json());
      const pageUrl = parsed.success ? parsed.data.url : undefined;
      if (!pageUrl) {
        throw new NoteServiceError('No URL returned from Notion API');
      }

      logger.info('Created Notion page', { pageUrl });
      return pageUrl;
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new NoteServiceError(`Failed to create Notion page: ${getErrorMessage(error)}`, toError(error));
    }
  }

  private async loadConfig(): Promise<NotionConfig> {
    try {
      return await this.configLoader.load();
    } catch (error) {
      throw new NoteServiceError(getErrorMessage(error), toError(error));
    }
  }

  private async getApiKey(): Promise<string> {
    if (!this.apiKey) {
      this.apiKey = await this.secrets.getSecret('NOTION-API-KEY');
    }
    return this.apiKey;
  }
}
