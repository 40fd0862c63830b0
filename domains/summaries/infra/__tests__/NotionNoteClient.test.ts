/**
 * Notion Note Client Tests
 *
 * Property and block building from the database configuration, tag
 * truncation, and page creation against a stubbed Notion API.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { NotionConfigLoader, type NotionConfig } from '@config';
import { NoteServiceError } from '@errors';

import type { SecretProvider } from '../../application/ports/SecretProvider';
import type { StructuredSummary } from '../../domain/VideoSummary';
import {
  NotionNoteClient,
  buildContentBlocks,
  buildPageProperties,
  truncateTag,
} from '../NotionNoteClient';

vi.mock('@kernel/logger', () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const summary: StructuredSummary = {
  title: 'Event Sourcing Basics',
  tags: ['architecture', 'events'],
  url: 'https://www.youtube.com/watch?v=dQw4w9WgXcQ',
  brief_summary: 'How to store state as a series of events.',
  summary_bullets: ['Events are immutable', '', 'Rebuild state by replay'],
  tools_and_technologies: [
    { tool: 'Kafka', purpose: 'Event log' },
    { tool: 'Postgres', purpose: '' },
  ],
};

const config: NotionConfig = {
  database_id: 'db-0001',
  database_name: 'Videos',
  property_mapping: {
    title: ['Name', 'Video Title'],
    tags: 'Tags',
    url: 'Source',
  },
  static_properties: {
    content_type: { property_name: 'Type', value: 'Video' },
  },
  content_sections: {
    overview: { field: 'brief_summary', heading: 'Overview' },
    key_points: { field: 'summary_bullets' },
    tools_used: { field: 'tools_and_technologies' },
  },
};

const text = (content: string) => [{ type: 'text', text: { content } }];

describe('NotionNoteClient', () => {
  // ============================================================================
  // truncateTag
  // ============================================================================

  describe('truncateTag', () => {
    it('should keep short tags unchanged apart from trimming', () => {
      expect(truncateTag('  typescript  ')).toBe('typescript');
    });

    it('should cut long tags at the last word boundary', () => {
      expect(truncateTag('alpha beta gamma', 12)).toBe('alpha beta');
    });

    it('should cut mid-word when there is no earlier space', () => {
      expect(truncateTag('abcdefghij', 4)).toBe('abcd');
    });

    it('should respect the default limit of 100 characters', () => {
      const tag = `${'a'.repeat(95)} ${'b'.repeat(10)}`;
      expect(truncateTag(tag)).toBe('a'.repeat(95));
    });
  });

  // ============================================================================
  // buildPageProperties
  // ============================================================================

  describe('buildPageProperties', () => {
    it('should map summary fields onto the configured properties', () => {
      expect(buildPageProperties(summary, config)).toEqual({
        'Name': { title: text('Event Sourcing Basics') },
        'Video Title': { rich_text: text('Event Sourcing Basics') },
        'Tags': { multi_select: [{ name: 'architecture' }, { name: 'events' }] },
        'Source': { url: 'https://www.youtube.com/watch?v=dQw4w9WgXcQ' },
        'Type': { select: { name: 'Video' } },
      });
    });

    it('should fall back to the default property names', () => {
      const properties = buildPageProperties(summary, { ...config, property_mapping: {}, static_properties: {} });

      expect(Object.keys(properties)).toEqual(['Title', 'Tags', 'URL']);
    });

    it('should use a placeholder title for raw summaries', () => {
      const properties = buildPageProperties(
        { raw_response: 'free text', note: 'Response was not in expected JSON format' },
        { ...config, static_properties: {} }
      );

      expect(properties).toEqual({
        'Name': { title: text('Untitled Video') },
        'Video Title': { rich_text: text('Untitled Video') },
      });
    });
  });

  // ============================================================================
  // buildContentBlocks
  // ============================================================================

  describe('buildContentBlocks', () => {
    it('should emit a heading and content per configured section', () => {
      const blocks = buildContentBlocks(summary, config.content_sections);

      expect(blocks).toEqual([
        { object: 'block', type: 'heading_2', heading_2: { rich_text: text('Overview') } },
        { object: 'block', type: 'paragraph', paragraph: { rich_text: text('How to store state as a series of events.') } },
        { object: 'block', type: 'heading_2', heading_2: { rich_text: text('Key Points') } },
        { object: 'block', type: 'bulleted_list_item', bulleted_list_item: { rich_text: text('Events are immutable') } },
        { object: 'block', type: 'bulleted_list_item', bulleted_list_item: { rich_text: text('Rebuild state by replay') } },
        { object: 'block', type: 'heading_2', heading_2: { rich_text: text('Tools Used') } },
        { object: 'block', type: 'bulleted_list_item', bulleted_list_item: { rich_text: text('Kafka: Event log') } },
        { object: 'block', type: 'bulleted_list_item', bulleted_list_item: { rich_text: text('Postgres') } },
      ]);
    });

    it('should skip empty and unknown fields', () => {
      const blocks = buildContentBlocks(
        { ...summary, brief_summary: '' },
        { overview: { field: 'brief_summary' }, extra: { field: 'no_such_field' } }
      );

      expect(blocks).toEqual([]);
    });

    it('should cap block content at 2000 characters', () => {
      const blocks = buildContentBlocks(
        { ...summary, brief_summary: 'x'.repeat(2500) },
        { overview: { field: 'brief_summary' } }
      );

      expect(blocks[1]).toEqual({
        object: 'block', type: 'paragraph', paragraph: { rich_text: text('x'.repeat(2000)) },
      });
    });

    it('should store a raw summary as its text', () => {
      const blocks = buildContentBlocks({ raw_response: 'free text', note: 'not json' }, config.content_sections);

      expect(blocks).toEqual([
        { object: 'block', type: 'heading_2', heading_2: { rich_text: text('Raw Response') } },
        { object: 'block', type: 'paragraph', paragraph: { rich_text: text('free text') } },
        { object: 'block', type: 'paragraph', paragraph: { rich_text: text('not json') } },
      ]);
    });
  });

  // ============================================================================
  // createPage
  // ============================================================================

  describe('createPage', () => {
    const fetchMock = vi.fn<typeof fetch>();
    const getSecret = vi.fn<SecretProvider['getSecret']>();
    let client: NotionNoteClient;

    beforeEach(() => {
      fetchMock.mockReset();
      getSecret.mockReset();
      getSecret.mockResolvedValue('test-notion-key');
      vi.stubGlobal('fetch', fetchMock);

      client = new NotionNoteClient(
        { getSecret },
        new NotionConfigLoader({ configJson: JSON.stringify(config) }),
        { timeoutMs: 1000, retry: { maxRetries: 0 } }
      );
    });

    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it('should create the page and return its URL', async () => {
      fetchMock.mockResolvedValueOnce(new Response(
        JSON.stringify({ id: 'page-1', url: 'https://www.notion.so/page-1' }),
        { status: 200 }
      ));

      await expect(client.createPage(summary)).resolves.toBe('https://www.notion.so/page-1');

      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe('https://api.notion.com/v1/pages');
      const headers = new Headers(init?.headers);
      expect(headers.get('authorization')).toBe('Bearer test-notion-key');
      expect(headers.get('notion-version')).toBe('2022-06-28');

      const body: unknown = JSON.parse(String(init?.body));
      expect(body).toMatchObject({
        parent: { database_id: 'db-0001' },
        properties: { Name: { title: text('Event Sourcing Basics') } },
      });
      expect(getSecret).toHaveBeenCalledWith('NOTION-API-KEY');
    });

    it('should fail when the response carries no URL', async () => {
      fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ id: 'page-1' }), { status: 200 }));

      const error = await client.createPage(summary).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NoteServiceError);
      expect(error).toMatchObject({ message: 'No URL returned from Notion API' });
    });

    it('should surface the Notion error message', async () => {
      fetchMock.mockResolvedValueOnce(new Response(
        JSON.stringify({ object: 'error', code: 'validation_error', message: 'Name is not a property that exists.' }),
        { status: 400 }
      ));

      const error = await client.createPage(summary).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NoteServiceError);
      expect(error).toMatchObject({
        message: 'Failed to create Notion page: Name is not a property that exists.',
        details: { status: 400 },
      });
    });

    it('should fall back to the status for non-JSON errors', async () => {
      fetchMock.mockResolvedValueOnce(new Response('Bad Gateway', { status: 404 }));

      await expect(client.createPage(summary)).rejects.toThrow('Failed to create Notion page: HTTP 404');
    });

    it('should not repeat a page creation that timed out', async () => {
      fetchMock.mockImplementation((_url, init) => new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
        });
      }));
      client = new NotionNoteClient(
        { getSecret },
        new NotionConfigLoader({ configJson: JSON.stringify(config) }),
        { timeoutMs: 5, retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 } }
      );

      await expect(client.createPage(summary))
        .rejects.toThrow('Failed to create Notion page: This operation was aborted');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should not repeat a page creation answered with a server error', async () => {
      fetchMock.mockResolvedValue(new Response('upstream down', { status: 503 }));
      client = new NotionNoteClient(
        { getSecret },
        new NotionConfigLoader({ configJson: JSON.stringify(config) }),
        { timeoutMs: 1000, retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 } }
      );

      await expect(client.createPage(summary)).rejects.toThrow('Failed to create Notion page: HTTP 503');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should retry a rate-limited page creation', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response('', { status: 429 }))
        .mockResolvedValueOnce(new Response(
          JSON.stringify({ id: 'page-1', url: 'https://www.notion.so/page-1' }),
          { status: 200 }
        ));
      client = new NotionNoteClient(
        { getSecret },
        new NotionConfigLoader({ configJson: JSON.stringify(config) }),
        { timeoutMs: 1000, retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 } }
      );

      await expect(client.createPage(summary)).resolves.toBe('https://www.notion.so/page-1');
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should wrap configuration errors', async () => {
      client = new NotionNoteClient(
        { getSecret },
        new NotionConfigLoader({ configJson: JSON.stringify({ database_id: 'PASTE_YOUR_DATABASE_ID_HERE' }) }),
        { timeoutMs: 1000 }
      );

      const error = await client.createPage(summary).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NoteServiceError);
      expect(error).toMatchObject({ message: 'database_id not configured in Notion configuration' });
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
