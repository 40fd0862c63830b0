/**
 * Run Capture Tests
 *
 * Log capture scoped to one request id, request and error capture with
 * redaction, and the markdown failure report.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { getLogger } from '@kernel/logger';
import { createRequestContext, runWithContext } from '@kernel/request-context';

import { RunCapture } from '../RunCapture';

const VIDEO_URL = 'https://www.youtube.com/watch?v=dQw4w9WgXcQ';

function fixedClock(start: string) {
  let current = new Date(start);
  return {
    now: () => current,
    set: (iso: string) => {
      current = new Date(iso);
    },
  };
}

describe('RunCapture', () => {
  // ============================================================================
  // Log capture
  // ============================================================================

  describe('log capture', () => {
    const logger = getLogger('capture-test');
    const previousLevel = process.env['LOG_LEVEL'];

    beforeEach(() => {
      process.env['LOG_LEVEL'] = 'info';
    });

    afterEach(() => {
      process.env['LOG_LEVEL'] = previousLevel;
    });

    it('should capture only entries of its own request', async () => {
      const capture = new RunCapture('req-1');
      capture.start();

      await runWithContext(createRequestContext({ requestId: 'req-1' }), async () => {
        logger.info('inside');
        logger.debug('below level');
      });
      logger.info('outside any request');
      await runWithContext(createRequestContext({ requestId: 'req-2' }), async () => {
        logger.warn('another request');
      });

      capture.stop();
      await runWithContext(createRequestContext({ requestId: 'req-1' }), async () => {
        logger.info('after stop');
      });

      expect(capture.getLogs().map(log => [log.level, log.message])).toEqual([
        ['INFO', '[capture-test] inside'],
      ]);
    });

    it('should append the error message to error entries', async () => {
      const capture = new RunCapture('req-3');
      capture.start();

      await runWithContext(createRequestContext({ requestId: 'req-3' }), async () => {
        logger.error('Call failed', new Error('socket hang up'));
      });
      capture.stop();

      expect(capture.getLogs().map(log => [log.level, log.message])).toEqual([
        ['ERROR', '[capture-test] Call failed: socket hang up'],
      ]);
    });
  });

  // ============================================================================
  // Request and error data
  // ============================================================================

  describe('request and error data', () => {
    it('should redact sensitive headers', () => {
      const capture = new RunCapture('req-4');

      capture.setRequestData(
        { url: VIDEO_URL },
        { 'Content-Type': 'application/json', 'x-functions-key': 'test-secret', 'Authorization': 'Bearer test-secret' }
      );

      expect(capture.getRequestData()?.headers).toEqual({
        'Content-Type': 'application/json',
        'x-functions-key': '[REDACTED]',
        'Authorization': '[REDACTED]',
      });
    });

    it('should record the error type, message and context', () => {
      const capture = new RunCapture('req-5');

      capture.setErrorInfo(new TypeError('Invalid input parameter'), { parameter: 'url' });

      expect(capture.getErrorInfo()).toMatchObject({
        type: 'TypeError',
        message: 'Invalid input parameter',
        context: { parameter: 'url' },
      });
      expect(capture.getErrorInfo()?.stack).toContain('TypeError: Invalid input parameter');
    });

    it('should accept non-Error values', () => {
      const capture = new RunCapture('req-6');

      capture.setErrorInfo('plain failure');

      expect(capture.getErrorInfo()).toMatchObject({ type: 'Error', message: 'plain failure', context: {} });
    });
  });

  // ============================================================================
  // Markdown report
  // ============================================================================

  describe('generateMarkdownReport', () => {
    const previousLevel = process.env['LOG_LEVEL'];

    beforeEach(() => {
      process.env['LOG_LEVEL'] = 'info';
      vi.useFakeTimers();
    });

    afterEach(() => {
      process.env['LOG_LEVEL'] = previousLevel;
      vi.useRealTimers();
    });

    it('should render the full report', () => {
      const clock = fixedClock('2026-03-01T10:00:00.000Z');
      const capture = new RunCapture('req-42', clock.now);

      capture.setRequestData(
        { url: VIDEO_URL },
        { 'content-type': 'application/json', 'x-functions-key': 'test-secret' }
      );
      clock.set('2026-03-01T10:00:01.250Z');
      vi.setSystemTime(new Date('2026-03-01T10:00:01.250Z'));
      const logger = getLogger({ service: 'digest', correlationId: 'req-42' });
      capture.start();
      logger.info('Processing request');
      logger.error('Call failed\nwith | pipe');
      capture.stop();

      const error = new Error('API timeout');
      error.stack = 'Error: API timeout\n    at test';
      capture.setErrorInfo(error, { youtubeUrl: VIDEO_URL });

      expect(capture.generateMarkdownReport()).toBe([
        '# Video Digest Failure Report',
        '',
        '**Request ID:** `req-42`',
        '',
        '**Generated:** 2026-03-01T10:00:01.250Z',
        '',
        '**Duration:** 1.25 seconds',
        '',
        '---',
        '',
        '## Request Information',
        '',
        '### Request Body',
        '',
        '```json',
        '{',
        `  "url": "${VIDEO_URL}"`,
        '}',
        '```',
        '',
        '### Request Headers',
        '',
        '```json',
        '{',
        '  "content-type": "application/json",',
        '  "x-functions-key": "[REDACTED]"',
        '}',
        '```',
        '',
        '## Error Information',
        '',
        '**Error Type:** `Error`',
        '',
        '**Error Message:**',
        '',
        '```',
        'API timeout',
        '```',
        '',
        '**Error Context:**',
        '',
        '```json',
        '{',
        `  "youtubeUrl": "${VIDEO_URL}"`,
        '}',
        '```',
        '',
        '**Stack Trace:**',
        '',
        '```',
        'Error: API timeout',
        '    at test',
        '```',
        '',
        '## Runtime Logs',
        '',
        '| Timestamp | Level | Message |',
        '|-----------|-------|---------|',
        '| 10:00:01.250 | INFO | [digest] Processing request |',
        '| 10:00:01.250 | ERROR | [digest] Call failed with \\| pipe |',
        '',
        '### Detailed Logs',
        '',
        '**[1] 2026-03-01T10:00:01.250Z - INFO**',
        '',
        '```',
        '[digest] Processing request',
        '```',
        '',
        '**[2] 2026-03-01T10:00:01.250Z - ERROR**',
        '',
        '```',
        '[digest] Call failed',
        'with | pipe',
        '```',
        '',
        '---',
        '',
        '*This report was generated automatically by the video-digest failure notification.*',
        '',
      ].join('\n'));
    });

    it('should note missing sections', () => {
      const report = new RunCapture('req-7').generateMarkdownReport();
      const lines = report.split('\n');

      expect(lines).toContain('*No request data captured*');
      expect(lines).toContain('*No error information captured*');
      expect(lines).toContain('*No logs captured*');
      expect(lines).not.toContain('### Detailed Logs');
    });

    it('should cap table messages at 100 characters', () => {
      vi.setSystemTime(new Date('2026-03-01T08:30:00.005Z'));
      const capture = new RunCapture('req-8');
      capture.start();
      getLogger({ service: 'digest', correlationId: 'req-8' }).info('y'.repeat(150));
      capture.stop();

      const lines = capture.generateMarkdownReport().split('\n');

      expect(lines).toContain(`| 08:30:00.005 | INFO | [digest] ${'y'.repeat(91)} |`);
      expect(lines).toContain(`[digest] ${'y'.repeat(150)}`);
    });

    it('should redact sensitive fields of the request body', () => {
      const capture = new RunCapture('req-9');
      capture.setRequestData({ url: VIDEO_URL, api_key: 'test-secret' });

      expect(capture.generateMarkdownReport().split('\n')).toContain('  "api_key": "[REDACTED]"');
    });
  });
});
