import {
  getErrorMessage,
  getStatusCodeForErrorCode,
  sanitizeErrorForClient,
  toError,
} from '@errors';
import { getLogger } from '@kernel/logger';
import { createRequestContext, runWithContext } from '@kernel/request-context';
import { parseJsonBody, validateRequestBody, validateYouTubeUrl } from '@security';

import type { VideoSummary } from '../domain/VideoSummary';
import type { NoteClient } from './ports/NoteClient';
import type { NotificationClient } from './ports/NotificationClient';
import type { SummarizationClient } from './ports/SummarizationClient';
import { RunCapture, type RequestHeaders } from './RunCapture';

const logger = getLogger('summarize');

// ============================================================================
// Type Definitions
// ============================================================================

export interface SummarizeServiceDeps {
  summarizer: SummarizationClient;
  /** Pages are created only when a note client is configured */
  notes?: NoteClient | undefined;
  /** Run notifications are sent only when a notification client is configured */
  notifier?: NotificationClient | undefined;
}

export interface SummarizeOutcome {
  status: 'success';
  youtubeUrl: string;
  summary: VideoSummary;
  noteUrl?: string | undefined;
}

export interface SummarizeResponse {
  statusCode: number;
  body: Record<string, unknown>;
}

export interface RawSummarizeRequest {
  /** Raw request payload */
  body: string;
  headers?: RequestHeaders | undefined;
}

// ============================================================================
// Response mapping
// ============================================================================

/**
* Map a run outcome or the error it threw to an HTTP-style response.
* Messages of unexpected errors never reach the caller.
*/
export function toResponse(result: unknown): SummarizeResponse {
  if (isOutcome(result)) {
    const body: Record<string, unknown> = {
      status: result.status,
      youtube_url: result.youtubeUrl,
      summary: result.summary,
    };
    if (result.noteUrl) body['notion_url'] = result.noteUrl;
    return { statusCode: 200, body };
  }

  const body = sanitizeErrorForClient(result);
  return { statusCode: getStatusCodeForErrorCode(body.code), body: { ...body } };
}

function isOutcome(value: unknown): value is SummarizeOutcome {
  return typeof value === 'object' && value !== null && 'status' in value && value.status === 'success';
}

function headerValue(headers: RequestHeaders | undefined, name: string): string | undefined {
  if (!headers) return undefined;
  const match = Object.entries(headers).find(([key]) => key.toLowerCase() === name);
  const value = match?.[1];
  return Array.isArray(value) ? value[0] : value;
}

// ============================================================================
// Summarize Video Service
// ============================================================================

/**
* Runs one summarize request end to end: validate the URL, summarize the
* video, store the summary as a note, and notify about the result.
*/
export class SummarizeVideoService {
  constructor(private readonly deps: SummarizeServiceDeps) {}

  /**
  * Summarize the video named by `body.url`.
  *
  * Every run gets its own request context, so log lines and the failure
  * report carry one request id.
  *
  * @throws InvalidYouTubeUrlError when the body or URL is rejected
  * @throws ExternalServiceError subclasses when a collaborator fails
  */
  async summarize(body: unknown, headers?: RequestHeaders): Promise<SummarizeOutcome> {
    const context = createRequestContext({ operation: 'summarize' });
    return runWithContext(context, () => this.run(context.requestId, body, headers));
  }

  /**
  * Parse, run and map a raw request.
  * Never throws; every failure becomes an error response.
  */
  async handle(request: RawSummarizeRequest): Promise<SummarizeResponse> {
    try {
      const body = parseJsonBody(request.body, headerValue(request.headers, 'content-type'));
      return toResponse(await this.summarize(body, request.headers));
    } catch (error) {
      return toResponse(error);
    }
  }

  private async run(requestId: string, body: unknown, headers: RequestHeaders | undefined): Promise<SummarizeOutcome> {
    const capture = new RunCapture(requestId);
    capture.start();
    capture.setRequestData(body, headers);

    try {
      logger.info('Summarize request received');

      let youtubeUrl: string;
      try {
        const { url } = validateRequestBody(body);
        youtubeUrl = validateYouTubeUrl(url);
      } catch (error) {
        logger.warn('Request rejected', { reason: getErrorMessage(error) });
        throw error;
      }

      logger.info('Processing video', { youtubeUrl });
      return await this.process(youtubeUrl, capture);
    } finally {
      capture.stop();
    }
  }

  private async process(youtubeUrl: string, capture: RunCapture): Promise<SummarizeOutcome> {
    try {
      const summary = await this.deps.summarizer.summarize(youtubeUrl);
      logger.info('Video summarized');

      let noteUrl: string | undefined;
      if (this.deps.notes) {
        noteUrl = await this.deps.notes.createPage(summary);
        logger.info('Note created', { noteUrl });
      }

      if (noteUrl) {
        await this.notifySuccess(youtubeUrl, noteUrl, summary);
      }

      return { status: 'success', youtubeUrl, summary, noteUrl };
    } catch (error) {
      logger.error('Summarize run failed', toError(error), { youtubeUrl });
      capture.setErrorInfo(error, { youtubeUrl });
      await this.notifyFailure(youtubeUrl, error, capture);
      throw error;
    }
  }

  private async notifySuccess(youtubeUrl: string, noteUrl: string, summary: VideoSummary): Promise<void> {
    if (!this.deps.notifier) return;
    try {
      await this.deps.notifier.sendSuccess({ youtubeUrl, noteUrl, summary });
    } catch (error) {
      logger.error('Success notification failed', toError(error));
    }
  }

  private async notifyFailure(youtubeUrl: string, error: unknown, capture: RunCapture): Promise<void> {
    if (!this.deps.notifier) return;
    try {
      await this.deps.notifier.sendFailure({
        youtubeUrl,
        error: getErrorMessage(error),
        report: capture.generateMarkdownReport(),
      });
    } catch (notifyError) {
      logger.error('Failure notification failed', toError(notifyError));
    }
  }
}
