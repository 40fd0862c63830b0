import { z } from 'zod';

import { AppError, SummarizationError, getErrorMessage, toError } from '@errors';
import { getLogger } from '@kernel/logger';
import { fetchWithRetry, type RetryOptions } from '@utils';

import type { SecretProvider } from '../application/ports/SecretProvider';
import type { SummarizationClient } from '../application/ports/SummarizationClient';
import { buildSummaryPrompt } from '../domain/prompt';
import { isRawSummary, parseSummaryResponse, type VideoSummary } from '../domain/VideoSummary';

const logger = getLogger('gemini');

export const GEMINI_API_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

export interface GeminiClientOptions {
  model: string;
  /** Per-attempt timeout; long videos take minutes to process */
  timeoutMs: number;
  baseUrl?: string | undefined;
  retry?: RetryOptions | undefined;
}

// ============================================================================
// Wire format
// ============================================================================

const GenerateContentResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).default([]),
    }).optional(),
    finishReason: z.string().optional(),
  })).default([]),
});

type GenerateContentResponse = z.infer<typeof GenerateContentResponseSchema>;

function responseText(response: GenerateContentResponse): string {
  const parts = response.candidates[0]?.content?.parts ?? [];
  return parts.map(part => part.text ?? '').join('');
}

// ============================================================================
// Client
// ============================================================================

/**
* Summarization client for the Gemini generateContent REST endpoint.
*
* The video goes in as a file part referencing the YouTube URL, processed at low
* media resolution so that videos of up to about three hours fit the token limit.
*/
export class GeminiSummarizationClient implements SummarizationClient {
  private apiKey: string | null = null;

  constructor(
    private readonly secrets: SecretProvider,
    private readonly options: GeminiClientOptions
  ) {}

  async summarize(canonicalUrl: string): Promise<VideoSummary> {
    const apiKey = await this.getApiKey();
    const endpoint = `${this.options.baseUrl ?? GEMINI_API_BASE_URL}/models/${encodeURIComponent(this.options.model)}:generateContent`;

    logger.info('Processing video', { url: canonicalUrl, model: this.options.model });

    try {
      const response = await fetchWithRetry(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': apiKey,
        },
        body: JSON.stringify({
          contents: [{
            parts: [
              { fileData: { fileUri: canonicalUrl } },
              { text: buildSummaryPrompt(canonicalUrl) },
            ],
          }],
          generationConfig: {
            mediaResolution: 'MEDIA_RESOLUTION_LOW',
          },
        }),
        timeout: this.options.timeoutMs,
        retry: this.options.retry,
      });

      if (!response.ok) {
        const detail = await response.text().catch(() => '');
        logger.error('Gemini request rejected', undefined, { status: response.status, detail: detail.slice(0, 500) });
        throw new SummarizationError(
          `Gemini API request failed with status ${response.status}`,
          undefined,
          { status: response.status }
        );
      }

      const parsed = GenerateContentResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new SummarizationError('Gemini returned an unexpected response format');
      }

      const text = responseText(parsed.data);
      if (!text.trim()) {
        throw new SummarizationError('Gemini returned empty response', undefined, {
          finishReason: parsed.data.candidates[0]?.finishReason,
        });
      }

      logger.info('Received response from Gemini', { length: text.length });
      logger.debug('Gemini response', { text });

      const summary = parseSummaryResponse(text, canonicalUrl);
      if (isRawSummary(summary)) {
        logger.warn('Could not parse Gemini response as a summary', { note: summary.note });
      }
      return summary;
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new SummarizationError(
        `Failed to process video with Gemini: ${getErrorMessage(error)}`,
        toError(error)
      );
    }
  }

  private async getApiKey(): Promise<string> {
    if (!this.apiKey) {
      this.apiKey = await this.secrets.getSecret('GOOGLE-API-KEY');
    }
    return this.apiKey;
  }
}
