/**
* Summaries Domain
*
* Video summarization pipeline: URL validation, Gemini summary, Notion page
* and email notification, wired from the application configuration.
*
* @example
* ```typescript
* import { loadConfig } from '@config';
* import { createSummarizeVideoService } from '@domain/summaries';
*
* const service = createSummarizeVideoService(loadConfig());
* const response = await service.handle({ body: '{"url":"https://youtu.be/dQw4w9WgXcQ"}' });
* ```
*/

import { NotionConfigLoader, type AppConfig } from '@config';
import { getLogger } from '@kernel/logger';

import type { NoteClient } from './application/ports/NoteClient';
import type { NotificationClient } from './application/ports/NotificationClient';
import type { SecretProvider } from './application/ports/SecretProvider';
import { SummarizeVideoService } from './application/SummarizeVideoService';
import { EmailNotificationClient } from './infra/EmailNotificationClient';
import { EnvSecretProvider } from './infra/EnvSecretProvider';
import { GeminiSummarizationClient } from './infra/GeminiSummarizationClient';
import { NotionNoteClient } from './infra/NotionNoteClient';

const logger = getLogger('summaries');

export interface ServiceOverrides {
  secrets?: SecretProvider | undefined;
}

function createNoteClient(config: AppConfig, secrets: SecretProvider): NoteClient | undefined {
  const { configJson, configPath, timeoutMs } = config.notion;
  if (!configJson && !configPath) {
    logger.info('Notion configuration not set; pages will not be created');
    return undefined;
  }
  return new NotionNoteClient(secrets, new NotionConfigLoader({ configJson, configPath }), { timeoutMs });
}

function createNotificationClient(config: AppConfig): NotificationClient | undefined {
  const { enabled, from, to, smtp } = config.email;
  if (!enabled) return undefined;
  if (!from) {
    logger.warn('EMAIL_FROM not set; notifications disabled');
    return undefined;
  }
  return new EmailNotificationClient({ from, to, smtp });
}

/**
* Build the summarize service from validated configuration.
* Each collaborator is constructed here; nothing is shared across services.
*/
export function createSummarizeVideoService(
  config: AppConfig,
  overrides: ServiceOverrides = {}
): SummarizeVideoService {
  const secrets = overrides.secrets ?? new EnvSecretProvider(config.env);

  return new SummarizeVideoService({
    summarizer: new GeminiSummarizationClient(secrets, {
      model: config.gemini.model,
      timeoutMs: config.gemini.timeoutMs,
    }),
    notes: createNoteClient(config, secrets),
    notifier: createNotificationClient(config),
  });
}

export {
  SummarizeVideoService,
  toResponse,
  type RawSummarizeRequest,
  type SummarizeOutcome,
  type SummarizeResponse,
  type SummarizeServiceDeps,
} from './application/SummarizeVideoService';
export { RunCapture, type CapturedLog, type RequestHeaders } from './application/RunCapture';
export type {
  FailureNotification,
  NoteClient,
  NotificationClient,
  SecretName,
  SecretProvider,
  SuccessNotification,
  SummarizationClient,
} from './application/ports';
export {
  isRawSummary,
  parseSummaryResponse,
  summaryTitle,
  type RawSummary,
  type StructuredSummary,
  type ToolUsage,
  type VideoSummary,
} from './domain/VideoSummary';
export { buildSummaryPrompt } from './domain/prompt';
export { EmailNotificationClient } from './infra/EmailNotificationClient';
export { EnvSecretProvider } from './infra/EnvSecretProvider';
export { GeminiSummarizationClient } from './infra/GeminiSummarizationClient';
export { NotionNoteClient } from './infra/NotionNoteClient';
