import type { VideoSummary } from '../../domain/VideoSummary';

/**
* Input for the notification sent after a summary page was created
*/
export interface SuccessNotification {
  youtubeUrl: string;
  noteUrl: string;
  summary: VideoSummary;
}

/**
* Input for the notification sent when a summarize run fails
*/
export interface FailureNotification {
  /** URL the run was processing (canonical when validation passed) */
  youtubeUrl: string;
  /** Error message shown to the recipient */
  error: string;
  /** Markdown failure report, attached when present */
  report?: string | undefined;
}

/**
* Adapter interface for run notifications (email, chat, ...).
* Implementations throw NotificationError when delivery fails.
*/
export interface NotificationClient {
  sendSuccess(input: SuccessNotification): Promise<void>;
  sendFailure(input: FailureNotification): Promise<void>;
}
