import { createTransport, type SendMailOptions } from 'nodemailer';

import type { SmtpConfig } from '@config';
import { NotificationError, getErrorMessage, toError } from '@errors';
import { getLogger } from '@kernel/logger';

import type {
  FailureNotification,
  NotificationClient,
  SuccessNotification,
} from '../application/ports/NotificationClient';
import { isRawSummary, summaryTitle } from '../domain/VideoSummary';

const logger = getLogger('email');

/**
* The part of a nodemailer transporter this client uses
*/
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId?: string | undefined }>;
  close?(): void;
}

export interface EmailClientOptions {
  from: string;
  to: string[];
  smtp: SmtpConfig;
}

// ============================================================================
// Sanitizers
// ============================================================================

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
  '`': '&#96;',
};

/** Escape a value for HTML text or attribute context */
export function escapeHtml(unsafe: string): string {
  return unsafe.replace(/[&<>"'`]/g, c => HTML_ESCAPES[c] ?? c);
}

/**
* Strip CR and LF from header values.
* "\r\n" in a subject or address would start a new SMTP header.
*/
export function stripCrlf(value: string): string {
  return value.replace(/[\r\n]/g, '');
}

/**
* Restrict an href to http(s). escapeHtml leaves `javascript:` URIs intact.
* @returns The trimmed URL, or '#' for any other scheme
*/
export function sanitizeHref(url: string): string {
  const trimmed = url.trim();
  if (!/^https?:\/\//i.test(trimmed)) return '#';
  return trimmed;
}

const link = (url: string, label: string): string =>
  `<a href="${escapeHtml(sanitizeHref(url))}">${escapeHtml(label)}</a>`;

// ============================================================================
// Templates
// ============================================================================

export interface EmailContent {
  subject: string;
  html: string;
  text: string;
}

export function renderSuccessEmail({ youtubeUrl, noteUrl, summary }: SuccessNotification): EmailContent {
  const title = summaryTitle(summary);
  const brief = (!isRawSummary(summary) && summary.brief_summary) || 'No summary available';

  return {
    subject: stripCrlf(`Summary Ready: ${title}`),
    html: [
      '<html>',
      '<body style="font-family: Arial, sans-serif; line-height: 1.6; color: #333;">',
      '<h2 style="color: #0066cc;">Video Summary Created</h2>',
      `<h3>${escapeHtml(title)}</h3>`,
      `<p><strong>Summary:</strong><br>${escapeHtml(brief)}</p>`,
      `<p>${link(noteUrl, 'View in Notion')}</p>`,
      `<p style="color: #666; font-size: 12px;">Original video: ${link(youtubeUrl, youtubeUrl)}</p>`,
      '</body>',
      '</html>',
    ].join('\n'),
    text: [
      title,
      '',
      brief,
      '',
      `View in Notion: ${noteUrl}`,
      `Original video: ${youtubeUrl}`,
    ].join('\n'),
  };
}

export function renderFailureEmail({ youtubeUrl, error, report }: FailureNotification): EmailContent {
  const footer = report
    ? 'The failure report is attached.'
    : 'Check the service logs for more details.';

  return {
    subject: 'Video Summary Failed',
    html: [
      '<html>',
      '<body style="font-family: Arial, sans-serif; line-height: 1.6; color: #333;">',
      '<h2 style="color: #cc0000;">Video Summary Failed</h2>',
      `<p><strong>Video URL:</strong><br>${link(youtubeUrl, youtubeUrl)}</p>`,
      `<p><strong>Error:</strong><br><code>${escapeHtml(error)}</code></p>`,
      `<p style="color: #666; font-size: 12px;">${footer}</p>`,
      '</body>',
      '</html>',
    ].join('\n'),
    text: [
      'Video Summary Failed',
      '',
      `Video URL: ${youtubeUrl}`,
      `Error: ${error}`,
      '',
      footer,
    ].join('\n'),
  };
}

// ============================================================================
// Client
// ============================================================================

export const FAILURE_REPORT_FILENAME = 'failure-report.md';

/**
* Notification client sending run results by email over SMTP
*/
export class EmailNotificationClient implements NotificationClient {
  private transporter: MailTransport | null;

  constructor(
    private readonly options: EmailClientOptions,
    transporter?: MailTransport
  ) {
    if (options.to.length === 0) {
      throw new NotificationError('At least one email recipient is required');
    }
    this.transporter = transporter ?? null;
  }

  async sendSuccess(input: SuccessNotification): Promise<void> {
    await this.send('success', renderSuccessEmail(input));
  }

  async sendFailure(input: FailureNotification): Promise<void> {
    const attachments: SendMailOptions['attachments'] = input.report
      ? [{ filename: FAILURE_REPORT_FILENAME, content: input.report, contentType: 'text/markdown' }]
      : undefined;
    await this.send('failure', renderFailureEmail(input), attachments);
  }

  /** Close the SMTP connection pool, if one was opened */
  close(): void {
    this.transporter?.close?.();
    this.transporter = null;
  }

  private getTransporter(): MailTransport {
    if (!this.transporter) {
      const { host, port, secure, user, pass } = this.options.smtp;
      this.transporter = createTransport({
        host,
        port,
        secure,
        auth: user && pass ? { user, pass } : undefined,
      });
    }
    return this.transporter;
  }

  private async send(
    kind: 'success' | 'failure',
    content: EmailContent,
    attachments?: SendMailOptions['attachments']
  ): Promise<void> {
    const transporter = this.getTransporter();
    try {
      const info = await transporter.sendMail({
        from: stripCrlf(this.options.from),
        to: this.options.to.map(stripCrlf),
        subject: stripCrlf(content.subject),
        html: content.html,
        text: content.text,
        attachments,
      });
      logger.info(`Sent ${kind} email`, { messageId: info.messageId, recipientCount: this.options.to.length });
    } catch (error) {
      throw new NotificationError(`Failed to send ${kind} email: ${getErrorMessage(error)}`, toError(error));
    }
  }
}
