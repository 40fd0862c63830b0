import { addLogHandler, type LogEntry } from '@kernel/logger';
import { sanitizeForLogging, sanitizeHeaders } from '@kernel/redaction';

/**
* Run Capture
*
* Collects what happened during one summarize run (log lines, the request,
* the error) so that a failure notification can carry a self-contained report.
*/

export type RequestHeaders = Record<string, string | string[] | undefined>;

export interface CapturedLog {
  /** ISO timestamp */
  timestamp: string;
  /** Upper-case level name */
  level: string;
  message: string;
}

interface CapturedRequest {
  body: unknown;
  headers: Record<string, string>;
  timestamp: string;
}

interface CapturedError {
  type: string;
  message: string;
  stack: string;
  context: Record<string, unknown>;
  timestamp: string;
}

/** Longest message shown in the runtime log table */
const TABLE_MESSAGE_LENGTH = 100;

function tableCell(message: string): string {
  return message.replace(/\n/g, ' ').replace(/\|/g, '\\|').slice(0, TABLE_MESSAGE_LENGTH);
}

function toJson(value: unknown): string {
  return JSON.stringify(sanitizeForLogging(value) ?? {}, null, 2);
}

export class RunCapture {
  private readonly logs: CapturedLog[] = [];
  private request: CapturedRequest | null = null;
  private error: CapturedError | null = null;
  private readonly startedAt: Date;
  private detach: (() => void) | null = null;

  /**
  * @param requestId - Only log entries carrying this request id are captured
  * @param now - Clock, replaceable in tests
  */
  constructor(
    private readonly requestId: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.startedAt = now();
  }

  /** Start capturing log entries of this run */
  start(): void {
    if (this.detach) return;
    this.detach = addLogHandler((entry: LogEntry) => {
      if (entry.requestId !== this.requestId) return;
      const message = entry.errorMessage ? `${entry.message}: ${entry.errorMessage}` : entry.message;
      this.logs.push({ timestamp: entry.timestamp, level: entry.level.toUpperCase(), message });
    });
  }

  /** Stop capturing; the collected data stays available */
  stop(): void {
    this.detach?.();
    this.detach = null;
  }

  getLogs(): readonly CapturedLog[] {
    return this.logs;
  }

  setRequestData(body: unknown, headers?: RequestHeaders): void {
    this.request = {
      body: body ?? {},
      headers: headers ? sanitizeHeaders(headers) : {},
      timestamp: this.now().toISOString(),
    };
  }

  getRequestData(): Readonly<CapturedRequest> | null {
    return this.request;
  }

  setErrorInfo(error: unknown, context: Record<string, unknown> = {}): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.error = {
      type: err.name,
      message: err.message,
      stack: err.stack ?? 'No stack trace available',
      context,
      timestamp: this.now().toISOString(),
    };
  }

  getErrorInfo(): Readonly<CapturedError> | null {
    return this.error;
  }

  /**
  * Markdown failure report: request, error, then the captured log lines as a
  * summary table followed by each line in full.
  */
  generateMarkdownReport(): string {
    const now = this.now();
    const seconds = (now.getTime() - this.startedAt.getTime()) / 1000;
    const lines: string[] = [
      '# Video Digest Failure Report',
      '',
      `**Request ID:** \`${this.requestId}\``,
      '',
      `**Generated:** ${now.toISOString()}`,
      '',
      `**Duration:** ${seconds.toFixed(2)} seconds`,
      '',
      '---',
      '',
      '## Request Information',
      '',
    ];

    if (this.request) {
      lines.push('### Request Body', '', '```json', toJson(this.request.body), '```', '');
      if (Object.keys(this.request.headers).length > 0) {
        lines.push('### Request Headers', '', '```json', JSON.stringify(this.request.headers, null, 2), '```', '');
      }
    } else {
      lines.push('*No request data captured*', '');
    }

    lines.push('## Error Information', '');
    if (this.error) {
      lines.push(
        `**Error Type:** \`${this.error.type}\``, '',
        '**Error Message:**', '',
        '```', this.error.message, '```', ''
      );
      if (Object.keys(this.error.context).length > 0) {
        lines.push('**Error Context:**', '', '```json', toJson(this.error.context), '```', '');
      }
      lines.push('**Stack Trace:**', '', '```', this.error.stack, '```', '');
    } else {
      lines.push('*No error information captured*', '');
    }

    lines.push('## Runtime Logs', '');
    if (this.logs.length > 0) {
      lines.push('| Timestamp | Level | Message |', '|-----------|-------|---------|');
      for (const log of this.logs) {
        const time = (log.timestamp.split('T')[1] ?? log.timestamp).slice(0, 12);
        lines.push(`| ${time} | ${log.level} | ${tableCell(log.message)} |`);
      }
      lines.push('', '### Detailed Logs', '');
      this.logs.forEach((log, index) => {
        lines.push(`**[${index + 1}] ${log.timestamp} - ${log.level}**`, '', '```', log.message, '```', '');
      });
    } else {
      lines.push('*No logs captured*', '');
    }

    lines.push('---', '', '*This report was generated automatically by the video-digest failure notification.*', '');
    return lines.join('\n');
  }
}
