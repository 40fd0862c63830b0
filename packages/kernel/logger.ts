import { getRequestContext } from './request-context';
import { sanitizeForLogging as redact, sanitizeErrorMessage } from './redaction';

/**
* Structured Logger
*
* Provides structured logging with request correlation,
* multiple log levels, and pluggable handlers.
*/

export { getRequestContext };

// ============================================================================
// Type Definitions
// ============================================================================

/** Available log levels */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
* Log entry structure
*/
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Service name */
  service?: string | undefined;
  /** Request ID / Correlation ID */
  requestId?: string | undefined;
  /** Milliseconds since the request context started */
  duration?: number | undefined;
  error?: Error | undefined;
  errorMessage?: string | undefined;
  errorStack?: string | undefined;
  metadata?: Record<string, unknown> | undefined;
}

/** Log handler function type */
export type LogHandler = (entry: LogEntry) => void;

/** Logger options for getLogger */
export interface LoggerOptions {
  service: string;
  /** Correlation ID (overrides request context) */
  correlationId?: string | undefined;
  /** Additional context to include in every log */
  context?: Record<string, unknown> | undefined;
}

// ============================================================================
// Handler Registry
// ============================================================================

let handlers: LogHandler[] = [];

const getHandlers = (): readonly LogHandler[] => [...handlers];

// ============================================================================
// Log Level Configuration
// ============================================================================

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some(level => level === value);
}

/**
* Get configured log level from environment.
* Returns null when logging is silenced.
*/
function getConfiguredLogLevel(): LogLevel | null {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (envLevel === 'silent') return null;
  if (isLogLevel(envLevel)) return envLevel;

  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  const configuredLevel = getConfiguredLogLevel();
  if (configuredLevel === null) return false;
  return LEVELS.indexOf(level) >= LEVELS.indexOf(configuredLevel);
}

function redactMetadata(obj: Record<string, unknown>): Record<string, unknown> {
  const result = redact(obj);
  return (typeof result === 'object' && result !== null && !Array.isArray(result))
    ? result
    : { _redacted: result };
}

// ============================================================================
// Default Handler
// ============================================================================

/**
* Default console handler.
* All logs go to stderr as one JSON object per line.
*/
function consoleHandler(entry: LogEntry): void {
  const { level, message, service, requestId, duration, errorMessage, errorStack, metadata } = entry;

  const logOutput: Record<string, unknown> = {
    level: level.toUpperCase(),
    message,
  };

  if (service) logOutput['service'] = service;
  if (requestId) logOutput['correlationId'] = requestId;
  if (duration !== undefined) logOutput['duration'] = duration;
  if (errorMessage) logOutput['error'] = errorMessage;
  if (errorStack && process.env['LOG_LEVEL'] === 'debug') logOutput['stack'] = errorStack;
  if (metadata && Object.keys(metadata).length > 0) {
    logOutput['metadata'] = metadata;
  }

  console.error(JSON.stringify(logOutput));
}

// ============================================================================
// Handler Management
// ============================================================================

/**
* Add a log handler
* @returns Function to remove the handler
*/
export function addLogHandler(handler: LogHandler): () => void {
  handlers = [...handlers, handler];
  return () => {
    handlers = handlers.filter(h => h !== handler);
  };
}

/**
* Remove all log handlers, including the default console handler
*/
export function clearLogHandlers(): void {
  handlers = [];
}

addLogHandler(consoleHandler);

// ============================================================================
// Logger Class
// ============================================================================

/**
* Logger instance with bound service name and correlation ID support
*/
export class Logger {
  private readonly context: Record<string, unknown>;

  constructor(
    private readonly service: string,
    private readonly correlationId?: string,
    context?: Record<string, unknown>
  ) {
    this.context = context || {};
  }

  private createEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    err?: Error
  ): LogEntry {
    const requestContext = getRequestContext();
    const correlationId = this.correlationId || requestContext?.requestId;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: `[${this.service}] ${message}`,
      service: this.service,
      metadata: redactMetadata({ ...this.context, ...metadata }),
    };

    if (correlationId) entry.requestId = correlationId;
    if (requestContext) entry.duration = Date.now() - requestContext.startTime;

    if (err) {
      entry.error = err;
      entry.errorMessage = sanitizeErrorMessage(err);
      entry.errorStack = err.stack;
    }

    return entry;
  }

  private emit(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    err?: Error
  ): void {
    if (!shouldLog(level)) return;
    const entry = this.createEntry(level, message, metadata, err);
    getHandlers().forEach(h => h(entry));
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.emit('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.emit('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.emit('warn', message, metadata);
  }

  error(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    this.emit('error', message, metadata, err);
  }

  fatal(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    this.emit('fatal', message, metadata, err);
  }

  /**
  * Create a child logger with additional context
  */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(
      this.service,
      this.correlationId,
      { ...this.context, ...additionalContext }
    );
  }
}

/**
* Get logger for service
* @param serviceOrOptions - Service name or LoggerOptions object
*/
export function getLogger(serviceOrOptions: string | LoggerOptions): Logger {
  if (typeof serviceOrOptions === 'string') {
    return new Logger(serviceOrOptions);
  }
  return new Logger(
    serviceOrOptions.service,
    serviceOrOptions.correlationId,
    serviceOrOptions.context
  );
}
