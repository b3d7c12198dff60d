/**
 * Logger interfaces and implementations
 * 
 * Why: Structured, level-based logging for the docs server, the schema
 * generator and the REST client.
 * 
 * Security: Credentials (Authorization header, password fields) are redacted
 * from log context before anything is written.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

const REDACTED = '[REDACTED]';
const SENSITIVE_HEADERS = ['authorization'];
const SENSITIVE_FIELDS = ['password'];

/**
 * Resolve level from LOG_LEVEL env var (defaults to INFO)
 */
export function levelFromEnv(value: string | undefined = process.env.LOG_LEVEL): LogLevel {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Redact credentials from log context
 *
 * Handles a `headers` object (case-insensitive) and top-level or `body`
 * password fields.
 */
export function redactSensitive(data: Record<string, unknown>): Record<string, unknown> {
  const redacted = { ...data };

  if (isRecord(redacted.headers)) {
    const headers = { ...redacted.headers };
    for (const key of Object.keys(headers)) {
      if (SENSITIVE_HEADERS.includes(key.toLowerCase()) && headers[key] !== undefined) {
        headers[key] = REDACTED;
      }
    }
    redacted.headers = headers;
  }

  if (isRecord(redacted.body)) {
    redacted.body = redactFields(redacted.body);
  }

  return redactFields(redacted);
}

function redactFields(data: Record<string, unknown>): Record<string, unknown> {
  const redacted = { ...data };
  for (const field of SENSITIVE_FIELDS) {
    if (field in redacted && redacted[field] !== undefined && redacted[field] !== null) {
      redacted[field] = REDACTED;
    }
  }
  return redacted;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Default logger - writes to stderr, respects LOG_LEVEL env var
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;

  constructor(level?: LogLevel) {
    this.level = level ?? levelFromEnv();
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('DEBUG', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('INFO', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('WARN', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const errorContext = error ? {
        error: error.message,
        stack: error.stack,
        ...context,
      } : context;
      this.write('ERROR', message, errorContext);
    }
  }

  private write(level: string, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const redacted = context ? redactSensitive(context) : undefined;
    const ctx = redacted ? ` ${JSON.stringify(redacted)}` : '';
    console.error(`[${timestamp}] ${level}: ${message}${ctx}`);
  }
}

/**
 * Structured JSON logger for production
 * 
 * Why: Machine-readable logs for log aggregation systems
 */
export class JsonLogger implements Logger {
  private level: LogLevel;

  constructor(level?: LogLevel) {
    this.level = level ?? levelFromEnv();
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('debug', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('info', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('warn', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      this.write('error', message, {
        error: error?.message,
        stack: error?.stack,
        ...context,
      });
    }
  }

  private write(level: string, message: string, context?: Record<string, unknown>): void {
    const redacted = context ? redactSensitive(context) : undefined;
    const log = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...redacted,
    };
    console.error(JSON.stringify(log));
  }
}

/**
 * Create logger from LOG_FORMAT ('console' | 'json')
 */
export function createLogger(format: string = process.env.LOG_FORMAT || 'console', level?: LogLevel): Logger {
  return format === 'json' ? new JsonLogger(level) : new ConsoleLogger(level);
}
