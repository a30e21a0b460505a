/**
 * Centralized logging service for the harness
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Structured fields understood by the JSON Lines format.
 * Anything else is carried under `context`.
 */
export interface LogContext {
  runId?: string;
  agent?: string;
  source?: string;
  step?: number;
  event?: string;
  [key: string]: unknown;
}

const RESERVED_FIELDS = ['runId', 'agent', 'source', 'step', 'event', 'error'];

function parseLevel(raw: string | undefined): LogLevel {
  switch ((raw ?? 'info').toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

export class Logger {
  private static instance: Logger | undefined;
  private logLevel: LogLevel;
  private namespace?: string;
  private structured: boolean;

  private constructor(namespace?: string) {
    this.namespace = namespace;
    // Read from the environment directly; config.ts depends on the logger
    this.logLevel = parseLevel(process.env['LOG_LEVEL']);
    this.structured = (process.env['LOG_STRUCTURED'] ?? 'false').toLowerCase() === 'true';
  }

  static getInstance(namespace?: string): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    if (namespace) {
      return new Logger(namespace);
    }
    return Logger.instance;
  }

  private formatMessage(level: string, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    if (this.structured) {
      const extra = context
        ? Object.fromEntries(
            Object.entries(context).filter(([key]) => !RESERVED_FIELDS.includes(key)),
          )
        : {};
      const entry = {
        timestamp,
        level,
        runId: context?.runId,
        agent: context?.agent,
        source: context?.source,
        step: context?.step,
        event: context?.event,
        message,
        ...(this.namespace ? { namespace: this.namespace } : {}),
        ...(Object.keys(extra).length > 0 ? { context: extra } : {}),
        ...(context?.['error'] !== undefined ? { error: context['error'] } : {}),
      };
      return JSON.stringify(entry);
    }
    const prefix = this.namespace ? `[${this.namespace}]` : '';
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `${timestamp} ${level} ${prefix} ${message}${contextStr}`;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.logLevel;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage('DEBUG', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage('INFO', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage('WARN', message, context));
    }
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorContext: LogContext = {
        ...context,
        error:
          error instanceof Error
            ? {
                message: error.message,
                stack: error.stack,
                name: error.name,
              }
            : error,
      };

      console.error(this.formatMessage('ERROR', message, errorContext));
    }
  }

  /**
   * Creates a child logger with a nested namespace
   */
  child(namespace: string): Logger {
    const fullNamespace = this.namespace ? `${this.namespace}:${namespace}` : namespace;
    return new Logger(fullNamespace);
  }

  setStructured(enabled: boolean): void {
    this.structured = enabled;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }
}

export const logger = Logger.getInstance();
