/**
 * Structured logger with JSON output and correlation IDs
 */

import { randomUUID } from 'node:crypto';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export interface LogContext {
  correlationId?: string;
  service?: string;
  operation?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  correlationId: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export type LogOutputStream = (entry: LogEntry) => void;

// stdout carries the prompt and the report summary
const writeToStderr: LogOutputStream = (entry) => {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
};

export class Logger {
  private static instance: Logger | undefined;
  private correlationId: string;
  private context: LogContext;
  private logLevel: LogLevel;
  private outputStream: LogOutputStream;

  constructor(
    logLevel: LogLevel = LogLevel.INFO,
    context: LogContext = {},
    outputStream?: LogOutputStream
  ) {
    this.logLevel = logLevel;
    this.correlationId = context.correlationId || randomUUID();
    this.context = { ...context, correlationId: this.correlationId };
    this.outputStream = outputStream || writeToStderr;
  }

  /**
   * Get singleton instance
   */
  static getInstance(logLevel?: LogLevel, context?: LogContext): Logger {
    if (!Logger.instance) {
      const level = logLevel ?? Logger.parseLogLevel(process.env.LOG_LEVEL);
      Logger.instance = new Logger(level, context);
    }
    return Logger.instance;
  }

  /**
   * Parse log level from string
   */
  static parseLogLevel(level?: string): LogLevel {
    switch (level?.toLowerCase()) {
      case 'error':
        return LogLevel.ERROR;
      case 'warn':
        return LogLevel.WARN;
      case 'info':
        return LogLevel.INFO;
      case 'debug':
        return LogLevel.DEBUG;
      default:
        return LogLevel.INFO;
    }
  }

  /**
   * Create a child logger with additional context.
   * The child shares its parent's level and output at creation time.
   */
  child(context: LogContext): Logger {
    return new Logger(
      this.logLevel,
      {
        ...this.context,
        ...context,
        correlationId: context.correlationId || this.correlationId
      },
      (entry) => this.outputStream(entry)
    );
  }

  private formatEntry(
    level: string,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      correlationId: this.correlationId,
      context: this.context
    };

    if (metadata) {
      entry.metadata = metadata;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack
      };
    }

    return entry;
  }

  private shouldLog(level: LogLevel): boolean {
    return level <= this.logLevel;
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      this.outputStream(this.formatEntry('ERROR', message, metadata, error));
    }
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.outputStream(this.formatEntry('WARN', message, metadata));
    }
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.outputStream(this.formatEntry('INFO', message, metadata));
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.outputStream(this.formatEntry('DEBUG', message, metadata));
    }
  }

  /**
   * Log an outbound API call
   */
  logApiCall(
    service: string,
    method: string,
    url: string,
    duration: number,
    status?: number,
    error?: Error
  ): void {
    const metadata = {
      service,
      method,
      url,
      duration,
      status,
      success: !error && status !== undefined && status < 400
    };

    if (error) {
      this.error(`API call failed: ${service}`, error, metadata);
    } else if (status !== undefined && status >= 400) {
      this.warn(`API call returned error status: ${service}`, metadata);
    } else {
      this.debug(`API call completed: ${service}`, metadata);
    }
  }

  /**
   * Start timing an operation; the returned function logs and returns the duration
   */
  startTimer(operation: string): () => number {
    const start = Date.now();
    this.debug(`Starting operation: ${operation}`);

    return () => {
      const duration = Date.now() - start;
      this.debug(`Operation completed: ${operation}`, { duration });
      return duration;
    };
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * Set output stream (useful for testing)
   */
  setOutputStream(stream: LogOutputStream): void {
    this.outputStream = stream;
  }
}

export function getLogger(): Logger {
  return Logger.getInstance();
}
