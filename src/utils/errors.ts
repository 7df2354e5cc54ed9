/**
 * Custom error classes and error description helpers
 */

import { randomUUID } from 'node:crypto';

/**
 * Base error class for all custom errors
 */
export class BaseError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly id: string;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
    this.id = randomUUID();
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack
    };
  }
}

/**
 * Error thrown when a channel source fails
 */
export class ChannelSourceError extends BaseError {
  constructor(
    public readonly source: string,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(`Channel source ${source} error: ${message}`, {
      source,
      originalError: originalError === undefined ? undefined : describeError(originalError)
    });
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends BaseError {
  constructor(
    message: string,
    public readonly missingFields?: string[]
  ) {
    super(`Configuration error: ${message}`, {
      missingFields
    });
  }
}

/**
 * Error raised when the report file cannot be written or read
 */
export class ExportError extends BaseError {
  constructor(
    public readonly filePath: string,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(`Export to ${filePath} failed: ${message}`, {
      filePath,
      originalError: originalError === undefined ? undefined : describeError(originalError)
    });
  }
}

/**
 * Status of the HTTP response a client error carries, if the server answered at all
 */
export function getResponseStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return undefined;
  }

  const response: unknown = error.response;
  if (
    typeof response === 'object' &&
    response !== null &&
    'status' in response &&
    typeof response.status === 'number'
  ) {
    return response.status;
  }

  return undefined;
}

/**
 * Read the HTTP status carried by a client error, if any.
 * Octokit puts it on the error itself, axios only on `error.response`.
 */
export function getHttpStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }

  return getResponseStatus(error);
}

/**
 * Render any thrown value as a single line of text
 */
export function describeError(error: unknown): string {
  const status = getHttpStatus(error);
  const message = error instanceof Error ? error.message : String(error);
  return status === undefined ? message : `${message} (HTTP ${status})`;
}

/**
 * Normalise a thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
