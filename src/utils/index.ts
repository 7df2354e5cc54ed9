/**
 * Central export point for utility modules
 */

export {
  BaseError,
  ChannelSourceError,
  ConfigurationError,
  describeError,
  ExportError,
  getHttpStatus,
  getResponseStatus,
  toError
} from './errors';
export { getLogger, type LogContext, type LogEntry, Logger, LogLevel, type LogOutputStream } from './logger';
export { cleanText, toTitleLabel, uniqueInOrder } from './text';
