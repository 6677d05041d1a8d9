/**
 * Logger Module
 *
 * Centralized logging for the torrent providers.
 */

export {
  Logger,
  createLogger,
  generateRequestId,
  formatError,
  shouldLog,
} from './logger';

export type { LogLevel, LogContext, LogEntry } from './logger';
