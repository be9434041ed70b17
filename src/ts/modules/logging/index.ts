/**
 * Logging Module
 *
 * Lazy-evaluated, concern-based logging with console output.
 * Errors and warnings always log. Info/verbose only log for enabled concerns.
 * Control via EDGEDOCK_LOG / EDGEDOCK_LOG_LEVEL or the exported toggles.
 */

export { LogLevel, LOG_LEVEL_NAMES } from './types';
export type { LogEntry, Logger, ConcernState } from './types';

export { createLogger, formatConsoleMessage } from './logger';
export {
  initLogConcerns,
  isConcernEnabled,
  getMinLevel,
  enableLogConcern,
  disableLogConcern,
  setLogLevel,
  resetLogConcerns,
  listLogConcerns,
  describeLogLevel,
} from './concerns';
