/**
 * Logging Types
 */

/** Log severity levels, most severe first */
export enum LogLevel {
  Exception = 0,
  Error = 1,
  Warn = 2,
  Info = 3,
  Verbose = 4,
}

/** Log level display names */
export const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.Exception]: 'EXCEPTION',
  [LogLevel.Error]: 'ERROR',
  [LogLevel.Warn]: 'WARN',
  [LogLevel.Info]: 'INFO',
  [LogLevel.Verbose]: 'VERBOSE',
};

/** A single log entry */
export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
}

/** Logger interface */
export interface Logger {
  exception: (error: Error, context?: string) => void;
  error: (messageFactory: () => string, data?: unknown) => void;
  warn: (messageFactory: () => string, data?: unknown) => void;
  info: (messageFactory: () => string, data?: unknown) => void;
  verbose: (messageFactory: () => string, data?: unknown) => void;
  log: (level: LogLevel, messageFactory: () => string, data?: unknown) => void;
}

/** On/off state of one concern, as reported by listLogConcerns */
export interface ConcernState {
  concern: string;
  enabled: boolean;
}
