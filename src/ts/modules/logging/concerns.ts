/**
 * Logging Concerns Module
 *
 * Per-module log filtering. Concerns start from the environment:
 *   EDGEDOCK_LOG=controller,layout   - enable logging for those modules
 *   EDGEDOCK_LOG=*                   - enable all modules
 *   EDGEDOCK_LOG_LEVEL=verbose       - global minimum level
 */

import { LogLevel, LOG_LEVEL_NAMES } from './types';
import type { ConcernState } from './types';

const CONCERNS_ENV = 'EDGEDOCK_LOG';
const LEVEL_ENV = 'EDGEDOCK_LOG_LEVEL';

const KNOWN_CONCERNS = [
  'main',
  'registry',
  'locator',
  'layout',
  'controller',
  'statusline',
  'commands',
] as const;

let enabledConcerns: Set<string> = new Set();
let minLevel: LogLevel = LogLevel.Warn;

const LEVEL_NAMES: Record<string, LogLevel> = {
  exception: LogLevel.Exception,
  error: LogLevel.Error,
  warn: LogLevel.Warn,
  info: LogLevel.Info,
  verbose: LogLevel.Verbose,
};

export function isConcernEnabled(module: string): boolean {
  return enabledConcerns.has('*') || enabledConcerns.has(module);
}

export function getMinLevel(): LogLevel {
  return minLevel;
}

export function enableLogConcern(concern: string): void {
  enabledConcerns.add(concern);
}

export function disableLogConcern(concern: string): void {
  enabledConcerns.delete(concern);
}

/** Returns false and leaves the level unchanged for an unknown name */
export function setLogLevel(name: string): boolean {
  const level = LEVEL_NAMES[name.trim().toLowerCase()];
  if (level === undefined) {
    console.error(`[edgedock] unknown log level: ${name}. Use: exception, error, warn, info, verbose`);
    return false;
  }
  minLevel = level;
  return true;
}

export function resetLogConcerns(): void {
  enabledConcerns.clear();
  minLevel = LogLevel.Warn;
}

export function listLogConcerns(): ConcernState[] {
  return KNOWN_CONCERNS.map((concern) => ({ concern, enabled: isConcernEnabled(concern) }));
}

export function describeLogLevel(): string {
  return LOG_LEVEL_NAMES[minLevel];
}

export function initLogConcerns(env: Record<string, string | undefined> = process.env): void {
  const concerns = env[CONCERNS_ENV];
  if (concerns) {
    enabledConcerns = new Set(
      concerns
        .split(',')
        .map((c) => c.trim())
        .filter((c) => c.length > 0),
    );
  }

  const level = env[LEVEL_ENV];
  if (level) {
    setLogLevel(level);
  }
}
