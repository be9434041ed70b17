/**
 * Errors raised by edgedock itself. Failures from the host or from a panel's
 * own open/close actions are not wrapped and reach the caller unchanged.
 */

export type PanelErrorCode = 'CONFIG' | 'UNKNOWN_PANEL' | 'CLOSE_TIMEOUT';

export class PanelError extends Error {
  readonly code: PanelErrorCode;

  constructor(code: PanelErrorCode, message: string) {
    super(message);
    this.name = 'PanelError';
    this.code = code;
  }
}

/** Malformed panel registration or global configuration */
export class ConfigError extends PanelError {
  constructor(message: string) {
    super('CONFIG', message);
    this.name = 'ConfigError';
  }
}

export class UnknownPanelError extends PanelError {
  readonly panelName: string;

  constructor(panelName: string) {
    super('UNKNOWN_PANEL', `Unknown panel: ${panelName}`);
    this.name = 'UnknownPanelError';
    this.panelName = panelName;
  }
}

/** A closed panel's window was still live after the configured bound */
export class CloseTimeoutError extends PanelError {
  readonly panelName: string;
  readonly waitedMs: number;

  constructor(panelName: string, waitedMs: number) {
    super('CLOSE_TIMEOUT', `Panel ${panelName} still open after ${waitedMs}ms`);
    this.name = 'CloseTimeoutError';
    this.panelName = panelName;
    this.waitedMs = waitedMs;
  }
}

export function isPanelError(value: unknown): value is PanelError {
  return value instanceof PanelError;
}
