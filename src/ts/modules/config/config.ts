/**
 * Configuration
 *
 * Merges user options over defaults and validates the result. Panel
 * descriptions are validated separately, when the registry receives them.
 */

import type { PanelInput, PanelManagerConfig, PanelManagerOptions, StatusLineOptions } from '../../types';
import {
  CLOSE_POLL_INTERVAL_MS,
  DEFAULT_BOTTOM_HEIGHT,
  DEFAULT_LEFT_WIDTH,
  DEFAULT_PANEL_OPTIONS,
  DEFAULT_RIGHT_WIDTH,
  DEFAULT_STATUS_LINE,
  DEFAULT_TOP_HEIGHT,
} from '../../constants';
import { ConfigError } from '../../errors';
import { isEdge, isValidSize } from '../registry';

export function defaultConfig(): PanelManagerConfig {
  return {
    leftWidth: DEFAULT_LEFT_WIDTH,
    rightWidth: DEFAULT_RIGHT_WIDTH,
    topHeight: DEFAULT_TOP_HEIGHT,
    bottomHeight: DEFAULT_BOTTOM_HEIGHT,
    move: true,
    options: { ...DEFAULT_PANEL_OPTIONS },
    closeTabOnLastPanel: false,
    statusline: null,
    closePollIntervalMs: CLOSE_POLL_INTERVAL_MS,
    closeTimeoutMs: null,
  };
}

function requireSize(key: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!isValidSize(value)) {
    throw new ConfigError(`${key} must be a positive number, got ${value}`);
  }
  return value;
}

function requireBoolean(key: string, value: unknown, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${key} must be a boolean`);
  }
  return value;
}

function resolveStatusLine(value: PanelManagerOptions['statusline']): StatusLineOptions | null {
  if (value === undefined || value === false) return null;
  if (value === true) return { ...DEFAULT_STATUS_LINE };

  const edge = value.edge ?? null;
  if (edge !== null && !isEdge(edge)) {
    throw new ConfigError(`statusline.edge must be left, right, top or bottom, got ${String(edge)}`);
  }
  return { ...DEFAULT_STATUS_LINE, ...value, edge };
}

function resolveTimeout(value: number | null | undefined): number | null {
  if (value === undefined || value === null) return null;
  if (!isValidSize(value)) {
    throw new ConfigError(`closeTimeoutMs must be a positive number or null, got ${value}`);
  }
  return value;
}

/**
 * Resolve user options into a complete configuration.
 * The options map merges key-wise: user values win, defaults fill the rest.
 */
export function resolveConfig(options: PanelManagerOptions = {}): PanelManagerConfig {
  const defaults = defaultConfig();
  return {
    leftWidth: requireSize('leftWidth', options.leftWidth, defaults.leftWidth),
    rightWidth: requireSize('rightWidth', options.rightWidth, defaults.rightWidth),
    topHeight: requireSize('topHeight', options.topHeight, defaults.topHeight),
    bottomHeight: requireSize('bottomHeight', options.bottomHeight, defaults.bottomHeight),
    move: requireBoolean('move', options.move, defaults.move),
    options: { ...defaults.options, ...(options.options ?? {}) },
    closeTabOnLastPanel: requireBoolean(
      'closeTabOnLastPanel',
      options.closeTabOnLastPanel,
      defaults.closeTabOnLastPanel,
    ),
    statusline: resolveStatusLine(options.statusline),
    closePollIntervalMs: requireSize(
      'closePollIntervalMs',
      options.closePollIntervalMs,
      defaults.closePollIntervalMs,
    ),
    closeTimeoutMs: resolveTimeout(options.closeTimeoutMs),
  };
}

/**
 * Flatten the panels option. The record form takes names from its keys;
 * each item of the list form must carry its own name.
 */
export function normalizePanelInputs(panels: PanelManagerOptions['panels']): PanelInput[] {
  if (panels === undefined) return [];
  if (Array.isArray(panels)) {
    return panels.map((panel, i) => {
      if (!panel.name) {
        throw new ConfigError(`Panel at index ${i} must include a "name" field`);
      }
      return panel;
    });
  }
  return Object.entries(panels).map(([name, attrs]) => ({ ...attrs, name }));
}
