/**
 * Constants
 *
 * Edge names, default sizing and option values, and polling intervals.
 */

import type { Edge, OptionValue, StatusLineOptions } from './types';

// =============================================================================
// Edges
// =============================================================================

/** Every recognized edge, in the order closeAll visits them */
export const EDGES: readonly Edge[] = ['left', 'right', 'top', 'bottom'];

/** Edges whose panels shift neighbouring viewports when opened or closed */
export const VIEW_DISTURBING_EDGES: ReadonlySet<Edge> = new Set<Edge>(['top', 'bottom']);

// =============================================================================
// Layout Defaults
// =============================================================================

export const DEFAULT_LEFT_WIDTH = 40;
export const DEFAULT_RIGHT_WIDTH = 40;
export const DEFAULT_TOP_HEIGHT = 0.4;
export const DEFAULT_BOTTOM_HEIGHT = 0.4;

/** Options applied to every panel window and its content */
export const DEFAULT_PANEL_OPTIONS: Readonly<Record<string, OptionValue>> = {
  winfixwidth: false,
  winfixheight: false,
  number: false,
  foldcolumn: '0',
  signcolumn: 'no',
  colorcolumn: '0',
  bufhidden: 'hide',
  buflisted: false,
};

/** Key mapped to close a panel when its content has no mapping for it */
export const CLOSE_KEY = 'q';

// =============================================================================
// Close Polling
// =============================================================================

/** Interval between checks that a closed panel's window is gone */
export const CLOSE_POLL_INTERVAL_MS = 30;

// =============================================================================
// Status Line
// =============================================================================

export const DEFAULT_STATUS_LINE: Readonly<StatusLineOptions> = {
  separator: ' ',
  activeMarker: '%#EdgedockActive#',
  inactiveMarker: '%#EdgedockInactive#',
  showNames: false,
  defaultIcon: '󰍉',
  edge: null,
};

// =============================================================================
// Commands
// =============================================================================

export const COMMAND_PREFIX = 'Panel';
