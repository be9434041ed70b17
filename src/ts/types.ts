/**
 * Type Definitions
 *
 * Shared interfaces and types used across all modules.
 * This file defines the contract between edgedock and the windowing host.
 */

// =============================================================================
// Geometry Types
// =============================================================================

/** Docking edge of the editing surface */
export type Edge = 'left' | 'right' | 'top' | 'bottom';

/** Host window identifier */
export type WindowHandle = number;

/** Host content (buffer) identifier */
export type ContentHandle = number;

/** Value accepted by a window- or content-scoped option */
export type OptionValue = string | number | boolean;

/** Opaque per-window cursor/scroll snapshot produced by the host */
export type ViewState = Readonly<Record<string, unknown>>;

// =============================================================================
// Panel Types
// =============================================================================

/** Something a panel does to open or close itself */
export type Action =
  | { kind: 'command'; command: string }
  | { kind: 'callback'; run: () => void | Promise<void> };

/** How a panel's window is found among the host's windows */
export type WindowLocatorSpec =
  | { kind: 'resolver'; resolve: () => WindowHandle | null | undefined }
  | { kind: 'predicate'; matches: (win: WindowHandle) => boolean };

/** Registered panel, normalized and frozen by the registry */
export interface PanelConfig {
  readonly name: string;
  readonly edge: Edge;
  readonly locator: WindowLocatorSpec;
  readonly openAction: Action;
  /** Absent means the host's generic close-window primitive */
  readonly closeAction: Action | null;
  /** >= 1 is absolute cells, (0, 1) is a fraction of the total dimension */
  readonly size: number | null;
  /** Overrides PanelManagerConfig.move when set */
  readonly move: boolean | null;
  readonly options: Readonly<Record<string, OptionValue>>;
  readonly exemptFrom: readonly RegExp[];
  readonly icon: string | null;
}

/** Panel description as written by the user */
export interface PanelInput {
  name?: string;
  edge?: string;
  /** Predicate tested against every window in the current view */
  filter?: (win: WindowHandle) => boolean;
  /** Custom resolver, takes precedence over filter */
  getWindow?: () => WindowHandle | null | undefined;
  open?: string | (() => void | Promise<void>);
  close?: string | (() => void | Promise<void>);
  size?: number;
  move?: boolean;
  options?: Record<string, OptionValue>;
  exemptFrom?: string | RegExp | ReadonlyArray<string | RegExp>;
  icon?: string;
}

/** Live panel window paired with its configuration */
export interface PanelWindow {
  window: WindowHandle;
  panel: PanelConfig;
}

// =============================================================================
// Configuration Types
// =============================================================================

/** Status-line rendering options */
export interface StatusLineOptions {
  separator: string;
  /** Highlight marker placed before the active panel's segment */
  activeMarker: string;
  /** Highlight marker placed before inactive segments */
  inactiveMarker: string;
  showNames: boolean;
  defaultIcon: string;
  /** Only render panels docked at this edge */
  edge: Edge | null;
}

/** Global configuration, fully resolved */
export interface PanelManagerConfig {
  leftWidth: number;
  rightWidth: number;
  topHeight: number;
  bottomHeight: number;
  /** Reposition panels to their edge when they are set up */
  move: boolean;
  options: Record<string, OptionValue>;
  /** Close the tab page (or quit) when only panels remain in it */
  closeTabOnLastPanel: boolean;
  statusline: StatusLineOptions | null;
  closePollIntervalMs: number;
  /** null waits for a close to complete indefinitely */
  closeTimeoutMs: number | null;
}

/** User-facing configuration passed to setupPanels */
export interface PanelManagerOptions {
  leftWidth?: number;
  rightWidth?: number;
  topHeight?: number;
  bottomHeight?: number;
  move?: boolean;
  options?: Record<string, OptionValue>;
  closeTabOnLastPanel?: boolean;
  statusline?: boolean | Partial<StatusLineOptions>;
  closePollIntervalMs?: number;
  closeTimeoutMs?: number | null;
  /** Keyed by panel name, or a list whose items carry their own name */
  panels?: Record<string, Omit<PanelInput, 'name'>> | PanelInput[];
}

// =============================================================================
// Host Contract
// =============================================================================

/** Host events edgedock reacts to */
export type HostEvent = 'contentShown' | 'contentHidden' | 'windowEntered';

/** User command as registered with the host */
export interface CommandDefinition {
  name: string;
  /** Number of arguments: exactly one, or none */
  nargs: 0 | 1;
  run: (arg: string) => Promise<void>;
  complete: (argLead: string) => string[];
}

/** Windowing host primitives consumed by edgedock */
export interface PanelHost {
  /** Windows in the current view, in host enumeration order */
  listWindows(): WindowHandle[];
  currentWindow(): WindowHandle;
  setCurrentWindow(win: WindowHandle): void;
  /** Move focus to the previously focused window */
  focusPrevious(): void;
  isWindowValid(win: WindowHandle): boolean;

  totalColumns(): number;
  totalLines(): number;
  setWidth(win: WindowHandle, columns: number): void;
  setHeight(win: WindowHandle, lines: number): void;
  /** Move a window so it spans the full extent of an edge */
  moveToEdge(win: WindowHandle, edge: Edge): void;
  closeWindow(win: WindowHandle): void;

  contentOf(win: WindowHandle): ContentHandle;
  /** Throws when the option is unknown for windows */
  setWindowOption(win: WindowHandle, key: string, value: OptionValue): void;
  /** Throws when the option is unknown for content */
  setContentOption(content: ContentHandle, key: string, value: OptionValue): void;
  hasMapping(content: ContentHandle, lhs: string): boolean;
  /** Map lhs on the content to the host's close-current-window action */
  mapCloseKey(content: ContentHandle, lhs: string): void;

  saveView(win: WindowHandle): ViewState;
  restoreView(win: WindowHandle, view: ViewState): void;
  /** True when the host keeps viewports stable across splits */
  hasStableViewports(): boolean;

  /** Run a host command verbatim */
  execute(command: string): void;

  tabPageCount(): number;
  closeTabPage(): void;
  quit(): void;

  on?(event: HostEvent, listener: () => void): () => void;
  /** Defer a callback to a later turn of the host event loop */
  schedule?(callback: () => void): void;
  createCommand?(definition: CommandDefinition): void;
}

/** Cooperative timer used while polling for closes */
export interface Scheduler {
  sleep(ms: number): Promise<void>;
  now(): number;
}

/** Receives the active panel of an edge at every settle point */
export interface NotificationSink {
  setActive(edge: Edge, name: string | null): void;
}
