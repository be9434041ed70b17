/**
 * edgedock
 *
 * Edge-docked panel manager: keeps one panel per edge of an editing surface.
 * Main entry point - wires together all modules over a windowing host.
 */

import type {
  Edge,
  HostEvent,
  NotificationSink,
  PanelConfig,
  PanelHost,
  PanelInput,
  PanelManagerConfig,
  PanelManagerOptions,
  PanelWindow,
  Scheduler,
  WindowHandle,
} from './types';
import { createLogger, initLogConcerns } from './modules/logging';
import { normalizePanelInputs, resolveConfig } from './modules/config';
import { createPanelRegistry, type PanelRegistry } from './modules/registry';
import { createWindowLocator } from './modules/locator';
import { createLayoutEngine } from './modules/layout';
import {
  createExclusivityController,
  timerScheduler,
  type ExclusivityController,
} from './modules/controller';
import { createPanelStatusLine, type PanelStatusLine } from './modules/statusline';
import { createPanelCommands, registerCommands } from './modules/commands';
import { storeNotificationSink } from './stores';
import { isPanelError } from './errors';

const log = createLogger('main');

export interface PanelManager {
  readonly config: PanelManagerConfig;
  readonly registry: PanelRegistry;
  readonly controller: ExclusivityController;
  /** Present when the statusline option is enabled */
  readonly statusLine: PanelStatusLine | null;

  open(name: string): Promise<void>;
  switch(name: string): Promise<void>;
  close(name: string): Promise<void>;
  toggle(name: string): Promise<void>;
  closeSide(edge: Edge): Promise<void>;
  closeSideExcept(edge: Edge, exceptName: string): Promise<void>;
  closeAll(): Promise<void>;
  isPanel(win?: WindowHandle): boolean;
  currentPanel(): PanelWindow | null;
  listPanels(): PanelConfig[];
  getPanel(name: string): PanelConfig | undefined;
  register(input: PanelInput): PanelConfig;
  setupWindow(name: string, win: WindowHandle): void;
  setupCurrentPanelWindow(): boolean;
  closeTabIfOnlyPanels(): boolean;
  /** Detach host event listeners */
  dispose(): void;
}

export interface SetupDeps {
  scheduler?: Scheduler;
  /** Receives settle-point notifications alongside $activePanels */
  sink?: NotificationSink;
  env?: Record<string, string | undefined>;
}

function combineSinks(sinks: NotificationSink[]): NotificationSink {
  return {
    setActive(edge, name) {
      for (const sink of sinks) sink.setActive(edge, name);
    },
  };
}

/** Run a host-event handler, reporting failures no caller could receive */
function guarded(label: string, handler: () => void): () => void {
  return () => {
    try {
      handler();
    } catch (e) {
      if (isPanelError(e)) {
        log.warn(() => `${label}: ${e.message}`);
      } else if (e instanceof Error) {
        log.exception(e, label);
      } else {
        log.error(() => `${label}: ${String(e)}`);
      }
    }
  };
}

/**
 * Resolve configuration, register panels, and attach to the host's events
 * and command registry.
 */
export function setupPanels(
  host: PanelHost,
  options: PanelManagerOptions = {},
  deps: SetupDeps = {},
): PanelManager {
  initLogConcerns(deps.env);

  const config = resolveConfig(options);
  const registry = createPanelRegistry();
  for (const input of normalizePanelInputs(options.panels)) {
    registry.register(input);
  }

  const locator = createWindowLocator(registry, host);
  const layout = createLayoutEngine(host, config);
  const statusLine = config.statusline ? createPanelStatusLine(registry, config.statusline) : null;
  const controller = createExclusivityController({
    host,
    registry,
    locator,
    layout,
    config,
    scheduler: deps.scheduler ?? timerScheduler,
    sink: combineSinks(deps.sink ? [storeNotificationSink, deps.sink] : [storeNotificationSink]),
  });

  registerCommands(host, createPanelCommands(registry, controller));

  const unsubscribers: Array<() => void> = [];
  const schedule = (callback: () => void): void => {
    if (host.schedule) {
      host.schedule(callback);
    } else {
      setTimeout(callback, 0);
    }
  };
  const listen = (event: HostEvent, listener: () => void): void => {
    if (host.on) unsubscribers.push(host.on(event, listener));
  };

  const reconcile = guarded('setup panel window', () => {
    if (locator.isPanel()) controller.setupCurrentPanelWindow();
  });
  // Deferred so the host finishes laying out the window first
  listen('contentShown', () => schedule(reconcile));
  listen('contentHidden', () => schedule(reconcile));

  if (config.closeTabOnLastPanel) {
    listen(
      'windowEntered',
      guarded('close tab on last panel', () => {
        controller.closeTabIfOnlyPanels();
      }),
    );
  }

  log.info(() => `Set up ${registry.all().length} panels`);

  return {
    config,
    registry,
    controller,
    statusLine,

    open: (name) => controller.open(name),
    switch: (name) => controller.switch(name),
    close: (name) => controller.close(name),
    toggle: (name) => controller.toggle(name),
    closeSide: (edge) => controller.closeSide(edge),
    closeSideExcept: (edge, exceptName) => controller.closeSideExcept(edge, exceptName),
    closeAll: () => controller.closeAll(),
    isPanel: (win) => locator.isPanel(win),
    currentPanel: () => locator.currentPanel(),
    listPanels: () => registry.all(),
    getPanel: (name) => registry.get(name),

    register(input: PanelInput): PanelConfig {
      const panel = registry.register(input);
      statusLine?.refresh();
      return panel;
    },

    setupWindow: (name, win) => controller.setupWindow(name, win),
    setupCurrentPanelWindow: () => controller.setupCurrentPanelWindow(),
    closeTabIfOnlyPanels: () => controller.closeTabIfOnlyPanels(),

    dispose(): void {
      for (const unsubscribe of unsubscribers.splice(0)) unsubscribe();
    },
  };
}

// =============================================================================
// Public API
// =============================================================================

export type * from './types';
export {
  PanelError,
  ConfigError,
  UnknownPanelError,
  CloseTimeoutError,
  isPanelError,
} from './errors';
export type { PanelErrorCode } from './errors';
export { EDGES } from './constants';
export {
  $activePanels,
  $activePanelNames,
  getActivePanel,
  resetActivePanels,
  storeNotificationSink,
} from './stores';
export type { ActivePanels } from './stores';
export type { PanelRegistry } from './modules/registry';
export type { ExclusivityController } from './modules/controller';
export type { PanelStatusLine, StatusSegment } from './modules/statusline';
export type { WindowLocator } from './modules/locator';
export type { LayoutEngine, ViewSnapshot } from './modules/layout';
export { createLogger, initLogConcerns, enableLogConcern, setLogLevel, LogLevel } from './modules/logging';
export type { Logger } from './modules/logging';
