/**
 * Layout Engine
 *
 * Brings a panel window in line with its configuration: docked to its
 * edge, sized, with its options applied and a close key mapped.
 * Every step is idempotent so it can run on windows the panel opened itself.
 */

import type {
  Edge,
  OptionValue,
  PanelConfig,
  PanelHost,
  PanelManagerConfig,
  WindowHandle,
} from '../../types';
import { CLOSE_KEY } from '../../constants';
import { createLogger } from '../logging';
import { computeSize, isVerticalEdge } from './sizing';
import { preserveViews, restoreViews, snapshotViews, type ViewSnapshot } from './viewState';

const log = createLogger('layout');

export interface LayoutEngine {
  computeSize(panel: PanelConfig, totalCells: number): number;
  reposition(panel: PanelConfig, win: WindowHandle): void;
  resize(panel: PanelConfig, win: WindowHandle): void;
  resolveOptions(panel: PanelConfig): Record<string, OptionValue>;
  applyOptions(panel: PanelConfig, win: WindowHandle): void;
  ensureCloseMapping(win: WindowHandle): void;
  /** reposition, resize, applyOptions and ensureCloseMapping */
  setupWindow(panel: PanelConfig, win: WindowHandle): void;
  snapshotViews(): ViewSnapshot;
  restoreViews(snapshot: ViewSnapshot): void;
  preserveViews<T>(edge: Edge | null, fn: () => Promise<T>): Promise<T>;
}

function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function createLayoutEngine(host: PanelHost, config: PanelManagerConfig): LayoutEngine {
  function shouldMove(panel: PanelConfig): boolean {
    return panel.move ?? config.move;
  }

  const engine: LayoutEngine = {
    computeSize(panel: PanelConfig, totalCells: number): number {
      return computeSize(panel, totalCells, config);
    },

    reposition(panel: PanelConfig, win: WindowHandle): void {
      if (!shouldMove(panel)) return;

      const previous = host.currentWindow();
      host.moveToEdge(win, panel.edge);
      if (host.isWindowValid(previous) && host.currentWindow() !== previous) {
        host.setCurrentWindow(previous);
      }
    },

    resize(panel: PanelConfig, win: WindowHandle): void {
      if (isVerticalEdge(panel.edge)) {
        host.setWidth(win, engine.computeSize(panel, host.totalColumns()));
      } else {
        host.setHeight(win, engine.computeSize(panel, host.totalLines()));
      }
    },

    resolveOptions(panel: PanelConfig): Record<string, OptionValue> {
      return { ...config.options, ...panel.options };
    },

    applyOptions(panel: PanelConfig, win: WindowHandle): void {
      const content = host.contentOf(win);
      for (const [key, value] of Object.entries(engine.resolveOptions(panel))) {
        // An option is usually valid for only one of the two scopes
        try {
          host.setWindowOption(win, key, value);
        } catch (e) {
          log.verbose(() => `${panel.name}: window option ${key} skipped (${describeError(e)})`);
        }
        try {
          host.setContentOption(content, key, value);
        } catch (e) {
          log.verbose(() => `${panel.name}: content option ${key} skipped (${describeError(e)})`);
        }
      }
    },

    ensureCloseMapping(win: WindowHandle): void {
      const content = host.contentOf(win);
      if (host.hasMapping(content, CLOSE_KEY)) return;
      host.mapCloseKey(content, CLOSE_KEY);
    },

    setupWindow(panel: PanelConfig, win: WindowHandle): void {
      engine.reposition(panel, win);
      engine.resize(panel, win);
      engine.applyOptions(panel, win);
      engine.ensureCloseMapping(win);
      log.verbose(() => `Set up ${panel.name} in window ${win}`);
    },

    snapshotViews(): ViewSnapshot {
      return snapshotViews(host);
    },

    restoreViews(snapshot: ViewSnapshot): void {
      restoreViews(host, snapshot);
    },

    preserveViews<T>(edge: Edge | null, fn: () => Promise<T>): Promise<T> {
      return preserveViews(host, edge, fn);
    },
  };

  return engine;
}
