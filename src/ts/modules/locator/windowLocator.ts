/**
 * Window Locator
 *
 * Resolves registered panels to live host windows. Nothing is cached:
 * host window handles can be invalidated or reused between calls.
 */

import type { Edge, PanelConfig, PanelHost, PanelWindow, WindowHandle } from '../../types';
import type { PanelRegistry } from '../registry';

export interface WindowLocator {
  /**
   * Live window of a panel. Predicate panels are tested against windows in
   * host enumeration order and the first match wins.
   */
  resolve(panel: PanelConfig): WindowHandle | null;
  /** Live windows at an edge mapped to their panel names */
  findAllAtEdge(edge: Edge): Map<WindowHandle, string>;
  /** Whether a window (default: the focused one) belongs to any panel */
  isPanel(win?: WindowHandle): boolean;
  /** Panel owning the focused window */
  currentPanel(): PanelWindow | null;
}

export function createWindowLocator(registry: PanelRegistry, host: PanelHost): WindowLocator {
  function resolve(panel: PanelConfig): WindowHandle | null {
    const locator = panel.locator;
    if (locator.kind === 'resolver') {
      return locator.resolve() ?? null;
    }
    for (const win of host.listWindows()) {
      if (locator.matches(win)) return win;
    }
    return null;
  }

  function matchesWindow(panel: PanelConfig, win: WindowHandle): boolean {
    const locator = panel.locator;
    if (locator.kind === 'resolver') {
      return locator.resolve() === win;
    }
    return locator.matches(win);
  }

  return {
    resolve,

    findAllAtEdge(edge: Edge): Map<WindowHandle, string> {
      const found = new Map<WindowHandle, string>();
      for (const name of registry.namesAtEdge(edge)) {
        const panel = registry.get(name);
        if (!panel) continue;
        const win = resolve(panel);
        if (win !== null) {
          found.set(win, name);
        }
      }
      return found;
    },

    isPanel(win?: WindowHandle): boolean {
      const target = win ?? host.currentWindow();
      return registry.all().some((panel) => matchesWindow(panel, target));
    },

    currentPanel(): PanelWindow | null {
      const current = host.currentWindow();
      for (const panel of registry.all()) {
        if (resolve(panel) === current) {
          return { window: current, panel };
        }
      }
      return null;
    },
  };
}
