/**
 * Exclusivity Controller
 *
 * Keeps at most one panel visible per edge. Opening or switching to a panel
 * closes the other live panels at its edge, except those matched by the
 * target's exemptFrom patterns, and waits until they are really gone.
 *
 * Edge state is never stored: every operation asks the locator which panels
 * are live. Operations are queued so none starts while another is still
 * waiting for a close; panel actions must not call back into them.
 */

import type {
  Edge,
  NotificationSink,
  PanelConfig,
  PanelHost,
  PanelManagerConfig,
  Scheduler,
  WindowHandle,
} from '../../types';
import { EDGES } from '../../constants';
import { ConfigError } from '../../errors';
import { createLogger } from '../logging';
import { isEdge, type PanelRegistry } from '../registry';
import type { WindowLocator } from '../locator';
import type { LayoutEngine } from '../layout';
import { invokeAction } from './actions';
import { waitForClose } from './waitForClose';

const log = createLogger('controller');

export interface ExclusivityControllerDeps {
  host: PanelHost;
  registry: PanelRegistry;
  locator: WindowLocator;
  layout: LayoutEngine;
  config: PanelManagerConfig;
  scheduler: Scheduler;
  sink: NotificationSink;
}

export interface ExclusivityController {
  /** Same as switch */
  open(name: string): Promise<void>;
  /** Close other panels at the edge, then focus the panel or open it */
  switch(name: string): Promise<void>;
  close(name: string): Promise<void>;
  /** Like switch, but closes the panel when it was already open */
  toggle(name: string): Promise<void>;
  closeSide(edge: Edge): Promise<void>;
  closeSideExcept(edge: Edge, exceptName: string): Promise<void>;
  closeAll(): Promise<void>;
  /** Apply layout to a panel window opened outside the controller */
  setupWindow(name: string, win: WindowHandle): void;
  /** setupWindow for the focused window, when it is a panel */
  setupCurrentPanelWindow(): boolean;
  /** Close the tab page, or quit, when only panels are left in it */
  closeTabIfOnlyPanels(): boolean;
  /** Names of the panels live at an edge, in registration order */
  livePanels(edge: Edge): string[];
}

/** Whether `target` leaves `other` open when it takes over their edge */
export function isExempt(target: PanelConfig, other: string): boolean {
  return target.exemptFrom.some((pattern) => pattern.test(other));
}

export function createExclusivityController(
  deps: ExclusivityControllerDeps,
): ExclusivityController {
  const { host, registry, locator, layout, config, scheduler, sink } = deps;

  let queue: Promise<void> = Promise.resolve();

  function serialize(operation: () => Promise<void>): Promise<void> {
    const run = queue.then(operation);
    // Failures reach the caller through run; the queue only keeps order
    queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  function requireEdge(edge: Edge): Edge {
    if (!isEdge(edge)) {
      throw new ConfigError(`Unrecognized edge "${String(edge)}" (expected ${EDGES.join(', ')})`);
    }
    return edge;
  }

  function windowOf(found: Map<WindowHandle, string>, name: string): WindowHandle | null {
    for (const [win, foundName] of found) {
      if (foundName === name) return win;
    }
    return null;
  }

  function focus(win: WindowHandle): void {
    if (host.isWindowValid(win) && host.currentWindow() !== win) {
      host.setCurrentWindow(win);
    }
  }

  async function closePanel(panel: PanelConfig, win: WindowHandle): Promise<void> {
    if (panel.closeAction) {
      await invokeAction(host, panel.closeAction);
    } else {
      host.closeWindow(win);
    }

    const polls = await waitForClose(locator, panel, scheduler, {
      pollIntervalMs: config.closePollIntervalMs,
      timeoutMs: config.closeTimeoutMs,
    });
    log.info(() => `Closed ${panel.name}${polls > 0 ? ` after ${polls} polls` : ''}`);
  }

  /** Close windows in order, first moving focus off any of them */
  async function closeWindows(targets: Array<[WindowHandle, string]>): Promise<void> {
    if (targets.length === 0) return;

    const current = host.currentWindow();
    if (targets.some(([win]) => win === current)) {
      host.focusPrevious();
    }

    for (const [win, name] of targets) {
      await closePanel(registry.require(name), win);
    }
  }

  function othersToClose(
    target: PanelConfig,
    found: Map<WindowHandle, string>,
  ): Array<[WindowHandle, string]> {
    return [...found].filter(([, name]) => name !== target.name && !isExempt(target, name));
  }

  async function openPanel(panel: PanelConfig): Promise<void> {
    await invokeAction(host, panel.openAction);

    const win = locator.resolve(panel);
    if (win === null) {
      // Layout is applied later through setupCurrentPanelWindow
      log.info(() => `${panel.name} has no window yet after opening`);
      return;
    }
    layout.setupWindow(panel, win);
    focus(win);
    log.info(() => `Opened ${panel.name} in window ${win}`);
  }

  async function closeLiveAt(edge: Edge, exceptName: string | null): Promise<void> {
    const found = locator.findAllAtEdge(edge);
    await closeWindows([...found].filter(([, name]) => name !== exceptName));
  }

  const controller: ExclusivityController = {
    open(name: string): Promise<void> {
      return controller.switch(name);
    },

    async switch(name: string): Promise<void> {
      const panel = registry.require(name);

      await serialize(async () => {
        await layout.preserveViews(panel.edge, async () => {
          const found = locator.findAllAtEdge(panel.edge);
          await closeWindows(othersToClose(panel, found));

          const existing = windowOf(found, name);
          if (existing !== null) {
            focus(existing);
          } else {
            await openPanel(panel);
          }
        });
        sink.setActive(panel.edge, name);
      });
    },

    async close(name: string): Promise<void> {
      const panel = registry.require(name);

      await serialize(async () => {
        await layout.preserveViews(panel.edge, async () => {
          const win = locator.resolve(panel);
          if (win !== null) {
            await closeWindows([[win, name]]);
          }
        });
        sink.setActive(panel.edge, null);
      });
    },

    async toggle(name: string): Promise<void> {
      const panel = registry.require(name);

      await serialize(async () => {
        let opened = false;
        await layout.preserveViews(panel.edge, async () => {
          const found = locator.findAllAtEdge(panel.edge);
          const existing = windowOf(found, name);
          const targets = othersToClose(panel, found);
          if (existing !== null) {
            targets.push([existing, name]);
          }
          await closeWindows(targets);

          if (existing === null) {
            await openPanel(panel);
            opened = true;
          }
        });
        sink.setActive(panel.edge, opened ? name : null);
      });
    },

    async closeSide(edge: Edge): Promise<void> {
      requireEdge(edge);

      await serialize(async () => {
        await layout.preserveViews(null, () => closeLiveAt(edge, null));
        sink.setActive(edge, null);
      });
    },

    async closeSideExcept(edge: Edge, exceptName: string): Promise<void> {
      requireEdge(edge);

      await serialize(async () => {
        await layout.preserveViews(null, () => closeLiveAt(edge, exceptName));
        const kept = controller.livePanels(edge).includes(exceptName);
        sink.setActive(edge, kept ? exceptName : null);
      });
    },

    async closeAll(): Promise<void> {
      await serialize(async () => {
        await layout.preserveViews(null, async () => {
          for (const edge of EDGES) {
            await closeLiveAt(edge, null);
          }
        });
        for (const edge of EDGES) {
          sink.setActive(edge, null);
        }
      });
    },

    setupWindow(name: string, win: WindowHandle): void {
      layout.setupWindow(registry.require(name), win);
    },

    setupCurrentPanelWindow(): boolean {
      const current = locator.currentPanel();
      if (!current) return false;

      sink.setActive(current.panel.edge, current.panel.name);
      layout.setupWindow(current.panel, current.window);
      return true;
    },

    closeTabIfOnlyPanels(): boolean {
      const windows = host.listWindows();
      if (windows.some((win) => !locator.isPanel(win))) return false;

      if (host.tabPageCount() > 1) {
        log.info(() => 'Only panels left, closing tab page');
        host.closeTabPage();
      } else {
        log.info(() => 'Only panels left, quitting');
        host.quit();
      }
      return true;
    },

    livePanels(edge: Edge): string[] {
      return [...locator.findAllAtEdge(edge).values()];
    },
  };

  return controller;
}
