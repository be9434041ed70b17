import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { setupPanels } from './main';
import { ConfigError, UnknownPanelError } from './errors';
import { getActivePanel, resetActivePanels } from './stores';
import { MemoryHost, createManualScheduler } from './testing/memoryHost';
import type { Edge, PanelManagerOptions } from './types';

function setup(buildOptions: (host: MemoryHost) => PanelManagerOptions = () => ({})) {
  const host = new MemoryHost({ columns: 120, lines: 40 });
  for (const tag of ['tree', 'outline', 'terminal']) {
    host.defineOpenCommand(`open ${tag}`, tag);
  }
  const events: Array<[Edge, string | null]> = [];
  const manager = setupPanels(host, buildOptions(host), {
    scheduler: createManualScheduler(() => host.tick()),
    sink: {
      setActive(edge, name) {
        events.push([edge, name]);
      },
    },
    env: {},
  });
  return { host, manager, events };
}

function treePanels(host: MemoryHost): PanelManagerOptions {
  return {
    panels: {
      tree: { edge: 'left', filter: host.byTag('tree'), open: 'open tree', icon: 'T' },
      outline: { edge: 'left', filter: host.byTag('outline'), open: 'open outline' },
    },
  };
}

describe('setupPanels', () => {
  beforeEach(() => {
    resetActivePanels();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('registers panels given as a record', () => {
    const { manager } = setup(treePanels);

    expect(manager.listPanels().map((p) => p.name)).toEqual(['tree', 'outline']);
    expect(manager.getPanel('tree')?.edge).toBe('left');
  });

  it('registers panels given as a list', () => {
    const { manager } = setup((host) => ({
      panels: [{ name: 'terminal', edge: 'bottom', filter: host.byTag('terminal'), open: 'open terminal' }],
    }));

    expect(manager.getPanel('terminal')?.edge).toBe('bottom');
  });

  it('rejects invalid options before touching the host', () => {
    const host = new MemoryHost();

    expect(() => setupPanels(host, { leftWidth: 0 }, { env: {} })).toThrow(ConfigError);
    expect(host.createdCommands).toEqual([]);
    expect(host.listenerCount('contentShown')).toBe(0);
  });

  it('registers user commands on the host', () => {
    const { host } = setup(treePanels);

    expect(host.createdCommands.map((c) => c.name)).toEqual([
      'Panel',
      'PanelOpen',
      'PanelSwitch',
      'PanelToggle',
      'PanelClose',
      'PanelCloseSide',
      'PanelCloseAll',
    ]);
  });

  it('publishes settle points to the store and the given sink', async () => {
    const { host, manager, events } = setup(treePanels);

    await manager.open('tree');
    await manager.switch('outline');

    expect(host.tags()).toEqual(['editor', 'outline']);
    expect(getActivePanel('left')).toBe('outline');
    expect(events).toEqual([
      ['left', 'tree'],
      ['left', 'outline'],
    ]);
    expect(manager.currentPanel()?.panel.name).toBe('outline');
  });

  it('rejects unknown panel names', async () => {
    const { manager } = setup(treePanels);

    await expect(manager.toggle('missing')).rejects.toThrow(UnknownPanelError);
  });

  it('sets up panel windows the host shows on its own', () => {
    const { host, manager, events } = setup(treePanels);
    const tree = host.addWindow('tree');

    host.emit('contentShown');
    expect(host.window(tree)?.width).toBeNull();

    host.flushScheduled();
    expect(host.window(tree)?.width).toBe(40);
    expect(host.window(tree)?.edge).toBe('left');
    expect(host.hasMapping(host.contentOf(tree), 'q')).toBe(true);
    expect(manager.isPanel(tree)).toBe(true);
    expect(events).toEqual([['left', 'tree']]);
  });

  it('ignores shown content outside any panel', () => {
    const { host, events } = setup(treePanels);
    const other = host.addWindow('scratch');

    host.emit('contentHidden');
    host.flushScheduled();

    expect(host.window(other)?.width).toBeNull();
    expect(events).toEqual([]);
  });

  it('logs failures from deferred setup instead of throwing', () => {
    const { host } = setup(treePanels);
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(host, 'setWidth').mockImplementation(() => {
      throw new Error('boom');
    });
    host.addWindow('tree');

    host.emit('contentShown');
    expect(() => host.flushScheduled()).not.toThrow();

    expect(consoleError).toHaveBeenCalledTimes(1);
    expect(consoleError.mock.calls[0]?.[0]).toMatch(/\[main\] setup panel window: boom$/);
  });

  it('quits when only panels remain and the option is on', async () => {
    const { host, manager } = setup((h) => ({ ...treePanels(h), closeTabOnLastPanel: true }));
    await manager.open('tree');

    host.closeWindow(1);
    host.emit('windowEntered');

    expect(host.quitCalled).toBe(true);
    expect(host.tabClosed).toBe(0);
  });

  it('closes the tab page instead when other tabs exist', async () => {
    const { host, manager } = setup((h) => ({ ...treePanels(h), closeTabOnLastPanel: true }));
    host.tabPages = 2;
    await manager.open('tree');

    host.closeWindow(1);
    host.emit('windowEntered');

    expect(host.tabClosed).toBe(1);
    expect(host.quitCalled).toBe(false);
  });

  it('does not watch window entry unless asked', () => {
    const { host } = setup(treePanels);

    expect(host.listenerCount('windowEntered')).toBe(0);
    expect(host.listenerCount('contentShown')).toBe(1);
  });

  it('detaches listeners on dispose', () => {
    const { host, manager } = setup((h) => ({ ...treePanels(h), closeTabOnLastPanel: true }));

    manager.dispose();

    expect(host.listenerCount('contentShown')).toBe(0);
    expect(host.listenerCount('contentHidden')).toBe(0);
    expect(host.listenerCount('windowEntered')).toBe(0);
  });

  it('refreshes the status line for panels registered later', async () => {
    const { host, manager } = setup(() => ({
      statusline: { activeMarker: '[+]', inactiveMarker: '[-]' },
    }));
    const statusLine = manager.statusLine;
    if (!statusLine) throw new Error('status line not enabled');
    const unlisten = statusLine.$text.listen(() => {});
    expect(statusLine.$text.get()).toBe('');

    manager.register({ name: 'tree', edge: 'left', filter: host.byTag('tree'), open: 'open tree', icon: 'T' });
    expect(statusLine.$text.get()).toBe('[-]T');

    await manager.open('tree');
    expect(statusLine.$text.get()).toBe('[+]T');
    unlisten();
  });

  it('has no status line by default', () => {
    const { manager } = setup();

    expect(manager.statusLine).toBeNull();
  });
});
