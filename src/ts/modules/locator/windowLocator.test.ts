import { describe, expect, it } from 'vitest';
import { createWindowLocator } from './windowLocator';
import { createPanelRegistry } from '../registry';
import { MemoryHost } from '../../testing/memoryHost';

function setup() {
  const host = new MemoryHost();
  const registry = createPanelRegistry();
  const locator = createWindowLocator(registry, host);
  return { host, registry, locator };
}

describe('createWindowLocator', () => {
  it('resolves predicate panels to the first matching window in host order', () => {
    const { host, registry, locator } = setup();
    const tree = registry.register({ name: 'tree', edge: 'left', filter: host.byTag('tree'), open: 'x' });
    const first = host.addWindow('tree');
    host.addWindow('tree');

    expect(locator.resolve(tree)).toBe(first);
  });

  it('returns null when no window matches', () => {
    const { host, registry, locator } = setup();
    const tree = registry.register({ name: 'tree', edge: 'left', filter: host.byTag('tree'), open: 'x' });

    expect(locator.resolve(tree)).toBeNull();
  });

  it('invokes custom resolvers directly', () => {
    const { host, registry, locator } = setup();
    const win = host.addWindow('quickfix');
    const qf = registry.register({ name: 'qf', edge: 'bottom', getWindow: () => win, open: 'x' });
    const none = registry.register({ name: 'none', edge: 'bottom', getWindow: () => undefined, open: 'x' });

    expect(locator.resolve(qf)).toBe(win);
    expect(locator.resolve(none)).toBeNull();
  });

  it('maps live windows at an edge to panel names', () => {
    const { host, registry, locator } = setup();
    registry.register({ name: 'tree', edge: 'left', filter: host.byTag('tree'), open: 'x' });
    registry.register({ name: 'undo', edge: 'left', filter: host.byTag('undo'), open: 'x' });
    registry.register({ name: 'outline', edge: 'right', filter: host.byTag('outline'), open: 'x' });
    const undo = host.addWindow('undo');
    host.addWindow('outline');

    expect([...locator.findAllAtEdge('left')]).toEqual([[undo, 'undo']]);
    expect(locator.findAllAtEdge('top').size).toBe(0);
  });

  it('detects panel windows, defaulting to the focused one', () => {
    const { host, registry, locator } = setup();
    registry.register({ name: 'tree', edge: 'left', filter: host.byTag('tree'), open: 'x' });
    const tree = host.addWindow('tree');

    expect(locator.isPanel()).toBe(true);
    expect(locator.isPanel(1)).toBe(false);
    expect(locator.isPanel(tree)).toBe(true);
  });

  it('compares resolver results when checking isPanel', () => {
    const { host, registry, locator } = setup();
    const win = host.addWindow('quickfix');
    registry.register({ name: 'qf', edge: 'bottom', getWindow: () => win, open: 'x' });

    expect(locator.isPanel(win)).toBe(true);
    expect(locator.isPanel(1)).toBe(false);
  });

  it('reports the panel owning the focused window', () => {
    const { host, registry, locator } = setup();
    const tree = registry.register({ name: 'tree', edge: 'left', filter: host.byTag('tree'), open: 'x' });
    expect(locator.currentPanel()).toBeNull();

    const win = host.addWindow('tree');
    expect(locator.currentPanel()).toEqual({ window: win, panel: tree });
  });
});
