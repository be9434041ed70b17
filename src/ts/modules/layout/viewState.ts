/**
 * View Preservation
 *
 * Opening or closing a top/bottom panel shifts the viewport of every other
 * window unless the host keeps viewports stable across splits. Views are
 * snapshotted before such operations and restored after them.
 */

import type { Edge, PanelHost, ViewState, WindowHandle } from '../../types';
import { VIEW_DISTURBING_EDGES } from '../../constants';

export type ViewSnapshot = Map<WindowHandle, ViewState>;

export function snapshotViews(host: PanelHost): ViewSnapshot {
  const snapshot: ViewSnapshot = new Map();
  if (host.hasStableViewports()) return snapshot;

  for (const win of host.listWindows()) {
    snapshot.set(win, host.saveView(win));
  }
  return snapshot;
}

export function restoreViews(host: PanelHost, snapshot: ViewSnapshot): void {
  if (snapshot.size === 0) return;

  const current = host.currentWindow();
  for (const [win, view] of snapshot) {
    if (host.isWindowValid(win)) {
      host.restoreView(win, view);
    }
  }
  if (host.isWindowValid(current) && host.currentWindow() !== current) {
    host.setCurrentWindow(current);
  }
}

/**
 * Run fn with views preserved around it. A null edge means the operation
 * may touch any edge, so views are always preserved.
 */
export async function preserveViews<T>(
  host: PanelHost,
  edge: Edge | null,
  fn: () => Promise<T>,
): Promise<T> {
  if (edge !== null && !VIEW_DISTURBING_EDGES.has(edge)) {
    return fn();
  }

  const snapshot = snapshotViews(host);
  try {
    return await fn();
  } finally {
    restoreViews(host, snapshot);
  }
}
