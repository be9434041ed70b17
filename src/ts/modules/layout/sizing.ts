/**
 * Panel Sizing
 *
 * Sizes >= 1 are absolute cell counts; sizes in (0, 1) are a fraction of
 * the total columns (left/right) or lines (top/bottom).
 */

import type { Edge, PanelConfig, PanelManagerConfig } from '../../types';

/** Width for left/right panels, height for top/bottom */
export function isVerticalEdge(edge: Edge): boolean {
  return edge === 'left' || edge === 'right';
}

export function defaultSizeFor(edge: Edge, config: PanelManagerConfig): number {
  switch (edge) {
    case 'left':
      return config.leftWidth;
    case 'right':
      return config.rightWidth;
    case 'top':
      return config.topHeight;
    case 'bottom':
      return config.bottomHeight;
  }
}

/** Resolve a size setting to a cell count, never less than one */
export function resolveCells(size: number, totalCells: number): number {
  const cells = size >= 1 ? Math.floor(size) : Math.floor(size * totalCells);
  return Math.max(1, cells);
}

export function computeSize(
  panel: PanelConfig,
  totalCells: number,
  config: PanelManagerConfig,
): number {
  return resolveCells(panel.size ?? defaultSizeFor(panel.edge, config), totalCells);
}
