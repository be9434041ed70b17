/**
 * Layout Module
 *
 * Panel geometry, options and view preservation.
 */

export { createLayoutEngine } from './layoutEngine';
export type { LayoutEngine } from './layoutEngine';
export { computeSize, defaultSizeFor, isVerticalEdge, resolveCells } from './sizing';
export { snapshotViews, restoreViews, preserveViews } from './viewState';
export type { ViewSnapshot } from './viewState';
