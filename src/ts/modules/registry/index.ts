export { createPanelRegistry } from './panelRegistry';
export type { PanelRegistry } from './panelRegistry';
export { normalizePanel, isEdge, isValidSize, toAction, toPatterns } from './normalize';
