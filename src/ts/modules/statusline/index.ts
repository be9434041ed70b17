export { createPanelStatusLine, buildSegments, renderSegments } from './statusLine';
export type { PanelStatusLine, StatusSegment } from './statusLine';
