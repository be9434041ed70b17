export { defaultConfig, resolveConfig, normalizePanelInputs } from './config';
