export { createWindowLocator } from './windowLocator';
export type { WindowLocator } from './windowLocator';
