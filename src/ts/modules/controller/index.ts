/**
 * Controller Module
 *
 * Edge exclusivity: open, switch, close, toggle and the bulk closes.
 */

export { createExclusivityController, isExempt } from './exclusivityController';
export type { ExclusivityController, ExclusivityControllerDeps } from './exclusivityController';
export { invokeAction } from './actions';
export { waitForClose } from './waitForClose';
export type { WaitForCloseOptions } from './waitForClose';
export { timerScheduler } from './scheduler';
