/**
 * Close Completion
 *
 * Some panels close asynchronously across several host event-loop turns,
 * so a close only counts once the panel's window is no longer found.
 */

import type { PanelConfig, Scheduler } from '../../types';
import { CloseTimeoutError } from '../../errors';
import type { WindowLocator } from '../locator';

export interface WaitForCloseOptions {
  pollIntervalMs: number;
  /** null polls until the window is gone */
  timeoutMs: number | null;
}

function isLive(locator: WindowLocator, panel: PanelConfig): boolean {
  for (const name of locator.findAllAtEdge(panel.edge).values()) {
    if (name === panel.name) return true;
  }
  return false;
}

/** Resolves with the number of polls that found the panel still live */
export async function waitForClose(
  locator: WindowLocator,
  panel: PanelConfig,
  scheduler: Scheduler,
  options: WaitForCloseOptions,
): Promise<number> {
  const started = scheduler.now();
  let polls = 0;

  while (isLive(locator, panel)) {
    const waited = scheduler.now() - started;
    if (options.timeoutMs !== null && waited >= options.timeoutMs) {
      throw new CloseTimeoutError(panel.name, waited);
    }
    polls += 1;
    await scheduler.sleep(options.pollIntervalMs);
  }

  return polls;
}
