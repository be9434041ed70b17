import type { Scheduler } from '../../types';

/** Scheduler backed by real timers, yielding to the event loop on every sleep */
export const timerScheduler: Scheduler = {
  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  },
  now(): number {
    return Date.now();
  },
};
