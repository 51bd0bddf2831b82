import type { Scheduler } from './types';

/** Largest delay a single Node timer honours; longer delays fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Scheduler backed by Node timers. Callbacks run on a later turn of the
 * event loop, never synchronously inside `after`. Delays beyond a single
 * timer's range are split across chained timers.
 */
export class TimerScheduler implements Scheduler {
  after(delayMs: number, callback: () => void): void {
    const remaining = Math.max(0, delayMs);
    if (remaining > MAX_TIMER_DELAY_MS) {
      setTimeout(() => this.after(remaining - MAX_TIMER_DELAY_MS, callback), MAX_TIMER_DELAY_MS);
      return;
    }
    setTimeout(callback, remaining);
  }
}

export const defaultScheduler: Scheduler = new TimerScheduler();

export function delay(scheduler: Scheduler, ms: number): Promise<void> {
  return new Promise((resolve) => scheduler.after(ms, resolve));
}
