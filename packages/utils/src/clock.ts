import { delay } from './misc.ts';

/**
 * A source of monotonic time and of real waiting. The scheduler reads and
 * waits only through a clock so that tests can substitute virtual time.
 */
export type Clock = {
  /** Monotonic milliseconds; only differences between readings matter. */
  now: () => number;
  delay: (ms: number) => Promise<void>;
};

/**
 * Make a clock backed by `performance.now()` and `setTimeout`.
 *
 * @returns The system clock.
 */
export const makeSystemClock = (): Clock => ({
  now: () => performance.now(),
  delay: async (ms) => (ms > 0 ? delay(ms) : undefined),
});
