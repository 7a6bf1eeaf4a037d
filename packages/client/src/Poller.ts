import { ProtocolViolationError, ProtocolViolationReason } from '@robolink/errors';
import type { Logger } from '@robolink/logger';
import type { Clock } from '@robolink/utils';

import type { Driver } from './Driver.ts';
import { Future } from './Future.ts';

export type PollerOptions = {
  driver: Driver;
  clock: Clock;
  logger: Logger;
  pollIntervalMs: number;
  minPollFraction: number;
};

/**
 * The suspension primitives. Each poll tick checks its condition, returns at
 * once if it holds, and otherwise pumps the session. A pump that processed
 * messages re-checks the condition straight away and, if still unmet,
 * suspends without delay; a pump that processed nothing suspends for the
 * base poll interval.
 *
 * None of the primitives times out. Bound a wait by composing it with the
 * wake predicate of {@link Poller.sleep}.
 */
export class Poller {
  readonly #driver: Driver;

  readonly #clock: Clock;

  readonly #logger: Logger;

  readonly #pollIntervalMs: number;

  readonly #minPollFraction: number;

  constructor({
    driver,
    clock,
    logger,
    pollIntervalMs,
    minPollFraction,
  }: PollerOptions) {
    this.#driver = driver;
    this.#clock = clock;
    this.#logger = logger;
    this.#pollIntervalMs = pollIntervalMs;
    this.#minPollFraction = minPollFraction;
  }

  /**
   * Suspend until `durationMs` has elapsed, pumping the session on every
   * tick. Near the deadline the ticks shorten, down to `minPollFraction` of
   * the base interval.
   *
   * @param durationMs - How long to sleep. A negative duration sleeps until
   *   `wake` returns true, or forever.
   * @param wake - Ends the sleep early on the first tick it returns true.
   * @throws A `TypeError` if `durationMs` is `NaN`.
   */
  async sleep(durationMs: number, wake?: () => boolean): Promise<void> {
    if (Number.isNaN(durationMs)) {
      throw new TypeError('Sleep duration must be a number, got NaN.');
    }
    const deadline = this.#clock.now() + durationMs;
    const isDone = (): boolean =>
      wake?.() === true || (durationMs >= 0 && this.#clock.now() >= deadline);

    while (!isDone()) {
      const progressed = this.#driver.pump();
      if (isDone()) {
        return;
      }
      await this.#driver.suspend({
        kind: 'timer',
        delayMs: progressed
          ? 0
          : this.#sleepInterval(durationMs, deadline - this.#clock.now()),
      });
    }
  }

  /**
   * Suspend until `probe` returns a value other than `undefined`.
   *
   * @param probe - Checks the condition, returning the value to hand back
   *   once it holds.
   * @param label - Describes the condition in suspend points.
   * @returns The probe's value.
   */
  async poll<Value>(
    probe: () => Value | undefined,
    label: string,
  ): Promise<Value> {
    for (;;) {
      const before = probe();
      if (before !== undefined) {
        return before;
      }
      const progressed = this.#driver.pump();
      if (progressed) {
        const after = probe();
        if (after !== undefined) {
          return after;
        }
      }
      await this.#driver.suspend({
        kind: 'condition',
        label,
        delayMs: progressed ? 0 : this.#pollIntervalMs,
      });
    }
  }

  /**
   * Suspend until `condition` holds.
   *
   * @param condition - The condition to wait for.
   * @param label - Describes the condition in suspend points.
   */
  async waitFor(condition: () => boolean, label = 'condition'): Promise<void> {
    await this.poll(() => (condition() ? true : undefined), label);
  }

  /**
   * Start a request and suspend until its reply arrives. A reply delivered
   * synchronously by `send` returns without pumping or suspending.
   *
   * @param send - Sends the request, handing `notify` to the session as its
   *   completion callback.
   * @param label - Describes the request in suspend points and logs.
   * @returns The reply.
   */
  async sendAndWait<Value>(
    send: (notify: (value: Value) => void) => void,
    label = 'request',
  ): Promise<Value> {
    const future = new Future<Value>();
    send((value) => {
      if (!future.complete(value)) {
        this.#logger.warn(
          `Ignored a second completion of ${label}`,
          new ProtocolViolationError(
            label,
            ProtocolViolationReason.AlreadyResolved,
          ),
        );
      }
    });

    while (!future.completed) {
      const progressed = this.#driver.pump();
      if (future.completed) {
        break;
      }
      await this.#driver.suspend({
        kind: 'reply',
        label,
        delayMs: progressed ? 0 : this.#pollIntervalMs,
      });
    }
    return future.value;
  }

  #sleepInterval(durationMs: number, remainingMs: number): number {
    if (durationMs < 0) {
      return this.#pollIntervalMs;
    }
    return Math.max(
      Math.min(this.#pollIntervalMs, remainingMs),
      this.#pollIntervalMs * this.#minPollFraction,
    );
  }
}
