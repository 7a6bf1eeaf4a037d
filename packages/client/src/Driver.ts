import { TaskStateError } from '@robolink/errors';
import type { Logger } from '@robolink/logger';
import { makeCounter } from '@robolink/utils';
import type { Clock } from '@robolink/utils';

import { Task } from './Task.ts';
import type { SuspendPoint } from './Task.ts';
import type { Session } from './types.ts';

export type DriverOptions = {
  session: Pick<Session, 'pump'>;
  clock: Clock;
  logger: Logger;
  /** The wait used in place of a requested delay that is not finite. */
  pollIntervalMs: number;
};

/**
 * The trampoline that drives tasks to completion, one quantum at a time,
 * on the single thread of control shared by the whole session.
 *
 * In each quantum every suspended root task is resumed once, in order, and
 * runs until its next suspend point. Between quanta the driver waits for the
 * shortest delay requested by the tasks' suspend points. The session is
 * pumped at most once per quantum, however many tasks ask for it.
 */
export class Driver {
  readonly #session: Pick<Session, 'pump'>;

  readonly #clock: Clock;

  readonly #logger: Logger;

  readonly #pollIntervalMs: number;

  readonly #taskCounter = makeCounter();

  #quantum = 0;

  #pumpedInQuantum: number | undefined;

  #lastPumpProgressed = false;

  #current: Task<unknown> | undefined;

  #running = false;

  /**
   * @param options - The driver's collaborators.
   * @param options.session - The session pumped by the suspension primitives.
   * @param options.clock - The clock used to wait between quanta.
   * @param options.logger - The logger for task lifecycle messages.
   * @param options.pollIntervalMs - The wait between quanta when a task
   *   requests a delay that is not finite.
   */
  constructor({ session, clock, logger, pollIntervalMs }: DriverOptions) {
    this.#session = session;
    this.#clock = clock;
    this.#logger = logger;
    this.#pollIntervalMs = pollIntervalMs;
  }

  /**
   * The index of the quantum being run. Once a run is over, this is the
   * number of quanta it took.
   *
   * @returns The quantum index.
   */
  get quantum(): number {
    return this.#quantum;
  }

  /**
   * Make a task with a fresh identifier.
   *
   * @param body - The task's computation.
   * @returns The task, not yet started.
   */
  createTask<Result>(body: () => Promise<Result>): Task<Result> {
    return new Task(`task:${this.#taskCounter()}`, body);
  }

  /**
   * Pump the session, unless it was already pumped during this quantum.
   *
   * @returns Whether the quantum's pump processed at least one message.
   */
  pump(): boolean {
    if (this.#pumpedInQuantum === this.#quantum) {
      return this.#lastPumpProgressed;
    }
    this.#pumpedInQuantum = this.#quantum;
    this.#lastPumpProgressed = false;
    this.#lastPumpProgressed = this.#session.pump();
    return this.#lastPumpProgressed;
  }

  /**
   * Suspend the task currently being stepped.
   *
   * @param point - Why the task is suspending.
   * @returns A promise that resolves when the task is resumed.
   */
  async suspend(point: SuspendPoint): Promise<void> {
    const task = this.#current;
    if (task === undefined) {
      throw new TaskStateError(
        'Suspension primitives may only be used inside a running task.',
      );
    }
    return task.suspend(point);
  }

  /**
   * Drive a task until it settles.
   *
   * @param task - The root task.
   * @returns The task's result.
   * @throws Whatever the task body threw, once its cleanup has run.
   */
  async runToCompletion<Result>(task: Task<Result>): Promise<Result> {
    await this.runAll([task]);
    return task.result();
  }

  /**
   * Drive several root tasks round-robin until every one of them settles.
   * A failing task does not stop the others.
   *
   * @param tasks - The root tasks.
   * @throws The failure of the only failed task, or an `AggregateError` when
   *   several failed.
   */
  async runAll(tasks: readonly Task<unknown>[]): Promise<void> {
    if (this.#running) {
      throw new TaskStateError('The driver is already running.');
    }
    this.#running = true;
    this.#quantum = 0;
    this.#pumpedInQuantum = undefined;
    try {
      await this.#loop(tasks);
    } finally {
      this.#running = false;
    }

    const failures = tasks.flatMap((task) => {
      try {
        task.result();
        return [];
      } catch (error) {
        return [error];
      }
    });
    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `${failures.length} tasks failed.`);
    }
  }

  async #loop(tasks: readonly Task<unknown>[]): Promise<void> {
    for (;;) {
      for (const task of tasks) {
        if (task.state === 'suspended') {
          await this.#step(task);
        }
      }
      this.#quantum += 1;
      if (tasks.every((task) => task.settled)) {
        return;
      }

      // An abandoned task has no suspend point; it is stepped once more to
      // wait for its body to settle.
      const delays = tasks.flatMap((task) =>
        task.suspendPoint === undefined
          ? []
          : [this.#toWaitMs(task.suspendPoint.delayMs)],
      );
      const delayMs = delays.length === 0 ? 0 : Math.min(...delays);
      if (delayMs > 0) {
        await this.#clock.delay(delayMs);
      }
    }
  }

  #toWaitMs(delayMs: number): number {
    return Number.isFinite(delayMs) ? delayMs : this.#pollIntervalMs;
  }

  async #step(task: Task<unknown>): Promise<void> {
    this.#current = task;
    try {
      await task.step();
    } finally {
      this.#current = undefined;
    }
    if (task.settled) {
      this.#logger.debug(
        `Task "${task.id}" ${task.state} in quantum ${this.#quantum}`,
      );
    }
  }
}
