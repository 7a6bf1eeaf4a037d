import { createDeferredPromise } from '@metamask/utils';
import { TaskStateError } from '@robolink/errors';

export type TaskState = 'running' | 'suspended' | 'completed' | 'failed';

/**
 * Why a task suspended, and how long the driver should let it rest before
 * resuming it.
 */
export type SuspendPoint = {
  kind: 'start' | 'timer' | 'condition' | 'reply';
  delayMs: number;
  label?: string;
};

type Outcome<Result> =
  | { state: 'completed'; value: Result }
  | { state: 'failed'; error: unknown };

/**
 * A resumable computation driven one quantum at a time.
 *
 * The body is an ordinary async function. It gives control back to the
 * driver only through {@link Task.suspend}, which the suspension primitives
 * call; every other `await` inside the body stays within the current
 * quantum. A quantum ends when the body suspends again or settles.
 *
 * A body that suspends while already suspended, e.g. by awaiting two
 * primitives at once, abandons its pending suspension: both suspensions
 * reject with a {@link TaskStateError}, the task is never resumed again, and
 * the quantum lasts until the body has unwound and settled.
 */
export class Task<Result> {
  readonly id: string;

  readonly #body: () => Promise<Result>;

  #state: TaskState = 'suspended';

  #suspendPoint: SuspendPoint | undefined = { kind: 'start', delayMs: 0 };

  #started = false;

  #suspension:
    | { resume: () => void; abort: (error: Error) => void }
    | undefined;

  #abandoned = false;

  readonly #settled = createDeferredPromise();

  #endQuantum: (() => void) | undefined;

  #outcome: Outcome<Result> | undefined;

  /**
   * @param id - The task's identifier, used in logs and errors.
   * @param body - The computation. It does not start until the first
   *   {@link Task.step}.
   */
  constructor(id: string, body: () => Promise<Result>) {
    this.id = id;
    this.#body = body;
  }

  get state(): TaskState {
    return this.#state;
  }

  /**
   * The point the task is suspended at, or `undefined` unless it is
   * suspended.
   *
   * @returns The current suspend point.
   */
  get suspendPoint(): SuspendPoint | undefined {
    return this.#suspendPoint;
  }

  get settled(): boolean {
    return this.#outcome !== undefined;
  }

  /**
   * Run the task for one quantum: start it, or resume it from its suspend
   * point, and wait until it suspends again or settles.
   *
   * A failure of the body does not reject this promise; it is recorded and
   * surfaced by {@link Task.result}.
   */
  async step(): Promise<void> {
    if (this.#state !== 'suspended') {
      throw new TaskStateError(
        `Cannot resume task "${this.id}" while it is ${this.#state}.`,
        this.id,
      );
    }
    if (this.#abandoned) {
      await this.#settled.promise;
      return;
    }
    const quantumEnd = createDeferredPromise();
    this.#endQuantum = () => quantumEnd.resolve();
    this.#state = 'running';
    this.#suspendPoint = undefined;

    if (this.#started) {
      const suspension = this.#suspension;
      this.#suspension = undefined;
      suspension?.resume();
    } else {
      this.#started = true;
      this.#start();
    }
    await quantumEnd.promise;
    if (this.#abandoned) {
      await this.#settled.promise;
    }
  }

  /**
   * Suspend the running task until the driver steps it again.
   *
   * @param point - Why the task is suspending.
   * @returns A promise that resolves when the task is resumed.
   */
  async suspend(point: SuspendPoint): Promise<void> {
    if (this.#state !== 'running') {
      const error = new TaskStateError(
        `Task "${this.id}" cannot suspend while it is ${this.#state}; await one primitive at a time.`,
        this.id,
      );
      if (this.#started && this.#state === 'suspended') {
        this.#abandon(error);
      }
      throw error;
    }
    const { promise, resolve, reject } = createDeferredPromise();
    this.#suspension = { resume: () => resolve(), abort: reject };
    this.#state = 'suspended';
    this.#suspendPoint = point;
    this.#endQuantum?.();
    return promise;
  }

  /**
   * The outcome of a settled task.
   *
   * @returns The value the body returned.
   * @throws The failure the body raised, or a {@link TaskStateError} if the
   *   task has not settled.
   */
  result(): Result {
    const outcome = this.#outcome;
    if (outcome === undefined) {
      throw new TaskStateError(
        `Task "${this.id}" has not settled yet.`,
        this.id,
      );
    }
    if (outcome.state === 'failed') {
      throw outcome.error;
    }
    return outcome.value;
  }

  #start(): void {
    // The executor calls the body synchronously, inside this quantum, and
    // turns a synchronous throw into a rejection.
    void new Promise<Result>((resolve) => resolve(this.#body())).then(
      (value) => this.#settle({ state: 'completed', value }),
      (error: unknown) => this.#settle({ state: 'failed', error }),
    );
  }

  #abandon(error: TaskStateError): void {
    this.#abandoned = true;
    this.#suspendPoint = undefined;
    const suspension = this.#suspension;
    this.#suspension = undefined;
    suspension?.abort(error);
  }

  #settle(outcome: Outcome<Result>): void {
    this.#outcome = outcome;
    this.#state = outcome.state;
    this.#suspendPoint = undefined;
    this.#endQuantum?.();
    this.#settled.resolve();
  }
}
