import { TaskStateError } from '@robolink/errors';

type FutureState<Value> =
  | { completed: false }
  | { completed: true; value: Value };

/**
 * A single-write completion slot, written by a reply callback and read by
 * the task waiting on it.
 */
export class Future<Value> {
  #state: FutureState<Value> = { completed: false };

  get completed(): boolean {
    return this.#state.completed;
  }

  /**
   * The completed value.
   *
   * @returns The value written by {@link Future.complete}.
   * @throws If the future has not completed yet.
   */
  get value(): Value {
    if (!this.#state.completed) {
      throw new TaskStateError('Future read before completion.');
    }
    return this.#state.value;
  }

  /**
   * Complete the future. Only the first call has any effect.
   *
   * @param value - The value to store.
   * @returns Whether this call completed the future.
   */
  complete(value: Value): boolean {
    if (this.#state.completed) {
      return false;
    }
    this.#state = { completed: true, value };
    return true;
  }
}
