import { BaseError } from '../BaseError.ts';
import { ErrorCode } from '../constants.ts';

/**
 * Error indicating misuse of the task scheduler, such as calling a
 * suspension primitive outside a running task.
 */
export class TaskStateError extends BaseError {
  /**
   * Creates a new TaskStateError.
   *
   * @param message - A human-readable description of the misuse.
   * @param taskId - The task involved, if any.
   */
  constructor(message: string, taskId?: string) {
    super(ErrorCode.TaskStateError, message, {
      data: taskId === undefined ? null : { taskId },
    });
  }
}
