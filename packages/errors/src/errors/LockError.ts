import { BaseError } from '../BaseError.ts';
import { ErrorCode } from '../constants.ts';
import type { ReplyError } from '../reply.ts';
import type { ErrorOptionsWithStack } from '../types.ts';

/**
 * Error indicating that the remote peer refused to lock a node.
 */
export class LockError extends BaseError {
  /**
   * Creates a new LockError.
   *
   * @param nodeId - The identifier of the node that could not be locked.
   * @param reply - The error descriptor carried by the lock reply.
   * @param options - Additional error options including cause and stack.
   */
  constructor(
    nodeId: string,
    reply: ReplyError,
    options?: ErrorOptionsWithStack,
  ) {
    super(
      ErrorCode.LockError,
      `Failed to lock node "${nodeId}": ${reply.message}`,
      {
        ...options,
        data: { nodeId, reply: { code: reply.code, message: reply.message } },
      },
    );
  }
}
