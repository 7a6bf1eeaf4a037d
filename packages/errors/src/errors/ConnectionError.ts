import { BaseError } from '../BaseError.ts';
import { ErrorCode } from '../constants.ts';
import type { ErrorOptionsWithStack } from '../types.ts';

/**
 * Error indicating that the transport to the remote peer failed, e.g. the
 * peer is unreachable or the socket was closed.
 */
export class ConnectionError extends BaseError {
  /**
   * Creates a new ConnectionError.
   *
   * @param message - A human-readable description of the failure.
   * @param options - Additional error options including cause and stack.
   */
  constructor(message: string, options?: ErrorOptionsWithStack) {
    super(ErrorCode.ConnectionError, message, options);
  }
}
