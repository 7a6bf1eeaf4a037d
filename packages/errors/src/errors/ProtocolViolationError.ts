import { BaseError } from '../BaseError.ts';
import { ErrorCode } from '../constants.ts';

export const ProtocolViolationReason = {
  UnknownRequest: 'unknown-request',
  AlreadyResolved: 'already-resolved',
  MalformedReply: 'malformed-reply',
} as const;

export type ProtocolViolationReason =
  (typeof ProtocolViolationReason)[keyof typeof ProtocolViolationReason];

const describeReason = (reason: ProtocolViolationReason): string => {
  switch (reason) {
    case ProtocolViolationReason.UnknownRequest:
      return 'no such request';
    case ProtocolViolationReason.AlreadyResolved:
      return 'request already resolved';
    case ProtocolViolationReason.MalformedReply:
      return 'malformed reply payload';
    /* v8 ignore next 2 */
    default:
      throw new Error(`Unknown protocol violation reason: ${String(reason)}`);
  }
};

/**
 * Describes a reply that could not be matched to exactly one outstanding
 * request. Logged and discarded by the correlation layer, never thrown.
 */
export class ProtocolViolationError extends BaseError {
  readonly reason: ProtocolViolationReason;

  /**
   * Creates a new ProtocolViolationError.
   *
   * @param requestId - The correlation id the reply was addressed to.
   * @param reason - Why the reply was rejected.
   */
  constructor(requestId: string, reason: ProtocolViolationReason) {
    super(
      ErrorCode.ProtocolViolation,
      `Discarded reply for "${requestId}": ${describeReason(reason)}.`,
      { data: { requestId, reason } },
    );
    this.reason = reason;
  }
}
