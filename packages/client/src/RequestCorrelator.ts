import {
  isReply,
  ProtocolViolationError,
  ProtocolViolationReason,
} from '@robolink/errors';
import type { ReplyError } from '@robolink/errors';
import type { Logger } from '@robolink/logger';
import { makeCounter } from '@robolink/utils';

import type { ReplyCallback } from './types.ts';

export type RequestCorrelatorOptions = {
  logger: Logger;
  prefix?: string;
};

/**
 * Pairs outgoing requests with their replies. Sessions mint a correlation id
 * for every request they send with {@link RequestCorrelator.track} and hand
 * inbound replies to {@link RequestCorrelator.resolve}.
 *
 * A reply that matches no outstanding request, or carries a malformed
 * payload, is a protocol violation: it is logged and discarded, and no other
 * request is affected.
 */
export class RequestCorrelator {
  readonly #pending = new Map<string, ReplyCallback>();

  readonly #counter = makeCounter();

  readonly #prefix: string;

  readonly #logger: Logger;

  #lastIssued = 0;

  constructor({ logger, prefix = 'req' }: RequestCorrelatorOptions) {
    this.#logger = logger;
    this.#prefix = prefix;
  }

  get pendingCount(): number {
    return this.#pending.size;
  }

  /**
   * Register a request awaiting a reply.
   *
   * @param notify - Receives the reply. Fire-and-forget requests omit it and
   *   their replies are dropped quietly.
   * @returns The request's correlation id.
   */
  track(notify: ReplyCallback = () => undefined): string {
    this.#lastIssued = this.#counter();
    const requestId = `${this.#prefix}:${this.#lastIssued}`;
    this.#pending.set(requestId, notify);
    return requestId;
  }

  /**
   * Deliver a reply to the request it answers.
   *
   * @param requestId - The correlation id the reply is addressed to.
   * @param reply - The reply payload as received.
   * @returns Whether the reply was delivered.
   */
  resolve(requestId: string, reply: unknown): boolean {
    const notify = this.#pending.get(requestId);
    if (notify === undefined) {
      this.#reportViolation(
        requestId,
        this.#wasIssued(requestId)
          ? ProtocolViolationReason.AlreadyResolved
          : ProtocolViolationReason.UnknownRequest,
      );
      return false;
    }
    if (!isReply(reply)) {
      this.#reportViolation(requestId, ProtocolViolationReason.MalformedReply);
      return false;
    }
    this.#pending.delete(requestId);
    notify(reply);
    return true;
  }

  /**
   * Answer every outstanding request with the same error, e.g. when the
   * connection is lost.
   *
   * @param reply - The error descriptor to deliver.
   */
  failAll(reply: ReplyError): void {
    const callbacks = [...this.#pending.values()];
    this.#pending.clear();
    for (const notify of callbacks) {
      notify(reply);
    }
  }

  #wasIssued(requestId: string): boolean {
    const prefix = `${this.#prefix}:`;
    if (!requestId.startsWith(prefix)) {
      return false;
    }
    const suffix = requestId.slice(prefix.length);
    // Only the exact text `track` mints counts, never `01` or `1.0`.
    return (
      /^[1-9]\d*$/u.test(suffix) && Number(suffix) <= this.#lastIssued
    );
  }

  #reportViolation(requestId: string, reason: ProtocolViolationReason): void {
    const violation = new ProtocolViolationError(requestId, reason);
    this.#logger.warn(violation.message, violation);
  }
}
