import {
  is,
  nullable,
  number,
  string,
  type,
} from '@metamask/superstruct';
import type { Infer } from '@metamask/superstruct';

/**
 * Struct for the error descriptor carried by a failed reply. Extra fields a
 * peer may attach are tolerated and forwarded untouched.
 */
export const ReplyErrorStruct = type({
  code: number(),
  message: string(),
});

export type ReplyError = Infer<typeof ReplyErrorStruct>;

/**
 * Struct for a reply payload: `null` on success, an error descriptor
 * otherwise.
 */
export const ReplyStruct = nullable(ReplyErrorStruct);

export type Reply = Infer<typeof ReplyStruct>;

/**
 * Type guard for reply error descriptors.
 *
 * @param value - The value to check.
 * @returns Whether the value is a {@link ReplyError}.
 */
export const isReplyError = (value: unknown): value is ReplyError =>
  is(value, ReplyErrorStruct);

/**
 * Type guard for reply payloads.
 *
 * @param value - The value to check.
 * @returns Whether the value is a {@link Reply}.
 */
export const isReply = (value: unknown): value is Reply =>
  is(value, ReplyStruct);
