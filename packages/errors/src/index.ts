export { BaseError } from './BaseError.ts';
export { ErrorCode } from './constants.ts';
export {
  ConnectionError,
  LockError,
  ProtocolViolationError,
  ProtocolViolationReason,
  TaskStateError,
} from './errors/index.ts';
export {
  ReplyErrorStruct,
  ReplyStruct,
  isReply,
  isReplyError,
} from './reply.ts';
export type { Reply, ReplyError } from './reply.ts';
export { isCodedError } from './utils/isCodedError.ts';
export type {
  BaseErrorOptions,
  CodedError,
  ErrorOptionsWithStack,
} from './types.ts';
