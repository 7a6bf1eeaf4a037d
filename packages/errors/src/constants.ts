/**
 * Enum defining all error codes for robolink errors.
 */
export const ErrorCode = {
  ConnectionError: 'CONNECTION_ERROR',
  LockError: 'LOCK_ERROR',
  ProtocolViolation: 'PROTOCOL_VIOLATION',
  TaskStateError: 'TASK_STATE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];
