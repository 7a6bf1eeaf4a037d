export { ConnectionError } from './ConnectionError.ts';
export { LockError } from './LockError.ts';
export {
  ProtocolViolationError,
  ProtocolViolationReason,
} from './ProtocolViolationError.ts';
export { TaskStateError } from './TaskStateError.ts';
