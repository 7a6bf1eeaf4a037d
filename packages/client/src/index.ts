export { AsyncClient, getWatchFlags } from './AsyncClient.ts';
export type { CompileOptions, WatchOptions } from './AsyncClient.ts';
export { Driver } from './Driver.ts';
export type { DriverOptions } from './Driver.ts';
export { Future } from './Future.ts';
export { NodeLock } from './NodeLock.ts';
export {
  DEFAULT_MIN_POLL_FRACTION,
  DEFAULT_POLL_INTERVAL_MS,
  parseClientOptions,
} from './options.ts';
export type { AsyncClientOptions } from './options.ts';
export { Poller } from './Poller.ts';
export { RequestCorrelator } from './RequestCorrelator.ts';
export type { RequestCorrelatorOptions } from './RequestCorrelator.ts';
export { Task } from './Task.ts';
export type { SuspendPoint, TaskState } from './Task.ts';
export { NodeStatus, VmExecutionCommand, WatchFlag } from './types.ts';
export type {
  EventDefinition,
  NodeSelector,
  RemoteNode,
  ReplyCallback,
  Session,
} from './types.ts';
