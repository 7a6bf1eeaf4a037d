import type { Json } from '@metamask/utils';
import type { Reply } from '@robolink/errors';

/**
 * The status of a remote node, as last announced by the peer.
 */
export const NodeStatus = {
  Unknown: 'unknown',
  Connected: 'connected',
  Available: 'available',
  Busy: 'busy',
  Ready: 'ready',
  Disconnected: 'disconnected',
} as const;

export type NodeStatus = (typeof NodeStatus)[keyof typeof NodeStatus];

/**
 * A remote device reachable through a {@link Session}.
 */
export type RemoteNode = {
  id: string;
  name?: string;
  status: NodeStatus;
  variables: Record<string, Json>;
};

/**
 * Commands accepted by a node's virtual machine.
 */
export const VmExecutionCommand = {
  Stop: 0,
  Run: 1,
  Reset: 2,
  Pause: 3,
  Step: 4,
  StepToNextLine: 5,
  WriteProgramToDeviceMemory: 6,
} as const;

export type VmExecutionCommand =
  (typeof VmExecutionCommand)[keyof typeof VmExecutionCommand];

/**
 * Bits of the watch request, selecting which node changes the peer reports.
 */
export const WatchFlag = {
  Properties: 0x01,
  Variables: 0x02,
  SharedEventsDescription: 0x04,
  Events: 0x08,
  VmExecutionState: 0x10,
  SharedVariables: 0x20,
} as const;

/** An event declaration: its name and the number of data words it carries. */
export type EventDefinition = [name: string, size: number];

/**
 * Invoked exactly once with the reply to a request.
 */
export type ReplyCallback = (reply: Reply) => void;

/**
 * The connection to the remote peer. Implementations own the transport and
 * the node list; both change only while {@link Session.pump} runs.
 *
 * Every send operation returns immediately. Its callback is invoked exactly
 * once, either synchronously during the call or during a later `pump()`.
 */
export type Session = {
  /**
   * Drain and dispatch the inbound messages available right now.
   *
   * @returns Whether at least one message was processed.
   */
  pump: () => boolean;
  readonly nodes: readonly RemoteNode[];
  sendLockNode: (nodeId: string, notify?: ReplyCallback) => void;
  sendUnlockNode: (nodeId: string, notify?: ReplyCallback) => void;
  sendProgram: (
    nodeId: string,
    program: string,
    load: boolean,
    notify?: ReplyCallback,
  ) => void;
  setVmExecutionState: (
    nodeId: string,
    command: VmExecutionCommand,
    notify?: ReplyCallback,
  ) => void;
  watchNode: (nodeId: string, flags: number, notify?: ReplyCallback) => void;
  setScratchpad: (
    nodeId: string,
    program: string,
    notify?: ReplyCallback,
  ) => void;
  registerEvents: (
    nodeId: string,
    events: EventDefinition[],
    notify?: ReplyCallback,
  ) => void;
};

/**
 * Selects the node to lock. Without a selector, the first available node is
 * used.
 */
export type NodeSelector = {
  nodeId?: string;
  nodeName?: string;
};
