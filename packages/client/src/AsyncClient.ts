import { LockError } from '@robolink/errors';
import type { Reply } from '@robolink/errors';
import type { Logger } from '@robolink/logger';

import { Driver } from './Driver.ts';
import { NodeLock } from './NodeLock.ts';
import { parseClientOptions } from './options.ts';
import type { AsyncClientOptions } from './options.ts';
import { Poller } from './Poller.ts';
import { NodeStatus, VmExecutionCommand, WatchFlag } from './types.ts';
import type {
  EventDefinition,
  NodeSelector,
  RemoteNode,
  ReplyCallback,
  Session,
} from './types.ts';

export type CompileOptions = {
  /** Whether the compiled program replaces the one loaded in the node. */
  load?: boolean;
};

export type WatchOptions = {
  variables?: boolean;
  events?: boolean;
  vmState?: boolean;
};

/**
 * Computes the watch flags for a watch request. Node properties are always
 * watched.
 *
 * @param options - What to watch.
 * @param options.variables - Watch node and shared variables.
 * @param options.events - Watch events and shared event descriptions.
 * @param options.vmState - Watch the virtual machine's execution state.
 * @returns The flags.
 */
export const getWatchFlags = ({
  variables = true,
  events = true,
  vmState = true,
}: WatchOptions = {}): number =>
  WatchFlag.Properties |
  (variables ? WatchFlag.Variables | WatchFlag.SharedVariables : 0) |
  (events ? WatchFlag.Events | WatchFlag.SharedEventsDescription : 0) |
  (vmState ? WatchFlag.VmExecutionState : 0);

/**
 * Lets application code drive a session with sequential-looking async
 * procedures. Every procedure runs as a task on the client's driver; the
 * suspension primitives and the node operations below must be awaited from
 * inside such a task.
 *
 * @example
 * ```ts
 * const client = new AsyncClient(session);
 * await client.runAsyncProgram(async () => {
 *   await client.withLock(async (node) => {
 *     const error = await node.compile(program);
 *     if (error === null) {
 *       await node.run();
 *     }
 *   });
 * });
 * ```
 */
export class AsyncClient {
  readonly session: Session;

  readonly #driver: Driver;

  readonly #poller: Poller;

  readonly #logger: Logger;

  /**
   * @param session - The connected session.
   * @param options - Client options.
   */
  constructor(session: Session, options: AsyncClientOptions = {}) {
    const { pollIntervalMs, minPollFraction, logger, clock } =
      parseClientOptions(options);
    this.session = session;
    this.#logger = logger;
    this.#driver = new Driver({
      session,
      clock,
      logger: logger.subLogger('driver'),
      pollIntervalMs,
    });
    this.#poller = new Poller({
      driver: this.#driver,
      clock,
      logger: logger.subLogger('poller'),
      pollIntervalMs,
      minPollFraction,
    });
  }

  get nodes(): readonly RemoteNode[] {
    return this.session.nodes;
  }

  /**
   * The driver's quantum index; see {@link Driver.quantum}.
   *
   * @returns The quantum index.
   */
  get quantum(): number {
    return this.#driver.quantum;
  }

  firstNode(): RemoteNode | undefined {
    return this.session.nodes[0];
  }

  /**
   * Run a procedure as the root task and drive it until it settles.
   *
   * @param program - Makes the procedure's promise.
   * @returns The procedure's result.
   * @throws Whatever the procedure threw, after its cleanup has run.
   */
  async runAsyncProgram<Result>(
    program: () => Promise<Result>,
  ): Promise<Result> {
    return this.#driver.runToCompletion(this.#driver.createTask(program));
  }

  /**
   * Run several procedures as concurrent root tasks, resumed round-robin and
   * sharing one pump per quantum.
   *
   * @param programs - Make the procedures' promises.
   * @throws The failure of the only failed procedure, or an `AggregateError`.
   */
  async runConcurrently(
    programs: readonly (() => Promise<unknown>)[],
  ): Promise<void> {
    await this.#driver.runAll(
      programs.map((program) => this.#driver.createTask(program)),
    );
  }

  async sleep(durationMs: number, wake?: () => boolean): Promise<void> {
    return this.#poller.sleep(durationMs, wake);
  }

  async waitFor(condition: () => boolean, label?: string): Promise<void> {
    return this.#poller.waitFor(condition, label);
  }

  async waitForNode(): Promise<void> {
    await this.#poller.poll(() => this.firstNode(), 'node');
  }

  async waitForStatus(expected: NodeStatus): Promise<void> {
    await this.#waitForFirstNodeWith(expected);
  }

  async sendAndWait(
    send: (notify: ReplyCallback) => void,
    label?: string,
  ): Promise<Reply> {
    return this.#poller.sendAndWait(send, label);
  }

  async lockNode(nodeId: string): Promise<Reply> {
    return this.sendAndWait(
      (notify) => this.session.sendLockNode(nodeId, notify),
      `lock ${nodeId}`,
    );
  }

  async unlockNode(nodeId: string): Promise<Reply> {
    return this.sendAndWait(
      (notify) => this.session.sendUnlockNode(nodeId, notify),
      `unlock ${nodeId}`,
    );
  }

  /**
   * Lock a node. Without a node id, wait for a matching node to become
   * available and lock it.
   *
   * @param selector - Which node to lock.
   * @param selector.nodeId - Lock this node, without waiting for it.
   * @param selector.nodeName - Lock the first available node of this name.
   * @returns The lock guard. Release it when done.
   * @throws {@link LockError} if the peer refuses the lock. No unlock request
   *   is sent in that case.
   */
  async lock(selector: NodeSelector = {}): Promise<NodeLock> {
    const nodeId =
      selector.nodeId ?? (await this.#waitForAvailableNode(selector.nodeName));
    const reply = await this.lockNode(nodeId);
    if (reply !== null) {
      throw new LockError(nodeId, reply);
    }
    this.#logger.debug(`Locked node "${nodeId}"`);
    return new NodeLock({
      nodeId,
      client: this,
      session: this.session,
      logger: this.#logger.subLogger('lock'),
    });
  }

  /**
   * Lock a node for the duration of `body`, releasing it however `body`
   * exits.
   *
   * @param body - Works with the locked node.
   * @param selector - Which node to lock; see {@link AsyncClient.lock}.
   * @returns The body's result.
   */
  async withLock<Result>(
    body: (lock: NodeLock) => Promise<Result>,
    selector?: NodeSelector,
  ): Promise<Result> {
    const lock = await this.lock(selector);
    try {
      return await body(lock);
    } finally {
      lock.release();
    }
  }

  async compile(
    nodeId: string,
    program: string,
    { load = true }: CompileOptions = {},
  ): Promise<Reply> {
    return this.sendAndWait(
      (notify) => this.session.sendProgram(nodeId, program, load, notify),
      `compile ${nodeId}`,
    );
  }

  async run(nodeId: string): Promise<Reply> {
    return this.#command(nodeId, VmExecutionCommand.Run, 'run');
  }

  async flash(nodeId: string): Promise<Reply> {
    return this.#command(
      nodeId,
      VmExecutionCommand.WriteProgramToDeviceMemory,
      'flash',
    );
  }

  async stop(nodeId: string): Promise<Reply> {
    return this.#command(nodeId, VmExecutionCommand.Stop, 'stop');
  }

  async watch(nodeId: string, options?: WatchOptions): Promise<Reply> {
    const flags = getWatchFlags(options);
    return this.sendAndWait(
      (notify) => this.session.watchNode(nodeId, flags, notify),
      `watch ${nodeId}`,
    );
  }

  async setScratchpad(nodeId: string, program: string): Promise<Reply> {
    return this.sendAndWait(
      (notify) => this.session.setScratchpad(nodeId, program, notify),
      `scratchpad ${nodeId}`,
    );
  }

  async registerEvents(
    nodeId: string,
    events: EventDefinition[],
  ): Promise<Reply> {
    return this.sendAndWait(
      (notify) => this.session.registerEvents(nodeId, events, notify),
      `register events ${nodeId}`,
    );
  }

  async #command(
    nodeId: string,
    command: VmExecutionCommand,
    name: string,
  ): Promise<Reply> {
    return this.sendAndWait(
      (notify) => this.session.setVmExecutionState(nodeId, command, notify),
      `${name} ${nodeId}`,
    );
  }

  async #waitForFirstNodeWith(status: NodeStatus): Promise<RemoteNode> {
    return this.#poller.poll(() => {
      const node = this.firstNode();
      return node?.status === status ? node : undefined;
    }, `first node ${status}`);
  }

  async #waitForAvailableNode(nodeName?: string): Promise<string> {
    if (nodeName === undefined) {
      const node = await this.#waitForFirstNodeWith(NodeStatus.Available);
      return node.id;
    }
    const node = await this.#poller.poll(
      () =>
        this.session.nodes.find(
          (candidate) =>
            candidate.name === nodeName &&
            candidate.status === NodeStatus.Available,
        ),
      `node "${nodeName}" available`,
    );
    return node.id;
  }
}
