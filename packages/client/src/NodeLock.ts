import type { Reply } from '@robolink/errors';
import type { Logger } from '@robolink/logger';

import type { AsyncClient, CompileOptions, WatchOptions } from './AsyncClient.ts';
import type { EventDefinition, Session } from './types.ts';

export type NodeLockOptions = {
  nodeId: string;
  client: AsyncClient;
  session: Pick<Session, 'sendUnlockNode'>;
  logger: Logger;
};

/**
 * Exclusive ownership of a locked node, obtained from
 * {@link AsyncClient.lock}. Release it exactly once when the owning scope
 * exits, normally in a `finally` block, or let {@link AsyncClient.withLock}
 * do so.
 *
 * The node operations are those of the client, bound to the locked node.
 */
export class NodeLock {
  readonly nodeId: string;

  readonly #client: AsyncClient;

  readonly #session: Pick<Session, 'sendUnlockNode'>;

  readonly #logger: Logger;

  #released = false;

  constructor({ nodeId, client, session, logger }: NodeLockOptions) {
    this.nodeId = nodeId;
    this.#client = client;
    this.#session = session;
    this.#logger = logger;
  }

  get released(): boolean {
    return this.#released;
  }

  /**
   * Send the unlock request, unless this lock was already released. The
   * reply is not awaited, and a failure to unlock is logged, not thrown.
   *
   * @returns Whether this call sent the unlock request.
   */
  release(): boolean {
    if (this.#released) {
      return false;
    }
    this.#released = true;
    try {
      this.#session.sendUnlockNode(this.nodeId, (reply) => {
        if (reply !== null) {
          this.#logger.warn(`Failed to unlock node "${this.nodeId}"`, reply);
        }
      });
      this.#logger.debug(`Released node "${this.nodeId}"`);
    } catch (error) {
      this.#logger.warn(
        `Failed to send unlock request for node "${this.nodeId}"`,
        error,
      );
    }
    return true;
  }

  async compile(program: string, options?: CompileOptions): Promise<Reply> {
    return this.#client.compile(this.nodeId, program, options);
  }

  async run(): Promise<Reply> {
    return this.#client.run(this.nodeId);
  }

  async flash(): Promise<Reply> {
    return this.#client.flash(this.nodeId);
  }

  async stop(): Promise<Reply> {
    return this.#client.stop(this.nodeId);
  }

  async watch(options?: WatchOptions): Promise<Reply> {
    return this.#client.watch(this.nodeId, options);
  }

  async setScratchpad(program: string): Promise<Reply> {
    return this.#client.setScratchpad(this.nodeId, program);
  }

  async registerEvents(events: EventDefinition[]): Promise<Reply> {
    return this.#client.registerEvents(this.nodeId, events);
  }
}
