import { ConnectionError } from '@robolink/errors';
import { describe, it, expect } from 'vitest';

import { NodeLock } from './NodeLock.ts';
import { VmExecutionCommand, WatchFlag } from './types.ts';
import { makeTestClient } from '../test/client.ts';
import { messagesAt } from '../test/utils.ts';

const makeLock = (...args: Parameters<typeof makeTestClient>) => {
  const context = makeTestClient(...args);
  const { client, session, logger } = context;
  const lock = new NodeLock({ nodeId: 'n1', client, session, logger });
  return { ...context, lock };
};

describe('NodeLock', () => {
  describe('release', () => {
    it('sends one unlock request however often it is called', () => {
      const { lock, session } = makeLock();
      expect(lock.released).toBe(false);
      expect(lock.release()).toBe(true);
      expect(lock.release()).toBe(false);
      expect(lock.released).toBe(true);
      expect(session.sentOfType('unlock')).toStrictEqual([
        { type: 'unlock', nodeId: 'n1', requestId: 'req:1' },
      ]);
    });

    it('logs the release', () => {
      const { lock, entries } = makeLock();
      lock.release();
      expect(messagesAt(entries, 'debug')).toStrictEqual(['Released node "n1"']);
    });

    it('logs an error reply to the unlock request', () => {
      const { lock, entries } = makeLock({
        responder: () => ({
          reply: { code: 4, message: 'not owner' },
          delivery: 'sync',
        }),
      });
      lock.release();
      expect(messagesAt(entries, 'warn')).toStrictEqual([
        'Failed to unlock node "n1"',
      ]);
      expect(entries.find((entry) => entry.level === 'warn')?.data).toStrictEqual(
        [{ code: 4, message: 'not owner' }],
      );
    });

    it('logs instead of throwing when the unlock request cannot be sent', () => {
      const { lock, session, entries } = makeLock();
      session.disconnect();
      expect(lock.release()).toBe(true);
      expect(messagesAt(entries, 'warn')).toStrictEqual([
        'Failed to send unlock request for node "n1"',
      ]);
      expect(
        entries.find((entry) => entry.level === 'warn')?.data?.[0],
      ).toBeInstanceOf(ConnectionError);
      expect(lock.release()).toBe(false);
    });
  });

  describe('node operations', () => {
    it('sends each operation to the locked node', async () => {
      const { client, lock, session } = makeLock({
        responder: () => ({ reply: null, delivery: 'sync' }),
      });
      const replies = await client.runAsyncProgram(async () => [
        await lock.compile('var x = 1'),
        await lock.run(),
        await lock.flash(),
        await lock.stop(),
        await lock.watch({ events: false }),
        await lock.setScratchpad('var y = 2'),
        await lock.registerEvents([['ping', 0]]),
      ]);
      expect(replies).toStrictEqual([null, null, null, null, null, null, null]);
      expect(session.sent).toStrictEqual([
        {
          type: 'program',
          nodeId: 'n1',
          program: 'var x = 1',
          load: true,
          requestId: 'req:1',
        },
        {
          type: 'vm-state',
          nodeId: 'n1',
          command: VmExecutionCommand.Run,
          requestId: 'req:2',
        },
        {
          type: 'vm-state',
          nodeId: 'n1',
          command: VmExecutionCommand.WriteProgramToDeviceMemory,
          requestId: 'req:3',
        },
        {
          type: 'vm-state',
          nodeId: 'n1',
          command: VmExecutionCommand.Stop,
          requestId: 'req:4',
        },
        {
          type: 'watch',
          nodeId: 'n1',
          flags:
            WatchFlag.Properties |
            WatchFlag.Variables |
            WatchFlag.SharedVariables |
            WatchFlag.VmExecutionState,
          requestId: 'req:5',
        },
        {
          type: 'scratchpad',
          nodeId: 'n1',
          program: 'var y = 2',
          requestId: 'req:6',
        },
        {
          type: 'events',
          nodeId: 'n1',
          events: [['ping', 0]],
          requestId: 'req:7',
        },
      ]);
    });

    it('forwards an error reply unchanged', async () => {
      const { client, lock } = makeLock({
        responder: () => ({
          reply: { code: 12, message: 'syntax error' },
        }),
      });
      const reply = await client.runAsyncProgram(async () =>
        lock.compile('oops'),
      );
      expect(reply).toStrictEqual({ code: 12, message: 'syntax error' });
    });
  });
});
