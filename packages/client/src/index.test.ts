import { describe, it, expect } from 'vitest';

import * as indexModule from './index.ts';

describe('index', () => {
  it('has the expected exports', () => {
    expect(Object.keys(indexModule).sort()).toStrictEqual([
      'AsyncClient',
      'DEFAULT_MIN_POLL_FRACTION',
      'DEFAULT_POLL_INTERVAL_MS',
      'Driver',
      'Future',
      'NodeLock',
      'NodeStatus',
      'Poller',
      'RequestCorrelator',
      'Task',
      'VmExecutionCommand',
      'WatchFlag',
      'getWatchFlags',
      'parseClientOptions',
    ]);
  });
});
