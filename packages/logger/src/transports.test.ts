import { describe, expect, it, vi } from 'vitest';

import { logLevels } from './constants.ts';
import { consoleTransport, makeArrayTransport } from './transports.ts';
import type { LogEntry, LogLevel } from './types.ts';

const makeLogEntry = (level: LogLevel): LogEntry => ({
  level,
  message: 'test-message',
  tags: ['test-tag'],
});

describe('consoleTransport', () => {
  it.each(Object.keys(logLevels))(
    'logs to the appropriate console alias: %s',
    (levelString: string) => {
      const level = levelString as LogLevel;
      const logEntry = makeLogEntry(level);
      const consoleMethodSpy = vi
        .spyOn(console, level)
        .mockImplementation(() => undefined);
      consoleTransport(logEntry);
      expect(consoleMethodSpy).toHaveBeenCalledWith(
        logEntry.tags,
        logEntry.message,
      );
    },
  );

  it('omits empty tags and passes data through', () => {
    const consoleMethodSpy = vi
      .spyOn(console, 'warn')
      .mockImplementation(() => undefined);
    consoleTransport({ level: 'warn', tags: [], message: 'hi', data: [1, 2] });
    expect(consoleMethodSpy).toHaveBeenCalledWith('hi', 1, 2);
  });
});

describe('makeArrayTransport', () => {
  it('writes to the array', () => {
    const target: LogEntry[] = [];
    const arrayTransport = makeArrayTransport(target);
    const logEntry = makeLogEntry('info');
    arrayTransport(logEntry);
    expect(target).toStrictEqual([logEntry]);
  });
});
