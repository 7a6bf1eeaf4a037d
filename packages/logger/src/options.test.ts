import { describe, expect, it, vi } from 'vitest';

import { DEFAULT_OPTIONS, mergeOptions, parseOptions } from './options.ts';
import { consoleTransport } from './transports.ts';
import type { Transport } from './types.ts';

describe('parseOptions', () => {
  it('parses an undefined options bag', () => {
    expect(parseOptions(undefined)).toStrictEqual({
      transports: [consoleTransport],
    });
  });

  it('parses an empty options bag', () => {
    expect(parseOptions({})).toStrictEqual({
      transports: [consoleTransport],
    });
  });

  it('keeps explicit transports', () => {
    const mockTransport: Transport = vi.fn();
    const options = parseOptions({
      tags: ['test'],
      transports: [mockTransport],
      level: 'warn',
    });
    expect(options).toStrictEqual({
      tags: ['test'],
      transports: [mockTransport],
      level: 'warn',
    });
  });

  it('parses a string', () => {
    expect(parseOptions('test')).toStrictEqual({
      tags: ['test'],
      transports: [consoleTransport],
    });
  });

  it.each([[0], [true], [false]])(
    'throws an error if the options are invalid: %j',
    (value) => {
      // @ts-expect-error Invalid options
      expect(() => parseOptions(value)).toThrow(/Invalid logger options/u);
    },
  );
});

describe('mergeOptions', () => {
  it.each([
    { left: ['test'], right: ['sub'], result: ['test', 'sub'] },
    { left: ['test', 'test'], right: ['sub'], result: ['test', 'sub'] },
    {
      left: ['test', 'fizz'],
      right: ['test', 'buzz'],
      result: ['test', 'fizz', 'buzz'],
    },
  ])('merges tags as expected: $left and $right', ({ left, right, result }) => {
    const options = mergeOptions({ tags: left }, { tags: right });
    expect(options.tags).toStrictEqual(result);
  });

  it('defaults to the default options', () => {
    expect(mergeOptions()).toStrictEqual(DEFAULT_OPTIONS);
  });

  it('deduplicates transports', () => {
    const transportA: Transport = vi.fn();
    const transportB: Transport = vi.fn();
    const options = mergeOptions(
      { transports: [transportA] },
      { transports: [transportA, transportB] },
    );
    expect(options.transports).toStrictEqual([transportA, transportB]);
  });

  it('takes the last explicit level', () => {
    expect(mergeOptions({ level: 'warn' }, {}).level).toBe('warn');
    expect(mergeOptions({ level: 'warn' }, { level: 'error' }).level).toBe(
      'error',
    );
  });
});
