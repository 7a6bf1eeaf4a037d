import { TaskStateError } from '@robolink/errors';
import { describe, it, expect } from 'vitest';

import { Future } from './Future.ts';

describe('Future', () => {
  it('starts incomplete', () => {
    const future = new Future<number>();
    expect(future.completed).toBe(false);
  });

  it('throws when read before completion', () => {
    const future = new Future<number>();
    expect(() => future.value).toThrow(TaskStateError);
    expect(() => future.value).toThrow('Future read before completion.');
  });

  it('stores the first value written', () => {
    const future = new Future<string | null>();
    expect(future.complete(null)).toBe(true);
    expect(future.completed).toBe(true);
    expect(future.value).toBeNull();
  });

  it('ignores later writes', () => {
    const future = new Future<string>();
    future.complete('first');
    expect(future.complete('second')).toBe(false);
    expect(future.value).toBe('first');
  });
});
