import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { delay, makeCounter } from './misc.ts';

describe('makeCounter', () => {
  it('starts at one by default', () => {
    const counter = makeCounter();
    expect(counter()).toBe(1);
    expect(counter()).toBe(2);
    expect(counter()).toBe(3);
  });

  it('starts one past the given value', () => {
    const counter = makeCounter(41);
    expect(counter()).toBe(42);
  });

  it('keeps independent counters apart', () => {
    const first = makeCounter();
    const second = makeCounter();
    first();
    first();
    expect(second()).toBe(1);
  });
});

describe('delay', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the given time', async () => {
    const resolved = vi.fn();
    const promise = delay(50).then(resolved);
    await vi.advanceTimersByTimeAsync(49);
    expect(resolved).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await promise;
    expect(resolved).toHaveBeenCalledOnce();
  });
});
