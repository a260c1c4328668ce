import { describe, it, expect, vi, afterEach } from 'vitest';
import { jitteredDelayMs, sleep } from './delay.js';

describe('jitteredDelayMs', () => {
  it('should stay within the range', () => {
    const range = { minMs: 800, maxMs: 1600 };

    expect(jitteredDelayMs(range, () => 0)).toBe(800);
    expect(jitteredDelayMs(range, () => 0.5)).toBe(1200);
    expect(jitteredDelayMs(range, () => 0.999)).toBeLessThan(1600);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve after the given time', async () => {
    vi.useFakeTimers();
    const done = vi.fn();

    const pending = sleep(1000).then(done);
    await vi.advanceTimersByTimeAsync(999);
    expect(done).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('should resolve immediately for non-positive durations', async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
  });
});
