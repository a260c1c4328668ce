import { DelayRange } from '../types/index.js';

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Random duration inside the range, used as a self-imposed rate limit
 */
export function jitteredDelayMs(range: DelayRange, random: () => number = Math.random): number {
  return range.minMs + random() * (range.maxMs - range.minMs);
}

export function politeDelay(range: DelayRange): Promise<void> {
  return sleep(jitteredDelayMs(range));
}
