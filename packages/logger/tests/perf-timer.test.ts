/**
 * @fileoverview Tests for performance timing utilities
 */

import { describe, it, expect } from 'vitest';
import { startTimer, measureSync, measureAsync } from '../src/perf-timer.js';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('startTimer', () => {
  it('should measure elapsed time', async () => {
    const timer = startTimer();
    await sleep(50);

    expect(timer.elapsed()).toBeGreaterThanOrEqual(45);
  });

  it('should freeze the duration once stopped', async () => {
    const timer = startTimer();
    await sleep(20);
    const stopped = timer.stop();
    await sleep(20);

    expect(timer.isRunning()).toBe(false);
    expect(timer.stop()).toBe(stopped);
    expect(timer.elapsed()).toBe(stopped);
  });

  it('should report running state', () => {
    const timer = startTimer();

    expect(timer.isRunning()).toBe(true);
    expect(Number.isInteger(timer.elapsed())).toBe(true);
  });
});

describe('measureSync', () => {
  it('should return the result with a duration', () => {
    const { result, duration_ms } = measureSync(() => 2 + 3);

    expect(result).toBe(5);
    expect(duration_ms).toBeGreaterThanOrEqual(0);
  });

  it('should propagate errors', () => {
    expect(() =>
      measureSync(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');
  });
});

describe('measureAsync', () => {
  it('should await the result', async () => {
    const { result, duration_ms } = await measureAsync(async () => {
      await sleep(10);
      return 'done';
    });

    expect(result).toBe('done');
    expect(duration_ms).toBeGreaterThanOrEqual(5);
  });

  it('should propagate rejections', async () => {
    await expect(measureAsync(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
  });
});
