import { describe, expect, it, vi } from 'vitest';
import { backoffDelay, withRetryAndBackoff, type RetryPolicy } from './retry';

class Flaky extends Error {}

const policy: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 2000,
  maxDelayMs: 60000,
  jitter: 0,
  isRetryable: error => error instanceof Flaky
};

describe('backoffDelay', () => {
  it('doubles from the base delay', () => {
    expect([1, 2, 3, 4].map(n => backoffDelay(policy, n))).toEqual([2000, 4000, 8000, 16000]);
  });

  it('never exceeds the cap', () => {
    expect(backoffDelay(policy, 10)).toBe(60000);
  });

  it('adds jitter as a fraction of the delay', () => {
    expect(backoffDelay({ ...policy, jitter: 0.3 }, 2, () => 0.5)).toBeCloseTo(4600);
  });
});

describe('withRetryAndBackoff', () => {
  it('returns the first success', async () => {
    const sleep = vi.fn(async () => undefined);
    const op = vi.fn(async () => 'ok');
    await expect(withRetryAndBackoff(op, policy, 'op', { sleep })).resolves.toBe('ok');
    expect(op).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries retryable errors with growing delays', async () => {
    const sleeps: number[] = [];
    const op = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Flaky('429'))
      .mockRejectedValueOnce(new Flaky('503'))
      .mockResolvedValue('ok');

    const result = await withRetryAndBackoff(op, policy, 'op', {
      sleep: async ms => {
        sleeps.push(ms);
      }
    });

    expect(result).toBe('ok');
    expect(sleeps).toEqual([2000, 4000]);
  });

  it('gives up after the last attempt with the last error', async () => {
    let calls = 0;
    const op = async () => {
      calls++;
      throw new Flaky(`attempt ${calls}`);
    };
    await expect(withRetryAndBackoff(op, policy, 'op', { sleep: async () => undefined })).rejects.toThrow('attempt 5');
    expect(calls).toBe(5);
  });

  it('does not retry other errors', async () => {
    const sleep = vi.fn(async () => undefined);
    const op = vi.fn(async () => {
      throw new Error('400 invalid request');
    });
    await expect(withRetryAndBackoff(op, policy, 'op', { sleep })).rejects.toThrow('400 invalid request');
    expect(op).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
