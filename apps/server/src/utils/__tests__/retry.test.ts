import { describe, it, expect, vi, afterEach } from 'vitest';
import { computeBackoff, sleep, withRetry } from '../retry.js';

const policy = { initialDelayMs: 1000, maxDelayMs: 60_000, multiplier: 2 };

describe('computeBackoff', () => {
  it('doubles from the initial delay', () => {
    expect(computeBackoff(1, policy)).toBe(1000);
    expect(computeBackoff(2, policy)).toBe(2000);
    expect(computeBackoff(4, policy)).toBe(8000);
  });

  it('caps at the maximum', () => {
    expect(computeBackoff(7, policy)).toBe(60_000);
    expect(computeBackoff(20, policy)).toBe(60_000);
  });

  it('treats attempts below 1 as the first', () => {
    expect(computeBackoff(0, policy)).toBe(1000);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    const done = vi.fn();

    void sleep(500).then(done);
    await vi.advanceTimersByTimeAsync(499);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(done).toHaveBeenCalledOnce();
  });

  it('resolves early on abort', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBeUndefined();
  });
});

describe('withRetry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the first success', async () => {
    const operation = vi.fn(async (attempt: number) => `ok-${attempt}`);

    await expect(withRetry(operation, { ...policy, maxAttempts: 3 })).resolves.toBe('ok-1');
    expect(operation).toHaveBeenCalledOnce();
  });

  it('retries with backoff until success', async () => {
    vi.useFakeTimers();
    const onRetry = vi.fn();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('done');

    const result = withRetry(operation, { ...policy, maxAttempts: 5, onRetry });
    await vi.advanceTimersByTimeAsync(3000);

    await expect(result).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([, attempt, delay]) => [attempt, delay])).toEqual([
      [1, 1000],
      [2, 2000],
    ]);
  });

  it('rethrows once attempts are exhausted', async () => {
    vi.useFakeTimers();
    const operation = vi.fn(async () => {
      throw new Error('down');
    });

    const result = withRetry(operation, { ...policy, maxAttempts: 2 });
    const settled = expect(result).rejects.toThrow('down');
    await vi.advanceTimersByTimeAsync(1000);

    await settled;
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('does not retry when shouldRetry declines', async () => {
    const operation = vi.fn(async () => {
      throw new Error('unauthorized');
    });

    await expect(
      withRetry(operation, { ...policy, maxAttempts: 5, shouldRetry: () => false })
    ).rejects.toThrow('unauthorized');
    expect(operation).toHaveBeenCalledOnce();
  });

  it('stops waiting when the signal aborts', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      throw new Error('still down');
    });

    const result = withRetry(operation, {
      ...policy,
      maxAttempts: Infinity,
      signal: controller.signal,
    });
    const settled = expect(result).rejects.toThrow('still down');
    await vi.advanceTimersByTimeAsync(0);
    controller.abort();

    await settled;
    expect(operation).toHaveBeenCalledOnce();
  });
});
