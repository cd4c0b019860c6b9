import { describe, it, expect, vi, afterEach } from 'vitest';
import { withRetry, withTimeout } from '../../../src/utils/retry.js';

describe('withRetry', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('returns the first successful result', async () => {
    const fn = vi.fn(async () => 'done');

    expect(await withRetry(fn)).toBe('done');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries until the function succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('done');
    const onRetry = vi.fn();

    const result = await withRetry(fn, { maxRetries: 3, baseDelayMs: 1, onRetry });

    expect(result).toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([, attempt]) => attempt)).toEqual([1, 2]);
  });

  it('gives up after the last retry', async () => {
    const fn = vi.fn(async () => {
      throw new Error('always');
    });

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1 })).rejects.toThrow('always');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('stops at once when retryOn rejects the error', async () => {
    const fn = vi.fn(async () => {
      throw new Error('fatal');
    });

    await expect(withRetry(fn, { baseDelayMs: 1, retryOn: (e) => e.message !== 'fatal' })).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('wraps non-Error rejections', async () => {
    await expect(withRetry(() => Promise.reject('plain string'), { maxRetries: 0 })).rejects.toThrow('plain string');
  });

  it('backs off exponentially', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout'] });
    vi.spyOn(Math, 'random').mockReturnValue(0);
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('done');

    const pending = withRetry(fn, { maxRetries: 2, baseDelayMs: 100 });

    await vi.advanceTimersByTimeAsync(99);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(200);
    await expect(pending).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves when the function finishes first', async () => {
    expect(await withTimeout(async () => 42, { timeoutMs: 1000 })).toBe(42);
  });

  it('rejects with the given message after the deadline', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const pending = withTimeout(() => new Promise<never>(() => {}), { timeoutMs: 500, message: 'too slow' });
    const assertion = expect(pending).rejects.toThrow('too slow');

    await vi.advanceTimersByTimeAsync(500);
    await assertion;
  });

  it('uses a default message', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const pending = withTimeout(() => new Promise<never>(() => {}), { timeoutMs: 250 });
    const assertion = expect(pending).rejects.toThrow('Operation timed out after 250ms');

    await vi.advanceTimersByTimeAsync(250);
    await assertion;
  });

  it('passes the function error through', async () => {
    await expect(withTimeout(() => Promise.reject(new Error('boom')), { timeoutMs: 1000 })).rejects.toThrow('boom');
  });
});
