import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, getRetryConfig, retryWithBackoff } from './retry.js';
import { ProviderError, isRetryableProviderError, mapProviderError } from './errors.js';

const fast = getRetryConfig({ attempts: 3, minDelayMs: 0, maxDelayMs: 0, jitter: 0 });

describe('retryWithBackoff', () => {
  it('should return the first successful result', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ProviderError('busy', 'rate_limit'))
      .mockResolvedValueOnce('ok');

    await expect(retryWithBackoff(fn, fast, isRetryableProviderError)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenLastCalledWith(2);
  });

  it('should not retry errors the predicate rejects', async () => {
    const error = new ProviderError('denied', 'auth');
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(error);

    await expect(retryWithBackoff(fn, fast, isRetryableProviderError)).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should rethrow the last error when attempts run out', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValue(new ProviderError('down', 'unavailable'));

    await expect(retryWithBackoff(fn, fast, isRetryableProviderError)).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should stop retrying once the signal aborts', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValue(new ProviderError('busy', 'rate_limit'));

    await expect(
      retryWithBackoff(fn, fast, isRetryableProviderError, controller.signal)
    ).rejects.toThrow('busy');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should cut a pending backoff short when the signal aborts', async () => {
    const slow = getRetryConfig({ attempts: 3, minDelayMs: 60_000, maxDelayMs: 60_000, jitter: 0 });
    const controller = new AbortController();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValue(new ProviderError('busy', 'rate_limit'));

    const pending = retryWithBackoff(fn, slow, isRetryableProviderError, controller.signal);
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toThrow('busy');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('backoffDelay', () => {
  it('should double per attempt up to the cap', () => {
    const config = getRetryConfig({ minDelayMs: 100, maxDelayMs: 300, jitter: 0 });
    expect(backoffDelay(1, config)).toBe(100);
    expect(backoffDelay(2, config)).toBe(200);
    expect(backoffDelay(3, config)).toBe(300);
  });

  it('should add proportional jitter', () => {
    const config = getRetryConfig({ minDelayMs: 100, jitter: 0.5 });
    expect(backoffDelay(1, config, () => 1)).toBe(150);
  });
});

describe('mapProviderError', () => {
  it.each([
    [401, 'auth'],
    [403, 'auth'],
    [402, 'billing'],
    [429, 'rate_limit'],
    [503, 'unavailable'],
    [400, 'unknown'],
  ])('should map status %i to %s', (status, kind) => {
    expect(mapProviderError({ status }).kind).toBe(kind);
  });

  it('should pass provider errors through', () => {
    const error = new ProviderError('x', 'billing');
    expect(mapProviderError(error)).toBe(error);
  });

  it('should map errors without a status to unknown', () => {
    const mapped = mapProviderError(new Error('socket hang up'));
    expect(mapped.kind).toBe('unknown');
    expect(mapped.status).toBeUndefined();
  });
});
