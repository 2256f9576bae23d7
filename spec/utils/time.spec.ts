import { describe, expect, it } from 'vitest';
import { TimeoutError, formatDuration, sleep, withTimeout } from '../../src/utils/time.ts';

describe('withTimeout', () => {
  it('returns the value of a promise that settles in time', async () => {
    await expect(withTimeout(Promise.resolve(5), 50, 'quick')).resolves.toBe(5);
  });

  it('rejects with a labeled TimeoutError', async () => {
    const err = await withTimeout(sleep(200), 10, 'slow thing').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ label: 'slow thing', ms: 10, message: 'timeout: slow thing after 10ms' });
  });

  it('passes through the rejection of the wrapped promise', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 50, 'x')).rejects.toThrow('boom');
  });
});

describe('formatDuration', () => {
  it.each([
    [0, '0s'],
    [59.9, '59s'],
    [61, '1m 1s'],
    [3600, '1h 0m 0s'],
    [90061, '1d 1h 1m 1s'],
  ])('formats %d seconds as %s', (secs, text) => {
    expect(formatDuration(secs)).toBe(text);
  });

  it('renders invalid input as a dash', () => {
    expect(formatDuration(-1)).toBe('—');
    expect(formatDuration(Number.NaN)).toBe('—');
  });
});
