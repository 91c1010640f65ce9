import { describe, expect, it, vi } from 'vitest';
import type { Logger } from './logger.js';
import { timed } from './timed.js';

const createLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe('timed', () => {
  it('returns the wrapped result and logs the duration', async () => {
    const logger = createLogger();
    vi.spyOn(performance, 'now').mockReturnValueOnce(1_000).mockReturnValueOnce(2_500);

    const add = timed('add', async (a: number, b: number) => a + b, () => logger);

    await expect(add(2, 3)).resolves.toBe(5);
    expect(logger.info).toHaveBeenCalledWith('add executed in 1.50s', { operation: 'add', durationMs: 1_500 });
    vi.restoreAllMocks();
  });

  it('logs and rethrows when the wrapped function rejects', async () => {
    const logger = createLogger();
    const failing = timed(
      'failing',
      async () => {
        throw new Error('boom');
      },
      () => logger,
    );

    await expect(failing()).rejects.toThrow('boom');
    expect(logger.info).toHaveBeenCalledTimes(1);
  });

  it('resolves the logger on each call', async () => {
    const first = createLogger();
    const second = createLogger();
    let current = first;
    const noop = timed('noop', async () => null, () => current);

    await noop();
    current = second;
    await noop();

    expect(first.info).toHaveBeenCalledTimes(1);
    expect(second.info).toHaveBeenCalledTimes(1);
  });
});
