import type { Logger } from './logger.js';

/**
 * Wraps an async function so every call logs its execution time once it settles,
 * e.g. `characterById executed in 0.42s`. Resolution and rejection pass through untouched.
 */
export function timed<Args extends unknown[], Result>(
  operation: string,
  fn: (...args: Args) => Promise<Result>,
  logger: () => Logger,
): (...args: Args) => Promise<Result> {
  return async (...args: Args): Promise<Result> => {
    const start = performance.now();
    try {
      return await fn(...args);
    } finally {
      const durationMs = performance.now() - start;
      logger().info(`${operation} executed in ${(durationMs / 1000).toFixed(2)}s`, { operation, durationMs });
    }
  };
}
