/** Any error class, abstract or concrete, regardless of its constructor arguments. */
export type ErrorClass<T extends Error> = abstract new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const visited = new Set<Error>();
  let current = err;

  while (current instanceof Error && !visited.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    visited.add(current);
    current = current.cause;
  }

  return null;
}
