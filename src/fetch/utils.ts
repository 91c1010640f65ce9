import type { HeaderOptions } from '../types/request.js';

/**
 * Merge header containers left to right into a single `Headers` instance; later sources win.
 */
export function mergeHeaderOptions(...sources: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const source of sources) {
    if (!source) {
      continue;
    }

    new Headers(source).forEach((value, key) => {
      merged.set(key, value);
    });
  }

  return merged;
}
