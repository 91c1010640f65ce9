import { ConstructURLError } from '../error/constructUrlError.js';
import type { SafeWrap } from './wrap.js';

/** Values accepted as `{placeholder}` replacements in a path template. */
export type PathParams = Record<string, string | number>;

/** Query parameters; `undefined` entries are skipped. */
export type SearchParams = Record<string, string | number | undefined>;

/**
 * Constructs a relative URL by replacing `{name}` path parameters (URI-encoded) and
 * appending query parameters.
 *
 * @example
 * constructUrl('/character/{id}', { id: 123 }, { language: 'en' }); // [null, 'character/123?language=en']
 */
export function constructUrl(
  path: string,
  pathParams: PathParams = {},
  search: SearchParams = {},
): SafeWrap<ConstructURLError, string> {
  let result = path;

  for (const [key, value] of Object.entries(pathParams)) {
    result = result.replaceAll(`{${key}}`, encodeURIComponent(String(value)));
  }

  if (result.includes('{') || result.includes('}')) {
    return [new ConstructURLError(`error constructing URL, path contains {} ${result}`, result), null];
  }

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(search)) {
    if (value === undefined) {
      continue;
    }
    searchParams.set(key, String(value));
  }

  const query = searchParams.toString();
  if (query) {
    result += `?${query}`;
  }

  // Strip leading slash for clean concatenation with baseUrl
  if (result.startsWith('/')) {
    return [null, result.substring(1)];
  }

  return [null, result];
}
