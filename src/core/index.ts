/**
 * Core entrypoint: exports the XIVAPI client, its option types and the search query value objects.
 * Import from here if you only need the client without error helpers.
 * @module
 */

/** Typed XIVAPI client returning error-first tuples. */
export { DEFAULT_BASE_URL, XivApiClient, type XivApiResult } from './client.js';
/** Maps a completed response to parsed JSON or a typed HTTP error. */
export { mapResponse } from './mapResponse.js';
/** Supported languages and string matching algorithms. */
export {
  LANGUAGES,
  type Language,
  MAX_MARKET_WORLDS,
  STRING_ALGORITHMS,
  type StringAlgorithm,
} from './schemas.js';
export type {
  CallOptions,
  CharacterByIdOptions,
  CharacterSearchOptions,
  FreeCompanyByIdOptions,
  IndexByIdOptions,
  IndexSearchOptions,
  LodestoneSearchOptions,
  LoreSearchOptions,
  MarketByDatacenterOptions,
  MarketByWorldsOptions,
  NamedSearchOptions,
  XivApiClientConfig,
  XivApiClientProps,
} from './types.js';
/** DQL range filter for index searches. */
export { FILTER_COMPARISONS, Filter, type FilterComparison, type RangeClause } from '../query/filter.js';
/** Single-field sort for index searches. */
export { Sort, type SortClause } from '../query/sort.js';
/** Shape of the index search payload. */
export type { MatchClause, SearchBody } from '../query/searchBody.js';
