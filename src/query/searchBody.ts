import type { Filter, RangeClause } from './filter.js';
import type { SortClause, Sort } from './sort.js';

/** Languages whose combined-name field is queried by every index search, in clause order. */
export const SEARCH_LANGUAGES = ['en', 'de', 'fr', 'ja'] as const;

/** Match clause against one language's combined-name field. */
export type MatchClause = Record<
  string,
  Record<string, { query: string; fuzziness: 'AUTO'; prefix_length: number; max_expansions: number }>
>;

/** JSON payload posted to `/search`. */
export interface SearchBody {
  indexes: string;
  columns: string;
  body: {
    query: {
      bool: {
        should: MatchClause[];
        filter?: RangeClause[];
      };
    };
    from: number;
    size: number;
    sort?: SortClause[];
  };
}

/** Inputs of {@link buildSearchBody}, already validated. */
export interface SearchBodyInput {
  name: string;
  indexes: readonly string[];
  columns: readonly string[];
  algorithm: string;
  filters?: readonly Filter[];
  sort?: Sort;
  page: number;
  perPage: number;
}

/**
 * Deduplicates a list and joins it with commas. Order follows first occurrence.
 */
export function joinUnique(values: readonly string[]): string {
  return [...new Set(values)].join(',');
}

/**
 * Builds the ElasticSearch-style boolean query XIVAPI expects for an index search:
 * one `should` clause per language, range filters ANDed through `filter`, an optional
 * single-field sort and offset pagination.
 */
export function buildSearchBody({
  name,
  indexes,
  columns,
  algorithm,
  filters = [],
  sort,
  page,
  perPage,
}: SearchBodyInput): SearchBody {
  const should = SEARCH_LANGUAGES.map(
    (language): MatchClause => ({
      [algorithm]: {
        [`NameCombined_${language}`]: {
          query: name,
          fuzziness: 'AUTO',
          prefix_length: 1,
          max_expansions: 50,
        },
      },
    }),
  );

  const body: SearchBody = {
    indexes: joinUnique(indexes),
    columns: joinUnique(columns),
    body: {
      query: { bool: { should } },
      from: page,
      size: perPage,
    },
  };

  if (filters.length > 0) {
    body.body.query.bool.filter = filters.map((filter) => filter.toClause());
  }

  if (sort) {
    body.body.sort = [sort.toClause()];
  }

  return body;
}
