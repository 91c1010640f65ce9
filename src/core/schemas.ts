import { z } from 'zod';

/** Language codes XIVAPI can answer in. */
export const LANGUAGES = ['en', 'fr', 'de', 'ja'] as const;

/** One of {@link LANGUAGES}. */
export type Language = (typeof LANGUAGES)[number];

/** String matching algorithms accepted by index search. */
export const STRING_ALGORITHMS = [
  'custom',
  'wildcard',
  'wildcard_plus',
  'fuzzy',
  'term',
  'prefix',
  'match',
  'match_phrase',
  'match_phrase_prefix',
  'multi_match',
  'query_string',
] as const;

/** One of {@link STRING_ALGORITHMS}. */
export type StringAlgorithm = (typeof STRING_ALGORITHMS)[number];

/** Market queries accept at most this many worlds at once. */
export const MAX_MARKET_WORLDS = 15;

/** Case-insensitive language code, normalized to lowercase. */
export const languageSchema = z.string().toLowerCase().pipe(z.enum(LANGUAGES));

export const stringAlgorithmSchema = z.enum(STRING_ALGORITHMS);

/** Index lists must name at least one index. */
export const indexesSchema = z.array(z.string()).min(1);

/** A single index name for a by-id lookup. */
export const indexSchema = z.string().min(1);

/** Column lists must name at least one column. */
export const columnsSchema = z.array(z.string()).min(1);

export const worldsSchema = z.array(z.string()).min(1).max(MAX_MARKET_WORLDS);

export const datacenterSchema = z.string().min(1);
