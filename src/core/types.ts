import type { Filter } from '../query/filter.js';
import type { Sort } from '../query/sort.js';
import type { FetchClientOptions, FetchClientProvider, FetchClientProviderDefinition } from '../types/request.js';
import type { Logger } from '../utils/logger.js';

/** Configuration for constructing an {@link XivApiClient}. */
export interface XivApiClientProps {
  /** Key identifying the application with XIVAPI, sent as `private_key` on every request. */
  apiKey: string;
  /**
   * Base URL of the XIVAPI service.
   * @default 'https://xivapi.com'
   */
  baseUrl?: string;
  /** HTTP client implementation instantiated lazily on first use. Defaults to `FetchClient`. */
  fetchProvider?: FetchClientProvider;
  /**
   * Already-created HTTP session to use instead of a lazily created one.
   * The caller owns it: {@link XivApiClient.dispose} leaves it untouched.
   */
  fetchClient?: FetchClientProviderDefinition;
  /** Default fetch options (headers, credentials, mode) for the lazily created provider. */
  fetchOpts?: FetchClientOptions;
  /**
   * Destination of request and timing records.
   * @default console-backed logger prefixed with `[xivapi]`
   */
  logger?: Logger;
}

/** Runtime configuration payload accepted by `XivApiClient.config`. */
export type XivApiClientConfig = Partial<Pick<XivApiClientProps, 'apiKey' | 'fetchOpts' | 'logger'>>;

/** Options every operation accepts. */
export interface CallOptions {
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Lodestone searches: characters, Free Companies, linkshells and PvP teams. */
export interface LodestoneSearchOptions extends CallOptions {
  /** World the entity is attributed to. */
  world: string;
  /**
   * 1-indexed page of results.
   * @default 1
   */
  page?: number;
}

export interface CharacterSearchOptions extends LodestoneSearchOptions {
  forename: string;
  surname: string;
}

export interface NamedSearchOptions extends LodestoneSearchOptions {
  name: string;
}

export interface CharacterByIdOptions extends CallOptions {
  /** Request the extended profile (`extended=1`). */
  extended?: boolean;
  /** Adds `AC`. */
  includeAchievements?: boolean;
  /** Adds `MIMO`. */
  includeMinionsMounts?: boolean;
  /** Adds `FR`. */
  includeFriendsList?: boolean;
  /** Adds `CJ`. */
  includeClassJobs?: boolean;
  /** Adds `FC`. */
  includeFreeCompany?: boolean;
  /** Adds `FCM`. */
  includeFreeCompanyMembers?: boolean;
  /** Adds `PVP`. */
  includePvpTeam?: boolean;
  /**
   * Response language, one of `en`, `fr`, `de`, `ja` (case-insensitive).
   * @default 'en'
   */
  language?: string;
}

export interface FreeCompanyByIdOptions extends CallOptions {
  extended?: boolean;
  /** Adds `FCM`. */
  includeFreeCompanyMembers?: boolean;
}

export interface IndexSearchOptions extends CallOptions {
  /** Text matched against the combined name of every language. */
  name: string;
  /** Indexes to search, e.g. `['Recipe', 'Item']`. At least one is required. */
  indexes: readonly string[];
  /** Columns to return, e.g. `['ID', 'Name', 'Icon']`. At least one is required. */
  columns: readonly string[];
  /** @default 'en' */
  language?: string;
  /** Range filters ANDed onto the query. */
  filters?: readonly Filter[];
  sort?: Sort;
  /**
   * Result offset (`from`).
   * @default 0
   */
  page?: number;
  /**
   * Page size (`size`).
   * @default 10
   */
  perPage?: number;
  /**
   * String matching algorithm, e.g. `match`, `fuzzy` or `wildcard_plus`.
   * @default 'match'
   */
  stringAlgo?: string;
}

export interface IndexByIdOptions extends CallOptions {
  /** Columns to return. At least one is required. */
  columns: readonly string[];
  /** @default 'en' */
  language?: string;
}

export interface LoreSearchOptions extends CallOptions {
  /** @default 'en' */
  language?: string;
}

export interface MarketByWorldsOptions extends CallOptions {
  /** Between 1 and 15 world names, e.g. `['Phoenix', 'Tonberry']`. */
  worlds: readonly string[];
  /**
   * Maximum number of history records.
   * @default 25
   */
  maxHistory?: number;
}

export interface MarketByDatacenterOptions extends CallOptions {
  /** Datacenter name, e.g. `'Chaos'`. */
  datacenter: string;
  /** @default 25 */
  maxHistory?: number;
}
