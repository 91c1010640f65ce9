import type { StandardSchemaV1 } from '@standard-schema/spec';
import {
  InvalidAlgorithmError,
  InvalidColumnsError,
  InvalidDatacenterError,
  InvalidIndexError,
  InvalidLanguageError,
  InvalidWorldsError,
} from '../error/argumentErrors.js';
import type { ValidationError } from '../error/validationError.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import { buildSearchBody, joinUnique } from '../query/searchBody.js';
import type { JsonValue } from '../types/json.js';
import type { FetchClientOptions, FetchClientProvider, FetchClientProviderDefinition } from '../types/request.js';
import { type PathParams, type SearchParams, constructUrl } from '../utils/constructUrl.js';
import { createConsoleLogger, type Logger } from '../utils/logger.js';
import { timed } from '../utils/timed.js';
import { type ValidationErrorClass, validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mapResponse } from './mapResponse.js';
import {
  columnsSchema,
  datacenterSchema,
  indexSchema,
  indexesSchema,
  LANGUAGES,
  type Language,
  languageSchema,
  STRING_ALGORITHMS,
  type StringAlgorithm,
  stringAlgorithmSchema,
  worldsSchema,
} from './schemas.js';
import type {
  CallOptions,
  CharacterByIdOptions,
  CharacterSearchOptions,
  FreeCompanyByIdOptions,
  IndexByIdOptions,
  IndexSearchOptions,
  LoreSearchOptions,
  MarketByDatacenterOptions,
  MarketByWorldsOptions,
  NamedSearchOptions,
  XivApiClientConfig,
  XivApiClientProps,
} from './types.js';

/** Default XIVAPI host. */
export const DEFAULT_BASE_URL = 'https://xivapi.com';

/** Result of every client operation: the untouched JSON body, or the reason there is none. */
export type XivApiResult = SafeWrapAsync<Error, JsonValue>;

/** Include flag → `data` code, in the order codes are sent. */
const CHARACTER_DATA_CODES = [
  ['includeAchievements', 'AC'],
  ['includeMinionsMounts', 'MIMO'],
  ['includeFriendsList', 'FR'],
  ['includeClassJobs', 'CJ'],
  ['includeFreeCompany', 'FC'],
  ['includeFreeCompanyMembers', 'FCM'],
  ['includePvpTeam', 'PVP'],
] as const satisfies ReadonlyArray<readonly [keyof CharacterByIdOptions, string]>;

const FREE_COMPANY_DATA_CODES = [['includeFreeCompanyMembers', 'FCM']] as const satisfies ReadonlyArray<
  readonly [keyof FreeCompanyByIdOptions, string]
>;

/**
 * Comma-joins the codes of every include flag set to `true`; `undefined` (parameter omitted) when none is.
 */
function dataParam<T extends object>(options: T, codes: ReadonlyArray<readonly [keyof T, string]>): string | undefined {
  const data = codes.filter(([flag]) => options[flag] === true).map(([, code]) => code);
  return data.length > 0 ? data.join(',') : undefined;
}

/** Outbound request description handed from a builder to the transport. */
interface XivApiRequest extends CallOptions {
  method: 'GET' | 'POST';
  path: string;
  pathParams?: PathParams;
  search?: SearchParams;
  body?: unknown;
}

/**
 * Typed XIVAPI client that:
 * - validates arguments locally before anything is sent,
 * - builds the path, query and (for index search) JSON body of each endpoint,
 * - sends it through a lazily created, pluggable HTTP provider,
 * - maps the response status to a typed error or returns the parsed JSON body.
 *
 * All operations return error-first tuples via {@link SafeWrapAsync}; none of them rejects.
 *
 * @example
 * const client = new XivApiClient({ apiKey: process.env.XIVAPI_KEY ?? '' });
 * const [err, character] = await client.characterById(730968, { includeClassJobs: true });
 * client.dispose();
 */
export class XivApiClient {
  /** Language codes accepted by every `language` option. */
  readonly languages: readonly Language[] = LANGUAGES;
  /** String matching algorithms accepted by {@link XivApiClient.indexSearch}. */
  readonly stringAlgorithms: readonly StringAlgorithm[] = STRING_ALGORITHMS;

  /** Key appended as `private_key` to every request. */
  #apiKey: string;
  /** Base URL handed to the provider. */
  #baseUrl: string;
  /** Provider class instantiated on first use. */
  #fetchProvider: FetchClientProvider;
  /** Default options for the provider. */
  #fetchOpts: FetchClientOptions;
  /** Live HTTP session, created lazily unless injected. */
  #fetchClient: FetchClientProviderDefinition | null;
  /** Whether {@link XivApiClient.dispose} may release the session. */
  #ownsFetchClient: boolean;
  #logger: Logger;

  /**
   * Creates a client. No HTTP session is opened until the first request, unless one is injected.
   */
  constructor({
    apiKey,
    baseUrl = DEFAULT_BASE_URL,
    fetchProvider = FetchClient,
    fetchClient,
    fetchOpts,
    logger,
  }: XivApiClientProps) {
    this.#apiKey = apiKey;
    this.#baseUrl = baseUrl;
    this.#fetchProvider = fetchProvider;
    this.#fetchOpts = { ...fetchOpts };
    this.#fetchClient = fetchClient ?? null;
    this.#ownsFetchClient = !fetchClient;
    this.#logger = logger ?? createConsoleLogger();
  }

  /**
   * Updates the API key, logger and default fetch options at runtime; fetch options are
   * propagated to the live provider.
   */
  config({ apiKey, fetchOpts, logger }: XivApiClientConfig): void {
    if (apiKey !== undefined) {
      this.#apiKey = apiKey;
    }

    if (logger) {
      this.#logger = logger;
    }

    if (!fetchOpts) {
      return;
    }

    this.#fetchOpts = {
      ...this.#fetchOpts,
      ...fetchOpts,
      headers: mergeHeaderOptions(this.#fetchOpts.headers, fetchOpts.headers),
    };
    this.#fetchClient?.config(fetchOpts);
  }

  /**
   * Releases the HTTP session this client created, aborting its in-flight requests.
   * A later call creates a fresh session. An injected `fetchClient` is left to its owner.
   */
  dispose(): void {
    if (!this.#ownsFetchClient || !this.#fetchClient) {
      return;
    }

    this.#fetchClient.dispose?.();
    this.#fetchClient = null;
    this.#logger.debug('disposed fetch client', { baseUrl: this.#baseUrl });
  }

  /**
   * Searches the Lodestone for characters by name on a world.
   *
   * @example
   * const [err, results] = await client.characterSearch({ world: 'Phoenix', forename: 'Alpha', surname: 'Tester' });
   */
  readonly characterSearch = this.#timed(
    'characterSearch',
    ({ world, forename, surname, page = 1, signal }: CharacterSearchOptions): XivApiResult =>
      this.#send({
        method: 'GET',
        path: '/character/search',
        search: { name: `${forename} ${surname}`, server: world, page },
        signal,
      }),
  );

  /**
   * Requests a character by Lodestone ID. Each `include*` flag adds its data set to the
   * `data` parameter, which is left out entirely when no flag is set.
   */
  readonly characterById = this.#timed(
    'characterById',
    async (lodestoneId: number, options: CharacterByIdOptions = {}): XivApiResult => {
      const { extended, language = 'en', signal } = options;

      const [errLanguage, lang] = this.#validateLanguage(language);
      if (errLanguage) {
        return [errLanguage, null];
      }

      return this.#send({
        method: 'GET',
        path: '/character/{lodestoneId}',
        pathParams: { lodestoneId },
        search: {
          language: lang,
          extended: extended ? 1 : undefined,
          data: dataParam(options, CHARACTER_DATA_CODES),
        },
        signal,
      });
    },
  );

  /** Searches the Lodestone for Free Companies by name on a world. */
  readonly freeCompanySearch = this.#timed(
    'freeCompanySearch',
    ({ world, name, page = 1, signal }: NamedSearchOptions): XivApiResult =>
      this.#send({ method: 'GET', path: '/freecompany/search', search: { name, server: world, page }, signal }),
  );

  /** Requests a Free Company by Lodestone ID, optionally with its members (`FCM`). */
  readonly freeCompanyById = this.#timed(
    'freeCompanyById',
    (lodestoneId: number, options: FreeCompanyByIdOptions = {}): XivApiResult =>
      this.#send({
        method: 'GET',
        path: '/freecompany/{lodestoneId}',
        pathParams: { lodestoneId },
        search: {
          extended: options.extended ? 1 : undefined,
          data: dataParam(options, FREE_COMPANY_DATA_CODES),
        },
        signal: options.signal,
      }),
  );

  /** Searches the Lodestone for linkshells by name on a world. */
  readonly linkshellSearch = this.#timed(
    'linkshellSearch',
    ({ world, name, page = 1, signal }: NamedSearchOptions): XivApiResult =>
      this.#send({ method: 'GET', path: '/linkshell/search', search: { name, server: world, page }, signal }),
  );

  /** Requests a linkshell by Lodestone ID. */
  readonly linkshellById = this.#timed(
    'linkshellById',
    (lodestoneId: string | number, { signal }: CallOptions = {}): XivApiResult =>
      this.#send({ method: 'GET', path: '/linkshell/{lodestoneId}', pathParams: { lodestoneId }, signal }),
  );

  /** Searches the Lodestone for PvP teams by name on a world. */
  readonly pvpTeamSearch = this.#timed(
    'pvpTeamSearch',
    ({ world, name, page = 1, signal }: NamedSearchOptions): XivApiResult =>
      this.#send({ method: 'GET', path: '/pvpteam/search', search: { name, server: world, page }, signal }),
  );

  /** Requests a PvP team by Lodestone ID (a hexadecimal string on the Lodestone). */
  readonly pvpTeamById = this.#timed(
    'pvpTeamById',
    (lodestoneId: string, { signal }: CallOptions = {}): XivApiResult =>
      this.#send({ method: 'GET', path: '/pvpteam/{lodestoneId}', pathParams: { lodestoneId }, signal }),
  );

  /**
   * Full-text search over one or more game indexes.
   *
   * The name is matched against the combined name of every language with the chosen
   * algorithm; filters are ANDed onto the query, and results are paged by offset
   * (`page` → `from`, `perPage` → `size`).
   *
   * @example
   * const [, filter] = Filter.create('LevelItem', 'gte', 100);
   * const [err, results] = await client.indexSearch({
   *   name: 'Sword',
   *   indexes: ['Item'],
   *   columns: ['ID', 'Name'],
   *   filters: filter ? [filter] : [],
   *   sort: new Sort('LevelItem', false),
   * });
   */
  readonly indexSearch = this.#timed(
    'indexSearch',
    async ({
      name,
      indexes,
      columns,
      language = 'en',
      filters,
      sort,
      page = 0,
      perPage = 10,
      stringAlgo = 'match',
      signal,
    }: IndexSearchOptions): XivApiResult => {
      const [errIndexes, validIndexes] = this.#validate(
        indexes,
        indexesSchema,
        InvalidIndexError,
        'Please specify at least one index to search for, e.g. ["Recipe"]',
      );
      if (errIndexes) {
        return [errIndexes, null];
      }

      const [errLanguage, lang] = this.#validateLanguage(language);
      if (errLanguage) {
        return [errLanguage, null];
      }

      const [errColumns, validColumns] = this.#validateColumns(columns);
      if (errColumns) {
        return [errColumns, null];
      }

      const [errAlgorithm, algorithm] = this.#validate(
        stringAlgo,
        stringAlgorithmSchema,
        InvalidAlgorithmError,
        `"${stringAlgo}" is not a supported string_algo for XIVAPI`,
      );
      if (errAlgorithm) {
        return [errAlgorithm, null];
      }

      return this.#send({
        method: 'POST',
        path: '/search',
        search: { language: lang },
        body: buildSearchBody({
          name,
          indexes: validIndexes,
          columns: validColumns,
          algorithm,
          filters,
          sort,
          page,
          perPage,
        }),
        signal,
      });
    },
  );

  /**
   * Requests a single row of an index by content ID, e.g. `indexById('Item', 1675, { columns: ['ID', 'Name'] })`.
   */
  readonly indexById = this.#timed(
    'indexById',
    async (
      index: string,
      contentId: number,
      { columns, language = 'en', signal }: IndexByIdOptions,
    ): XivApiResult => {
      const [errIndex, validIndex] = this.#validate(
        index,
        indexSchema,
        InvalidIndexError,
        'Please specify an index to search on, e.g. "Item"',
      );
      if (errIndex) {
        return [errIndex, null];
      }

      const [errColumns, validColumns] = this.#validateColumns(columns);
      if (errColumns) {
        return [errColumns, null];
      }

      const [errLanguage, lang] = this.#validateLanguage(language);
      if (errLanguage) {
        return [errLanguage, null];
      }

      return this.#send({
        method: 'GET',
        path: '/{index}/{contentId}',
        pathParams: { index: validIndex, contentId },
        search: { columns: joinUnique(validColumns), language: lang },
        signal,
      });
    },
  );

  /**
   * Searches cutscene subtitles, quest dialog and item, achievement, mount and minion
   * descriptions for text matching `query`.
   */
  readonly loreSearch = this.#timed(
    'loreSearch',
    async (query: string, { language = 'en', signal }: LoreSearchOptions = {}): XivApiResult => {
      const [errLanguage, lang] = this.#validateLanguage(language);
      if (errLanguage) {
        return [errLanguage, null];
      }

      return this.#send({ method: 'GET', path: '/lore', search: { string: query, language: lang }, signal });
    },
  );

  /** Requests the world status post from the Lodestone. */
  readonly lodestoneWorldStatus = this.#timed(
    'lodestoneWorldStatus',
    ({ signal }: CallOptions = {}): XivApiResult =>
      this.#send({ method: 'GET', path: '/lodestone/worldstatus', signal }),
  );

  /**
   * Requests current listings and sale history of an item on up to 15 worlds.
   */
  readonly marketByWorlds = this.#timed(
    'marketByWorlds',
    async (itemId: number, { worlds, maxHistory = 25, signal }: MarketByWorldsOptions): XivApiResult => {
      const [errWorlds, validWorlds] = this.#validate(
        worlds,
        worldsSchema,
        InvalidWorldsError,
        'Please provide a list of 1 to 15 FFXIV world names, e.g. ["Phoenix", "Gilgamesh", "Tonberry"]',
      );
      if (errWorlds) {
        return [errWorlds, null];
      }

      return this.#send({
        method: 'GET',
        path: '/market/item/{itemId}',
        pathParams: { itemId },
        search: { servers: joinUnique(validWorlds), max_history: maxHistory },
        signal,
      });
    },
  );

  /**
   * Requests current listings and sale history of an item on every world of a datacenter.
   */
  readonly marketByDatacenter = this.#timed(
    'marketByDatacenter',
    async (itemId: number, { datacenter, maxHistory = 25, signal }: MarketByDatacenterOptions): XivApiResult => {
      const [errDatacenter, dc] = this.#validate(
        datacenter,
        datacenterSchema,
        InvalidDatacenterError,
        'Please provide the name of an FFXIV datacenter, e.g. "Chaos", "Aether" or "Elemental"',
      );
      if (errDatacenter) {
        return [errDatacenter, null];
      }

      return this.#send({
        method: 'GET',
        path: '/market/item/{itemId}',
        pathParams: { itemId },
        search: { dc, max_history: maxHistory },
        signal,
      });
    },
  );

  /** Applies execution-time logging to a request builder. */
  #timed<Args extends unknown[]>(
    operation: string,
    fn: (...args: Args) => XivApiResult,
  ): (...args: Args) => XivApiResult {
    return timed(operation, fn, () => this.#logger);
  }

  #validate<T extends StandardSchemaV1, E extends ValidationError>(
    input: unknown,
    schema: T,
    errorClass: ValidationErrorClass<E>,
    message: string,
  ): SafeWrap<E, StandardSchemaV1.InferOutput<T>> {
    return validator(input, schema, errorClass, message);
  }

  #validateLanguage(language: string): SafeWrap<InvalidLanguageError, Language> {
    return this.#validate(
      language,
      languageSchema,
      InvalidLanguageError,
      `"${language}" is not a valid language code for XIVAPI.`,
    );
  }

  #validateColumns(columns: readonly string[]): SafeWrap<InvalidColumnsError, string[]> {
    return this.#validate(
      columns,
      columnsSchema,
      InvalidColumnsError,
      'Please specify at least one column to return in the resulting data.',
    );
  }

  /** Returns the live HTTP session, creating it on first use. */
  #transport(): FetchClientProviderDefinition {
    if (!this.#fetchClient) {
      this.#fetchClient = new this.#fetchProvider(this.#baseUrl, this.#fetchOpts);
      this.#logger.debug('created fetch client', { baseUrl: this.#baseUrl });
    }

    return this.#fetchClient;
  }

  /**
   * Core execution pipeline shared by every builder: constructs the URL (always adding
   * `private_key`), issues the request and maps the response.
   *
   * Transport failures are returned exactly as the provider produced or threw them.
   */
  async #send({ method, path, pathParams, search, body, signal }: XivApiRequest): XivApiResult {
    const [errUrl, url] = constructUrl(path, pathParams, { ...search, private_key: this.#apiKey });
    if (errUrl) {
      return [errUrl, null];
    }

    const fetchClient = this.#transport();
    const [errThrown, wrapped] = await safeWrapAsync(() =>
      method === 'POST'
        ? fetchClient.post(url, { body: JSON.stringify(body), signal })
        : fetchClient.get(url, { signal }),
    );
    if (errThrown) {
      return [errThrown, null];
    }

    const [errRequest, response] = wrapped;
    if (errRequest) {
      return [errRequest, null];
    }

    return mapResponse(response, this.#logger);
  }
}
