import type {
  FetchClientOptions,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
} from '../types/request.js';
import { mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** Headers every XIVAPI request carries. */
const DEFAULT_HEADERS: HeaderOptions = { Accept: 'application/json' };

/**
 * Thin wrapper around the native `fetch` API that:
 * - prefixes all requests with a configured base URL,
 * - merges default and per-request options,
 * - returns error-first tuples via {@link SafeWrapAsync},
 * - hands back every completed response regardless of status.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Base URL prepended to all request paths. */
  #baseUrl: string;
  /** Default fetch options (headers, credentials, mode). */
  #opts: FetchClientOptions;
  /** Aborts every in-flight request once the client is disposed. */
  #abortController = new AbortController();

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    if (!baseUrl.endsWith('/')) {
      baseUrl += '/';
    }

    this.#baseUrl = baseUrl;
    this.#opts = opts ?? {};
  }

  /**
   * Updates default fetch options (merged with existing headers).
   */
  public config(opts: FetchClientOptions): void {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /**
   * Aborts pending requests. Requests issued afterwards fail immediately.
   */
  public dispose(): void {
    this.#abortController.abort(new Error('fetch client was disposed'));
  }

  /**
   * Executes a GET request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path including its query (e.g. `character/123?language=en`).
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public get(endpoint: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request('GET', endpoint, opts);
  }

  /**
   * Executes a POST request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path including its query (e.g. `search?language=en`).
   * @param opts - Request options, `body` being the serialized JSON payload.
   * @returns A promise resolving to `[error, response]`.
   */
  public post(endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('POST', endpoint, opts);
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Network / fetch errors are returned as thrown by `fetch`, without wrapping.
   */
  async #request(method: 'GET' | 'POST', endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const headers = mergeHeaderOptions(
      DEFAULT_HEADERS,
      this.#opts.headers,
      opts.body !== undefined ? { 'Content-Type': 'application/json' } : undefined,
      opts.headers,
    );
    const { signal, release } = mergeSignals([opts.signal, this.#abortController.signal]);

    try {
      return await safeWrapAsync(() =>
        fetch(this.constructPath(endpoint), {
          method,
          body: opts.body,
          headers,
          mode: this.#opts.mode,
          credentials: this.#opts.credentials,
          ...(signal && { signal }),
        }),
      );
    } finally {
      release();
    }
  }

  /**
   * Joins the base URL and endpoint into a single URL string.
   *
   * - Strips a leading slash from the endpoint to avoid `//` in the URL.
   */
  private constructPath(endpoint: string): string {
    return `${this.#baseUrl}${endpoint.replace(/^\//, '')}`;
  }
}
