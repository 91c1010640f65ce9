import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper. */
export type HeaderOptions = NonNullable<RequestInit['headers']>;

/** Per-request options handed to a {@link FetchClientProviderDefinition}. */
export interface FetchOptions {
  /** Extra headers for this request only. */
  headers?: HeaderOptions;
  /** Serialized request body (JSON for XIVAPI). */
  body?: string;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Default options applied by a provider to every request. */
export interface FetchClientOptions {
  /** Headers sent with every request (merged under per-request headers). */
  headers?: HeaderOptions;
  /** Fetch credentials mode. */
  credentials?: RequestCredentials;
  /** Fetch mode. */
  mode?: RequestMode;
}

/**
 * Contract for the HTTP session used by the XIVAPI client: issue GET/POST requests and
 * hand back the raw response, whatever its status. Status handling belongs to the client.
 */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (url: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, Response>;
  /** Executes a POST request. */
  post: (url: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
  /** Updates default options for the provider. */
  config: (opts: FetchClientOptions) => void;
  /** Optional lifecycle hook to abort pending requests and release resources. */
  dispose?: () => void;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the fetch-client, with a base-url + options */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}
