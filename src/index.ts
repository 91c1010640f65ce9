/**
 * Root entrypoint: re-exports the XIVAPI client, query value objects, transport and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/** Client, option types and search query value objects. */
export * from './core/index.js';
/** Error taxonomy and helpers for identifying and unwrapping error types. */
export * from './error/index.js';
/** Default fetch-backed HTTP provider. */
export { FetchClient } from './fetch/index.js';
/** Any JSON value; the shape of every response body. */
export type { JsonValue } from './types/json.js';
/** Contracts for plugging in a different HTTP provider. */
export type {
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
} from './types/request.js';
/** Logger contract and the bundled implementations. */
export { createConsoleLogger, type LogContext, type Logger, silentLogger } from './utils/logger.js';
/** Tuple-style result helpers. */
export { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './utils/wrap.js';
