/**
 * Fetch entrypoint: exports the default fetch-backed transport.
 * @module
 */
export { FetchClient } from './client.js';
