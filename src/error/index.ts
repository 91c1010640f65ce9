/**
 * Error entrypoint: exports the XIVAPI error taxonomy and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Argument errors, returned before any request is sent. */
export {
  getInvalidAlgorithmError,
  getInvalidColumnsError,
  getInvalidDatacenterError,
  getInvalidFilterError,
  getInvalidIndexError,
  getInvalidLanguageError,
  getInvalidWorldsError,
  InvalidAlgorithmError,
  InvalidColumnsError,
  InvalidDatacenterError,
  InvalidFilterError,
  InvalidIndexError,
  InvalidLanguageError,
  InvalidWorldsError,
  isInvalidAlgorithmError,
  isInvalidColumnsError,
  isInvalidDatacenterError,
  isInvalidFilterError,
  isInvalidIndexError,
  isInvalidLanguageError,
  isInvalidWorldsError,
} from './argumentErrors.js';
/** Error representing a path template that could not be turned into a URL. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Error representing a response status without a more specific mapping. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Errors mapped from XIVAPI response status codes. */
export {
  BadRequestError,
  ForbiddenError,
  getBadRequestError,
  getForbiddenError,
  getNotFoundError,
  getServerError,
  getServiceUnavailableError,
  isBadRequestError,
  isForbiddenError,
  isNotFoundError,
  isServerError,
  isServiceUnavailableError,
  NotFoundError,
  ServerError,
  ServiceUnavailableError,
} from './responseErrors.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Base class of every argument error, carrying the schema issues. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
