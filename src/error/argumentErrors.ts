import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';
import { ValidationError } from './validationError.js';

/** Returned when the language code is not one of the supported XIVAPI languages (en, fr, de, ja). */
export class InvalidLanguageError extends ValidationError {
  static name = 'InvalidLanguageError';
}

/** Returned when no index is given to search or look up content on. */
export class InvalidIndexError extends ValidationError {
  static name = 'InvalidIndexError';
}

/** Returned when no column is given to return in the resulting data. */
export class InvalidColumnsError extends ValidationError {
  static name = 'InvalidColumnsError';
}

/** Returned when the string matching algorithm is not supported by XIVAPI. */
export class InvalidAlgorithmError extends ValidationError {
  static name = 'InvalidAlgorithmError';
}

/** Returned when the filter comparison is not one of gt, gte, lt or lte. */
export class InvalidFilterError extends ValidationError {
  static name = 'InvalidFilterError';
}

/** Returned when the world list for a market query is empty or holds more than 15 worlds. */
export class InvalidWorldsError extends ValidationError {
  static name = 'InvalidWorldsError';
}

/** Returned when the datacenter name for a market query is empty. */
export class InvalidDatacenterError extends ValidationError {
  static name = 'InvalidDatacenterError';
}

/** Type guard for {@link InvalidLanguageError}. */
export function isInvalidLanguageError(error: unknown): error is InvalidLanguageError {
  return isErrorType(InvalidLanguageError, error);
}

/** Extract an {@link InvalidLanguageError} from an unknown error value, following nested causes. */
export function getInvalidLanguageError(error: unknown): InvalidLanguageError | null {
  return unwrapErrorType(InvalidLanguageError, error);
}

/** Type guard for {@link InvalidIndexError}. */
export function isInvalidIndexError(error: unknown): error is InvalidIndexError {
  return isErrorType(InvalidIndexError, error);
}

/** Extract an {@link InvalidIndexError} from an unknown error value, following nested causes. */
export function getInvalidIndexError(error: unknown): InvalidIndexError | null {
  return unwrapErrorType(InvalidIndexError, error);
}

/** Type guard for {@link InvalidColumnsError}. */
export function isInvalidColumnsError(error: unknown): error is InvalidColumnsError {
  return isErrorType(InvalidColumnsError, error);
}

/** Extract an {@link InvalidColumnsError} from an unknown error value, following nested causes. */
export function getInvalidColumnsError(error: unknown): InvalidColumnsError | null {
  return unwrapErrorType(InvalidColumnsError, error);
}

/** Type guard for {@link InvalidAlgorithmError}. */
export function isInvalidAlgorithmError(error: unknown): error is InvalidAlgorithmError {
  return isErrorType(InvalidAlgorithmError, error);
}

/** Extract an {@link InvalidAlgorithmError} from an unknown error value, following nested causes. */
export function getInvalidAlgorithmError(error: unknown): InvalidAlgorithmError | null {
  return unwrapErrorType(InvalidAlgorithmError, error);
}

/** Type guard for {@link InvalidFilterError}. */
export function isInvalidFilterError(error: unknown): error is InvalidFilterError {
  return isErrorType(InvalidFilterError, error);
}

/** Extract an {@link InvalidFilterError} from an unknown error value, following nested causes. */
export function getInvalidFilterError(error: unknown): InvalidFilterError | null {
  return unwrapErrorType(InvalidFilterError, error);
}

/** Type guard for {@link InvalidWorldsError}. */
export function isInvalidWorldsError(error: unknown): error is InvalidWorldsError {
  return isErrorType(InvalidWorldsError, error);
}

/** Extract an {@link InvalidWorldsError} from an unknown error value, following nested causes. */
export function getInvalidWorldsError(error: unknown): InvalidWorldsError | null {
  return unwrapErrorType(InvalidWorldsError, error);
}

/** Type guard for {@link InvalidDatacenterError}. */
export function isInvalidDatacenterError(error: unknown): error is InvalidDatacenterError {
  return isErrorType(InvalidDatacenterError, error);
}

/** Extract an {@link InvalidDatacenterError} from an unknown error value, following nested causes. */
export function getInvalidDatacenterError(error: unknown): InvalidDatacenterError | null {
  return unwrapErrorType(InvalidDatacenterError, error);
}
