import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** XIVAPI rejected the request parameters (400). */
export class BadRequestError extends HTTPError {
  static name = 'BadRequestError';

  constructor(response: Response, message = 'Request was bad. Please check your parameters.', opts?: ErrorOptions) {
    super(response, message, opts);
  }
}

/** XIVAPI refused the request, usually because of an invalid API key (401). */
export class ForbiddenError extends HTTPError {
  static name = 'ForbiddenError';

  constructor(
    response: Response,
    message = 'Request was refused. Possibly due to an invalid API key.',
    opts?: ErrorOptions,
  ) {
    super(response, message, opts);
  }
}

/** The requested resource does not exist (404). */
export class NotFoundError extends HTTPError {
  static name = 'NotFoundError';

  constructor(response: Response, message = 'Resource not found.', opts?: ErrorOptions) {
    super(response, message, opts);
  }
}

/** Internal server error on XIVAPI (500). */
export class ServerError extends HTTPError {
  static name = 'ServerError';

  constructor(response: Response, message = 'An internal server error has occurred on XIVAPI.', opts?: ErrorOptions) {
    super(response, message, opts);
  }
}

/**
 * XIVAPI is unavailable (503). Commonly returned for Lodestone-backed endpoints while
 * the Lodestone is under maintenance.
 */
export class ServiceUnavailableError extends HTTPError {
  static name = 'ServiceUnavailableError';

  constructor(
    response: Response,
    message = 'Service is unavailable. This could be because the Lodestone is under maintenance.',
    opts?: ErrorOptions,
  ) {
    super(response, message, opts);
  }
}

/** Type guard for {@link BadRequestError}. */
export function isBadRequestError(error: unknown): error is BadRequestError {
  return isErrorType(BadRequestError, error);
}

/** Extract a {@link BadRequestError} from an unknown error value, following nested causes. */
export function getBadRequestError(error: unknown): BadRequestError | null {
  return unwrapErrorType(BadRequestError, error);
}

/** Type guard for {@link ForbiddenError}. */
export function isForbiddenError(error: unknown): error is ForbiddenError {
  return isErrorType(ForbiddenError, error);
}

/** Extract a {@link ForbiddenError} from an unknown error value, following nested causes. */
export function getForbiddenError(error: unknown): ForbiddenError | null {
  return unwrapErrorType(ForbiddenError, error);
}

/** Type guard for {@link NotFoundError}. */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return isErrorType(NotFoundError, error);
}

/** Extract a {@link NotFoundError} from an unknown error value, following nested causes. */
export function getNotFoundError(error: unknown): NotFoundError | null {
  return unwrapErrorType(NotFoundError, error);
}

/** Type guard for {@link ServerError}. */
export function isServerError(error: unknown): error is ServerError {
  return isErrorType(ServerError, error);
}

/** Extract a {@link ServerError} from an unknown error value, following nested causes. */
export function getServerError(error: unknown): ServerError | null {
  return unwrapErrorType(ServerError, error);
}

/** Type guard for {@link ServiceUnavailableError}. */
export function isServiceUnavailableError(error: unknown): error is ServiceUnavailableError {
  return isErrorType(ServiceUnavailableError, error);
}

/** Extract a {@link ServiceUnavailableError} from an unknown error value, following nested causes. */
export function getServiceUnavailableError(error: unknown): ServiceUnavailableError | null {
  return unwrapErrorType(ServiceUnavailableError, error);
}
