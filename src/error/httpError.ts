import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing an XIVAPI response with a status code the client does not map
 * to a more specific error. Base class of every remote-side error.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  static name = 'HTTPError';

  /** Response causing the HTTPError */
  #response: Response;

  /** Creates a new instance of a HTTPError with defaulting message + response to wrap */
  constructor(response: Response, message: string = `HTTP Error: ${response.status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#response = response;
  }

  /** Response causing the HTTPError */
  get response(): Response {
    return this.#response;
  }

  /** Status code of the response causing the HTTPError */
  get status(): number {
    return this.#response.status;
  }
}

/**
 * Type guard that checks if an error is an {@link HTTPError} (or any of its subclasses).
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

/**
 * Extracts an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): HTTPError | null {
  return unwrapErrorType(HTTPError, error);
}
