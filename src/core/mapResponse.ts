import { HTTPError } from '../error/httpError.js';
import {
  BadRequestError,
  ForbiddenError,
  NotFoundError,
  ServerError,
  ServiceUnavailableError,
} from '../error/responseErrors.js';
import type { JsonValue } from '../types/json.js';
import { type Logger, redactUrl } from '../utils/logger.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';

/** Status codes with a dedicated error class. */
const STATUS_ERRORS: Partial<Record<number, new (response: Response) => HTTPError>> = {
  400: BadRequestError,
  401: ForbiddenError,
  404: NotFoundError,
  500: ServerError,
  503: ServiceUnavailableError,
};

/**
 * Turns a completed XIVAPI round trip into a tuple-style result, purely on its status code.
 *
 * - 2xx: the parsed JSON body (`null` for an empty body).
 * - 400, 401, 404, 500, 503: the matching {@link HTTPError} subclass.
 * - Any other status: a plain {@link HTTPError}.
 *
 * Every response is logged as `<status> from <url>` with the API key redacted.
 */
export async function mapResponse(response: Response, logger: Logger): SafeWrapAsync<Error, JsonValue> {
  const url = redactUrl(response.url);
  logger.info(`${response.status} from ${url}`, { status: response.status, url });

  if (!response.ok) {
    const ErrorClass = STATUS_ERRORS[response.status] ?? HTTPError;
    return [new ErrorClass(response), null];
  }

  // Read as text first: an empty body is valid and `.json()` would reject it
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in mapResponse', { cause: errText }), null];
  }

  if (!text) {
    return [null, null];
  }

  const [errJson, json] = safeWrap((): JsonValue => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json response body in mapResponse', { cause: errJson }), null];
  }

  return [null, json];
}
