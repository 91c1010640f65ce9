import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { ValidationError } from '../error/validationError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/** Constructor shape shared by {@link ValidationError} and its subclasses. */
export type ValidationErrorClass<E extends ValidationError> = new (
  message: string,
  issues?: readonly StandardSchemaV1.Issue[],
  opts?: ErrorOptions,
) => E;

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)`; a schema that throws is reported as an
 *   error whose `cause` is the thrown value.
 * - Argument validation happens before any request is issued, so only synchronous schemas
 *   are accepted: a schema returning a Promise is reported as an error.
 * - If the validation result contains `issues`, the error carries them.
 * - On success without issues, returns `[null, result.value]`.
 *
 * Errors are constructed from `ErrorClass` with `message`, so callers get the specific
 * argument error of the parameter being validated.
 */
export function validator<T extends StandardSchemaV1, E extends ValidationError>(
  input: unknown,
  schema: T,
  ErrorClass: ValidationErrorClass<E>,
  message = 'error validating data',
): SafeWrap<E, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));

  if (err) {
    return [new ErrorClass(message, [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    return [new ErrorClass(`${message}: asynchronous schemas are not supported`), null];
  }

  if (result.issues) {
    return [new ErrorClass(message, [...result.issues]), null];
  }

  return [null, result.value];
}
