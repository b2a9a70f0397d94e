/**
 * Type guards for the base error types + code-level discrimination.
 *
 * Category guards match on `_tag`, so domain errors that extend
 * DocSchemaError directly are classified the same way as the base classes.
 */

import { DocSchemaError } from "./base.js";
import type { BaseErrorType, ErrorCode } from "./catalog.js";

function hasTag(error: unknown, tag: BaseErrorType): error is DocSchemaError {
  return error instanceof DocSchemaError && error._tag === tag;
}

/** Check if an error is a ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is DocSchemaError {
  return hasTag(error, "ValidationError");
}

/** Check if an error is a NotFoundError (resource missing) */
export function isNotFoundError(error: unknown): error is DocSchemaError {
  return hasTag(error, "NotFoundError");
}

/** Check if an error is an ExternalError (filesystem/runtime failure) */
export function isExternalError(error: unknown): error is DocSchemaError {
  return hasTag(error, "ExternalError");
}

/**
 * Check if a DocSchemaError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: DocSchemaError,
  code: C,
): error is DocSchemaError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition.
 * Returns false for non-DocSchemaError values.
 */
export function isExpectedError(error: unknown): boolean {
  return error instanceof DocSchemaError && error.isExpected;
}
