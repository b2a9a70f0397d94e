/**
 * @docschema/errors
 *
 * Shared error taxonomy for docschema packages.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition and a `_tag` naming the base type it behaves as.
 * Use `error.code === "XXX"` for fine-grained matching, or the category
 * guards (`isValidationError`, ...) for coarse matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { DocSchemaError, type ErrorJSON, isDocSchemaError, isError } from "./base.js";

export {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
} from "./utils.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isExpectedError,
  isExternalError,
  isNotFoundError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// SCHEMA RESOLVER ERRORS
// ============================================================================

export {
  MalformedIdentifierError,
  ProbeFailedError,
  ResolverConfigNotFoundError,
  ResolverConfigParseError,
  ResolverConfigurationError,
  SchemaFileParseError,
  SchemaResolverError,
  SearchPolicyInvalidError,
} from "./schema-resolver.js";
