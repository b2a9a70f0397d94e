/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by docschema packages is declared here. Each code
 * maps to a domain and to one of the base error types of the hierarchy.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: schema
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "NotFoundError" | "ExternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // SCHEMA ERRORS - Schema-file resolution
  // ============================================================================
  SCHEMA_IDENTIFIER_MALFORMED: {
    domain: "schema",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Malformed object identifier",
    description: "The dotted object identifier is empty",
  },
  SCHEMA_POLICY_INVALID: {
    domain: "schema",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid search policy",
    description: "The schema search policy failed validation",
  },
  SCHEMA_CONFIG_INVALID: {
    domain: "schema",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid resolver configuration",
    description: "The resolver configuration failed validation",
  },
  SCHEMA_CONFIG_PARSE_FAILED: {
    domain: "schema",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Resolver configuration parse failed",
    description: "The resolver configuration file is not valid YAML",
  },
  SCHEMA_CONFIG_NOT_FOUND: {
    domain: "schema",
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Resolver configuration not found",
    description: "The resolver configuration file does not exist",
  },
  SCHEMA_PROBE_FAILED: {
    domain: "schema",
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Schema probe failed",
    description: "A filesystem error other than a missing file occurred while probing a candidate",
  },
  SCHEMA_FILE_INVALID_JSON: {
    domain: "schema",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid schema file",
    description: "The selected schema file does not contain valid JSON text",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];
