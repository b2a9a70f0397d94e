/**
 * Schema resolver errors
 *
 * Abstract base: SchemaResolverError
 * Concrete:
 *   - MalformedIdentifierError (SCHEMA_IDENTIFIER_MALFORMED)
 *   - SearchPolicyInvalidError (SCHEMA_POLICY_INVALID)
 *   - ResolverConfigurationError (SCHEMA_CONFIG_INVALID)
 *   - ResolverConfigParseError (SCHEMA_CONFIG_PARSE_FAILED)
 *   - ResolverConfigNotFoundError (SCHEMA_CONFIG_NOT_FOUND)
 *   - ProbeFailedError (SCHEMA_PROBE_FAILED)
 *   - SchemaFileParseError (SCHEMA_FILE_INVALID_JSON)
 */

import { DocSchemaError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

/**
 * Enables generic catch: `if (e instanceof SchemaResolverError)`
 * while specific subclasses allow precise handling.
 */
export abstract class SchemaResolverError extends DocSchemaError {}

// ---------------------------------------------------------------------------
// Identifier
// ---------------------------------------------------------------------------

/**
 * Thrown when an object identifier cannot be turned into an object path.
 */
export class MalformedIdentifierError extends SchemaResolverError {
  readonly _tag = "ValidationError" as const;
  readonly code = "SCHEMA_IDENTIFIER_MALFORMED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly identifier: string;

  constructor(identifier: string, reason = "identifier must not be empty") {
    super(`Malformed object identifier "${identifier}": ${reason}`);
    const entry = ERROR_CATALOG.SCHEMA_IDENTIFIER_MALFORMED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.identifier = identifier;
  }
}

// ---------------------------------------------------------------------------
// Policy & configuration
// ---------------------------------------------------------------------------

export class SearchPolicyInvalidError extends SchemaResolverError {
  readonly _tag = "ValidationError" as const;
  readonly code = "SCHEMA_POLICY_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid search policy: ${issues.join("; ")}`);
    const entry = ERROR_CATALOG.SCHEMA_POLICY_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}

export class ResolverConfigurationError extends SchemaResolverError {
  readonly _tag = "ValidationError" as const;
  readonly code = "SCHEMA_CONFIG_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly issues: readonly string[];

  constructor(issues: readonly string[], filePath?: string) {
    const where = filePath !== undefined ? ` in ${filePath}` : "";
    super(`Invalid resolver configuration${where}: ${issues.join("; ")}`);
    const entry = ERROR_CATALOG.SCHEMA_CONFIG_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}

/**
 * Thrown when a configuration file is not valid YAML.
 * Carries the 1-based line/column reported by the parser when available.
 */
export class ResolverConfigParseError extends SchemaResolverError {
  readonly _tag = "ValidationError" as const;
  readonly code = "SCHEMA_CONFIG_PARSE_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly filePath: string | undefined;
  readonly line: number | undefined;
  readonly column: number | undefined;

  constructor(
    filePath: string | undefined,
    detail: string,
    line?: number,
    column?: number,
    cause?: Error,
  ) {
    const where = filePath !== undefined ? ` ${filePath}` : "";
    const position = line !== undefined ? ` (line ${line}, column ${column ?? 0})` : "";
    super(
      `Failed to parse resolver configuration${where}${position}: ${detail}`,
      undefined,
      cause ? { cause } : undefined,
    );
    const entry = ERROR_CATALOG.SCHEMA_CONFIG_PARSE_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.filePath = filePath;
    this.line = line;
    this.column = column;
  }
}

export class ResolverConfigNotFoundError extends SchemaResolverError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "SCHEMA_CONFIG_NOT_FOUND" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly filePath: string;

  constructor(filePath: string) {
    super(`Resolver configuration not found: ${filePath}`);
    const entry = ERROR_CATALOG.SCHEMA_CONFIG_NOT_FOUND;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.filePath = filePath;
  }
}

// ---------------------------------------------------------------------------
// Filesystem
// ---------------------------------------------------------------------------

/**
 * Thrown when probing a candidate fails for a reason other than the file
 * not existing, e.g. EACCES or EIO.
 */
export class ProbeFailedError extends SchemaResolverError {
  readonly _tag = "ExternalError" as const;
  readonly code = "SCHEMA_PROBE_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly path: string;
  /** Underlying errno code, e.g. "EACCES" */
  readonly errno: string | undefined;

  constructor(path: string, cause: Error, errno?: string) {
    super(
      `Failed to probe schema candidate ${path}: ${cause.message}`,
      errno !== undefined ? { errno } : undefined,
      { cause },
    );
    const entry = ERROR_CATALOG.SCHEMA_PROBE_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.path = path;
    this.errno = errno;
  }
}

export class SchemaFileParseError extends SchemaResolverError {
  readonly _tag = "ValidationError" as const;
  readonly code = "SCHEMA_FILE_INVALID_JSON" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly path: string;

  constructor(path: string, detail: string, cause?: Error) {
    super(`Invalid schema file ${path}: ${detail}`, undefined, cause ? { cause } : undefined);
    const entry = ERROR_CATALOG.SCHEMA_FILE_INVALID_JSON;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.path = path;
  }
}
