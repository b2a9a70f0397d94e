import type { BaseErrorType, ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * Serialized form of a DocSchemaError (see `toJSON()`).
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Readonly<Record<string, string>> | undefined;
}

/**
 * Root of the docschema error hierarchy.
 *
 * Concrete subclasses declare `_tag` (the base type they behave as) and `code`
 * (the catalog entry). Use `instanceof` for category matching and
 * `error.code === "XXX"` for fine-grained matching.
 */
export abstract class DocSchemaError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly timestamp: Date;
  readonly metadata: Readonly<Record<string, string>> | undefined;

  constructor(message: string, metadata?: Record<string, string>, options?: { cause?: Error }) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata !== undefined ? { metadata: this.metadata } : {}),
    };
  }
}

/** Check if a value is a DocSchemaError */
export function isDocSchemaError(error: unknown): error is DocSchemaError {
  return error instanceof DocSchemaError;
}

/** Check if a value is any Error */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
