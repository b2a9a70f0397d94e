/**
 * Reads the file selected by the resolver. No schema semantics are applied:
 * the caller decides what to do with schema-typed vs plain-data content.
 */

import { readFile } from "node:fs/promises";

import { getErrorMessage, SchemaFileParseError } from "@docschema/errors";

import { toProbeFailedError } from "./probe.js";
import type { FileKind, SchemaFile } from "./types.js";

/** Number of characters checked for null bytes (binary detection) */
const NULL_BYTE_CHECK_SIZE = 8192;

/**
 * Reads and parses a matched schema file.
 *
 * @throws {SchemaFileParseError} for binary content or invalid JSON
 * @throws {ProbeFailedError} when the file cannot be read
 */
export async function readSchemaFile(match: {
  readonly path: string;
  readonly kind: FileKind;
  readonly variant?: string;
}): Promise<SchemaFile> {
  let text: string;
  try {
    text = await readFile(match.path, "utf-8");
  } catch (error: unknown) {
    throw toProbeFailedError(match.path, error);
  }

  if (text.slice(0, NULL_BYTE_CHECK_SIZE).includes("\0")) {
    throw new SchemaFileParseError(match.path, "file appears to be binary, not text");
  }

  // Strip BOM if present
  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  let content: unknown;
  try {
    content = JSON.parse(body);
  } catch (error: unknown) {
    const cause = error instanceof Error ? error : undefined;
    throw new SchemaFileParseError(match.path, getErrorMessage(error), cause);
  }

  return {
    path: match.path,
    kind: match.kind,
    ...(match.variant !== undefined ? { variant: match.variant } : {}),
    content,
  };
}
