/**
 * Filesystem probe backed by node:fs/promises, plus errno helpers.
 */

import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";

import { getErrorMessage, ProbeFailedError } from "@docschema/errors";

import type { FileProbe } from "./types.js";

/** Errno codes that mean "no such file" for a probe */
const MISSING_CODES: ReadonlySet<string> = new Set(["ENOENT", "ENOTDIR"]);

export const nodeFileProbe: FileProbe = {
  stat: (path) => stat(path),
  access: (path) => access(path, constants.R_OK),
};

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * True when the error says the path does not exist.
 */
export function isMissingFileError(error: unknown): boolean {
  return isNodeError(error) && error.code !== undefined && MISSING_CODES.has(error.code);
}

/**
 * Wraps a filesystem error into a ProbeFailedError, keeping its errno code.
 */
export function toProbeFailedError(path: string, error: unknown): ProbeFailedError {
  if (error instanceof Error) {
    return new ProbeFailedError(path, error, isNodeError(error) ? error.code : undefined);
  }
  return new ProbeFailedError(path, new Error(getErrorMessage(error)));
}
