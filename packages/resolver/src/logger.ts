/**
 * Console-backed ResolverLogger. Messages are prefixed with `[tag]`.
 */

import type { ResolverLogger } from "./types.js";

export const DEFAULT_LOG_TAG = "schema-resolver";

export function createConsoleLogger(tag: string = DEFAULT_LOG_TAG): ResolverLogger {
  return {
    debug(message) {
      console.debug(`[${tag}] ${message}`);
    },
    warn(message) {
      console.warn(`[${tag}] ${message}`);
    },
  };
}

/** Drops every message */
export const silentLogger: ResolverLogger = {
  debug() {},
  warn() {},
};
