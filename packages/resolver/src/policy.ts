/**
 * Search policy construction and separator rendering.
 */

import { SearchPolicyInvalidError } from "@docschema/errors";

import { deepFreeze } from "./freeze.js";
import { formatIssues, normalizePolicyKeys, SearchPolicySchema } from "./schema.js";
import type { PathSeparator, SearchPolicy, SearchPolicyInput } from "./types.js";

const SEPARATOR_TEXT: Readonly<Record<PathSeparator, string>> = {
  DOT: ".",
  SLASH: "/",
  NONE: "",
};

/**
 * Default policy: no package name, progressive path context, "." everywhere.
 */
const DEFAULTS: SearchPolicy = {
  includePackageName: false,
  includePathToFile: true,
  pathToFileSeparator: "DOT",
  pathToClassSeparator: "DOT",
  customPatterns: [],
};

export const DEFAULT_SEARCH_POLICY: SearchPolicy = deepFreeze(DEFAULTS);

/**
 * Validates a partial policy, fills defaults, and freezes the result.
 *
 * @throws {SearchPolicyInvalidError} listing every invalid field
 */
export function createSearchPolicy(input?: SearchPolicyInput): SearchPolicy {
  if (input === undefined) return DEFAULT_SEARCH_POLICY;
  return parseSearchPolicyConfig(input);
}

/**
 * Parses an untyped policy (e.g. the `search_policy` block of a config file).
 * Accepts camelCase or snake_case keys and separator aliases ".", "/", "none".
 *
 * @throws {SearchPolicyInvalidError} listing every invalid field
 */
export function parseSearchPolicyConfig(raw: unknown): SearchPolicy {
  const result = SearchPolicySchema.safeParse(normalizePolicyKeys(raw ?? {}));
  if (!result.success) {
    throw new SearchPolicyInvalidError(formatIssues(result.error));
  }
  return deepFreeze(result.data);
}

/**
 * Renders a separator as the text placed between name parts.
 */
export function separatorText(separator: PathSeparator): string {
  return SEPARATOR_TEXT[separator];
}
