/**
 * Zod validation schemas for search policies and resolver configuration.
 *
 * Configuration files may use camelCase keys or the snake_case spelling of
 * documentation-build configs (`include_package_name`, `path_to_file_separator`, ...).
 * Keys are normalized before validation; a canonical key wins over its alias.
 */

import { z } from "zod";
import type { PathSeparator } from "./types.js";

const SEPARATOR_ALIASES: ReadonlyMap<string, PathSeparator> = new Map([
  [".", "DOT"],
  ["dot", "DOT"],
  ["/", "SLASH"],
  ["slash", "SLASH"],
  ["none", "NONE"],
]);

const POLICY_KEY_ALIASES: Readonly<Record<string, string>> = {
  include_package_name: "includePackageName",
  include_path_to_file: "includePathToFile",
  path_to_file_separator: "pathToFileSeparator",
  path_to_class_separator: "pathToClassSeparator",
  custom_patterns: "customPatterns",
};

const CONFIG_KEY_ALIASES: Readonly<Record<string, string>> = {
  schema_dir: "schemaDir",
  json_schema_dir: "schemaDir",
  debug_logging: "debug",
  search_policy: "searchPolicy",
};

/**
 * Separator spelled as ".", "/", "none" or DOT/SLASH/NONE (case-insensitive).
 */
export const PathSeparatorSchema = z.string().transform((value, ctx): PathSeparator => {
  const separator = SEPARATOR_ALIASES.get(value.toLowerCase());
  if (separator === undefined) {
    ctx.addIssue({
      code: "custom",
      message: `Unknown separator "${value}" (expected ".", "/" or "none")`,
    });
    return z.NEVER;
  }
  return separator;
});

export const CustomPatternSchema = z.string().min(1, "Custom pattern must not be empty");

export const SearchPolicySchema = z
  .object({
    includePackageName: z.boolean().default(false),
    includePathToFile: z.boolean().default(true),
    pathToFileSeparator: PathSeparatorSchema.default("DOT"),
    pathToClassSeparator: PathSeparatorSchema.default("DOT"),
    customPatterns: z.array(CustomPatternSchema).default([]),
  })
  .strict();

export const ResolverConfigSchema = z
  .object({
    schemaDir: z.string().min(1, "schemaDir must not be empty"),
    debug: z.boolean().default(false),
    searchPolicy: z.unknown().optional(),
  })
  .strict();

/**
 * Renames aliased keys of a plain object; any other value is returned untouched
 * so the schema can report it.
 */
export function normalizeKeys(
  raw: unknown,
  aliases: Readonly<Record<string, string>>,
): unknown {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    return raw;
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    const canonical = aliases[key];
    if (canonical === undefined) {
      normalized[key] = value;
    } else if (!Object.hasOwn(raw, canonical)) {
      normalized[canonical] = value;
    }
  }
  return normalized;
}

export function normalizePolicyKeys(raw: unknown): unknown {
  return normalizeKeys(raw, POLICY_KEY_ALIASES);
}

export function normalizeConfigKeys(raw: unknown): unknown {
  return normalizeKeys(raw, CONFIG_KEY_ALIASES);
}

/**
 * Formats zod issues as `path: message` strings.
 */
export function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((i) => {
    const path = [...(prefix !== undefined ? [prefix] : []), ...i.path.map(String)].join(".");
    return path.length > 0 ? `${path}: ${i.message}` : i.message;
  });
}
