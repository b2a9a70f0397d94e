/**
 * Resolver configuration: validation, YAML parsing, and file loading.
 *
 * A configuration file looks like:
 *
 *   schemaDir: ./schemas
 *   debug: false
 *   searchPolicy:
 *     includePackageName: false
 *     pathToFileSeparator: "/"
 *     customPatterns:
 *       - "{class_name}_{method_name}"
 *
 * snake_case keys (`json_schema_dir`, `search_policy`, `path_to_file_separator`, ...)
 * are accepted as aliases. JSON files parse as well.
 */

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import {
  ResolverConfigNotFoundError,
  ResolverConfigParseError,
  ResolverConfigurationError,
} from "@docschema/errors";
import { parse as parseYaml, YAMLParseError } from "yaml";

import { deepFreeze } from "./freeze.js";
import { isNodeError } from "./probe.js";
import { SchemaResolver } from "./resolver.js";
import {
  formatIssues,
  normalizeConfigKeys,
  normalizePolicyKeys,
  ResolverConfigSchema,
  SearchPolicySchema,
} from "./schema.js";
import type { FileProbe, ResolverConfig, ResolverLogger } from "./types.js";

export interface ParseResolverConfigOptions {
  /** Directory a relative `schemaDir` is resolved against (default: left relative) */
  readonly baseDir?: string;
  /** Source file, for error messages */
  readonly filePath?: string;
}

export interface LoadResolverConfigOptions {
  readonly encoding?: BufferEncoding;
}

/**
 * Validates an untyped configuration object.
 *
 * @throws {ResolverConfigurationError} listing every invalid field, including
 *   those of the nested search policy
 */
export function parseResolverConfig(
  raw: unknown,
  options?: ParseResolverConfigOptions,
): ResolverConfig {
  const result = ResolverConfigSchema.safeParse(normalizeConfigKeys(raw));
  if (!result.success) {
    throw new ResolverConfigurationError(formatIssues(result.error), options?.filePath);
  }

  const policy = SearchPolicySchema.safeParse(normalizePolicyKeys(result.data.searchPolicy ?? {}));
  if (!policy.success) {
    throw new ResolverConfigurationError(
      formatIssues(policy.error, "searchPolicy"),
      options?.filePath,
    );
  }

  const schemaDir =
    options?.baseDir !== undefined
      ? resolve(options.baseDir, result.data.schemaDir)
      : result.data.schemaDir;

  return deepFreeze({
    schemaDir,
    debug: result.data.debug,
    searchPolicy: policy.data,
  });
}

/**
 * Parses YAML (or JSON) text into a validated configuration.
 *
 * @throws {ResolverConfigParseError} on a syntax error
 * @throws {ResolverConfigurationError} on invalid content
 */
export function parseResolverConfigYaml(
  text: string,
  options?: ParseResolverConfigOptions,
): ResolverConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      const pos = error.linePos?.[0];
      throw new ResolverConfigParseError(options?.filePath, error.message, pos?.line, pos?.col, error);
    }
    throw new ResolverConfigParseError(options?.filePath, String(error));
  }

  return parseResolverConfig(parsed, options);
}

/**
 * Reads a configuration file. A relative `schemaDir` is resolved against the
 * directory containing the file.
 */
export async function loadResolverConfig(
  filePath: string,
  options?: LoadResolverConfigOptions,
): Promise<ResolverConfig> {
  const absolutePath = resolve(filePath);

  let content: string;
  try {
    content = await readFile(absolutePath, { encoding: options?.encoding ?? "utf-8" });
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      throw new ResolverConfigNotFoundError(absolutePath);
    }
    throw error;
  }

  return parseResolverConfigYaml(content, {
    baseDir: dirname(absolutePath),
    filePath: absolutePath,
  });
}

/**
 * Builds a SchemaResolver from a loaded configuration.
 */
export function createResolverFromConfig(
  config: ResolverConfig,
  options?: { readonly logger?: ResolverLogger; readonly probe?: FileProbe },
): SchemaResolver {
  return new SchemaResolver({
    schemaDir: config.schemaDir,
    policy: config.searchPolicy,
    debug: config.debug,
    ...(options?.logger !== undefined ? { logger: options.logger } : {}),
    ...(options?.probe !== undefined ? { probe: options.probe } : {}),
  });
}
