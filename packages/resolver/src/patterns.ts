/**
 * Candidate generation: turns an ObjectPath and a SearchPolicy into the
 * ordered list of schema file names to probe, most specific first.
 *
 * Stem order:
 *   1. custom patterns, as configured
 *   2. base name: `Class<classSep>member`, or `member`
 *   3. path context, nearest segment first: `catalog<fileSep>base`, `endpoints<fileSep>catalog<fileSep>base`, ...
 *   4. member alone (methods only)
 *   5. fully-qualified identifier joined with "." (always present)
 * With includePackageName, (5) moves between (3) and (4).
 *
 * Each stem expands to `stem.<variant>.schema.json`, `stem.<variant>.json`,
 * `stem.schema.json`, `stem.json`. Duplicates keep their first position.
 */

import { SearchPolicyInvalidError } from "@docschema/errors";

import { deepFreeze } from "./freeze.js";
import { formatObjectPath, formatPackageName } from "./object-path.js";
import { separatorText } from "./policy.js";
import type { Candidate, FileKind, GenerateOptions, ObjectPath, SearchPolicy } from "./types.js";

export const DEFAULT_FILE_KINDS: readonly FileKind[] = Object.freeze(["schema", "data"]);

const KIND_SUFFIX: Readonly<Record<FileKind, string>> = {
  schema: ".schema.json",
  data: ".json",
};

const PLACEHOLDER_PATTERN = /\{(object_name|class_name|method_name|package_name)\}/g;

/**
 * Renders a custom pattern template into a stem.
 *
 * A template that already names a suffix (`custom_{class_name}.json`) has it
 * removed; the suffixes are added back per file kind. Unknown placeholders
 * are kept verbatim. The result may be empty, e.g. `{class_name}` for a
 * module-level function.
 */
export function renderCustomPattern(template: string, path: ObjectPath): string {
  const values: ReadonlyMap<string, string> = new Map([
    ["object_name", formatObjectPath(path)],
    ["class_name", path.className ?? ""],
    ["method_name", path.memberName],
    ["package_name", formatPackageName(path)],
  ]);

  const rendered = template.replace(
    PLACEHOLDER_PATTERN,
    (match, name: string) => values.get(name) ?? match,
  );
  return stripKindSuffix(rendered);
}

/**
 * Ordered stems for a path under a policy. May contain duplicates.
 */
export function generateStems(path: ObjectPath, policy: SearchPolicy): string[] {
  const classSeparator = separatorText(policy.pathToClassSeparator);
  const fileSeparator = separatorText(policy.pathToFileSeparator);

  // A template whose placeholders all render empty names no file
  const stems = policy.customPatterns
    .map((template) => renderCustomPattern(template, path))
    .filter((stem) => stem.length > 0);

  const baseName =
    path.className !== undefined
      ? `${path.className}${classSeparator}${path.memberName}`
      : path.memberName;
  stems.push(baseName);

  if (policy.includePathToFile) {
    const context =
      policy.includePackageName && path.package !== undefined
        ? [path.package, ...path.pathSegments]
        : path.pathSegments;
    for (let size = 1; size <= context.length; size++) {
      stems.push([...context.slice(-size), baseName].join(fileSeparator));
    }
  }

  const qualified = formatObjectPath(path);
  if (policy.includePackageName) {
    stems.push(qualified);
  }
  if (path.className !== undefined) {
    stems.push(path.memberName);
  }
  if (!policy.includePackageName) {
    stems.push(qualified);
  }

  return stems;
}

/**
 * Expands stems into candidates, variant forms first, de-duplicated by file name.
 *
 * @throws {SearchPolicyInvalidError} when `fileKinds` is empty, or when the
 *   variant is `schema` or ends in `.schema`
 */
export function expandStems(stems: readonly string[], options?: GenerateOptions): Candidate[] {
  const kinds = options?.fileKinds ?? DEFAULT_FILE_KINDS;
  if (kinds.length === 0) {
    throw new SearchPolicyInvalidError(["fileKinds: at least one file kind is required"]);
  }

  const variant = options?.variant !== undefined && options.variant !== "" ? options.variant : undefined;
  if (variant !== undefined && (variant === "schema" || variant.endsWith(".schema"))) {
    throw new SearchPolicyInvalidError([
      `variant: "${variant}" would make data file names read as schema files`,
    ]);
  }
  const seen = new Set<string>();
  const candidates: Candidate[] = [];

  const add = (candidate: Candidate): void => {
    if (seen.has(candidate.fileName)) return;
    seen.add(candidate.fileName);
    candidates.push(candidate);
  };

  for (const stem of stems) {
    if (variant !== undefined) {
      for (const kind of kinds) {
        add({ fileName: `${stem}.${variant}${KIND_SUFFIX[kind]}`, stem, kind, variant });
      }
    }
    for (const kind of kinds) {
      add({ fileName: `${stem}${KIND_SUFFIX[kind]}`, stem, kind });
    }
  }

  return candidates;
}

/**
 * Ordered, unique candidates for a path under a policy.
 */
export function generateCandidates(
  path: ObjectPath,
  policy: SearchPolicy,
  options?: GenerateOptions,
): readonly Candidate[] {
  return deepFreeze(expandStems(generateStems(path, policy), options));
}

/**
 * File names only, in probe order.
 */
export function generateFileNames(
  path: ObjectPath,
  policy: SearchPolicy,
  options?: GenerateOptions,
): string[] {
  return generateCandidates(path, policy, options).map((c) => c.fileName);
}

function stripKindSuffix(name: string): string {
  for (const suffix of [KIND_SUFFIX.schema, KIND_SUFFIX.data]) {
    if (name.endsWith(suffix)) {
      return name.slice(0, -suffix.length);
    }
  }
  return name;
}
