/**
 * Type definitions for schema-file resolution.
 *
 * Three layers:
 * - ObjectPath + SearchPolicy: immutable inputs
 * - Candidate: one generated file name, in priority order
 * - ResolveResult: the outcome of probing candidates against a directory
 */

/**
 * Separator used when joining name parts into a file stem.
 * DOT renders as ".", SLASH as "/" (a subdirectory), NONE as "".
 */
export type PathSeparator = "DOT" | "SLASH" | "NONE";

/**
 * File kinds, in default probe order.
 * - schema: `<stem>.schema.json`, a JSON Schema eligible for example generation
 * - data: `<stem>.json`, plain JSON rendered as-is
 */
export type FileKind = "schema" | "data";

/**
 * Structural split of a dotted object identifier.
 *
 * `package`, `pathSegments`, `className`, `memberName` joined with "."
 * reproduce the identifier the path was parsed from.
 */
export interface ObjectPath {
  /** Leading namespace segment; absent for top-level modules */
  readonly package?: string;
  /** Namespace segments between the package and the class/member */
  readonly pathSegments: readonly string[];
  /** Owning class, present only for methods */
  readonly className?: string;
  /** Function or method name */
  readonly memberName: string;
}

/**
 * Caller-supplied structural hints for parseObjectPath().
 * An omitted flag falls back to the naming-convention default.
 */
export interface ObjectLayout {
  /** Treat the leading segment as the package (default: when 2+ segments) */
  readonly hasPackage?: boolean;
  /** Treat the second-to-last segment as a class (default: when it starts upper-case) */
  readonly hasClass?: boolean;
}

/**
 * Naming policy driving candidate generation. Frozen once created.
 */
export interface SearchPolicy {
  readonly includePackageName: boolean;
  readonly includePathToFile: boolean;
  /** Separator between namespace segments and the class/member part */
  readonly pathToFileSeparator: PathSeparator;
  /** Separator between class and member */
  readonly pathToClassSeparator: PathSeparator;
  /**
   * Templates tried before every standard candidate. Placeholders:
   * `{object_name}`, `{class_name}`, `{method_name}`, `{package_name}`.
   */
  readonly customPatterns: readonly string[];
}

/** Partial policy accepted by createSearchPolicy() */
export type SearchPolicyInput = Partial<SearchPolicy>;

export interface GenerateOptions {
  /** Discriminator inserted before the suffix, e.g. "options" → `stem.options.schema.json` */
  readonly variant?: string;
  /** Restricts (and orders) the file kinds tried per stem (default: schema, data) */
  readonly fileKinds?: readonly FileKind[];
}

/**
 * One file name considered during resolution.
 */
export interface Candidate {
  /** Relative file name, e.g. "catalog.ProductService.similar.schema.json" */
  readonly fileName: string;
  /** File name without variant and kind suffix */
  readonly stem: string;
  readonly kind: FileKind;
  readonly variant?: string;
}

/** How a single probe ended */
export type ProbeOutcome = "matched" | "missing" | "rejected";

export interface ProbeAttempt {
  readonly candidate: Candidate;
  readonly outcome: ProbeOutcome;
}

export interface SchemaMatch {
  readonly found: true;
  /** Absolute path of the matched file */
  readonly path: string;
  readonly fileName: string;
  readonly kind: FileKind;
  readonly variant?: string;
  /** Every probe up to and including the match, in order */
  readonly attempted: readonly ProbeAttempt[];
}

export interface SchemaNotFound {
  readonly found: false;
  /** Every candidate probed, in order */
  readonly attempted: readonly ProbeAttempt[];
}

export type ResolveResult = SchemaMatch | SchemaNotFound;

/**
 * Logging capability injected into the resolver.
 */
export interface ResolverLogger {
  debug(message: string): void;
  warn(message: string): void;
}

/**
 * Minimal file metadata the resolver needs from a probe.
 */
export interface ProbeStat {
  isFile(): boolean;
}

/**
 * Filesystem access used for probing. Implementations reject with the
 * underlying errno error (ENOENT for a missing file).
 */
export interface FileProbe {
  stat(path: string): Promise<ProbeStat>;
  /** Resolves when the file is readable by this process */
  access(path: string): Promise<void>;
}

export interface SchemaResolverOptions {
  /** Directory the candidates are resolved against */
  readonly schemaDir: string;
  /** Naming policy, validated and frozen on construction (default: DEFAULT_SEARCH_POLICY) */
  readonly policy?: SearchPolicy;
  /** Log every probe and its outcome through `logger.debug` (default: false) */
  readonly debug?: boolean;
  /** Logger (default: console logger tagged "schema-resolver") */
  readonly logger?: ResolverLogger;
  /** Filesystem probe (default: node:fs/promises) */
  readonly probe?: FileProbe;
}

/**
 * Per-call options for SchemaResolver.resolve().
 */
export interface ResolveOptions extends GenerateOptions {
  /** Structural hints used when the object is given as a dotted string */
  readonly layout?: ObjectLayout;
}

/**
 * Resolver settings loaded from a configuration file.
 */
export interface ResolverConfig {
  readonly schemaDir: string;
  readonly debug: boolean;
  readonly searchPolicy: SearchPolicy;
}

/**
 * Contents of a selected schema file.
 */
export interface SchemaFile {
  readonly path: string;
  readonly kind: FileKind;
  readonly variant?: string;
  /** Parsed JSON value */
  readonly content: unknown;
}
