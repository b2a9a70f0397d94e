/**
 * @docschema/resolver
 *
 * Resolves the schema file documenting a code object from its dotted
 * identifier and a declarative naming policy:
 *   parseObjectPath → generateCandidates → SchemaResolver.resolve → readSchemaFile
 */

// Configuration
export {
  createResolverFromConfig,
  type LoadResolverConfigOptions,
  loadResolverConfig,
  type ParseResolverConfigOptions,
  parseResolverConfig,
  parseResolverConfigYaml,
} from "./config.js";
// Logging
export { createConsoleLogger, DEFAULT_LOG_TAG, silentLogger } from "./logger.js";
// Object paths
export {
  createObjectPath,
  formatObjectPath,
  formatPackageName,
  parseObjectPath,
} from "./object-path.js";
// Candidate generation
export {
  DEFAULT_FILE_KINDS,
  expandStems,
  generateCandidates,
  generateFileNames,
  generateStems,
  renderCustomPattern,
} from "./patterns.js";
// Policy
export {
  createSearchPolicy,
  DEFAULT_SEARCH_POLICY,
  parseSearchPolicyConfig,
  separatorText,
} from "./policy.js";
// Probing
export { isMissingFileError, nodeFileProbe } from "./probe.js";
// Reading
export { readSchemaFile } from "./reader.js";
// Resolution
export { findSchemaForObject, SchemaResolver } from "./resolver.js";
// Schema validation
export { PathSeparatorSchema, ResolverConfigSchema, SearchPolicySchema } from "./schema.js";
// Types
export type {
  Candidate,
  FileKind,
  FileProbe,
  GenerateOptions,
  ObjectLayout,
  ObjectPath,
  PathSeparator,
  ProbeAttempt,
  ProbeOutcome,
  ProbeStat,
  ResolveOptions,
  ResolverConfig,
  ResolverLogger,
  ResolveResult,
  SchemaFile,
  SchemaMatch,
  SchemaNotFound,
  SchemaResolverOptions,
  SearchPolicy,
  SearchPolicyInput,
} from "./types.js";
