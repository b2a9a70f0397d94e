/**
 * SchemaResolver: probes generated candidates against a schema directory.
 *
 * One stat (plus a readability check on a hit) per candidate, in priority
 * order, stopping at the first regular file. A missing file or directory is a
 * miss; any other filesystem error is thrown as ProbeFailedError. Nothing is
 * cached: resolutions are independent and may run concurrently.
 */

import { isAbsolute, relative, resolve, sep } from "node:path";

import { MalformedIdentifierError } from "@docschema/errors";

import { createConsoleLogger } from "./logger.js";
import { parseObjectPath } from "./object-path.js";
import { expandStems, generateCandidates } from "./patterns.js";
import { createSearchPolicy } from "./policy.js";
import { isMissingFileError, nodeFileProbe, toProbeFailedError } from "./probe.js";
import type {
  Candidate,
  FileProbe,
  GenerateOptions,
  ObjectPath,
  ProbeAttempt,
  ProbeOutcome,
  ResolveOptions,
  ResolverLogger,
  ResolveResult,
  SchemaResolverOptions,
  SearchPolicy,
} from "./types.js";

export class SchemaResolver {
  /** Absolute schema directory */
  readonly schemaDir: string;
  readonly policy: SearchPolicy;
  private readonly debug: boolean;
  private readonly logger: ResolverLogger;
  private readonly probe: FileProbe;

  /**
   * @throws {SearchPolicyInvalidError} when `options.policy` fails validation
   */
  constructor(options: SchemaResolverOptions) {
    this.schemaDir = resolve(options.schemaDir);
    this.policy = createSearchPolicy(options.policy);
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? createConsoleLogger();
    this.probe = options.probe ?? nodeFileProbe;
  }

  /**
   * Candidates for an object, in probe order.
   * A dotted string is parsed with `options.layout`.
   */
  candidatesFor(object: string | ObjectPath, options?: ResolveOptions): readonly Candidate[] {
    const path = typeof object === "string" ? parseObjectPath(object, options?.layout) : object;
    return generateCandidates(path, this.policy, options);
  }

  /**
   * Finds the schema file for a documented object.
   *
   * @throws {MalformedIdentifierError} for an empty identifier
   * @throws {ProbeFailedError} on filesystem errors other than "not found"
   */
  async resolve(object: string | ObjectPath, options?: ResolveOptions): Promise<ResolveResult> {
    return this.probeCandidates(this.candidatesFor(object, options));
  }

  /**
   * Finds a schema by explicit name: `name.schema.json`, then `name.json`.
   */
  async resolveByName(name: string, options?: GenerateOptions): Promise<ResolveResult> {
    if (name.length === 0) {
      throw new MalformedIdentifierError(name, "schema name must not be empty");
    }
    return this.probeCandidates(expandStems([name], options));
  }

  /**
   * Probes candidates in order and returns the first regular, readable file.
   */
  async probeCandidates(candidates: readonly Candidate[]): Promise<ResolveResult> {
    const attempted: ProbeAttempt[] = [];

    for (const candidate of candidates) {
      const target = resolve(this.schemaDir, candidate.fileName);

      let outcome: ProbeOutcome;
      if (!this.contains(target)) {
        this.logger.warn(`Skipping candidate "${candidate.fileName}": resolves outside ${this.schemaDir}`);
        outcome = "rejected";
      } else {
        outcome = (await this.isReadableFile(target)) ? "matched" : "missing";
      }

      attempted.push({ candidate, outcome });
      if (this.debug) {
        this.logger.debug(`${candidate.fileName}: ${outcome}`);
      }

      if (outcome === "matched") {
        return {
          found: true,
          path: target,
          fileName: candidate.fileName,
          kind: candidate.kind,
          ...(candidate.variant !== undefined ? { variant: candidate.variant } : {}),
          attempted,
        };
      }
    }

    if (this.debug) {
      this.logger.debug(`No schema found in ${this.schemaDir} after ${attempted.length} candidate(s)`);
    }
    return { found: false, attempted };
  }

  private contains(target: string): boolean {
    const rel = relative(this.schemaDir, target);
    return rel.length > 0 && rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
  }

  private async isReadableFile(target: string): Promise<boolean> {
    try {
      const info = await this.probe.stat(target);
      if (!info.isFile()) return false;
      await this.probe.access(target);
      return true;
    } catch (error: unknown) {
      if (isMissingFileError(error)) return false;
      throw toProbeFailedError(target, error);
    }
  }
}

/**
 * One-shot resolution of a dotted identifier against a directory.
 */
export async function findSchemaForObject(
  identifier: string,
  schemaDir: string,
  policy?: SearchPolicy,
  options?: ResolveOptions & Pick<SchemaResolverOptions, "debug" | "logger" | "probe">,
): Promise<ResolveResult> {
  const resolver = new SchemaResolver({
    schemaDir,
    ...(policy !== undefined ? { policy } : {}),
    ...(options?.debug !== undefined ? { debug: options.debug } : {}),
    ...(options?.logger !== undefined ? { logger: options.logger } : {}),
    ...(options?.probe !== undefined ? { probe: options.probe } : {}),
  });
  return resolver.resolve(identifier, options);
}
