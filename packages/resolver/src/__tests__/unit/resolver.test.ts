import { MalformedIdentifierError, ProbeFailedError, SearchPolicyInvalidError } from "@docschema/errors";
import { describe, expect, it, type Mock, vi } from "vitest";
import { silentLogger } from "../../logger.js";
import { createObjectPath } from "../../object-path.js";
import { createSearchPolicy } from "../../policy.js";
import { findSchemaForObject, SchemaResolver } from "../../resolver.js";
import type { FileProbe, ProbeStat, ResolverLogger } from "../../types.js";

const SCHEMA_DIR = "/schemas";
const PRODUCT_SIMILAR = "perekrestok_api.endpoints.catalog.ProductService.similar";

function errnoError(code: string, path: string): Error {
  return Object.assign(new Error(`${code}: ${path}`), { code });
}

/** In-memory filesystem: regular files, directories, and paths that fail with an errno. */
function createMemoryProbe(options: {
  files?: readonly string[];
  dirs?: readonly string[];
  statErrors?: Readonly<Record<string, string>>;
  unreadable?: readonly string[];
}): FileProbe & { statted: string[] } {
  const files = new Set(options.files ?? []);
  const dirs = new Set(options.dirs ?? []);
  const unreadable = new Set(options.unreadable ?? []);
  const statted: string[] = [];

  return {
    statted,
    async stat(path): Promise<ProbeStat> {
      statted.push(path);
      const code = options.statErrors?.[path];
      if (code !== undefined) throw errnoError(code, path);
      if (files.has(path)) return { isFile: () => true };
      if (dirs.has(path)) return { isFile: () => false };
      throw errnoError("ENOENT", path);
    },
    async access(path): Promise<void> {
      if (unreadable.has(path)) throw errnoError("EACCES", path);
    },
  };
}

interface CaptureLogger extends ResolverLogger {
  readonly debug: Mock<(message: string) => void>;
  readonly warn: Mock<(message: string) => void>;
}

function createCaptureLogger(): CaptureLogger {
  return { debug: vi.fn<(message: string) => void>(), warn: vi.fn<(message: string) => void>() };
}

describe("SchemaResolver", () => {
  it("falls through to the member-only schema", async () => {
    const probe = createMemoryProbe({ files: ["/schemas/similar.schema.json"] });
    const resolver = new SchemaResolver({ schemaDir: SCHEMA_DIR, probe, logger: silentLogger });

    const result = await resolver.resolve(PRODUCT_SIMILAR);

    expect(result.found).toBe(true);
    if (!result.found) return;
    expect(result.path).toBe("/schemas/similar.schema.json");
    expect(result.fileName).toBe("similar.schema.json");
    expect(result.kind).toBe("schema");
    expect(result.variant).toBeUndefined();
    expect(result.attempted).toHaveLength(7);
    expect(result.attempted.slice(0, 6).every((a) => a.outcome === "missing")).toBe(true);
    expect(result.attempted.at(-1)?.outcome).toBe("matched");
  });

  it("stops at the first match", async () => {
    const probe = createMemoryProbe({
      files: ["/schemas/ProductService.similar.json", "/schemas/similar.schema.json"],
    });
    const resolver = new SchemaResolver({ schemaDir: SCHEMA_DIR, probe, logger: silentLogger });

    const result = await resolver.resolve(PRODUCT_SIMILAR);

    expect(result).toMatchObject({ found: true, fileName: "ProductService.similar.json", kind: "data" });
    expect(result.attempted).toHaveLength(2);
    expect(probe.statted).toEqual([
      "/schemas/ProductService.similar.schema.json",
      "/schemas/ProductService.similar.json",
    ]);
  });

  it("returns not-found with every attempted candidate", async () => {
    const resolver = new SchemaResolver({
      schemaDir: SCHEMA_DIR,
      probe: createMemoryProbe({}),
      logger: silentLogger,
    });

    const result = await resolver.resolve(PRODUCT_SIMILAR);

    expect(result.found).toBe(false);
    expect(result.attempted).toHaveLength(10);
    expect(result.attempted.every((a) => a.outcome === "missing")).toBe(true);
    expect(result.attempted.at(-1)?.candidate.fileName).toBe(`${PRODUCT_SIMILAR}.json`);
  });

  it("skips a directory named like a candidate", async () => {
    const probe = createMemoryProbe({
      dirs: ["/schemas/ProductService.similar.schema.json"],
      files: ["/schemas/ProductService.similar.json"],
    });
    const resolver = new SchemaResolver({ schemaDir: SCHEMA_DIR, probe, logger: silentLogger });

    const result = await resolver.resolve(PRODUCT_SIMILAR);

    expect(result).toMatchObject({ found: true, fileName: "ProductService.similar.json" });
    expect(result.attempted.at(0)?.outcome).toBe("missing");
  });

  it("treats ENOTDIR as a miss", async () => {
    const probe = createMemoryProbe({
      statErrors: { "/schemas/ProductService.similar.schema.json": "ENOTDIR" },
      files: ["/schemas/similar.json"],
    });
    const resolver = new SchemaResolver({ schemaDir: SCHEMA_DIR, probe, logger: silentLogger });

    await expect(resolver.resolve(PRODUCT_SIMILAR)).resolves.toMatchObject({
      found: true,
      fileName: "similar.json",
    });
  });

  it("throws ProbeFailedError on a permission error", async () => {
    const probe = createMemoryProbe({
      statErrors: { "/schemas/ProductService.similar.schema.json": "EACCES" },
    });
    const resolver = new SchemaResolver({ schemaDir: SCHEMA_DIR, probe, logger: silentLogger });

    await expect(resolver.resolve(PRODUCT_SIMILAR)).rejects.toThrow(ProbeFailedError);
    await expect(resolver.resolve(PRODUCT_SIMILAR)).rejects.toMatchObject({
      code: "SCHEMA_PROBE_FAILED",
      path: "/schemas/ProductService.similar.schema.json",
      errno: "EACCES",
    });
  });

  it("throws ProbeFailedError for a file it cannot read", async () => {
    const probe = createMemoryProbe({
      files: ["/schemas/ProductService.similar.schema.json"],
      unreadable: ["/schemas/ProductService.similar.schema.json"],
    });
    const resolver = new SchemaResolver({ schemaDir: SCHEMA_DIR, probe, logger: silentLogger });

    await expect(resolver.resolve(PRODUCT_SIMILAR)).rejects.toThrow(ProbeFailedError);
  });

  it("throws MalformedIdentifierError for an empty identifier", async () => {
    const resolver = new SchemaResolver({
      schemaDir: SCHEMA_DIR,
      probe: createMemoryProbe({}),
      logger: silentLogger,
    });

    await expect(resolver.resolve("")).rejects.toThrow(MalformedIdentifierError);
  });

  it("reports the variant of a variant match", async () => {
    const probe = createMemoryProbe({ files: ["/schemas/func.options.json"] });
    const resolver = new SchemaResolver({ schemaDir: SCHEMA_DIR, probe, logger: silentLogger });

    const result = await resolver.resolve("module.func", { variant: "options" });

    expect(result).toEqual({
      found: true,
      path: "/schemas/func.options.json",
      fileName: "func.options.json",
      kind: "data",
      variant: "options",
      attempted: [
        {
          candidate: { fileName: "func.options.schema.json", stem: "func", kind: "schema", variant: "options" },
          outcome: "missing",
        },
        {
          candidate: { fileName: "func.options.json", stem: "func", kind: "data", variant: "options" },
          outcome: "matched",
        },
      ],
    });
  });

  it("accepts a structured object path", async () => {
    const probe = createMemoryProbe({ files: ["/schemas/Bucket.get.schema.json"] });
    const resolver = new SchemaResolver({ schemaDir: SCHEMA_DIR, probe, logger: silentLogger });
    const path = createObjectPath({
      package: "google.cloud",
      pathSegments: ["storage"],
      className: "Bucket",
      memberName: "get",
    });

    await expect(resolver.resolve(path)).resolves.toMatchObject({ found: true, fileName: "Bucket.get.schema.json" });
  });

  it("validates and freezes a caller-built policy", () => {
    const policy = {
      includePackageName: false,
      includePathToFile: true,
      pathToFileSeparator: "SLASH" as const,
      pathToClassSeparator: "DOT" as const,
      customPatterns: ["x_{method_name}"],
    };

    const resolver = new SchemaResolver({ schemaDir: SCHEMA_DIR, policy, probe: createMemoryProbe({}) });

    expect(resolver.policy).toEqual(policy);
    expect(Object.isFrozen(resolver.policy)).toBe(true);
    expect(Object.isFrozen(resolver.policy.customPatterns)).toBe(true);
    expect(Object.isFrozen(policy)).toBe(false);
  });

  it("rejects an invalid caller-built policy", () => {
    const policy = {
      includePackageName: false,
      includePathToFile: true,
      pathToFileSeparator: "DOT" as const,
      pathToClassSeparator: "DOT" as const,
      customPatterns: [""],
    };

    expect(() => new SchemaResolver({ schemaDir: SCHEMA_DIR, policy })).toThrow(SearchPolicyInvalidError);
  });

  it("rejects a schema variant before probing", async () => {
    const probe = createMemoryProbe({ files: ["/schemas/func.schema.json"] });
    const resolver = new SchemaResolver({ schemaDir: SCHEMA_DIR, probe, logger: silentLogger });

    await expect(resolver.resolve("module.func", { variant: "schema" })).rejects.toThrow(SearchPolicyInvalidError);
    expect(probe.statted).toEqual([]);
  });

  it("parses string identifiers with the given layout", () => {
    const resolver = new SchemaResolver({ schemaDir: SCHEMA_DIR, probe: createMemoryProbe({}) });

    expect(resolver.candidatesFor("pkg.helper.run").at(0)?.fileName).toBe("run.schema.json");
    expect(resolver.candidatesFor("pkg.helper.run", { layout: { hasClass: true } }).at(0)?.fileName).toBe(
      "helper.run.schema.json",
    );
  });

  it("resolves concurrent lookups independently", async () => {
    const probe = createMemoryProbe({ files: ["/schemas/similar.schema.json", "/schemas/func.json"] });
    const resolver = new SchemaResolver({ schemaDir: SCHEMA_DIR, probe, logger: silentLogger });

    const [first, second] = await Promise.all([resolver.resolve(PRODUCT_SIMILAR), resolver.resolve("module.func")]);

    expect(first).toMatchObject({ found: true, fileName: "similar.schema.json" });
    expect(second).toMatchObject({ found: true, fileName: "func.json" });
    expect(first.attempted).toHaveLength(7);
    expect(second.attempted).toHaveLength(2);
  });

  describe("candidates outside the schema directory", () => {
    it("rejects them without probing and warns", async () => {
      const probe = createMemoryProbe({ files: ["/outside/similar.schema.json", "/schemas/similar.schema.json"] });
      const logger = createCaptureLogger();
      const resolver = new SchemaResolver({
        schemaDir: SCHEMA_DIR,
        policy: createSearchPolicy({ customPatterns: ["../outside/{method_name}"] }),
        probe,
        logger,
      });

      const result = await resolver.resolve(PRODUCT_SIMILAR);

      expect(result.attempted.slice(0, 2).map((a) => a.outcome)).toEqual(["rejected", "rejected"]);
      expect(result).toMatchObject({ found: true, path: "/schemas/similar.schema.json" });
      expect(probe.statted).not.toContain("/outside/similar.schema.json");
      expect(logger.warn).toHaveBeenCalledWith(
        'Skipping candidate "../outside/similar.schema.json": resolves outside /schemas',
      );
      expect(logger.debug).not.toHaveBeenCalled();
    });
  });

  describe("debug logging", () => {
    it("logs every attempt in order", async () => {
      const logger = createCaptureLogger();
      const resolver = new SchemaResolver({
        schemaDir: SCHEMA_DIR,
        probe: createMemoryProbe({ files: ["/schemas/similar.schema.json"] }),
        logger,
        debug: true,
      });

      await resolver.resolve(PRODUCT_SIMILAR);

      expect(logger.debug.mock.calls.map((call) => call[0])).toEqual([
        "ProductService.similar.schema.json: missing",
        "ProductService.similar.json: missing",
        "catalog.ProductService.similar.schema.json: missing",
        "catalog.ProductService.similar.json: missing",
        "endpoints.catalog.ProductService.similar.schema.json: missing",
        "endpoints.catalog.ProductService.similar.json: missing",
        "similar.schema.json: matched",
      ]);
    });

    it("summarizes a miss", async () => {
      const logger = createCaptureLogger();
      const resolver = new SchemaResolver({
        schemaDir: SCHEMA_DIR,
        probe: createMemoryProbe({}),
        logger,
        debug: true,
      });

      await resolver.resolve("module.func");

      expect(logger.debug).toHaveBeenCalledTimes(5);
      expect(logger.debug).toHaveBeenLastCalledWith("No schema found in /schemas after 4 candidate(s)");
    });

    it("stays quiet when disabled", async () => {
      const logger = createCaptureLogger();
      const resolver = new SchemaResolver({ schemaDir: SCHEMA_DIR, probe: createMemoryProbe({}), logger });

      await resolver.resolve(PRODUCT_SIMILAR);

      expect(logger.debug).not.toHaveBeenCalled();
    });
  });

  describe("resolveByName", () => {
    it("tries the schema form, then the data form", async () => {
      const resolver = new SchemaResolver({
        schemaDir: SCHEMA_DIR,
        probe: createMemoryProbe({ files: ["/schemas/User.create.json"] }),
        logger: silentLogger,
      });

      const result = await resolver.resolveByName("User.create");

      expect(result).toMatchObject({ found: true, kind: "data", path: "/schemas/User.create.json" });
      expect(result.attempted.map((a) => a.candidate.fileName)).toEqual([
        "User.create.schema.json",
        "User.create.json",
      ]);
    });

    it("rejects an empty name", async () => {
      const resolver = new SchemaResolver({ schemaDir: SCHEMA_DIR, probe: createMemoryProbe({}) });

      await expect(resolver.resolveByName("")).rejects.toThrow(
        'Malformed object identifier "": schema name must not be empty',
      );
    });
  });
});

describe("findSchemaForObject", () => {
  it("resolves with an explicit policy", async () => {
    const probe = createMemoryProbe({ files: ["/schemas/mypackage/module/MyClass.method.schema.json"] });
    const policy = createSearchPolicy({ includePackageName: true, pathToFileSeparator: "SLASH" });

    const result = await findSchemaForObject("mypackage.module.MyClass.method", SCHEMA_DIR, policy, {
      probe,
      logger: silentLogger,
    });

    expect(result).toMatchObject({
      found: true,
      fileName: "mypackage/module/MyClass.method.schema.json",
      path: "/schemas/mypackage/module/MyClass.method.schema.json",
    });
    expect(result.attempted).toHaveLength(5);
  });

  it("falls back to the default policy", async () => {
    const result = await findSchemaForObject("module.func", SCHEMA_DIR, undefined, {
      probe: createMemoryProbe({ files: ["/schemas/module.func.schema.json"] }),
    });

    expect(result).toMatchObject({ found: true, fileName: "module.func.schema.json" });
  });
});
