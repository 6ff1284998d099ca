import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { ErrorObject } from "ajv";
import type { SchemaRegistry } from "../schema/registry.js";
import { SchemaError, errorMessage, type FieldIssue } from "../core/errors.js";
import { sha256Digest } from "../artifact-writer/checksum.js";
import type { BuilderBackend, Maintainer, Manifest, Platform } from "../types/manifest.js";

/** Manifest as written by authors, before defaults are applied. */
export type ManifestDocument = {
  version?: number;
  name: string;
  maintainers: Maintainer[];
  git: { repo: string; fetch?: string; tag?: string; sha?: string };
  build: {
    path?: string;
    dockerfile?: string;
    context?: string;
    builder?: BuilderBackend;
    platforms?: Platform[];
    tags: string[];
    args?: Record<string, string>;
    annotations?: Record<string, string>;
    labels?: Record<string, string>;
    target?: string;
    test?: string;
  };
  metadata: { identifier: string; project: string };
};

export const MANIFEST_DEFAULTS = {
  version: 0.2,
  fetch: "refs/heads/main",
  path: ".",
  dockerfile: "Dockerfile",
  context: ".",
  builder: "buildkit",
  platforms: ["linux/amd64"],
} as const satisfies {
  version: number;
  fetch: string;
  path: string;
  dockerfile: string;
  context: string;
  builder: BuilderBackend;
  platforms: readonly Platform[];
};

export type LoadResult = { ok: true; manifest: Manifest } | { ok: false; error: SchemaError };

export type LoadOptions = {
  /** Manifests already in the library; used for identifier uniqueness. */
  known?: Iterable<Manifest>;
  /** File name or other origin, carried into error details. */
  source?: string;
};

export type DirectoryLoad = {
  manifests: Array<{ path: string; manifest: Manifest }>;
  errors: Array<{ path: string; error: SchemaError }>;
};

function unescapePointer(segment: string): string {
  return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

/** Ajv error → dotted field path (`build.platforms.1`, `git.extra`). */
export function issuePath(err: ErrorObject): string {
  const segments = err.instancePath
    .split("/")
    .slice(1)
    .map(unescapePointer);
  if (err.keyword === "additionalProperties") segments.push(String(err.params.additionalProperty));
  if (err.keyword === "required") segments.push(String(err.params.missingProperty));
  return segments.length > 0 ? segments.join(".") : "(root)";
}

export function toIssues(errors: ErrorObject[]): FieldIssue[] {
  const seen = new Set<string>();
  const issues: FieldIssue[] = [];
  for (const err of errors) {
    const p = issuePath(err);
    const message =
      err.keyword === "additionalProperties"
        ? "unknown property"
        : err.keyword === "oneOf" && p.endsWith("git")
          ? "exactly one of tag or sha must be set"
          : (err.message ?? err.keyword);
    const key = `${p}|${err.keyword}|${message}`;
    if (seen.has(key)) continue;
    seen.add(key);
    issues.push({ path: p, keyword: err.keyword, message });
  }
  return issues;
}

function withDefaults(doc: ManifestDocument): Manifest {
  const b = doc.build;
  return {
    version: doc.version ?? MANIFEST_DEFAULTS.version,
    name: doc.name,
    maintainers: doc.maintainers.map((m) => ({
      name: m.name,
      email: m.email,
      ...(m.github !== undefined ? { github: m.github } : {}),
      ...(m.gitlab !== undefined ? { gitlab: m.gitlab } : {}),
    })),
    git: {
      repo: doc.git.repo,
      fetch: doc.git.fetch ?? MANIFEST_DEFAULTS.fetch,
      ...(doc.git.tag !== undefined ? { tag: doc.git.tag } : {}),
      ...(doc.git.sha !== undefined ? { sha: doc.git.sha } : {}),
    },
    build: {
      path: b.path ?? MANIFEST_DEFAULTS.path,
      dockerfile: b.dockerfile ?? MANIFEST_DEFAULTS.dockerfile,
      context: b.context ?? MANIFEST_DEFAULTS.context,
      builder: b.builder ?? MANIFEST_DEFAULTS.builder,
      platforms: b.platforms ? [...b.platforms] : [...MANIFEST_DEFAULTS.platforms],
      tags: [...b.tags],
      args: b.args ? { ...b.args } : null,
      annotations: b.annotations ? { ...b.annotations } : null,
      labels: b.labels ? { ...b.labels } : null,
      target: b.target ?? null,
      test: b.test ?? null,
    },
    metadata: { identifier: doc.metadata.identifier, project: doc.metadata.project },
  };
}

/**
 * Parses and validates manifest documents against the
 * bundled closed schema, then applies defaults.
 */
export class ManifestStore {
  constructor(private readonly registry: SchemaRegistry) {}

  /** Validate YAML text or an already-parsed document. */
  load(raw: unknown, opts: LoadOptions = {}): LoadResult {
    let doc: unknown = raw;
    if (typeof raw === "string") {
      try {
        doc = YAML.parse(raw);
      } catch (e) {
        return this.fail("Manifest is not valid YAML", [{ path: "(root)", keyword: "yaml", message: errorMessage(e) }], opts.source);
      }
    }

    const validate = this.registry.getValidator<ManifestDocument>("manifest");
    if (!validate(doc)) {
      const issues = toIssues(validate.errors ?? []);
      const summary = issues.map((i) => `${i.path}: ${i.message}`).join("; ");
      return this.fail(`Manifest failed schema validation: ${summary}`, issues, opts.source);
    }

    const manifest = withDefaults(doc);

    for (const other of opts.known ?? []) {
      if (other.name !== manifest.name && other.metadata.identifier === manifest.metadata.identifier) {
        return this.fail(
          `metadata.identifier '${manifest.metadata.identifier}' is already used by manifest '${other.name}'`,
          [{ path: "metadata.identifier", keyword: "unique", message: `already used by '${other.name}'` }],
          opts.source,
        );
      }
    }

    return { ok: true, manifest };
  }

  loadFile(filePath: string, opts: Omit<LoadOptions, "source"> = {}): LoadResult {
    let text: string;
    try {
      text = fs.readFileSync(filePath, "utf8");
    } catch (e) {
      return this.fail(`Cannot read manifest: ${errorMessage(e)}`, [{ path: "(root)", keyword: "read", message: errorMessage(e) }], filePath);
    }
    return this.load(text, { ...opts, source: filePath });
  }

  /**
   * Load every *.yaml / *.yml file of a directory. Identifiers and names must
   * be unique across the set; the first file (by name) keeps a contested value.
   */
  loadDirectory(dir: string): DirectoryLoad {
    const result: DirectoryLoad = { manifests: [], errors: [] };
    if (!fs.existsSync(dir)) return result;

    const files = fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((e) => e.isFile() && (e.name.endsWith(".yaml") || e.name.endsWith(".yml")))
      .map((e) => path.join(dir, e.name))
      .sort();

    for (const file of files) {
      const res = this.loadFile(file, { known: result.manifests.map((m) => m.manifest) });
      if (!res.ok) {
        result.errors.push({ path: file, error: res.error });
        continue;
      }
      const clash = result.manifests.find((m) => m.manifest.name === res.manifest.name);
      if (clash) {
        const issue = { path: "name", keyword: "unique", message: `already declared in ${path.basename(clash.path)}` };
        result.errors.push({ path: file, error: new SchemaError(`Duplicate manifest name '${res.manifest.name}'`, [issue], file) });
        continue;
      }
      result.manifests.push({ path: file, manifest: res.manifest });
    }

    return result;
  }

  private fail(message: string, issues: FieldIssue[], source?: string): LoadResult {
    return { ok: false, error: new SchemaError(message, issues, source) };
  }
}

/** Manifest → YAML; null optional fields are left out so that load(serialize(m)) equals m. */
export function serializeManifest(manifest: Manifest): string {
  const b = manifest.build;
  const build: Record<string, unknown> = {
    path: b.path,
    dockerfile: b.dockerfile,
    context: b.context,
    builder: b.builder,
    platforms: b.platforms,
    tags: b.tags,
  };
  if (b.args !== null) build.args = b.args;
  if (b.annotations !== null) build.annotations = b.annotations;
  if (b.labels !== null) build.labels = b.labels;
  if (b.target !== null) build.target = b.target;
  if (b.test !== null) build.test = b.test;

  return YAML.stringify({
    version: manifest.version,
    name: manifest.name,
    maintainers: manifest.maintainers,
    git: manifest.git,
    build,
    metadata: manifest.metadata,
  });
}

/** sha256 over the canonical serialization, `sha256:<hex>`. */
export function manifestDigest(manifest: Manifest): string {
  return sha256Digest(serializeManifest(manifest));
}
