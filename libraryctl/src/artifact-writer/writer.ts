import fs from "node:fs";
import path from "node:path";
import type { ArtifactEntry, RunIndex } from "../types/run.js";
import type { LogSink } from "../build/coordinator.js";
import { computeSha256 } from "./checksum.js";
import { INDEX_FILE, buildRunIndex, isContainedPath } from "./index-builder.js";

type Tracked = { schema?: string; producedAt: string };

/**
 * Owns one run directory. Every file written (or adopted via
 * `track`) is listed in `index.json` with its size and sha256.
 */
export class ArtifactWriter implements LogSink {
  private readonly tracked = new Map<string, Tracked>();

  constructor(readonly runDir: string) {}

  init(): void {
    fs.mkdirSync(this.runDir, { recursive: true });
  }

  /** Write a JSON artifact; `schema` is `<name>@<version>` when it conforms to one. */
  writeJson(relativePath: string, content: unknown, schema?: string): string {
    return this.write(relativePath, JSON.stringify(content, null, 2) + "\n", schema);
  }

  writeText(relativePath: string, content: string): string {
    return this.write(relativePath, content);
  }

  /** Include a file written by someone else (progress.log, state.json) in the index. */
  track(relativePath: string, schema?: string): void {
    this.resolve(relativePath);
    this.tracked.set(relativePath, { schema, producedAt: new Date().toISOString() });
  }

  /** Hash everything tracked that exists now and write `index.json`. */
  writeIndex(opts: { runId: string; manifest: string; status: string; schemaVersions: Record<string, string> }): RunIndex {
    const artifacts: ArtifactEntry[] = [];
    for (const [relativePath, info] of this.tracked) {
      const full = this.resolve(relativePath);
      if (!fs.existsSync(full)) continue;
      artifacts.push({
        path: relativePath,
        ...(info.schema ? { schema: info.schema } : {}),
        sha256: computeSha256(full),
        size: fs.statSync(full).size,
        produced_at: info.producedAt,
      });
    }

    const index = buildRunIndex({
      run_id: opts.runId,
      manifest: opts.manifest,
      status: opts.status,
      schema_versions: opts.schemaVersions,
      artifacts,
    });
    fs.writeFileSync(path.join(this.runDir, INDEX_FILE), JSON.stringify(index, null, 2) + "\n", "utf8");
    return index;
  }

  private write(relativePath: string, payload: string, schema?: string): string {
    const full = this.resolve(relativePath);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, payload, "utf8");
    this.tracked.set(relativePath, { schema, producedAt: new Date().toISOString() });
    return relativePath;
  }

  private resolve(relativePath: string): string {
    if (!isContainedPath(this.runDir, relativePath) || relativePath === INDEX_FILE) {
      throw new Error(`Invalid artifact path: ${relativePath}`);
    }
    return path.join(this.runDir, relativePath);
  }
}
