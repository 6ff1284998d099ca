import fs from "node:fs";
import path from "node:path";
import type { ArtifactEntry, RunIndex } from "../types/run.js";
import { computeSha256 } from "./checksum.js";

export const INDEX_FILE = "index.json";

export type RunIndexInput = {
  run_id: string;
  manifest: string;
  status: string;
  schema_versions: Record<string, string>;
  artifacts: ArtifactEntry[];
};

/** Build a run index; artifacts are listed in path order. */
export function buildRunIndex(input: RunIndexInput): RunIndex {
  return {
    run_id: input.run_id,
    manifest: input.manifest,
    created_at: new Date().toISOString(),
    status: input.status,
    schema_versions: input.schema_versions,
    artifacts: [...input.artifacts].sort((a, b) => a.path.localeCompare(b.path)),
  };
}

/** Artifact paths must stay inside the run directory. */
export function isContainedPath(runDir: string, relativePath: string): boolean {
  if (path.isAbsolute(relativePath) || relativePath.includes("\0")) return false;
  const base = path.resolve(runDir);
  const full = path.resolve(base, relativePath);
  return full.startsWith(base + path.sep);
}

/**
 * Check every entry of an index against the files on disk.
 * Returns one message per problem; empty when the run directory is intact.
 */
export function verifyRunIndex(runDir: string, index: RunIndex): string[] {
  const problems: string[] = [];
  const seen = new Set<string>();

  for (const entry of index.artifacts) {
    if (seen.has(entry.path)) {
      problems.push(`${entry.path}: listed more than once`);
      continue;
    }
    seen.add(entry.path);

    if (!isContainedPath(runDir, entry.path)) {
      problems.push(`${entry.path}: path escapes the run directory`);
      continue;
    }

    const full = path.join(runDir, entry.path);
    if (!fs.existsSync(full)) {
      problems.push(`${entry.path}: missing`);
      continue;
    }

    const size = fs.statSync(full).size;
    if (size !== entry.size) {
      problems.push(`${entry.path}: size ${size} does not match recorded ${entry.size}`);
      continue;
    }
    if (computeSha256(full) !== entry.sha256) {
      problems.push(`${entry.path}: sha256 mismatch`);
    }
  }

  return problems;
}
