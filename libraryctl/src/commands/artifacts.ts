import fs from "node:fs";
import path from "node:path";
import { safePath } from "../core/security.js";
import { errorMessage } from "../core/errors.js";
import { diag, type Diagnostic } from "./context.js";

export type ArtifactFile = { path: string; size: number };

export type ArtifactsResult = { ok: true; files: ArtifactFile[] } | { ok: false; error: Diagnostic };

/**
 * List the files of a run directory.
 */
export function listArtifacts(opts: { artifactsDir: string; runId: string }): ArtifactsResult {
  let dir: string;
  try {
    dir = safePath(path.resolve(opts.artifactsDir), opts.runId);
  } catch (e) {
    return { ok: false, error: diag("error", "RUN_ID_INVALID", errorMessage(e)) };
  }

  if (!fs.existsSync(dir)) {
    return { ok: false, error: diag("error", "RUN_NOT_FOUND", `No artifacts found for: ${opts.runId}`, { path: dir }) };
  }

  const files: ArtifactFile[] = [];
  collectFiles(dir, dir, files);
  return { ok: true, files: files.sort((a, b) => a.path.localeCompare(b.path)) };
}

function collectFiles(baseDir: string, currentDir: string, out: ArtifactFile[]): void {
  for (const entry of fs.readdirSync(currentDir, { withFileTypes: true })) {
    const fullPath = path.join(currentDir, entry.name);
    if (entry.isDirectory()) {
      collectFiles(baseDir, fullPath, out);
    } else if (entry.isFile()) {
      out.push({ path: path.relative(baseDir, fullPath), size: fs.statSync(fullPath).size });
    }
  }
}
