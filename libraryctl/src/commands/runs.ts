import fs from "node:fs";
import path from "node:path";
import type { OutcomeReport } from "../core/orchestrator.js";
import { safePath } from "../core/security.js";
import { errorMessage } from "../core/errors.js";
import { diag, type Diagnostic } from "./context.js";

export type RunSummary = { id: string; manifest: string; status: string; updated_at: string };

/**
 * List all runs with their current status, most recently updated first.
 */
export function listRuns(artifactsDir: string): RunSummary[] {
  if (!fs.existsSync(artifactsDir)) return [];

  const results: RunSummary[] = [];
  for (const entry of fs.readdirSync(artifactsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const statePath = path.join(artifactsDir, entry.name, "state.json");
    if (!fs.existsSync(statePath)) continue;

    try {
      const state: unknown = JSON.parse(fs.readFileSync(statePath, "utf8"));
      const field = (key: string): string => {
        if (typeof state !== "object" || state === null) return "";
        const value: unknown = Reflect.get(state, key);
        return typeof value === "string" ? value : "";
      };
      results.push({ id: entry.name, manifest: field("manifest"), status: field("status") || "unknown", updated_at: field("updated_at") });
    } catch {
      results.push({ id: entry.name, manifest: "", status: "corrupted", updated_at: "" });
    }
  }

  return results.sort((a, b) => b.updated_at.localeCompare(a.updated_at));
}

export type OutcomeResult = { ok: true; report: OutcomeReport } | { ok: false; error: Diagnostic };

/** The outcome report of a finished run. */
export function readOutcome(artifactsDir: string, runId: string): OutcomeResult {
  let file: string;
  try {
    file = path.join(safePath(path.resolve(artifactsDir), runId), "outcome.json");
  } catch (e) {
    return { ok: false, error: diag("error", "RUN_ID_INVALID", errorMessage(e)) };
  }
  if (!fs.existsSync(file)) {
    return { ok: false, error: diag("error", "RUN_NOT_FOUND", `No finished run: ${runId}`, { path: file }) };
  }
  try {
    const report: OutcomeReport = JSON.parse(fs.readFileSync(file, "utf8"));
    return { ok: true, report };
  } catch (e) {
    return { ok: false, error: diag("error", "RUN_OUTCOME_INVALID", `Failed to read outcome: ${errorMessage(e)}`, { path: file }) };
  }
}
