import fs from "node:fs";
import path from "node:path";
import { isPipelineStatus, isTerminal } from "./state-machine.js";

export type ConcurrencyCheck = {
  allowed: boolean;
  activeId?: string;
  reason?: string;
};

export type ConcurrencyWarning = (msg: string) => void;

/**
 * One active run per manifest: scans every run directory's state.json for a
 * non-terminal run of the same manifest. Runs not updated for `staleMs` are
 * considered abandoned.
 */
export function checkConcurrency(
  artifactsDir: string,
  manifest: string,
  staleMs: number,
  onWarn?: ConcurrencyWarning,
  now: number = Date.now(),
): ConcurrencyCheck {
  if (!fs.existsSync(artifactsDir)) {
    return { allowed: true };
  }

  for (const entry of fs.readdirSync(artifactsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;

    const statePath = path.join(artifactsDir, entry.name, "state.json");
    if (!fs.existsSync(statePath)) continue;

    let state: unknown;
    try {
      state = JSON.parse(fs.readFileSync(statePath, "utf8"));
    } catch (e) {
      onWarn?.(`Skipping unreadable run state ${statePath}: ${e instanceof Error ? e.message : String(e)}`);
      continue;
    }
    if (typeof state !== "object" || state === null) continue;

    const owner: unknown = Reflect.get(state, "manifest");
    const status: unknown = Reflect.get(state, "status");
    const updatedAt: unknown = Reflect.get(state, "updated_at");
    if (owner !== manifest || typeof status !== "string" || !isPipelineStatus(status)) continue;
    if (isTerminal(status)) continue;

    const age = typeof updatedAt === "string" ? now - Date.parse(updatedAt) : Number.POSITIVE_INFINITY;
    if (!(age <= staleMs)) {
      onWarn?.(`Ignoring stale run ${entry.name} (status: ${status})`);
      continue;
    }

    return {
      allowed: false,
      activeId: entry.name,
      reason: `Active run already in progress for ${manifest}: ${entry.name} (status: ${status})`,
    };
  }

  return { allowed: true };
}
