import type { BuildState } from "../types/build-state.js";
import { createRegistry } from "../schema/registry.js";
import { FileBuildStateStore } from "../state/build-state-store.js";
import { errorMessage } from "../core/errors.js";
import { commandConfig, diag, type ConfigOptions, type Diagnostic } from "./context.js";

export type StatusResult = { ok: true; states: BuildState[] } | { ok: false; error: Diagnostic };

/**
 * Read BuildState for one manifest, or for every manifest when `name` is omitted.
 */
export async function status(opts: ConfigOptions & { name?: string }): Promise<StatusResult> {
  const configured = await commandConfig(opts);
  if (!configured.ok) return configured;
  const { config } = configured;

  try {
    const store = new FileBuildStateStore(config.state_dir, await createRegistry(), { leaseMs: config.lease_seconds * 1000 });
    if (!opts.name) return { ok: true, states: await store.list() };

    const state = await store.read(opts.name);
    if (!state) return { ok: false, error: diag("error", "STATE_NOT_FOUND", `No build state for ${opts.name}`) };
    return { ok: true, states: [state] };
  } catch (e) {
    return { ok: false, error: diag("error", "STATE_READ_FAILED", `Failed to read build state: ${errorMessage(e)}`) };
  }
}
