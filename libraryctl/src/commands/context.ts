import { resolveDirs } from "../config/loader.js";
import { loadConfig } from "../config/validator.js";
import type { LibraryConfig } from "../types/config.js";
import { errorMessage } from "../core/errors.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type ConfigOptions = {
  /** Configuration directory; the bundled one when omitted. */
  configDir?: string;
  /** Environment layer, e.g. "ci" for config/ci.yaml. */
  env?: string;
  cwd?: string;
  vars?: NodeJS.ProcessEnv;
};

export type ConfigResult = { ok: true; config: LibraryConfig } | { ok: false; error: Diagnostic };

export function diag(level: Diagnostic["level"], code: string, message: string, extra?: Pick<Diagnostic, "path" | "details">): Diagnostic {
  return { level, code, message, ...extra };
}

/** Load, validate and resolve the configuration for a command. */
export async function commandConfig(opts: ConfigOptions): Promise<ConfigResult> {
  try {
    const config = await loadConfig(opts.env, opts.configDir, opts.vars);
    return { ok: true, config: resolveDirs(config, opts.cwd ?? process.cwd()) };
  } catch (e) {
    return { ok: false, error: diag("error", "CONFIG_INVALID", errorMessage(e)) };
  }
}
