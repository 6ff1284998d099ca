import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { LibraryConfig } from "../types/config.js";

export const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

export const ENV_PREFIX = "LIBRARY_";

type Layer = Record<string, unknown>;

function isPlainObject(value: unknown): value is Layer {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Layer, override: Layer): Layer {
  const result: Layer = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Layer {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * Apply LIBRARY_ prefixed environment variable overrides.
 * LIBRARY_REGISTRY → registry; values become numbers where the key already holds one.
 */
function applyEnvOverrides(config: Layer, env: NodeJS.ProcessEnv): Layer {
  const result: Layer = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    const current = result[configKey];
    if (isPlainObject(current)) continue;
    if (typeof current === "number" && value.trim() !== "" && Number.isFinite(Number(value))) {
      result[configKey] = Number(value);
    } else {
      result[configKey] = value;
    }
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← LIBRARY_* environment variables.
 *
 * The result is untyped until it passes `validateConfig`.
 */
export function loadConfigLayers(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): Layer {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}

/** Resolve the directory settings of a config against a working directory. */
export function resolveDirs(config: LibraryConfig, cwd: string): LibraryConfig {
  return {
    ...config,
    artifacts_dir: path.resolve(cwd, config.artifacts_dir),
    state_dir: path.resolve(cwd, config.state_dir),
    cache_dir: path.resolve(cwd, config.cache_dir),
  };
}
