import fs from "node:fs";
import path from "node:path";
import { loadConfigLayers } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { ManifestStore } from "../manifest/store.js";
import { INDEX_FILE, verifyRunIndex } from "../artifact-writer/index-builder.js";
import type { RunIndex } from "../types/run.js";
import { errorMessage } from "../core/errors.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { diag, type Diagnostic } from "./context.js";

export type { Diagnostic };

export type ValidateResult = { ok: true; diagnostics: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

export type ValidateOptions = {
  configDir?: string;
  env?: string;
  vars?: NodeJS.ProcessEnv;
  /** Directory of manifest YAML files. */
  manifestsDir?: string;
  /** A run directory whose index.json should be verified. */
  runDir?: string;
  schemaDir?: string;
};

function validateManifests(dir: string, registry: SchemaRegistry, errors: Diagnostic[], info: Diagnostic[]): void {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    errors.push(diag("error", "MANIFEST_DIR_MISSING", `Manifest directory not found: ${dir}`, { path: dir }));
    return;
  }

  const { manifests, errors: failures } = new ManifestStore(registry).loadDirectory(dir);
  for (const failure of failures) {
    for (const issue of failure.error.issues) {
      errors.push(
        diag("error", "MANIFEST_INVALID", `${path.basename(failure.path)}: ${issue.path}: ${issue.message}`, {
          path: failure.path,
          details: { field: issue.path, keyword: issue.keyword },
        }),
      );
    }
  }
  info.push(diag("info", "MANIFESTS_OK", `${manifests.length} manifest(s) valid`, { path: dir }));
}

function validateRunDir(runDir: string, registry: SchemaRegistry, errors: Diagnostic[], info: Diagnostic[]): void {
  const indexPath = path.join(runDir, INDEX_FILE);
  if (!fs.existsSync(indexPath)) {
    errors.push(diag("error", "RUN_INDEX_MISSING", `Missing run index: ${indexPath}`, { path: indexPath }));
    return;
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(indexPath, "utf8"));
  } catch (e) {
    errors.push(diag("error", "RUN_INDEX_JSON_INVALID", `Invalid JSON in ${indexPath}: ${errorMessage(e)}`, { path: indexPath }));
    return;
  }

  const validate = registry.getValidator<RunIndex>("run-index");
  if (!validate(data)) {
    const { errors: text } = registry.validate("run-index", data);
    errors.push(diag("error", "RUN_INDEX_INVALID", `Run index invalid: ${text}`, { path: indexPath }));
    return;
  }

  for (const problem of verifyRunIndex(runDir, data)) {
    errors.push(diag("error", "RUN_ARTIFACT_MISMATCH", problem, { path: runDir }));
  }
  info.push(diag("info", "RUN_INDEX_OK", `${data.artifacts.length} artifact(s) indexed`, { path: indexPath }));
}

/**
 * Validate configuration, and optionally a manifest directory and a run
 * directory's integrity index.
 */
export async function validateAll(opts: ValidateOptions): Promise<ValidateResult> {
  const errors: Diagnostic[] = [];
  const info: Diagnostic[] = [];

  try {
    const res = await validateConfig(loadConfigLayers(opts.env, opts.configDir, opts.vars));
    if (!res.valid) errors.push(diag("error", "CONFIG_INVALID", `Config invalid: ${res.errors}`));
    else info.push(diag("info", "CONFIG_OK", "Configuration valid"));
  } catch (e) {
    errors.push(diag("error", "CONFIG_READ_FAILED", `Failed to read config: ${errorMessage(e)}`));
  }

  let registry: SchemaRegistry;
  try {
    registry = await createRegistry(opts.schemaDir);
  } catch (e) {
    errors.push(diag("error", "SCHEMA_LOAD_FAILED", errorMessage(e)));
    return { ok: false, errors };
  }

  if (opts.manifestsDir) validateManifests(path.resolve(opts.manifestsDir), registry, errors, info);
  if (opts.runDir) validateRunDir(path.resolve(opts.runDir), registry, errors, info);

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, diagnostics: info };
}

/** Manifest problems outrank run-directory problems, which outrank configuration. */
export function exitCodeForDiagnostics(errors: Diagnostic[]): ExitCode {
  if (errors.length === 0) return EXIT.SUCCESS;
  if (errors.some((e) => e.code.startsWith("MANIFEST_"))) return EXIT.SCHEMA_INVALID;
  if (errors.some((e) => e.code.startsWith("RUN_"))) return EXIT.PIPELINE_FAILED;
  return EXIT.INVALID_ARGS;
}
