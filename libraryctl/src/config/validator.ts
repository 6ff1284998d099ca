import { loadAjv } from "../schema/ajv.js";
import type { LibraryConfig } from "../types/config.js";
import { loadConfigLayers } from "./loader.js";

const positiveInt = { type: "integer", minimum: 1 } as const;

const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "registry",
    "namespace",
    "staging_namespace",
    "artifacts_dir",
    "state_dir",
    "cache_dir",
    "lease_seconds",
    "stale_run_seconds",
    "retry",
    "timeouts",
    "docker",
    "signer",
  ],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    registry: { type: "string", pattern: "^[A-Za-z0-9.-]+(:[0-9]+)?$" },
    namespace: { type: "string", pattern: "^[a-z0-9]+([._-][a-z0-9]+)*$" },
    staging_namespace: { type: "string", pattern: "^[a-z0-9]+([._-][a-z0-9]+)*$" },
    artifacts_dir: { type: "string", minLength: 1 },
    state_dir: { type: "string", minLength: 1 },
    cache_dir: { type: "string", minLength: 1 },
    lease_seconds: positiveInt,
    stale_run_seconds: positiveInt,
    retry: {
      type: "object",
      required: ["source_attempts", "build_attempts", "backoff_ms"],
      additionalProperties: false,
      properties: {
        source_attempts: positiveInt,
        build_attempts: positiveInt,
        backoff_ms: { type: "integer", minimum: 0 },
      },
    },
    timeouts: {
      type: "object",
      required: ["build_seconds", "test_seconds"],
      additionalProperties: false,
      properties: {
        build_seconds: positiveInt,
        test_seconds: positiveInt,
      },
    },
    docker: {
      type: "object",
      required: ["command"],
      additionalProperties: false,
      properties: {
        command: { type: "string", minLength: 1 },
        untag_command: { type: "string", minLength: 1 },
      },
    },
    signer: {
      type: "object",
      required: ["command"],
      additionalProperties: false,
      properties: {
        command: { type: "string", minLength: 1 },
        key: { type: "string", minLength: 1 },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: LibraryConfig; errors: null }
  | { valid: false; errors: string };

/** Validate loaded config layers against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile<LibraryConfig>(CONFIG_SCHEMA);
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}

/** Load and validate in one step; throws with the validation message on failure. */
export async function loadConfig(envName?: string, configDir?: string, env?: NodeJS.ProcessEnv): Promise<LibraryConfig> {
  const res = await validateConfig(loadConfigLayers(envName, configDir, env));
  if (!res.valid) {
    throw new Error(`Invalid configuration: ${res.errors}`);
  }
  return res.config;
}
