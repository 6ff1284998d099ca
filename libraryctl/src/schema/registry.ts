import fs from "node:fs";
import path from "node:path";
import type { ErrorObject } from "ajv";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  id: string;
  version: string;
  filePath: string;
  schema: Record<string, unknown>;
};

export type SchemaValidation = {
  valid: boolean;
  errors: string | null;
  details: ErrorObject[];
};

export const SCHEMA_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../schemas");

/**
 * Schema registry: discovers every *.schema.json in a directory and registers
 * them with one Ajv instance, so schemas may `$ref` each other by `$id`.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const ajv = await loadAjv();
    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json")).sort();

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema = JSON.parse(fs.readFileSync(filePath, "utf8")) as Record<string, unknown>;

      // "build-state.schema.json" → "build-state"
      const name = file.replace(/\.schema\.json$/, "");
      if (typeof schema.$id !== "string") {
        throw new Error(`Schema ${file} has no $id`);
      }

      this.entries.set(name, {
        name,
        id: schema.$id,
        version: extractVersion(schema) ?? "1.0.0",
        filePath,
        schema,
      });
      ajv.addSchema(schema);
    }

    this.ajv = ajv;
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** name → version */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  /** Validator for a schema name; Ajv compiles each `$id` once and caches it. */
  getValidator<T = unknown>(name: string): AjvValidateFn<T> {
    const entry = this.entries.get(name);
    if (!entry || !this.ajv) {
      throw new Error(`Schema not found: ${name}`);
    }

    const validate = this.ajv.getSchema<T>(entry.id);
    if (!validate) {
      throw new Error(`Schema failed to compile: ${name}`);
    }
    return validate;
  }

  validate(name: string, data: unknown): SchemaValidation {
    const validate = this.getValidator(name);
    const valid = validate(data);
    const details = valid ? [] : [...(validate.errors ?? [])];

    return {
      valid,
      errors: valid || !this.ajv ? null : this.ajv.errorsText(details),
      details,
    };
  }
}

/** Extract the semver suffix of a schema `$id`, e.g. ".../build@1.0.0". */
function extractVersion(schema: Record<string, unknown>): string | null {
  if (typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)$/.exec(schema.$id);
    if (m) return m[1];
  }
  return null;
}

let shared: Promise<SchemaRegistry> | null = null;

/** Create and load a registry; the bundled schema directory is loaded once per process. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  if (schemaDir) {
    const registry = new SchemaRegistry(schemaDir);
    await registry.load();
    return registry;
  }
  if (!shared) {
    const registry = new SchemaRegistry(SCHEMA_DIR);
    shared = registry.load().then(() => registry);
  }
  return shared;
}
