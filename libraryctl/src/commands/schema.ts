import { createRegistry } from "../schema/registry.js";
import { diag, type Diagnostic } from "./context.js";

export type SchemaResult =
  | { ok: true; name: string; version: string; schema: Record<string, unknown> }
  | { ok: false; error: Diagnostic };

/** A bundled schema by name (`manifest` by default). */
export async function showSchema(name = "manifest"): Promise<SchemaResult> {
  const registry = await createRegistry();
  const entry = registry.get(name);
  if (!entry) {
    return {
      ok: false,
      error: diag("error", "SCHEMA_NOT_FOUND", `Unknown schema: ${name} (available: ${registry.names().join(", ")})`),
    };
  }
  return { ok: true, name: entry.name, version: entry.version, schema: entry.schema };
}

export async function listSchemas(): Promise<Array<{ name: string; version: string }>> {
  const registry = await createRegistry();
  return registry.names().map((name) => ({ name, version: registry.versions()[name] }));
}
