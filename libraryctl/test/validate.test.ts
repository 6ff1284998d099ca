import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { exitCodeForDiagnostics, validateAll } from "../src/commands/validate.js";
import { ArtifactWriter } from "../src/artifact-writer/writer.js";
import { EXIT } from "../src/commands/exit-codes.js";
import { BASE_MANIFEST_YAML } from "./fakes.js";

const EXAMPLES_DIR = path.resolve(import.meta.dirname, "../examples");

describe("libraryctl validate", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "libraryctl-validate-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function sampleRun(): string {
    const runDir = path.join(tmpDir, "base-v0.1.0-20260301-001");
    const writer = new ArtifactWriter(runDir);
    writer.init();
    writer.writeJson("attempt.json", { overall: "success" });
    writer.writeText("logs/linux-amd64.build.log", "built");
    writer.writeIndex({ runId: "base-v0.1.0-20260301-001", manifest: "base", status: "done", schemaVersions: {} });
    return runDir;
  }

  it("accepts the bundled config and the example manifests", async () => {
    const res = await validateAll({ manifestsDir: EXAMPLES_DIR, vars: {} });
    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(res.diagnostics.map((d) => d.code)).toEqual(["CONFIG_OK", "MANIFESTS_OK"]);
      expect(res.diagnostics[1].message).toBe("1 manifest(s) valid");
    }
  });

  it("fails when the config directory has no config", async () => {
    const res = await validateAll({ configDir: path.join(tmpDir, "nope"), vars: {} });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.errors.map((e) => e.code)).toEqual(["CONFIG_INVALID"]);
      expect(res.errors[0].message).toMatch(/^Config invalid: data must have required property 'schema_version'/);
      expect(exitCodeForDiagnostics(res.errors)).toBe(EXIT.INVALID_ARGS);
    }
  });

  it("reports every invalid manifest field", async () => {
    const dir = path.join(tmpDir, "library");
    fs.mkdirSync(dir);
    fs.writeFileSync(path.join(dir, "base.yaml"), BASE_MANIFEST_YAML + "extra: 1\n");

    const res = await validateAll({ manifestsDir: dir, vars: {} });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.errors).toEqual([
        {
          level: "error",
          code: "MANIFEST_INVALID",
          message: "base.yaml: extra: unknown property",
          path: path.join(dir, "base.yaml"),
          details: { field: "extra", keyword: "additionalProperties" },
        },
      ]);
      expect(exitCodeForDiagnostics(res.errors)).toBe(EXIT.SCHEMA_INVALID);
    }
  });

  it("fails when the manifest directory is missing", async () => {
    const res = await validateAll({ manifestsDir: path.join(tmpDir, "missing"), vars: {} });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors.map((e) => e.code)).toEqual(["MANIFEST_DIR_MISSING"]);
  });

  it("verifies an intact run directory", async () => {
    const res = await validateAll({ runDir: sampleRun(), vars: {} });
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.diagnostics[1]).toMatchObject({ code: "RUN_INDEX_OK", message: "2 artifact(s) indexed" });
  });

  it("reports tampered artifacts", async () => {
    const runDir = sampleRun();
    fs.writeFileSync(path.join(runDir, "logs/linux-amd64.build.log"), "BUILT");

    const res = await validateAll({ runDir, vars: {} });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.errors.map((e) => [e.code, e.message])).toEqual([["RUN_ARTIFACT_MISMATCH", "logs/linux-amd64.build.log: sha256 mismatch"]]);
      expect(exitCodeForDiagnostics(res.errors)).toBe(EXIT.PIPELINE_FAILED);
    }
  });

  it("reports a missing or unreadable index", async () => {
    const runDir = path.join(tmpDir, "empty-run");
    fs.mkdirSync(runDir);
    const missing = await validateAll({ runDir, vars: {} });
    expect(missing.ok).toBe(false);
    if (!missing.ok) expect(missing.errors.map((e) => e.code)).toEqual(["RUN_INDEX_MISSING"]);

    fs.writeFileSync(path.join(runDir, "index.json"), "{ not json");
    const broken = await validateAll({ runDir, vars: {} });
    expect(broken.ok).toBe(false);
    if (!broken.ok) expect(broken.errors.map((e) => e.code)).toEqual(["RUN_INDEX_JSON_INVALID"]);

    fs.writeFileSync(path.join(runDir, "index.json"), JSON.stringify({ run_id: "x" }));
    const invalid = await validateAll({ runDir, vars: {} });
    expect(invalid.ok).toBe(false);
    if (!invalid.ok) expect(invalid.errors.map((e) => e.code)).toEqual(["RUN_INDEX_INVALID"]);
  });
});
