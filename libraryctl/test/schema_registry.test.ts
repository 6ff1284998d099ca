import { describe, expect, it, beforeAll } from "vitest";
import path from "node:path";
import { SchemaRegistry, createRegistry } from "../src/schema/registry.js";

const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");

describe("schema registry", () => {
  let registry: SchemaRegistry;

  beforeAll(async () => {
    registry = await createRegistry(SCHEMA_DIR);
  });

  it("discovers all schema files", () => {
    expect(registry.names()).toEqual([
      "build",
      "build-state",
      "git",
      "maintainer",
      "manifest",
      "metadata",
      "provenance",
      "run-index",
    ]);
  });

  it("reads versions from $id", () => {
    expect(registry.versions().manifest).toBe("1.0.0");
    expect(registry.get("provenance")?.id).toBe("https://schemas.image-library.local/provenance@1.0.0");
  });

  it("shares the bundled registry", async () => {
    expect(await createRegistry()).toBe(await createRegistry());
  });

  it("fails on a missing directory", async () => {
    await expect(createRegistry(path.join(SCHEMA_DIR, "missing"))).rejects.toThrow(/^Schema directory not found/);
  });

  it("throws for an unknown schema name", () => {
    expect(() => registry.getValidator("freeze")).toThrow("Schema not found: freeze");
  });

  describe("git schema", () => {
    it("accepts a tag or a sha", () => {
      expect(registry.validate("git", { repo: "https://git.example.test/a", tag: "v1" }).valid).toBe(true);
      expect(registry.validate("git", { repo: "https://git.example.test/a", sha: "0123abc" }).valid).toBe(true);
    });

    it("rejects neither or both", () => {
      expect(registry.validate("git", { repo: "https://git.example.test/a" }).valid).toBe(false);
      expect(registry.validate("git", { repo: "https://git.example.test/a", tag: "v1", sha: "0123abc" }).valid).toBe(false);
    });

    it("rejects a malformed sha and a relative repo", () => {
      expect(registry.validate("git", { repo: "https://git.example.test/a", sha: "XYZ" }).valid).toBe(false);
      expect(registry.validate("git", { repo: "not a url", tag: "v1" }).valid).toBe(false);
    });
  });

  describe("maintainer schema", () => {
    it("requires a valid email", () => {
      expect(registry.validate("maintainer", { name: "A", email: "a@example.test" }).valid).toBe(true);
      expect(registry.validate("maintainer", { name: "A", email: "not-an-email" }).valid).toBe(false);
    });
  });

  describe("build schema", () => {
    it("rejects invalid tags", () => {
      expect(registry.validate("build", { tags: ["latest", "3.12-slim"] }).valid).toBe(true);
      expect(registry.validate("build", { tags: [] }).valid).toBe(false);
      expect(registry.validate("build", { tags: ["-bad"] }).valid).toBe(false);
    });

    it("rejects non-string build args", () => {
      expect(registry.validate("build", { tags: ["latest"], args: { PYTHON: 3 } }).valid).toBe(false);
    });
  });

  describe("build-state schema", () => {
    it("accepts a never-built document", () => {
      expect(registry.validate("build-state", { name: "base", version: 0, current: null, reservation: null }).valid).toBe(true);
    });

    it("rejects a reservation without a token", () => {
      const doc = { name: "base", version: 0, current: null, reservation: { owner: "x", expiresAt: "2026-03-01T00:00:00Z" } };
      const { valid, errors } = registry.validate("build-state", doc);
      expect(valid).toBe(false);
      expect(errors).toContain("token");
    });
  });
});
