import { describe, expect, it, vi } from "vitest";
import { ChangeDetector, buildScope, diffTrees, inScope, renderDiffMarkdown } from "../src/detect/change-detector.js";
import { SourceUnavailableError } from "../src/core/errors.js";
import { BASE_MANIFEST_YAML, COMMIT_A, COMMIT_B, FakeResolver, REPO, loadManifest, priorState } from "./fakes.js";

function transient(): SourceUnavailableError {
  return new SourceUnavailableError("Cannot resolve v0.1.0: Could not resolve host", { repo: REPO, ref: "v0.1.0", retryable: true });
}

describe("buildScope", () => {
  it("covers the whole repository for the default layout", async () => {
    const manifest = await loadManifest();
    expect(buildScope(manifest)).toEqual({ dockerfile: "Dockerfile", context: ".", patterns: ["**"] });
  });

  it("adds the Dockerfile when it lies outside the context", async () => {
    const manifest = await loadManifest(BASE_MANIFEST_YAML.replace("  tags:", "  path: docker\n  context: ../src\n  tags:"));
    const scope = buildScope(manifest);
    expect(scope).toEqual({ dockerfile: "docker/Dockerfile", context: "src", patterns: ["src/**", "docker/Dockerfile"] });
    expect(inScope("src/app/main.py", scope)).toBe(true);
    expect(inScope("docker/Dockerfile", scope)).toBe(true);
    expect(inScope("docker/README.md", scope)).toBe(false);
  });

  it("clamps a context above the repository root", async () => {
    const manifest = await loadManifest(BASE_MANIFEST_YAML.replace("  tags:", "  context: ../..\n  tags:"));
    expect(buildScope(manifest).context).toBe(".");
  });
});

describe("diffTrees", () => {
  const scope = { dockerfile: "img/Dockerfile", context: "img", patterns: ["img/**"] };

  it("classifies files inside the scope only", () => {
    const before = new Map([
      ["img/Dockerfile", "1"],
      ["img/app.py", "2"],
      ["img/old.txt", "3"],
      ["docs/guide.md", "4"],
    ]);
    const after = new Map([
      ["img/Dockerfile", "1"],
      ["img/app.py", "22"],
      ["img/new.txt", "5"],
      ["docs/guide.md", "44"],
    ]);
    expect(diffTrees(before, after, scope)).toEqual({ added: ["img/new.txt"], removed: ["img/old.txt"], modified: ["img/app.py"] });
  });

  it("treats every file as added without a previous tree", () => {
    const after = new Map([
      ["img/b.txt", "1"],
      ["img/a.txt", "2"],
    ]);
    expect(diffTrees(null, after, scope)).toEqual({ added: ["img/a.txt", "img/b.txt"], removed: [], modified: [] });
  });
});

describe("ChangeDetector.needsBuild", () => {
  const opts = { attempts: 3, backoffMs: 0 };

  it("requires a first build and lists every file as added", async () => {
    const resolver = new FakeResolver({ "v0.1.0": COMMIT_A }, { [COMMIT_A]: { Dockerfile: "1", "README.md": "2" } });
    const res = await new ChangeDetector(resolver, opts).needsBuild(await loadManifest(), null);

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.decision.required).toBe(true);
    expect(res.decision.reason).toBe("first-build");
    expect(res.decision.source).toEqual({ repo: REPO, ref: "v0.1.0", commit: COMMIT_A });
    expect(res.decision.diff).toMatchObject({
      fromCommit: null,
      toCommit: COMMIT_A,
      added: ["Dockerfile", "README.md"],
      removed: [],
      modified: [],
      patch: null,
      note: null,
    });
  });

  it("skips when the tag moved but resolves to the published commit", async () => {
    const resolver = new FakeResolver({ "v0.1.0": COMMIT_A });
    const listFiles = vi.spyOn(resolver, "listFiles");
    const res = await new ChangeDetector(resolver, opts).needsBuild(await loadManifest(), priorState({ lastTag: "v0.0.9" }));

    expect(res).toEqual({
      ok: true,
      decision: { required: false, reason: "up-to-date", source: { repo: REPO, ref: "v0.1.0", commit: COMMIT_A }, diff: null },
    });
    expect(listFiles).not.toHaveBeenCalled();
  });

  it("requires a build when the commit changed and reports the diff", async () => {
    const resolver = new FakeResolver(
      { "v0.1.0": COMMIT_B },
      {
        [COMMIT_A]: { Dockerfile: "1", "app.py": "2", "old.txt": "3" },
        [COMMIT_B]: { Dockerfile: "1", "app.py": "22", "new.txt": "4" },
      },
    );
    const res = await new ChangeDetector(resolver, opts).needsBuild(await loadManifest(), priorState());

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.decision.reason).toBe("commit-changed");
    expect(res.decision.diff).toMatchObject({
      fromCommit: COMMIT_A,
      toCommit: COMMIT_B,
      added: ["new.txt"],
      modified: ["app.py"],
      removed: ["old.txt"],
      patch: "diff aaaaaaa..bbbbbbb -- .\n",
      note: null,
    });
  });

  it("keeps the decision when the previous tree is gone", async () => {
    const resolver = new FakeResolver({ "v0.1.0": COMMIT_B }, { [COMMIT_B]: { Dockerfile: "1" } });
    const res = await new ChangeDetector(resolver, opts).needsBuild(await loadManifest(), priorState());

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.decision.required).toBe(true);
    expect(res.decision.diff?.added).toEqual(["Dockerfile"]);
    expect(res.decision.diff?.note).toBe(`previous commit ${COMMIT_A} unavailable: No tree for ${COMMIT_A}`);
  });

  it("retries transient resolution failures", async () => {
    const resolver = new FakeResolver({ "v0.1.0": COMMIT_A }, { [COMMIT_A]: {} });
    resolver.resolveFailures.push(transient(), transient());
    const onRetry = vi.fn();

    const res = await new ChangeDetector(resolver, { ...opts, onRetry }).needsBuild(await loadManifest(), null);
    expect(res.ok).toBe(true);
    expect(resolver.resolveCalls).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it("reports SourceUnavailable once retries are exhausted", async () => {
    const resolver = new FakeResolver({ "v0.1.0": COMMIT_A });
    resolver.resolveFailures.push(transient(), transient(), transient());

    const res = await new ChangeDetector(resolver, opts).needsBuild(await loadManifest(), null);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.kind).toBe("SourceUnavailable");
    expect(res.error.retryable).toBe(false);
    expect(res.error.message).toBe("Cannot resolve v0.1.0: Could not resolve host (after 3 attempts)");
    expect(resolver.resolveCalls).toBe(3);
  });

  it("does not retry an unknown ref", async () => {
    const resolver = new FakeResolver({});
    const res = await new ChangeDetector(resolver, opts).needsBuild(await loadManifest(), null);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.message).toBe(`Cannot resolve v0.1.0 in ${REPO}: unknown revision`);
    expect(resolver.resolveCalls).toBe(1);
  });
});

describe("renderDiffMarkdown", () => {
  it("lists changed files and the patch", () => {
    const md = renderDiffMarkdown({
      manifest: "base",
      scope: { dockerfile: "Dockerfile", context: ".", patterns: ["**"] },
      fromCommit: COMMIT_A,
      toCommit: COMMIT_B,
      added: ["new.txt"],
      removed: [],
      modified: [],
      patch: "+hello\n",
      note: null,
    });
    expect(md.split("\n")).toEqual([
      "# Build definition changes: base",
      "",
      `- From: ${COMMIT_A}`,
      `- To: ${COMMIT_B}`,
      "- Dockerfile: `Dockerfile`",
      "- Context: `.`",
      "",
      "## Added (1)",
      "",
      "- `new.txt`",
      "",
      "## Patch",
      "",
      "```diff",
      "+hello",
      "```",
      "",
    ]);
  });
});
