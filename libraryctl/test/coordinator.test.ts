import { describe, expect, it } from "vitest";
import { BuildCoordinator, computeOverall, type BuildContext, type CoordinatorOptions, type LogSink } from "../src/build/coordinator.js";
import type { PlatformResult } from "../src/types/attempt.js";
import { BASE_MANIFEST_YAML, COMMIT_A, FakeBuilder, FakeTests, REPO, fakeDigest, loadManifest } from "./fakes.js";

class MemorySink implements LogSink {
  readonly files = new Map<string, string>();

  writeText(relativePath: string, content: string): string {
    this.files.set(relativePath, content);
    return relativePath;
  }
}

const OPTIONS: CoordinatorOptions = {
  registry: "images.canfar.net",
  stagingNamespace: "staging",
  buildAttempts: 3,
  backoffMs: 0,
  timeoutMs: 10_000,
};

const CTX: BuildContext = {
  attemptId: "base-v0.1.0-20260301-001",
  source: { repo: REPO, ref: "v0.1.0", commit: COMMIT_A },
  sourceDir: "/tmp/checkout",
};

const AMD64_REF = "images.canfar.net/staging/base:aaaaaaaaaaaa-linux-amd64";
const ARM64_REF = "images.canfar.net/staging/base:aaaaaaaaaaaa-linux-arm64";

function result(results: PlatformResult[], platform: string): PlatformResult {
  const found = results.find((r) => r.platform === platform);
  if (!found) throw new Error(`no result for ${platform}`);
  return found;
}

describe("BuildCoordinator", () => {
  it("builds and tests every platform", async () => {
    const builder = new FakeBuilder();
    const tests = new FakeTests();
    const sink = new MemorySink();
    const manifest = await loadManifest();

    const attempt = await new BuildCoordinator(builder, tests, OPTIONS, sink).build(manifest, manifest.build.platforms, CTX);

    expect(attempt.overall).toBe("success");
    expect(attempt.cause).toBeNull();
    expect(attempt.id).toBe(CTX.attemptId);
    expect(attempt.source).toEqual({ repo: REPO, ref: "v0.1.0", commit: COMMIT_A });
    expect(attempt.builder).toEqual({ backend: "buildkit", name: "buildx", version: "0.0.0-test" });
    expect(attempt.results.map((r) => r.platform)).toEqual(["linux/amd64", "linux/arm64"]);

    const amd64 = result(attempt.results, "linux/amd64");
    expect(amd64).toMatchObject({
      status: "success",
      failedStage: null,
      image: { reference: AMD64_REF, digest: fakeDigest(AMD64_REF) },
      logRef: "logs/linux-amd64.build.log",
      testOutputRef: "logs/linux-amd64.test.log",
      attempts: 1,
      error: null,
    });
    expect(sink.files.get("logs/linux-amd64.build.log")).toBe("built linux/amd64");
    expect(sink.files.get("logs/linux-arm64.test.log")).toBe("uv 0.4.0");

    expect(builder.calls[0]).toMatchObject({
      manifest: "base",
      backend: "buildkit",
      sourceDir: "/tmp/checkout",
      dockerfile: "Dockerfile",
      context: ".",
      args: null,
      target: null,
    });
    expect(tests.calls.map((c) => [c.platform, c.command, c.image.reference])).toEqual([
      ["linux/amd64", "uv --version", AMD64_REF],
      ["linux/arm64", "uv --version", ARM64_REF],
    ]);
  });

  it("reports partial when one platform fails to build", async () => {
    const builder = new FakeBuilder({ "linux/arm64": "fail" });
    const sink = new MemorySink();
    const manifest = await loadManifest();

    const attempt = await new BuildCoordinator(builder, new FakeTests(), OPTIONS, sink).build(manifest, manifest.build.platforms, CTX);

    expect(attempt.overall).toBe("partial");
    expect(result(attempt.results, "linux/amd64").status).toBe("success");
    expect(result(attempt.results, "linux/arm64")).toMatchObject({
      status: "failed",
      failedStage: "build",
      image: null,
      logRef: "logs/linux-arm64.build.log",
      testOutputRef: null,
      attempts: 1,
      error: { kind: "BuildFailure", message: "RUN step failed for linux/arm64" },
    });
    expect(sink.files.get("logs/linux-arm64.build.log")).toBe("error: compile failed on linux/arm64");
    expect(builder.attemptsFor("linux/arm64")).toBe(1);
  });

  it("reports failed when no platform builds", async () => {
    const builder = new FakeBuilder({ "linux/amd64": "fail", "linux/arm64": "fail" });
    const manifest = await loadManifest();
    const attempt = await new BuildCoordinator(builder, new FakeTests(), OPTIONS).build(manifest, manifest.build.platforms, CTX);
    expect(attempt.overall).toBe("failed");
  });

  it("fails a platform whose test command exits non-zero", async () => {
    const sink = new MemorySink();
    const manifest = await loadManifest();
    const tests = new FakeTests({ "linux/arm64": 127 });

    const attempt = await new BuildCoordinator(new FakeBuilder(), tests, OPTIONS, sink).build(manifest, manifest.build.platforms, CTX);

    expect(attempt.overall).toBe("partial");
    expect(result(attempt.results, "linux/arm64")).toMatchObject({
      status: "failed",
      failedStage: "test",
      image: { reference: ARM64_REF, digest: fakeDigest(ARM64_REF) },
      testOutputRef: "logs/linux-arm64.test.log",
      error: { kind: "BuildFailure", message: "Test command exited with code 127" },
    });
    expect(sink.files.get("logs/linux-arm64.test.log")).toBe("uv: command not found");
  });

  it("skips testing when the manifest has no test command", async () => {
    const tests = new FakeTests();
    const manifest = await loadManifest(BASE_MANIFEST_YAML.replace("  test: uv --version\n", ""));

    const attempt = await new BuildCoordinator(new FakeBuilder(), tests, OPTIONS, new MemorySink()).build(manifest, manifest.build.platforms, CTX);

    expect(attempt.overall).toBe("success");
    expect(tests.calls).toEqual([]);
    expect(attempt.results.map((r) => r.testOutputRef)).toEqual([null, null]);
  });

  it("retries transient build failures", async () => {
    const builder = new FakeBuilder({ "linux/amd64": { transient: 2 } });
    const manifest = await loadManifest();

    const attempt = await new BuildCoordinator(builder, new FakeTests(), OPTIONS).build(manifest, manifest.build.platforms, CTX);

    expect(attempt.overall).toBe("success");
    expect(result(attempt.results, "linux/amd64").attempts).toBe(3);
    expect(builder.attemptsFor("linux/amd64")).toBe(3);
    expect(builder.attemptsFor("linux/arm64")).toBe(1);
  });

  it("turns persistent transient failures into a build failure", async () => {
    const builder = new FakeBuilder({ "linux/amd64": "always-transient" });
    const sink = new MemorySink();
    const manifest = await loadManifest();

    const attempt = await new BuildCoordinator(builder, new FakeTests(), { ...OPTIONS, buildAttempts: 2 }, sink).build(
      manifest,
      ["linux/amd64"],
      CTX,
    );

    expect(attempt.overall).toBe("failed");
    expect(attempt.results[0]).toMatchObject({
      failedStage: "build",
      attempts: 2,
      error: {
        kind: "BuildFailure",
        message: "registry push failed: 503 Service Unavailable (transient failure persisted after 2 attempts)",
      },
      logRef: "logs/linux-amd64.build.log",
    });
    expect(sink.files.get("logs/linux-amd64.build.log")).toBe("push: 503");
    expect(builder.attemptsFor("linux/amd64")).toBe(2);
  });

  it("retries a test run the daemon could not start", async () => {
    const tests = new FakeTests({}, { "linux/amd64": 1 });
    const manifest = await loadManifest();

    const attempt = await new BuildCoordinator(new FakeBuilder(), tests, OPTIONS).build(manifest, ["linux/amd64"], CTX);

    expect(attempt.overall).toBe("success");
    expect(tests.calls).toHaveLength(2);
  });

  it("discards every result when the attempt times out", async () => {
    const builder = new FakeBuilder({ "linux/arm64": "hang" });
    const sink = new MemorySink();
    const manifest = await loadManifest();

    const attempt = await new BuildCoordinator(builder, new FakeTests(), { ...OPTIONS, timeoutMs: 50 }, sink).build(
      manifest,
      manifest.build.platforms,
      CTX,
    );

    expect(attempt.overall).toBe("failed");
    expect(attempt.cause).toBe("Timeout");
    for (const r of attempt.results) {
      expect(r).toMatchObject({
        status: "failed",
        failedStage: "build",
        image: null,
        logRef: null,
        error: { kind: "Timeout", message: "Build attempt exceeded 50ms" },
      });
    }
    expect(sink.files.size).toBe(0);
  });

  it("builds each requested platform once", async () => {
    const builder = new FakeBuilder();
    const manifest = await loadManifest();

    const attempt = await new BuildCoordinator(builder, new FakeTests(), OPTIONS).build(manifest, ["linux/amd64", "linux/amd64"], CTX);

    expect(attempt.platforms).toEqual(["linux/amd64"]);
    expect(attempt.results).toHaveLength(1);
    expect(builder.calls).toHaveLength(1);
  });
});

describe("computeOverall", () => {
  const ok = (platform: "linux/amd64" | "linux/arm64"): PlatformResult => ({
    platform,
    status: "success",
    failedStage: null,
    image: { reference: "r", digest: "d" },
    logRef: null,
    testOutputRef: null,
    attempts: 1,
    durationMs: 1,
    error: null,
  });

  it("is success only when every requested platform succeeded", () => {
    expect(computeOverall(["linux/amd64", "linux/arm64"], [ok("linux/amd64"), ok("linux/arm64")])).toBe("success");
    expect(computeOverall(["linux/amd64", "linux/arm64"], [ok("linux/amd64")])).toBe("partial");
    expect(computeOverall(["linux/arm64"], [ok("linux/amd64")])).toBe("failed");
    expect(computeOverall([], [])).toBe("failed");
  });
});
