import path from "node:path";
import type { Manifest, Platform } from "../types/manifest.js";
import { platformSlug } from "../types/manifest.js";
import type { AttemptOverall, BuildAttempt, BuiltImage, PlatformResult } from "../types/attempt.js";
import type { ResolvedSource } from "../git/source-resolver.js";
import { TimeoutError, errorMessage, isLibraryError, type ErrorKind } from "../core/errors.js";
import { RetriesExhaustedError, withRetry } from "../core/retry.js";
import { silentLog, type EventLog } from "../log/progress-log.js";
import { stagingReference } from "../publish/references.js";
import type { BuilderIdentity, ImageBuilder } from "./docker-builder.js";
import type { TestRunner } from "./test-runner.js";

export type CoordinatorOptions = {
  registry: string;
  stagingNamespace: string;
  /** Total attempts per stage when the failure is transient. */
  buildAttempts: number;
  backoffMs: number;
  /** Wall-clock budget for the whole attempt. */
  timeoutMs: number;
};

export type BuildContext = {
  attemptId: string;
  source: ResolvedSource;
  /** Checked-out tree of `source.commit`. */
  sourceDir: string;
};

/** Where build logs and test output go; returns the artifact-relative path. */
export interface LogSink {
  writeText(relativePath: string, content: string): string;
}

type PlatformOutcome = {
  result: Omit<PlatformResult, "logRef" | "testOutputRef">;
  buildLog: string | null;
  testOutput: string | null;
};

function isTransient(e: unknown): boolean {
  return isLibraryError(e) && e.kind === "TransientInfraError";
}

function logOf(e: unknown): string | null {
  const inner = e instanceof RetriesExhaustedError ? e.last : e;
  if (!isLibraryError(inner)) return null;
  return typeof inner.details.log === "string" ? inner.details.log : null;
}

/** Exhausted transient retries become a build failure for the platform. */
function failureOf(e: unknown): { kind: ErrorKind; message: string } {
  if (e instanceof RetriesExhaustedError) {
    return {
      kind: "BuildFailure",
      message: `${errorMessage(e.last)} (transient failure persisted after ${e.attempts} attempts)`,
    };
  }
  return { kind: isLibraryError(e) ? e.kind : "BuildFailure", message: errorMessage(e) };
}

/** success: every requested platform built (and tested); partial: some; failed: none. */
export function computeOverall(requested: readonly Platform[], results: readonly PlatformResult[]): AttemptOverall {
  const succeeded = new Set(results.filter((r) => r.status === "success").map((r) => r.platform));
  const count = requested.filter((p) => succeeded.has(p)).length;
  if (requested.length > 0 && count === requested.length) return "success";
  return count > 0 ? "partial" : "failed";
}

/**
 * Builds and tests each platform independently and in
 * parallel, then aggregates. Only TransientInfraError is retried; build-logic
 * failures and failing tests end the platform immediately.
 */
export class BuildCoordinator {
  constructor(
    private readonly builder: ImageBuilder,
    private readonly tests: TestRunner,
    private readonly opts: CoordinatorOptions,
    private readonly sink: LogSink | null = null,
    private readonly log: EventLog = silentLog,
  ) {}

  async build(manifest: Manifest, platforms: readonly Platform[], ctx: BuildContext): Promise<BuildAttempt> {
    const requested = [...new Set(platforms)];
    const startedAt = new Date();
    const builder = await this.identity(manifest);

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new TimeoutError(`Build attempt exceeded ${this.opts.timeoutMs}ms`, { attemptId: ctx.attemptId }));
    }, this.opts.timeoutMs);

    let settled: PromiseSettledResult<PlatformOutcome>[];
    try {
      settled = await Promise.allSettled(requested.map((p) => this.runPlatform(manifest, p, ctx, controller.signal)));
    } finally {
      clearTimeout(timer);
    }

    const base = {
      id: ctx.attemptId,
      manifest: manifest.name,
      source: { repo: ctx.source.repo, ref: ctx.source.ref, commit: ctx.source.commit },
      builder: { backend: manifest.build.builder, ...builder },
      platforms: requested,
      startedAt: startedAt.toISOString(),
    };

    if (controller.signal.aborted) {
      const elapsed = Date.now() - startedAt.getTime();
      this.log.error(`build attempt ${ctx.attemptId} timed out after ${elapsed}ms; discarding platform results`);
      const results: PlatformResult[] = requested.map((platform, i) => {
        const outcome = settled[i];
        return {
          platform,
          status: "failed",
          failedStage: "build",
          image: null,
          logRef: null,
          testOutputRef: null,
          attempts: outcome.status === "fulfilled" ? outcome.value.result.attempts : 0,
          durationMs: elapsed,
          error: { kind: "Timeout", message: `Build attempt exceeded ${this.opts.timeoutMs}ms` },
        };
      });
      return { ...base, results, overall: "failed", cause: "Timeout", finishedAt: new Date().toISOString() };
    }

    const results: PlatformResult[] = [];
    for (const [i, platform] of requested.entries()) {
      const outcome = settled[i];
      if (outcome.status === "rejected") {
        results.push({
          platform,
          status: "failed",
          failedStage: "build",
          image: null,
          logRef: null,
          testOutputRef: null,
          attempts: 0,
          durationMs: Date.now() - startedAt.getTime(),
          error: failureOf(outcome.reason),
        });
        continue;
      }
      const { result, buildLog, testOutput } = outcome.value;
      const slug = platformSlug(platform);
      results.push({
        ...result,
        logRef: this.persist(`logs/${slug}.build.log`, buildLog),
        testOutputRef: this.persist(`logs/${slug}.test.log`, testOutput),
      });
    }

    const overall = computeOverall(requested, results);
    this.log.info(`build attempt ${ctx.attemptId} finished: ${overall}`);
    return { ...base, results, overall, cause: null, finishedAt: new Date().toISOString() };
  }

  private async identity(manifest: Manifest): Promise<BuilderIdentity> {
    try {
      return await this.builder.identity(manifest.build.builder);
    } catch (e) {
      this.log.warn(`cannot determine builder version: ${errorMessage(e)}`);
      return { name: manifest.build.builder, version: "unknown" };
    }
  }

  private persist(relativePath: string, content: string | null): string | null {
    if (content === null || !this.sink) return null;
    return this.sink.writeText(relativePath, content);
  }

  private async runPlatform(manifest: Manifest, platform: Platform, ctx: BuildContext, signal: AbortSignal): Promise<PlatformOutcome> {
    const started = Date.now();
    const { build } = manifest;
    const retry = {
      attempts: this.opts.buildAttempts,
      backoffMs: this.opts.backoffMs,
      isRetryable: isTransient,
      signal,
      onRetry: (attempt: number, e: unknown, delayMs: number) =>
        this.log.warn(`${platform}: transient failure on attempt ${attempt}, retrying in ${Math.round(delayMs)}ms: ${errorMessage(e)}`),
    };

    const failed = (stage: "build" | "test", attempts: number, e: unknown, image: BuiltImage | null) => ({
      platform,
      status: "failed" as const,
      failedStage: stage,
      image,
      attempts,
      durationMs: Date.now() - started,
      error: failureOf(e),
    });

    this.log.info(`${platform}: building with ${build.builder}`);
    let attempts = 0;
    let image: BuiltImage;
    let buildLog: string;
    try {
      const out = await withRetry(async (n) => {
        attempts = n;
        return this.builder.build(
          {
            manifest: manifest.name,
            platform,
            backend: build.builder,
            sourceDir: ctx.sourceDir,
            dockerfile: path.posix.join(build.path, build.dockerfile),
            context: path.posix.join(build.path, build.context),
            args: build.args,
            labels: build.labels,
            annotations: build.annotations,
            target: build.target,
            reference: stagingReference(this.opts.registry, this.opts.stagingNamespace, manifest.name, ctx.source.commit, platform),
          },
          signal,
        );
      }, retry);
      image = out.value.image;
      buildLog = out.value.log;
      attempts = out.attempts;
    } catch (e) {
      if (signal.aborted) throw e;
      this.log.error(`${platform}: build failed: ${errorMessage(e)}`);
      return { result: failed("build", attempts, e, null), buildLog: logOf(e), testOutput: null };
    }

    if (!build.test) {
      this.log.info(`${platform}: built ${image.digest}`);
      return {
        result: { platform, status: "success", failedStage: null, image, attempts, durationMs: Date.now() - started, error: null },
        buildLog,
        testOutput: null,
      };
    }

    const command = build.test;
    try {
      const { value: test } = await withRetry(() => this.tests.run(image, platform, command, signal), retry);
      if (test.exitCode !== 0) {
        this.log.error(`${platform}: test command exited with ${test.exitCode}`);
        return {
          result: {
            platform,
            status: "failed",
            failedStage: "test",
            image,
            attempts,
            durationMs: Date.now() - started,
            error: { kind: "BuildFailure", message: `Test command exited with code ${test.exitCode}` },
          },
          buildLog,
          testOutput: test.output,
        };
      }
      this.log.info(`${platform}: built and tested ${image.digest}`);
      return {
        result: { platform, status: "success", failedStage: null, image, attempts, durationMs: Date.now() - started, error: null },
        buildLog,
        testOutput: test.output,
      };
    } catch (e) {
      if (signal.aborted) throw e;
      this.log.error(`${platform}: test could not run: ${errorMessage(e)}`);
      return { result: failed("test", attempts, e, image), buildLog, testOutput: logOf(e) };
    }
  }
}
