import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { LibraryConfig } from "../types/config.js";
import type { Manifest, Platform } from "../types/manifest.js";
import type { BuildAttempt } from "../types/attempt.js";
import type { ProvenanceRecord } from "../types/provenance.js";
import type { RunState } from "../types/run.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { SourceResolver } from "../git/source-resolver.js";
import type { BuildStateStore } from "../state/build-state-store.js";
import type { ImageBuilder } from "../build/docker-builder.js";
import type { TestRunner } from "../build/test-runner.js";
import type { ImageRegistry } from "../publish/registry.js";
import type { Signer } from "../publish/cosign-signer.js";
import { ManifestStore, serializeManifest } from "../manifest/store.js";
import { ChangeDetector, renderDiffMarkdown, type ChangeReason } from "../detect/change-detector.js";
import { BuildCoordinator } from "../build/coordinator.js";
import { ProvenancePublisher } from "../publish/publisher.js";
import { ArtifactWriter } from "../artifact-writer/writer.js";
import { ProgressLog } from "../log/progress-log.js";
import { SchemaError, errorMessage, isLibraryError, type ErrorKind, type FieldIssue } from "./errors.js";
import { withFsLock } from "./fs-lock.js";
import { safePath } from "./security.js";
import { checkConcurrency } from "./concurrency.js";
import { generateRunId } from "./run-id.js";
import {
  type PipelineStage,
  type PipelineStatus,
  type TransitionEvent,
  failedStage,
  isStage,
  isSuccessful,
  nextState,
} from "./state-machine.js";

/** A manifest change event: the new manifest document and where it came from. */
export type ManifestChange = {
  /** YAML text or an already-parsed document. */
  document: unknown;
  source?: string;
  /** The rest of the library, for identifier uniqueness. */
  known?: Manifest[];
};

export type RunOptions = {
  /** Stop after change detection. */
  dryRun?: boolean;
};

export type OutcomeError = {
  kind: ErrorKind | "Internal";
  message: string;
  platform?: Platform;
  logRef?: string;
  issues?: FieldIssue[];
};

export type OutcomeReport = {
  runId: string;
  manifest: string;
  status: PipelineStatus;
  success: boolean;
  action: "published" | "noop" | "dry-run" | null;
  failedStage: PipelineStage | null;
  error: OutcomeError | null;
  decision: { required: boolean; reason: ChangeReason; ref: string; commit: string } | null;
  attempt: BuildAttempt | null;
  provenance: ProvenanceRecord | null;
  published: string[];
  runDir: string;
  startedAt: string;
  finishedAt: string;
};

export type OrchestratorDeps = {
  /** Configuration with absolute directories. */
  config: LibraryConfig;
  schemas: SchemaRegistry;
  resolver: SourceResolver;
  stateStore: BuildStateStore;
  builder: ImageBuilder;
  tests: TestRunner;
  registry: ImageRegistry;
  signer: Signer;
  /** Reservation owner recorded in BuildState; defaults to `libraryctl@<pid>`. */
  owner?: string;
  /** Second destination for progress lines (stderr in the CLI). */
  mirror?: (line: string) => void;
};

type RunContext = {
  runId: string;
  runDir: string;
  state: RunState;
  writer: ArtifactWriter;
  log: ProgressLog;
  report: Omit<OutcomeReport, "status" | "success" | "failedStage" | "error" | "finishedAt" | "runDir" | "runId">;
};

/** Manifest name and pinned ref, read before validation so the run can be named. */
export function peekIdentity(document: unknown, source?: string): { name: string; ref: string } {
  let parsed: unknown = document;
  if (typeof document === "string") {
    try {
      parsed = YAML.parse(document);
    } catch {
      parsed = null;
    }
  }

  const fallback = source ? path.basename(source).replace(/\.ya?ml$/, "") : "manifest";
  if (typeof parsed !== "object" || parsed === null) return { name: fallback, ref: "unknown" };

  const name: unknown = Reflect.get(parsed, "name");
  const git: unknown = Reflect.get(parsed, "git");
  let ref: unknown = null;
  if (typeof git === "object" && git !== null) {
    ref = Reflect.get(git, "tag") ?? Reflect.get(git, "sha");
  }
  return {
    name: typeof name === "string" && name.length > 0 ? name : fallback,
    ref: typeof ref === "string" && ref.length > 0 ? ref : "unknown",
  };
}

export function toOutcomeError(e: unknown): OutcomeError {
  if (e instanceof SchemaError) return { kind: e.kind, message: e.message, issues: e.issues };
  if (isLibraryError(e)) return { kind: e.kind, message: e.message };
  return { kind: "Internal", message: errorMessage(e) };
}

function buildError(attempt: BuildAttempt): OutcomeError {
  if (attempt.cause === "Timeout") {
    return { kind: "Timeout", message: `Build attempt ${attempt.id} timed out; all platform results discarded` };
  }
  const failed = attempt.results.find((r) => r.status === "failed");
  if (!failed) return { kind: "BuildFailure", message: `Build attempt ${attempt.id} is ${attempt.overall}` };
  return {
    kind: failed.error?.kind ?? "BuildFailure",
    message: `Build ${attempt.overall}: ${failed.platform} ${failed.failedStage ?? "build"} failed: ${failed.error?.message ?? "unknown error"}`,
    platform: failed.platform,
    ...(failed.logRef ? { logRef: failed.logRef } : failed.testOutputRef ? { logRef: failed.testOutputRef } : {}),
  };
}

/**
 * Drives one manifest change through load → detect → build →
 * publish, persisting `state.json` after every transition and stopping at the
 * first failing stage. Every run ends with exactly one OutcomeReport.
 */
export class Orchestrator {
  private readonly manifests: ManifestStore;

  constructor(private readonly deps: OrchestratorDeps) {
    this.manifests = new ManifestStore(deps.schemas);
  }

  async run(change: ManifestChange, opts: RunOptions = {}): Promise<OutcomeReport> {
    const ctx = await this.begin(change, opts);
    if (ctx.state.status === "failed_load") {
      return this.finish(ctx, {
        kind: "ConcurrentUpdateConflict",
        message: `Another run of ${ctx.state.manifest} is in progress`,
      });
    }

    try {
      // load
      ctx.log.info(`loading manifest${change.source ? ` from ${change.source}` : ""}`);
      const loaded = this.manifests.load(change.document, { known: change.known, source: change.source });
      if (!loaded.ok) return this.fail(ctx, "failure", toOutcomeError(loaded.error));
      const manifest = loaded.manifest;
      ctx.writer.writeText("manifest.yaml", serializeManifest(manifest));
      this.advance(ctx, "success");

      // detect
      const prior = await this.deps.stateStore.read(manifest.name);
      const detector = new ChangeDetector(this.deps.resolver, {
        attempts: this.deps.config.retry.source_attempts,
        backoffMs: this.deps.config.retry.backoff_ms,
        onRetry: (attempt, e) => ctx.log.warn(`source resolution attempt ${attempt} failed, retrying: ${errorMessage(e)}`),
      });
      const detected = await detector.needsBuild(manifest, prior);
      if (!detected.ok) return this.fail(ctx, "failure", toOutcomeError(detected.error));
      const { decision } = detected;
      ctx.report.decision = {
        required: decision.required,
        reason: decision.reason,
        ref: decision.source.ref,
        commit: decision.source.commit,
      };
      if (decision.diff) {
        ctx.writer.writeJson("diff.json", decision.diff);
        ctx.writer.writeText("diff.md", renderDiffMarkdown(decision.diff));
      }
      ctx.log.info(`change detection: ${decision.reason} (${decision.source.ref} → ${decision.source.commit})`);

      if (!decision.required && prior && prior.lastTag !== decision.source.ref) {
        ctx.log.info(`${decision.source.ref} resolves to the commit published from ${prior.lastTag}; BuildState keeps ${prior.lastTag}`);
      }

      if (!decision.required || opts.dryRun) {
        ctx.report.action = decision.required ? "dry-run" : "noop";
        this.advance(ctx, "skip");
        return this.finish(ctx, null);
      }
      this.advance(ctx, "success");

      // build
      const attempt = await this.build(ctx, manifest, decision.source);
      ctx.report.attempt = attempt;
      ctx.writer.writeJson("attempt.json", attempt);
      if (attempt.overall !== "success") {
        return this.fail(ctx, attempt.cause === "Timeout" ? "timeout" : "failure", buildError(attempt));
      }
      this.advance(ctx, "success");

      // publish
      const publisher = new ProvenancePublisher(
        this.deps.registry,
        this.deps.signer,
        this.deps.stateStore,
        this.deps.schemas,
        {
          registry: this.deps.config.registry,
          namespace: this.deps.config.namespace,
          owner: this.deps.owner ?? `libraryctl@${process.pid}`,
        },
        ctx.log,
      );
      const published = await publisher.publish(manifest, attempt, prior);
      if (!published.ok) return this.fail(ctx, "failure", toOutcomeError(published.error));

      ctx.writer.writeJson("provenance.json", published.record, `provenance@${this.deps.schemas.get("provenance")?.version ?? "1.0.0"}`);
      ctx.report.provenance = published.record;
      ctx.report.published = [...published.record.published];
      ctx.report.action = "published";
      this.advance(ctx, "success");
      return this.finish(ctx, null);
    } catch (e) {
      ctx.log.error(`unexpected error in ${ctx.state.status}: ${errorMessage(e)}`);
      return this.fail(ctx, "failure", toOutcomeError(e));
    }
  }

  /** Claim a run directory, refusing (as `failed_load`) while another run of the manifest is active. */
  private async begin(change: ManifestChange, opts: RunOptions): Promise<RunContext> {
    const { config } = this.deps;
    const identity = peekIdentity(change.document, change.source);
    fs.mkdirSync(config.artifacts_dir, { recursive: true });

    return withFsLock<RunContext>(path.join(config.artifacts_dir, ".runs.lock"), 10000, async () => {
      const warnings: string[] = [];
      const check = checkConcurrency(config.artifacts_dir, identity.name, config.stale_run_seconds * 1000, (m) => warnings.push(m));
      const runId = generateRunId(identity.name, identity.ref, config.artifacts_dir);
      const runDir = safePath(config.artifacts_dir, runId);

      const writer = new ArtifactWriter(runDir);
      writer.init();
      const log = new ProgressLog(path.join(runDir, "progress.log"), { runId, manifest: identity.name }, this.deps.mirror);
      writer.track("progress.log");
      writer.track("state.json");

      const now = new Date().toISOString();
      const state: RunState = {
        run_id: runId,
        manifest: identity.name,
        manifest_path: change.source ?? null,
        status: check.allowed ? "load" : "failed_load",
        dry_run: opts.dryRun === true,
        created_at: now,
        updated_at: now,
        pid: process.pid,
      };
      this.saveState(runDir, state);

      for (const w of warnings) log.warn(w);
      if (!check.allowed) log.error(check.reason ?? "concurrent run refused");
      else log.info(`run started${opts.dryRun ? " (dry run)" : ""}`);

      return {
        runId,
        runDir,
        state,
        writer,
        log,
        report: {
          manifest: identity.name,
          action: null,
          decision: null,
          attempt: null,
          provenance: null,
          published: [],
          startedAt: now,
        },
      };
    });
  }

  private async build(ctx: RunContext, manifest: Manifest, source: { repo: string; ref: string; commit: string }): Promise<BuildAttempt> {
    const { config } = this.deps;
    const checkout = path.join(config.cache_dir, "checkouts", ctx.runId);
    try {
      ctx.log.info(`checking out ${source.commit}`);
      const sourceDir = await this.deps.resolver.checkout(source, checkout);
      const coordinator = new BuildCoordinator(
        this.deps.builder,
        this.deps.tests,
        {
          registry: config.registry,
          stagingNamespace: config.staging_namespace,
          buildAttempts: config.retry.build_attempts,
          backoffMs: config.retry.backoff_ms,
          timeoutMs: config.timeouts.build_seconds * 1000,
        },
        ctx.writer,
        ctx.log,
      );
      return await coordinator.build(manifest, manifest.build.platforms, { attemptId: ctx.runId, source, sourceDir });
    } finally {
      fs.rmSync(checkout, { recursive: true, force: true });
    }
  }

  private advance(ctx: RunContext, event: TransitionEvent): void {
    const from = ctx.state.status;
    ctx.state.status = nextState(from, event);
    ctx.state.updated_at = new Date().toISOString();
    this.saveState(ctx.runDir, ctx.state);
    ctx.log.info(`${from} → ${ctx.state.status}`);
  }

  private fail(ctx: RunContext, event: "failure" | "timeout", error: OutcomeError): OutcomeReport {
    if (isStage(ctx.state.status)) this.advance(ctx, event);
    return this.finish(ctx, error);
  }

  private finish(ctx: RunContext, error: OutcomeError | null): OutcomeReport {
    if (error) ctx.log.error(`${error.kind}: ${error.message}`);
    else ctx.log.info(`run finished: ${ctx.state.status}${ctx.report.action ? ` (${ctx.report.action})` : ""}`);

    const report: OutcomeReport = {
      runId: ctx.runId,
      ...ctx.report,
      status: ctx.state.status,
      success: isSuccessful(ctx.state.status),
      failedStage: failedStage(ctx.state.status),
      error,
      runDir: ctx.runDir,
      finishedAt: new Date().toISOString(),
    };
    ctx.writer.writeJson("outcome.json", report);
    ctx.writer.writeIndex({
      runId: ctx.runId,
      manifest: ctx.state.manifest,
      status: ctx.state.status,
      schemaVersions: this.deps.schemas.versions(),
    });
    return report;
  }

  private saveState(runDir: string, state: RunState): void {
    fs.writeFileSync(path.join(runDir, "state.json"), JSON.stringify(state, null, 2), "utf8");
  }
}
