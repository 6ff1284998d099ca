import path from "node:path";
import { minimatch } from "minimatch";
import type { Manifest } from "../types/manifest.js";
import { pinnedRef } from "../types/manifest.js";
import type { BuildState } from "../types/build-state.js";
import type { FileTree, ResolvedSource, SourceResolver } from "../git/source-resolver.js";
import { SourceUnavailableError, errorMessage, isLibraryError } from "../core/errors.js";
import { RetriesExhaustedError, withRetry } from "../core/retry.js";

export type BuildScope = {
  /** Dockerfile path from the repository root. */
  dockerfile: string;
  /** Context directory from the repository root ("." = whole repository). */
  context: string;
  patterns: string[];
};

/** File-level view of what changed in the build scope between two commits. */
export type DiffReport = {
  manifest: string;
  scope: BuildScope;
  fromCommit: string | null;
  toCommit: string;
  added: string[];
  removed: string[];
  modified: string[];
  /** Unified patch for the scope, when a prior commit exists. */
  patch: string | null;
  /** Why the report is incomplete, if it is. */
  note: string | null;
};

export type ChangeReason = "first-build" | "commit-changed" | "up-to-date";

export type ChangeDecision = {
  required: boolean;
  reason: ChangeReason;
  source: ResolvedSource;
  diff: DiffReport | null;
};

export type DetectResult =
  | { ok: true; decision: ChangeDecision }
  | { ok: false; error: SourceUnavailableError };

export type ChangeDetectorOptions = {
  attempts: number;
  backoffMs: number;
  onRetry?: (attempt: number, error: unknown) => void;
};

/** Files that can affect the image: everything under the context, plus the Dockerfile. */
export function buildScope(manifest: Manifest): BuildScope {
  const p = path.posix;
  const dockerfile = p.normalize(p.join(manifest.build.path, manifest.build.dockerfile));
  let context = p.normalize(p.join(manifest.build.path, manifest.build.context)).replace(/\/+$/, "");
  if (context === "" || context.startsWith("..")) context = ".";

  const patterns = context === "." ? ["**"] : [`${context}/**`];
  if (!patterns.some((pattern) => minimatch(dockerfile, pattern, { dot: true }))) {
    patterns.push(dockerfile);
  }
  return { dockerfile, context, patterns };
}

export function inScope(file: string, scope: BuildScope): boolean {
  return scope.patterns.some((pattern) => minimatch(file, pattern, { dot: true }));
}

/** Compare two trees inside the scope. */
export function diffTrees(before: FileTree | null, after: FileTree, scope: BuildScope): Pick<DiffReport, "added" | "removed" | "modified"> {
  const added: string[] = [];
  const removed: string[] = [];
  const modified: string[] = [];

  for (const [file, blob] of after) {
    if (!inScope(file, scope)) continue;
    const prev = before?.get(file);
    if (prev === undefined) added.push(file);
    else if (prev !== blob) modified.push(file);
  }
  for (const file of before?.keys() ?? []) {
    if (inScope(file, scope) && !after.has(file)) removed.push(file);
  }

  return { added: added.sort(), removed: removed.sort(), modified: modified.sort() };
}

/**
 * Decides whether a manifest needs a rebuild by resolving its
 * pinned ref to a commit and comparing it with the last published commit.
 * Tags can move, so tag strings alone never decide.
 */
export class ChangeDetector {
  constructor(
    private readonly resolver: SourceResolver,
    private readonly opts: ChangeDetectorOptions = { attempts: 3, backoffMs: 1000 },
  ) {}

  async needsBuild(manifest: Manifest, priorState: BuildState | null): Promise<DetectResult> {
    const ref = pinnedRef(manifest.git);
    let source: ResolvedSource;
    try {
      const res = await withRetry(() => this.resolver.resolve(manifest.git.repo, ref, { fetch: manifest.git.fetch }), {
        attempts: this.opts.attempts,
        backoffMs: this.opts.backoffMs,
        isRetryable: (e) => isLibraryError(e) && e.kind === "SourceUnavailable" && e.retryable,
        onRetry: (attempt, e) => this.opts.onRetry?.(attempt, e),
      });
      source = res.value;
    } catch (e) {
      return { ok: false, error: toSourceUnavailable(e, manifest.git.repo, ref) };
    }

    if (priorState && priorState.lastCommit === source.commit) {
      return { ok: true, decision: { required: false, reason: "up-to-date", source, diff: null } };
    }

    const diff = await this.computeDiff(manifest, priorState, source);
    return {
      ok: true,
      decision: { required: true, reason: priorState ? "commit-changed" : "first-build", source, diff },
    };
  }

  /** Advisory only: failures end up in `note`, never in the decision. */
  private async computeDiff(manifest: Manifest, priorState: BuildState | null, source: ResolvedSource): Promise<DiffReport> {
    const scope = buildScope(manifest);
    const report: DiffReport = {
      manifest: manifest.name,
      scope,
      fromCommit: priorState?.lastCommit ?? null,
      toCommit: source.commit,
      added: [],
      removed: [],
      modified: [],
      patch: null,
      note: null,
    };

    let after: FileTree;
    try {
      after = await this.resolver.listFiles(source.repo, source.commit);
    } catch (e) {
      return { ...report, note: `file list unavailable: ${errorMessage(e)}` };
    }

    let before: FileTree | null = null;
    if (priorState) {
      try {
        before = await this.resolver.listFiles(source.repo, priorState.lastCommit);
      } catch (e) {
        return { ...report, ...diffTrees(null, after, scope), note: `previous commit ${priorState.lastCommit} unavailable: ${errorMessage(e)}` };
      }
    }

    const files = diffTrees(before, after, scope);
    let patch: string | null = null;
    let note: string | null = null;
    if (priorState) {
      const pathspecs = scope.context === "." ? ["."] : [scope.context, scope.dockerfile];
      try {
        patch = await this.resolver.diff(source.repo, priorState.lastCommit, source.commit, pathspecs);
      } catch (e) {
        note = `patch unavailable: ${errorMessage(e)}`;
      }
    }
    return { ...report, ...files, patch, note };
  }
}

function toSourceUnavailable(e: unknown, repo: string, ref: string): SourceUnavailableError {
  const last = e instanceof RetriesExhaustedError ? e.last : e;
  const attempts = e instanceof RetriesExhaustedError ? e.attempts : 1;
  if (last instanceof SourceUnavailableError) {
    return attempts > 1
      ? new SourceUnavailableError(`${last.message} (after ${attempts} attempts)`, { repo, ref, retryable: false, cause: last })
      : last;
  }
  return new SourceUnavailableError(`Cannot resolve ${ref} in ${repo}: ${errorMessage(last)}`, { repo, ref, retryable: false, cause: last });
}

/** Markdown summary for reviewers. */
export function renderDiffMarkdown(report: DiffReport): string {
  const lines: string[] = [];
  lines.push(`# Build definition changes: ${report.manifest}`);
  lines.push("");
  lines.push(`- From: ${report.fromCommit ?? "(first build)"}`);
  lines.push(`- To: ${report.toCommit}`);
  lines.push(`- Dockerfile: \`${report.scope.dockerfile}\``);
  lines.push(`- Context: \`${report.scope.context}\``);
  if (report.note) lines.push(`- Note: ${report.note}`);
  lines.push("");

  const section = (title: string, files: string[]) => {
    if (files.length === 0) return;
    lines.push(`## ${title} (${files.length})`);
    lines.push("");
    for (const f of files) lines.push(`- \`${f}\``);
    lines.push("");
  };
  section("Added", report.added);
  section("Modified", report.modified);
  section("Removed", report.removed);

  if (report.added.length + report.modified.length + report.removed.length === 0) {
    lines.push("No files changed in the build scope.");
    lines.push("");
  }

  if (report.patch) {
    lines.push("## Patch");
    lines.push("");
    lines.push("```diff");
    lines.push(report.patch.trimEnd());
    lines.push("```");
    lines.push("");
  }
  return lines.join("\n");
}
