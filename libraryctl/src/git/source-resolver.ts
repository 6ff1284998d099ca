import fs from "node:fs";
import path from "node:path";
import { simpleGit, type SimpleGit } from "simple-git";
import { computeSha256FromContent } from "../artifact-writer/checksum.js";
import { SourceUnavailableError, errorMessage } from "../core/errors.js";
import { redactSensitiveInfo } from "../core/security.js";

export type ResolvedSource = {
  repo: string;
  /** The ref the manifest pins (tag or sha). */
  ref: string;
  commit: string;
};

/** path → blob id, for every file of a commit */
export type FileTree = Map<string, string>;

/**
 * External source resolver: turns (repo, ref) into an immutable commit and
 * gives access to that commit's files.
 */
export interface SourceResolver {
  resolve(repo: string, ref: string, opts?: { fetch?: string }): Promise<ResolvedSource>;
  listFiles(repo: string, commit: string): Promise<FileTree>;
  /** Unified patch between two commits, limited to `pathspecs`. */
  diff(repo: string, fromCommit: string, toCommit: string, pathspecs: string[]): Promise<string>;
  /** Materialize the commit's tree at `dest`; returns the directory. */
  checkout(source: ResolvedSource, dest: string): Promise<string>;
}

const TRANSIENT_PATTERNS = [
  /could not resolve host/i,
  /connection (timed out|reset|refused)/i,
  /operation timed out/i,
  /early EOF/i,
  /the remote end hung up/i,
  /RPC failed/i,
  /HTTP\/?[\d.]* 5\d\d/i,
  /block timeout/i,
];

export function isTransientGitError(message: string): boolean {
  return TRANSIENT_PATTERNS.some((p) => p.test(message));
}

export type GitFactory = (baseDir?: string) => SimpleGit;

const defaultFactory: GitFactory = (baseDir) =>
  simpleGit({ ...(baseDir ? { baseDir } : {}), timeout: { block: 300000 } });

/**
 * Git operations wrapper. Keeps one bare mirror per repository under
 * `cacheDir` and answers every query from it.
 */
export class GitSourceResolver implements SourceResolver {
  private readonly synced = new Set<string>();

  constructor(
    private readonly cacheDir: string,
    private readonly git: GitFactory = defaultFactory,
  ) {}

  mirrorDir(repo: string): string {
    return path.join(this.cacheDir, "mirrors", `${computeSha256FromContent(repo).slice(0, 16)}.git`);
  }

  async resolve(repo: string, ref: string, opts?: { fetch?: string }): Promise<ResolvedSource> {
    const dir = await this.guard(repo, ref, () => this.sync(repo, opts?.fetch));
    const commit = await this.guard(repo, ref, async () => (await this.git(dir).revparse([`${ref}^{commit}`])).trim());
    return { repo, ref, commit };
  }

  async listFiles(repo: string, commit: string): Promise<FileTree> {
    const dir = await this.guard(repo, commit, () => this.sync(repo));
    const out = await this.guard(repo, commit, () => this.git(dir).raw(["ls-tree", "-r", "--full-tree", commit]));
    return parseLsTree(out);
  }

  async diff(repo: string, fromCommit: string, toCommit: string, pathspecs: string[]): Promise<string> {
    const dir = await this.guard(repo, toCommit, () => this.sync(repo));
    return this.guard(repo, toCommit, () =>
      this.git(dir).raw(["diff", "--no-color", fromCommit, toCommit, "--", ...pathspecs]),
    );
  }

  async checkout(source: ResolvedSource, dest: string): Promise<string> {
    const mirror = await this.guard(source.repo, source.ref, () => this.sync(source.repo));
    return this.guard(source.repo, source.ref, async () => {
      fs.rmSync(dest, { recursive: true, force: true });
      fs.mkdirSync(path.dirname(dest), { recursive: true });
      await this.git().clone(mirror, dest, ["--no-checkout", "--quiet"]);
      await this.git(dest).raw(["checkout", "--quiet", "--detach", source.commit]);
      return dest;
    });
  }

  /** Clone the mirror on first use, fetch once per process afterwards. */
  private async sync(repo: string, fetchRef?: string): Promise<string> {
    const dir = this.mirrorDir(repo);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(path.dirname(dir), { recursive: true });
      await this.git().clone(repo, dir, ["--mirror", "--quiet"]);
      this.synced.add(repo);
    } else if (!this.synced.has(repo)) {
      await this.git(dir).raw(["fetch", "--prune", "--force", "--quiet", "origin"]);
      this.synced.add(repo);
    }
    if (fetchRef) {
      await this.git(dir).raw(["fetch", "--force", "--quiet", "origin", `+${fetchRef}:${fetchRef}`]);
    }
    return dir;
  }

  private async guard<T>(repo: string, ref: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      const message = redactSensitiveInfo(errorMessage(e));
      throw new SourceUnavailableError(`Cannot resolve ${ref} in ${redactSensitiveInfo(repo)}: ${message}`, {
        repo,
        ref,
        retryable: isTransientGitError(message),
        cause: e,
      });
    }
  }
}

/** `<mode> <type> <object>\t<path>` lines → path → object id (blobs only). */
export function parseLsTree(output: string): FileTree {
  const tree: FileTree = new Map();
  for (const line of output.split("\n")) {
    const tab = line.indexOf("\t");
    if (tab === -1) continue;
    const [, type, object] = line.slice(0, tab).split(" ");
    if (type !== "blob" || !object) continue;
    tree.set(line.slice(tab + 1), object);
  }
  return tree;
}
