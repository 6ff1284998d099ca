import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { BuilderBackend, Platform } from "../types/manifest.js";
import type { BuiltImage } from "../types/attempt.js";
import { BuildFailureError, TransientInfraError } from "../core/errors.js";
import { redactSensitiveInfo, sanitizeEnv } from "../core/security.js";
import { repositoryOf, isDigest } from "../publish/references.js";
import { ToolExecError, execTool, isTransientInfraOutput, type ExecResult } from "./exec.js";

export type BuildRequest = {
  manifest: string;
  platform: Platform;
  backend: BuilderBackend;
  /** Checked-out source tree. */
  sourceDir: string;
  /** Dockerfile (or, for oci-import, the image archive) relative to sourceDir. */
  dockerfile: string;
  /** Build context relative to sourceDir. */
  context: string;
  args: Record<string, string> | null;
  labels: Record<string, string> | null;
  annotations: Record<string, string> | null;
  target: string | null;
  /** Staging reference to push the result to. */
  reference: string;
};

export type BuildOutput = {
  image: BuiltImage;
  log: string;
};

export type BuilderIdentity = { name: string; version: string };

/**
 * External container builder. `build` throws BuildFailureError for build-logic
 * failures and TransientInfraError for infrastructure trouble worth retrying;
 * both carry the tool output as `details.log`.
 */
export interface ImageBuilder {
  identity(backend: BuilderBackend): Promise<BuilderIdentity>;
  build(req: BuildRequest, signal: AbortSignal): Promise<BuildOutput>;
}

export type DockerCliOptions = {
  command: string;
  env?: NodeJS.ProcessEnv;
};

function flagPairs(flag: string, map: Record<string, string> | null): string[] {
  if (!map) return [];
  return Object.keys(map)
    .sort()
    .flatMap((key) => [flag, `${key}=${map[key]}`]);
}

/** Last "Loaded image: x" / "Loaded image ID: sha256:…" line of `docker load`. */
export function parseLoadedImage(output: string): string | null {
  let loaded: string | null = null;
  for (const line of output.split("\n")) {
    const m = /^Loaded image(?: ID)?:\s*(\S+)/.exec(line.trim());
    if (m) loaded = m[1];
  }
  return loaded;
}

/** Digest recorded by `buildx build --metadata-file`. */
export function parseBuildxMetadata(content: string): string | null {
  const parsed: unknown = JSON.parse(content);
  if (typeof parsed !== "object" || parsed === null) return null;
  const digest: unknown = Reflect.get(parsed, "containerimage.digest");
  return typeof digest === "string" && isDigest(digest) ? digest : null;
}

/** Pick the RepoDigests entry belonging to `reference`'s repository. */
export function pickRepoDigest(repoDigestsJson: string, reference: string): string | null {
  const parsed: unknown = JSON.parse(repoDigestsJson);
  if (!Array.isArray(parsed)) return null;
  const repo = repositoryOf(reference);
  for (const entry of parsed) {
    if (typeof entry !== "string") continue;
    const at = entry.indexOf("@");
    if (at !== -1 && entry.slice(0, at) === repo && isDigest(entry.slice(at + 1))) {
      return entry.slice(at + 1);
    }
  }
  return null;
}

/** Docker CLI adapter for the three builder backends. */
export class DockerCliBuilder implements ImageBuilder {
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly opts: DockerCliOptions) {
    this.env = opts.env ?? sanitizeEnv(process.env, ["DOCKER_", "BUILDX_"]);
  }

  async identity(backend: BuilderBackend): Promise<BuilderIdentity> {
    if (backend === "buildkit") {
      const { stdout } = await this.docker(["buildx", "version"], new AbortController().signal, []);
      const [, version] = stdout.trim().split(/\s+/);
      return { name: "buildx", version: version ?? "unknown" };
    }
    const { stdout } = await this.docker(["version", "--format", "{{.Server.Version}}"], new AbortController().signal, []);
    return { name: "docker", version: stdout.trim() || "unknown" };
  }

  async build(req: BuildRequest, signal: AbortSignal): Promise<BuildOutput> {
    switch (req.backend) {
      case "buildkit":
        return this.buildx(req, signal);
      case "classic":
        return this.classic(req, signal);
      case "oci-import":
        return this.ociImport(req, signal);
    }
  }

  private async buildx(req: BuildRequest, signal: AbortSignal): Promise<BuildOutput> {
    const log: string[] = [];
    const metaDir = fs.mkdtempSync(path.join(os.tmpdir(), "libraryctl-meta-"));
    const metaFile = path.join(metaDir, "metadata.json");
    try {
      await this.docker(
        [
          "buildx",
          "build",
          "--progress=plain",
          "--provenance=false",
          "--sbom=false",
          "--platform",
          req.platform,
          "--file",
          path.join(req.sourceDir, req.dockerfile),
          "--tag",
          req.reference,
          ...flagPairs("--build-arg", req.args),
          ...flagPairs("--label", req.labels),
          ...flagPairs("--annotation", req.annotations),
          ...(req.target ? ["--target", req.target] : []),
          "--push",
          "--metadata-file",
          metaFile,
          path.join(req.sourceDir, req.context),
        ],
        signal,
        log,
      );
      const digest = parseBuildxMetadata(fs.readFileSync(metaFile, "utf8"));
      if (!digest) throw new BuildFailureError(`buildx reported no image digest for ${req.reference}`, { log: log.join("\n") });
      return { image: { reference: req.reference, digest }, log: log.join("\n") };
    } finally {
      fs.rmSync(metaDir, { recursive: true, force: true });
    }
  }

  private async classic(req: BuildRequest, signal: AbortSignal): Promise<BuildOutput> {
    const log: string[] = [];
    if (req.annotations) log.push("note: annotations are not supported by the classic builder and were ignored");
    await this.docker(
      [
        "build",
        "--platform",
        req.platform,
        "--file",
        path.join(req.sourceDir, req.dockerfile),
        "--tag",
        req.reference,
        ...flagPairs("--build-arg", req.args),
        ...flagPairs("--label", req.labels),
        ...(req.target ? ["--target", req.target] : []),
        path.join(req.sourceDir, req.context),
      ],
      signal,
      log,
      { DOCKER_BUILDKIT: "0" },
    );
    return this.pushAndInspect(req, signal, log);
  }

  private async ociImport(req: BuildRequest, signal: AbortSignal): Promise<BuildOutput> {
    const log: string[] = [];
    const { stdout } = await this.docker(["load", "--input", path.join(req.sourceDir, req.dockerfile)], signal, log);
    const loaded = parseLoadedImage(stdout);
    if (!loaded) throw new BuildFailureError(`docker load reported no image for ${req.dockerfile}`, { log: log.join("\n") });
    await this.docker(["tag", loaded, req.reference], signal, log);
    return this.pushAndInspect(req, signal, log);
  }

  private async pushAndInspect(req: BuildRequest, signal: AbortSignal, log: string[]): Promise<BuildOutput> {
    await this.docker(["push", req.reference], signal, log);
    const { stdout } = await this.docker(["image", "inspect", "--format", "{{json .RepoDigests}}", req.reference], signal, log);
    const digest = pickRepoDigest(stdout.trim(), req.reference);
    if (!digest) throw new BuildFailureError(`No pushed digest recorded for ${req.reference}`, { log: log.join("\n") });
    return { image: { reference: req.reference, digest }, log: log.join("\n") };
  }

  /** Run docker, appending its output to `log`; failures become taxonomy errors. */
  private async docker(args: string[], signal: AbortSignal, log: string[], extraEnv: NodeJS.ProcessEnv = {}): Promise<ExecResult> {
    log.push(`$ ${this.opts.command} ${args.join(" ")}`);
    try {
      const result = await execTool(this.opts.command, args, { signal, env: { ...this.env, ...extraEnv } });
      log.push(redactSensitiveInfo([result.stdout, result.stderr].filter(Boolean).join("\n")));
      return result;
    } catch (e) {
      if (!(e instanceof ToolExecError)) throw e;
      if (e.aborted) throw signal.reason ?? e;
      const output = redactSensitiveInfo(e.output());
      log.push(output);
      const message = `${this.opts.command} ${args[0]} failed (exit ${e.exitCode ?? "none"})`;
      if (isTransientInfraOutput(output)) {
        throw new TransientInfraError(message, { log: log.join("\n") }, e);
      }
      throw new BuildFailureError(message, { log: log.join("\n") }, e);
    }
  }
}
