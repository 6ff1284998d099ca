import fs from "node:fs";
import path from "node:path";
import type { LibraryConfig } from "../types/config.js";
import type { Manifest } from "../types/manifest.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { ManifestStore } from "../manifest/store.js";
import { GitSourceResolver } from "../git/source-resolver.js";
import { FileBuildStateStore } from "../state/build-state-store.js";
import { DockerCliBuilder } from "../build/docker-builder.js";
import { DockerTestRunner } from "../build/test-runner.js";
import { DockerImageRegistry } from "../publish/registry.js";
import { CosignSigner } from "../publish/cosign-signer.js";
import { Orchestrator, type OrchestratorDeps, type OutcomeReport } from "../core/orchestrator.js";
import { EXIT, exitCodeForOutcome, type ExitCode } from "./exit-codes.js";
import { commandConfig, diag, type ConfigOptions, type Diagnostic } from "./context.js";

/** External collaborators a caller may replace (tests pass in-process fakes). */
export type RuntimeOverrides = Partial<Omit<OrchestratorDeps, "config" | "schemas">>;

export type RunCommandOptions = ConfigOptions & {
  manifestPath: string;
  /** Library directory; its other manifests take part in identifier uniqueness. */
  manifestsDir?: string;
  dryRun?: boolean;
  overrides?: RuntimeOverrides;
};

export type RunCommandResult =
  | { ok: true; report: OutcomeReport; exitCode: ExitCode }
  | { ok: false; error: Diagnostic; exitCode: ExitCode };

/** Wire the production adapters (git mirror cache, Docker CLI, cosign, file state store). */
export function createRuntime(config: LibraryConfig, schemas: SchemaRegistry, overrides: RuntimeOverrides = {}): OrchestratorDeps {
  return {
    config,
    schemas,
    resolver: overrides.resolver ?? new GitSourceResolver(config.cache_dir),
    stateStore:
      overrides.stateStore ?? new FileBuildStateStore(config.state_dir, schemas, { leaseMs: config.lease_seconds * 1000 }),
    builder: overrides.builder ?? new DockerCliBuilder({ command: config.docker.command }),
    tests: overrides.tests ?? new DockerTestRunner({ command: config.docker.command, timeoutMs: config.timeouts.test_seconds * 1000 }),
    registry: overrides.registry ?? new DockerImageRegistry({ command: config.docker.command, untagCommand: config.docker.untag_command }),
    signer: overrides.signer ?? new CosignSigner({ command: config.signer.command, key: config.signer.key }),
    owner: overrides.owner,
    mirror: overrides.mirror,
  };
}

function knownManifests(store: ManifestStore, dir: string, exclude: string): Manifest[] {
  return store
    .loadDirectory(dir)
    .manifests.filter((m) => path.resolve(m.path) !== exclude)
    .map((m) => m.manifest);
}

/** `libraryctl run <manifest>` */
export async function runManifest(opts: RunCommandOptions): Promise<RunCommandResult> {
  const cwd = opts.cwd ?? process.cwd();
  const configured = await commandConfig({ ...opts, cwd });
  if (!configured.ok) return { ok: false, error: configured.error, exitCode: EXIT.INVALID_ARGS };
  const { config } = configured;

  const manifestPath = path.resolve(cwd, opts.manifestPath);
  if (!fs.existsSync(manifestPath) || !fs.statSync(manifestPath).isFile()) {
    return {
      ok: false,
      error: diag("error", "MANIFEST_NOT_FOUND", `Manifest not found: ${manifestPath}`, { path: manifestPath }),
      exitCode: EXIT.INVALID_ARGS,
    };
  }

  const schemas = await createRegistry();
  let known: Manifest[] = [];
  if (opts.manifestsDir) {
    const dir = path.resolve(cwd, opts.manifestsDir);
    if (!fs.existsSync(dir)) {
      return {
        ok: false,
        error: diag("error", "MANIFEST_DIR_MISSING", `Manifest directory not found: ${dir}`, { path: dir }),
        exitCode: EXIT.INVALID_ARGS,
      };
    }
    known = knownManifests(new ManifestStore(schemas), dir, manifestPath);
  }

  const orchestrator = new Orchestrator(createRuntime(config, schemas, opts.overrides));
  const report = await orchestrator.run(
    { document: fs.readFileSync(manifestPath, "utf8"), source: manifestPath, known },
    { dryRun: opts.dryRun },
  );
  return { ok: true, report, exitCode: exitCodeForOutcome(report) };
}
