#!/usr/bin/env node

import { Command } from "commander";
import { validateAll, exitCodeForDiagnostics } from "./commands/validate.js";
import { runManifest } from "./commands/run.js";
import { status } from "./commands/status.js";
import { listRuns, readOutcome } from "./commands/runs.js";
import { listArtifacts } from "./commands/artifacts.js";
import { listSchemas, showSchema } from "./commands/schema.js";
import { commandConfig, type Diagnostic } from "./commands/context.js";
import { EXIT } from "./commands/exit-codes.js";
import type { OutcomeReport } from "./core/orchestrator.js";

type Format = "human" | "jsonl";

type CommonOpts = { config?: string; env?: string; format: Format };

const program = new Command();

program
  .name("libraryctl")
  .description("Build, sign and publish library container images from manifests")
  .version("0.1.0");

function jsonl(obj: unknown): void {
  process.stdout.write(JSON.stringify(obj) + "\n");
}

function fail(format: Format, error: Diagnostic, exitCode: number): never {
  if (format === "jsonl") jsonl(error);
  else console.error(error.message);
  process.exit(exitCode);
}

function printOutcome(report: OutcomeReport, format: Format): void {
  if (format === "jsonl") {
    jsonl({
      level: report.success ? "info" : "error",
      code: report.success ? "RUN_OK" : "RUN_FAILED",
      message: report.error?.message ?? `${report.manifest}: ${report.status}`,
      runId: report.runId,
      status: report.status,
      action: report.action,
      failedStage: report.failedStage,
      error: report.error,
      published: report.published,
      runDir: report.runDir,
    });
    return;
  }

  console.log(`Run ${report.runId}: ${report.status}${report.action ? ` (${report.action})` : ""}`);
  if (report.decision) {
    console.log(`  source: ${report.decision.ref} → ${report.decision.commit} (${report.decision.reason})`);
  }
  for (const r of report.attempt?.results ?? []) {
    console.log(`  ${r.platform}: ${r.status}${r.image ? ` ${r.image.digest}` : ""}${r.error ? ` [${r.error.kind}] ${r.error.message}` : ""}`);
  }
  for (const ref of report.published) console.log(`  published ${ref}`);
  if (report.error) {
    console.error(`  ${report.failedStage ?? "run"} failed: [${report.error.kind}] ${report.error.message}`);
    for (const issue of report.error.issues ?? []) console.error(`    ${issue.path}: ${issue.message}`);
    if (report.error.logRef) console.error(`    log: ${report.runDir}/${report.error.logRef}`);
  }
  console.log(`  artifacts: ${report.runDir}`);
}

program
  .command("validate")
  .description("Validate config, and optionally a manifest directory and a run directory")
  .option("--config <path>", "Path to config directory (default: bundled)")
  .option("--env <name>", "Config environment layer, e.g. ci")
  .option("--manifests <dir>", "Directory of manifest YAML files")
  .option("--artifacts <runDir>", "Run directory whose index.json should be verified")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: CommonOpts & { manifests?: string; artifacts?: string }) => {
    const res = await validateAll({
      configDir: opts.config,
      env: opts.env,
      manifestsDir: opts.manifests,
      runDir: opts.artifacts,
    });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) jsonl(err);
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exit(exitCodeForDiagnostics(res.errors));
    }

    if (opts.format === "jsonl") {
      for (const d of res.diagnostics) jsonl(d);
    } else {
      console.log("OK");
    }
  });

program
  .command("run")
  .description("Process a manifest change: load, detect, build, publish")
  .argument("<manifest>", "Manifest YAML file")
  .option("--manifests <dir>", "Library directory, for identifier uniqueness")
  .option("--config <path>", "Path to config directory (default: bundled)")
  .option("--env <name>", "Config environment layer, e.g. ci")
  .option("--dry-run", "Stop after change detection")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (manifest: string, opts: CommonOpts & { manifests?: string; dryRun?: boolean }) => {
    const res = await runManifest({
      manifestPath: manifest,
      manifestsDir: opts.manifests,
      configDir: opts.config,
      env: opts.env,
      dryRun: opts.dryRun,
      overrides: opts.format === "human" ? { mirror: (line) => process.stderr.write(line) } : {},
    });
    if (!res.ok) fail(opts.format, res.error, res.exitCode);

    printOutcome(res.report, opts.format);
    if (res.exitCode !== EXIT.SUCCESS) process.exit(res.exitCode);
  });

program
  .command("status")
  .description("Show the last published state of one or all manifests")
  .argument("[name]", "Manifest name (omit to list all)")
  .option("--config <path>", "Path to config directory (default: bundled)")
  .option("--env <name>", "Config environment layer, e.g. ci")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (name: string | undefined, opts: CommonOpts) => {
    const res = await status({ configDir: opts.config, env: opts.env, name });
    if (!res.ok) fail(opts.format, res.error, EXIT.INVALID_ARGS);

    if (opts.format === "jsonl") {
      for (const s of res.states) jsonl(s);
      return;
    }
    if (res.states.length === 0) {
      console.log("No manifests built yet.");
      return;
    }
    for (const s of res.states) {
      console.log(`${s.name}  ${s.lastTag}  ${s.lastCommit.slice(0, 12)}  ${s.builtAt}  ${s.indexDigest}`);
    }
  });

program
  .command("runs")
  .description("List runs, or show the outcome of one")
  .argument("[runId]", "Run ID (omit to list all)")
  .option("--config <path>", "Path to config directory (default: bundled)")
  .option("--env <name>", "Config environment layer, e.g. ci")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (runId: string | undefined, opts: CommonOpts) => {
    const configured = await commandConfig({ configDir: opts.config, env: opts.env });
    if (!configured.ok) fail(opts.format, configured.error, EXIT.INVALID_ARGS);
    const { artifacts_dir } = configured.config;

    if (runId) {
      const res = readOutcome(artifacts_dir, runId);
      if (!res.ok) fail(opts.format, res.error, EXIT.INVALID_ARGS);
      printOutcome(res.report, opts.format);
      return;
    }

    const list = listRuns(artifacts_dir);
    if (opts.format === "jsonl") {
      for (const item of list) jsonl(item);
      return;
    }
    if (list.length === 0) {
      console.log("No runs found.");
      return;
    }
    for (const item of list) console.log(`${item.id}  ${item.status}  ${item.updated_at}`);
  });

program
  .command("artifacts")
  .description("List the files of a run")
  .argument("<runId>", "Run ID")
  .option("--config <path>", "Path to config directory (default: bundled)")
  .option("--env <name>", "Config environment layer, e.g. ci")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (runId: string, opts: CommonOpts) => {
    const configured = await commandConfig({ configDir: opts.config, env: opts.env });
    if (!configured.ok) fail(opts.format, configured.error, EXIT.INVALID_ARGS);

    const res = listArtifacts({ artifactsDir: configured.config.artifacts_dir, runId });
    if (!res.ok) fail(opts.format, res.error, EXIT.INVALID_ARGS);
    if (opts.format === "jsonl") {
      for (const f of res.files) jsonl(f);
    } else {
      for (const f of res.files) console.log(`${f.path}  ${f.size} bytes`);
    }
  });

program
  .command("schema")
  .description("Print a bundled JSON Schema")
  .argument("[name]", "Schema name", "manifest")
  .option("--list", "List bundled schemas instead")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (name: string, opts: { list?: boolean; format: Format }) => {
    if (opts.list) {
      for (const s of await listSchemas()) {
        if (opts.format === "jsonl") jsonl(s);
        else console.log(`${s.name}@${s.version}`);
      }
      return;
    }
    const res = await showSchema(name);
    if (!res.ok) fail(opts.format, res.error, EXIT.INVALID_ARGS);
    if (opts.format === "jsonl") jsonl(res.schema);
    else console.log(JSON.stringify(res.schema, null, 2));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.PIPELINE_FAILED);
});
