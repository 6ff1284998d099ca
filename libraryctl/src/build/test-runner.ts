import type { Platform } from "../types/manifest.js";
import type { BuiltImage } from "../types/attempt.js";
import { BuildFailureError, TransientInfraError } from "../core/errors.js";
import { redactSensitiveInfo, sanitizeEnv } from "../core/security.js";
import { digestReference } from "../publish/references.js";
import { splitCommand } from "./command.js";
import { ToolExecError, execTool } from "./exec.js";

export type TestOutcome = {
  exitCode: number;
  output: string;
};

/**
 * Runs a manifest's test command inside a built image. A failing test is a
 * non-zero `exitCode`, not an exception; exceptions are infrastructure
 * (TransientInfraError) or an unusable command (BuildFailureError).
 */
export interface TestRunner {
  run(image: BuiltImage, platform: Platform, command: string, signal: AbortSignal): Promise<TestOutcome>;
}

/** `docker run` exits 125 when the daemon itself failed. */
export const DOCKER_DAEMON_EXIT = 125;

export class DockerTestRunner implements TestRunner {
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly opts: { command: string; timeoutMs: number; env?: NodeJS.ProcessEnv }) {
    this.env = opts.env ?? sanitizeEnv(process.env, ["DOCKER_"]);
  }

  async run(image: BuiltImage, platform: Platform, command: string, signal: AbortSignal): Promise<TestOutcome> {
    let argv: string[];
    try {
      argv = splitCommand(command);
    } catch (e) {
      throw new BuildFailureError(`Unusable test command: ${command}`, {}, e);
    }
    if (argv.length === 0) throw new BuildFailureError("Test command is empty");

    const args = ["run", "--rm", "--pull", "missing", "--platform", platform, digestReference(image.reference, image.digest), ...argv];
    try {
      const { stdout, stderr } = await execTool(this.opts.command, args, {
        signal,
        env: this.env,
        timeoutMs: this.opts.timeoutMs,
      });
      return { exitCode: 0, output: redactSensitiveInfo([stdout, stderr].filter(Boolean).join("\n")) };
    } catch (e) {
      if (!(e instanceof ToolExecError)) throw e;
      if (e.aborted) throw signal.reason ?? e;
      const output = redactSensitiveInfo(e.output());
      if (e.timedOut) {
        return { exitCode: -1, output: `${output}\ntest command timed out after ${this.opts.timeoutMs}ms` };
      }
      if (e.exitCode === DOCKER_DAEMON_EXIT) {
        throw new TransientInfraError(`docker run failed for ${platform} (exit ${e.exitCode ?? "none"})`, { log: output }, e);
      }
      if (e.exitCode === null) {
        throw new BuildFailureError(`Could not run ${this.opts.command} for ${platform}: ${e.message}`, { log: output }, e);
      }
      return { exitCode: e.exitCode, output };
    }
  }
}
