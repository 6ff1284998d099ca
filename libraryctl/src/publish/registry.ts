import { PublicationError } from "../core/errors.js";
import { redactSensitiveInfo, sanitizeEnv } from "../core/security.js";
import { ToolExecError, execTool } from "../build/exec.js";
import { splitCommand } from "../build/command.js";
import { isDigest } from "./references.js";

/** External registry operations used by publication. Failures are PublicationError. */
export interface ImageRegistry {
  /** Assemble a multi-platform index from `sources` under `target`; returns the index digest. */
  createIndex(target: string, sources: string[]): Promise<string>;
  /** Point `target` at the image `source` (a digest reference). */
  tag(source: string, target: string): Promise<void>;
  /** Remove the tag `target` from its repository; the image it pointed at stays. */
  untag(target: string): Promise<void>;
}

export const DEFAULT_UNTAG_COMMAND = "regctl tag delete";

/** Digest of `docker buildx imagetools inspect --format '{{json .Manifest}}'`. */
export function parseInspectDigest(output: string): string | null {
  const parsed: unknown = JSON.parse(output);
  if (typeof parsed !== "object" || parsed === null) return null;
  const digest: unknown = Reflect.get(parsed, "digest");
  return typeof digest === "string" && isDigest(digest) ? digest : null;
}

/**
 * `docker buildx imagetools` adapter; works registry-side, nothing is pulled.
 * imagetools cannot delete a tag, so `untag` runs `untagCommand <reference>`.
 */
export class DockerImageRegistry implements ImageRegistry {
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly opts: { command: string; untagCommand?: string; env?: NodeJS.ProcessEnv }) {
    this.env = opts.env ?? sanitizeEnv(process.env, ["DOCKER_", "BUILDX_"]);
  }

  async createIndex(target: string, sources: string[]): Promise<string> {
    await this.imagetools(["create", "--tag", target, ...sources], target);
    const { stdout } = await this.imagetools(["inspect", "--format", "{{json .Manifest}}", target], target);
    const digest = parseInspectDigest(stdout.trim());
    if (!digest) throw new PublicationError(`Registry reported no digest for ${target}`, { reference: target });
    return digest;
  }

  async tag(source: string, target: string): Promise<void> {
    await this.imagetools(["create", "--tag", target, source], target);
  }

  async untag(target: string): Promise<void> {
    const [command, ...args] = splitCommand(this.opts.untagCommand ?? DEFAULT_UNTAG_COMMAND);
    if (!command) throw new PublicationError(`No untag command configured for ${target}`, { reference: target });
    try {
      await execTool(command, [...args, target], { env: this.env });
    } catch (e) {
      if (!(e instanceof ToolExecError)) throw e;
      throw new PublicationError(
        `untag failed for ${target} (exit ${e.exitCode ?? "none"})`,
        { reference: target, log: redactSensitiveInfo(e.output()) },
        e,
      );
    }
  }

  private async imagetools(args: string[], reference: string): Promise<{ stdout: string }> {
    try {
      return await execTool(this.opts.command, ["buildx", "imagetools", ...args], { env: this.env });
    } catch (e) {
      if (!(e instanceof ToolExecError)) throw e;
      throw new PublicationError(
        `imagetools ${args[0]} failed for ${reference} (exit ${e.exitCode ?? "none"})`,
        { reference, log: redactSensitiveInfo(e.output()) },
        e,
      );
    }
  }
}
