import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { SigningFailedError } from "../core/errors.js";
import { redactSensitiveInfo, sanitizeEnv } from "../core/security.js";
import { ToolExecError, execTool } from "../build/exec.js";

/**
 * External signer. Both operations return the reference under which the
 * signature (or attestation) was stored, and throw SigningFailedError.
 */
export interface Signer {
  sign(reference: string): Promise<string>;
  attest(subject: string, predicate: unknown): Promise<string>;
}

export type CosignOptions = {
  command: string;
  /** Key reference passed as `--key` (file path, `env://VAR`, KMS URI); keyless when absent. */
  key?: string;
  env?: NodeJS.ProcessEnv;
};

export const ATTESTATION_TYPE = "slsaprovenance";

/** cosign CLI adapter. */
export class CosignSigner implements Signer {
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly opts: CosignOptions) {
    this.env = opts.env ?? sanitizeEnv(process.env, ["COSIGN_", "SIGSTORE_", "DOCKER_"]);
  }

  async sign(reference: string): Promise<string> {
    await this.cosign(["sign", "--yes", ...this.keyArgs(), reference], reference);
    return this.triangulate(reference, "signature");
  }

  async attest(subject: string, predicate: unknown): Promise<string> {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "libraryctl-attest-"));
    const predicatePath = path.join(dir, "predicate.json");
    try {
      fs.writeFileSync(predicatePath, JSON.stringify(predicate), "utf8");
      await this.cosign(
        ["attest", "--yes", ...this.keyArgs(), "--type", ATTESTATION_TYPE, "--predicate", predicatePath, subject],
        subject,
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
    return this.triangulate(subject, "attestation");
  }

  private keyArgs(): string[] {
    return this.opts.key ? ["--key", this.opts.key] : [];
  }

  /** Where cosign stored the signature/attestation for `reference`. */
  private async triangulate(reference: string, type: "signature" | "attestation"): Promise<string> {
    const { stdout } = await this.cosign(["triangulate", "--type", type, reference], reference);
    const stored = stdout.trim();
    if (!stored) throw new SigningFailedError(`cosign reported no ${type} location for ${reference}`, { reference });
    return stored;
  }

  private async cosign(args: string[], reference: string): Promise<{ stdout: string }> {
    try {
      return await execTool(this.opts.command, args, { env: this.env });
    } catch (e) {
      if (!(e instanceof ToolExecError)) throw e;
      throw new SigningFailedError(
        `cosign ${args[0]} failed for ${reference} (exit ${e.exitCode ?? "none"})`,
        { reference, log: redactSensitiveInfo(e.output()) },
        e,
      );
    }
  }
}
