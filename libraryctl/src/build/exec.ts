import { execFile } from "node:child_process";
import { promisify } from "node:util";

const pExecFile = promisify(execFile);

export const MAX_CMD_BUFFER_SIZE = 50 * 1024 * 1024; // 50MB

export type ExecOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  timeoutMs?: number;
};

export type ExecResult = { stdout: string; stderr: string };

/** A tool invocation that exited non-zero, was killed, or never started. */
export class ToolExecError extends Error {
  constructor(
    message: string,
    readonly command: string,
    readonly exitCode: number | null,
    readonly stdout: string,
    readonly stderr: string,
    readonly aborted: boolean,
    readonly timedOut: boolean,
  ) {
    super(message);
    this.name = "ToolExecError";
  }

  /** Everything the tool printed, for build logs. */
  output(): string {
    return [this.stdout, this.stderr].filter((s) => s.length > 0).join("\n");
  }
}

function stringField(e: object, key: string): string {
  const value: unknown = Reflect.get(e, key);
  return typeof value === "string" ? value : "";
}

/** Run an external tool without a shell. */
export async function execTool(command: string, args: string[], opts: ExecOptions = {}): Promise<ExecResult> {
  try {
    const { stdout, stderr } = await pExecFile(command, args, {
      cwd: opts.cwd,
      env: opts.env,
      signal: opts.signal,
      timeout: opts.timeoutMs,
      maxBuffer: MAX_CMD_BUFFER_SIZE,
      shell: false,
      encoding: "utf8",
    });
    return { stdout, stderr };
  } catch (e) {
    if (typeof e !== "object" || e === null) throw e;
    const code: unknown = Reflect.get(e, "code");
    const killed = Reflect.get(e, "killed") === true;
    const aborted = opts.signal?.aborted === true || Reflect.get(e, "name") === "AbortError";
    const message = e instanceof Error ? e.message : `${command} failed`;
    throw new ToolExecError(
      message,
      `${command} ${args.join(" ")}`,
      typeof code === "number" ? code : null,
      stringField(e, "stdout"),
      stringField(e, "stderr"),
      aborted,
      killed && !aborted,
    );
  }
}

const TRANSIENT_INFRA_PATTERNS = [
  /i\/o timeout/i,
  /TLS handshake timeout/i,
  /connection (reset|refused)/i,
  /no such host/i,
  /toomanyrequests/i,
  /\b50[234]\b/,
  /service unavailable/i,
  /bad gateway/i,
  /context deadline exceeded/i,
  /unexpected EOF/i,
  /net\/http: request canceled/i,
  /Cannot connect to the Docker daemon/i,
];

export function isTransientInfraOutput(output: string): boolean {
  return TRANSIENT_INFRA_PATTERNS.some((p) => p.test(output));
}
