import fs from "node:fs";
import path from "node:path";
import { redactSensitiveInfo, sanitizeLogMessage } from "../core/security.js";

export type LogLevel = "info" | "warn" | "error";

export type LogContext = {
  runId: string;
  manifest: string;
};

/** Anything components log through. */
export type EventLog = {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
};

export function formatLogLine(level: LogLevel, ctx: LogContext, msg: string, at: Date = new Date()): string {
  const sanitized = {
    runId: sanitizeLogMessage(ctx.runId),
    manifest: sanitizeLogMessage(ctx.manifest),
    msg: sanitizeLogMessage(redactSensitiveInfo(msg)),
  };
  return `[${at.toISOString()}] ${level.toUpperCase()} runId=${sanitized.runId} manifest=${sanitized.manifest} ${sanitized.msg}\n`;
}

/**
 * Progress log: one line per pipeline event appended to `progress.log` in the
 * run directory, optionally mirrored to a second sink (stderr in the CLI).
 */
export class ProgressLog implements EventLog {
  constructor(
    private readonly filePath: string | null,
    private readonly ctx: LogContext,
    private readonly mirror?: (line: string) => void,
  ) {
    if (filePath) fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  info(msg: string): void {
    this.write("info", msg);
  }

  warn(msg: string): void {
    this.write("warn", msg);
  }

  error(msg: string): void {
    this.write("error", msg);
  }

  private write(level: LogLevel, msg: string): void {
    const line = formatLogLine(level, this.ctx, msg);
    if (this.filePath) fs.appendFileSync(this.filePath, line, "utf8");
    this.mirror?.(line);
  }
}

/** Discards everything; the default for library callers that pass no log. */
export const silentLog: EventLog = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
