/**
 * Pipeline stages in order. A manifest change walks them left to right,
 * or stops at the first failure.
 */
export const ALL_STAGES = ["load", "detect", "build", "publish"] as const;

export type PipelineStage = (typeof ALL_STAGES)[number];

export type PipelineStatus =
  | PipelineStage
  | "done"
  | "noop"
  | `failed_${PipelineStage}`
  | `timeout_${PipelineStage}`;

/**
 * Events that drive transitions. `skip` ends the run successfully without
 * running the remaining stages (source unchanged since the last publish).
 */
export type TransitionEvent = "success" | "failure" | "timeout" | "skip";

export function isStage(status: string): status is PipelineStage {
  return (ALL_STAGES as readonly string[]).includes(status);
}

export function isPipelineStatus(value: string): value is PipelineStatus {
  if (isStage(value) || value === "done" || value === "noop") return true;
  const m = /^(?:failed|timeout)_(.+)$/.exec(value);
  return m !== null && isStage(m[1]);
}

export function isTerminal(status: PipelineStatus): boolean {
  return status === "done" || status === "noop" || status.startsWith("failed_") || status.startsWith("timeout_");
}

export function isSuccessful(status: PipelineStatus): boolean {
  return status === "done" || status === "noop";
}

/** Stage named by a terminal failure status, e.g. `failed_build` → `build`. */
export function failedStage(status: PipelineStatus): PipelineStage | null {
  const m = /^(?:failed|timeout)_(.+)$/.exec(status);
  if (!m) return null;
  return isStage(m[1]) ? m[1] : null;
}

/**
 * Pure function: given current status + event, return next status.
 */
export function nextState(current: PipelineStatus, event: TransitionEvent): PipelineStatus {
  if (!isStage(current)) return current;

  if (event === "failure") return `failed_${current}`;
  if (event === "timeout") return `timeout_${current}`;
  if (event === "skip") return "noop";

  const idx = ALL_STAGES.indexOf(current);
  if (idx >= ALL_STAGES.length - 1) return "done";
  return ALL_STAGES[idx + 1];
}
