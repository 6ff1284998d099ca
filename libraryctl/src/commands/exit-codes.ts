import type { OutcomeReport } from "../core/orchestrator.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  PIPELINE_FAILED: 1,
  SCHEMA_INVALID: 2,
  INVALID_ARGS: 3,
  CONCURRENT_CONFLICT: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeForOutcome(report: OutcomeReport): ExitCode {
  if (report.success) return EXIT.SUCCESS;
  switch (report.error?.kind) {
    case "SchemaError":
      return EXIT.SCHEMA_INVALID;
    case "ConcurrentUpdateConflict":
      return EXIT.CONCURRENT_CONFLICT;
    default:
      return EXIT.PIPELINE_FAILED;
  }
}
