import type { PipelineStatus } from "../core/state-machine.js";

/** One file of a run directory, as recorded in `index.json`. */
export type ArtifactEntry = {
  /** Path relative to the run directory. */
  path: string;
  /** `<schema>@<version>` for JSON documents with a schema. */
  schema?: string;
  sha256: string;
  size: number;
  produced_at: string;
};

export type RunIndex = {
  run_id: string;
  manifest: string;
  created_at: string;
  status: string;
  schema_versions: Record<string, string>;
  artifacts: ArtifactEntry[];
};

/** Persisted after every pipeline transition as `state.json`. */
export type RunState = {
  run_id: string;
  manifest: string;
  manifest_path: string | null;
  status: PipelineStatus;
  dry_run: boolean;
  created_at: string;
  updated_at: string;
  pid: number;
};
