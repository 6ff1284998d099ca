/** Configuration types for the layered config system (base.yaml ← env.yaml ← LIBRARY_* vars). */
export type RetryConfig = {
  source_attempts: number;
  build_attempts: number;
  backoff_ms: number;
};

export type TimeoutsConfig = {
  build_seconds: number;
  test_seconds: number;
};

export type LibraryConfig = {
  schema_version: string;
  registry: string;
  namespace: string;
  staging_namespace: string;
  artifacts_dir: string;
  state_dir: string;
  cache_dir: string;
  lease_seconds: number;
  stale_run_seconds: number;
  retry: RetryConfig;
  timeouts: TimeoutsConfig;
  docker: {
    command: string;
    /** Deletes one remote tag, given the reference as its last argument. */
    untag_command?: string;
  };
  signer: { command: string; key?: string };
};
