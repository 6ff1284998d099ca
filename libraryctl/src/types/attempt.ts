import type { Platform, BuilderBackend } from "./manifest.js";
import type { ErrorKind } from "../core/errors.js";

export type PlatformStage = "build" | "test";

export type BuiltImage = {
  /** Staging reference the platform image was pushed to. */
  reference: string;
  digest: string;
};

export type PlatformResult = {
  platform: Platform;
  status: "success" | "failed";
  /** Stage that failed, or null on success. */
  failedStage: PlatformStage | null;
  image: BuiltImage | null;
  /** Artifact-relative path of the build log. */
  logRef: string | null;
  testOutputRef: string | null;
  attempts: number;
  durationMs: number;
  error: { kind: ErrorKind; message: string } | null;
};

export type AttemptOverall = "success" | "partial" | "failed";

export type BuildAttempt = {
  id: string;
  manifest: string;
  source: { repo: string; ref: string; commit: string };
  builder: { backend: BuilderBackend; name: string; version: string };
  platforms: Platform[];
  results: PlatformResult[];
  overall: AttemptOverall;
  cause: "Timeout" | null;
  startedAt: string;
  finishedAt: string;
};
