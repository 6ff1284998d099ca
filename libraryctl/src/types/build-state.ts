import type { Platform } from "./manifest.js";

/** Last successfully published revision of a manifest. */
export type BuildState = {
  name: string;
  lastTag: string;
  lastCommit: string;
  builtAt: string;
  digests: Partial<Record<Platform, string>>;
  indexDigest: string;
  attemptId: string;
  published: string[];
  /** Optimistic-concurrency version; bumped on every committed update. */
  version: number;
};

export type Reservation = {
  name: string;
  owner: string;
  token: string;
  expiresAt: string;
  /** Version of the state document the reservation was granted against. */
  baseVersion: number;
};

/** On-disk document, one per manifest. */
export type BuildStateDocument = {
  name: string;
  version: number;
  current: Omit<BuildState, "name" | "version"> | null;
  reservation: { owner: string; token: string; expiresAt: string } | null;
};

/** The prior state a writer expects to replace. `null` means "never built". */
export type ExpectedState = { lastTag: string; version: number } | null;
