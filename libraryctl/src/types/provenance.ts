import type { Platform } from "./manifest.js";

/** Provenance record: created once per fully successful attempt, never mutated. */
export type ProvenanceRecord = {
  readonly schemaVersion: "1.0.0";
  readonly createdAt: string;
  readonly attemptId: string;
  readonly manifest: {
    readonly name: string;
    readonly identifier: string;
    readonly project: string;
    readonly version: number;
    /** sha256 over the canonical serialization of the manifest. */
    readonly digest: string;
  };
  readonly source: { readonly repo: string; readonly ref: string; readonly commit: string };
  readonly builder: { readonly backend: string; readonly name: string; readonly version: string };
  readonly platforms: ReadonlyArray<{ readonly platform: Platform; readonly digest: string }>;
  readonly indexDigest: string;
  readonly signatures: ReadonlyArray<{ readonly reference: string; readonly signature: string }>;
  readonly attestation?: string;
  readonly published: ReadonlyArray<string>;
};
