import type { Manifest } from "../types/manifest.js";
import type { BuildAttempt } from "../types/attempt.js";
import type { ProvenanceRecord } from "../types/provenance.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { PublicationError } from "../core/errors.js";
import { manifestDigest } from "../manifest/store.js";

export type ProvenanceInput = {
  manifest: Manifest;
  attempt: BuildAttempt;
  indexDigest: string;
  signatures: Array<{ reference: string; signature: string }>;
  published: string[];
  attestation?: string;
  createdAt?: Date;
};

/** Freeze an object graph in place. */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

/**
 * Assemble the provenance record of a successful attempt, validate it against
 * the `provenance` schema and freeze it.
 */
export function buildProvenance(input: ProvenanceInput, registry: SchemaRegistry): ProvenanceRecord {
  const { manifest, attempt } = input;
  const platforms = manifest.build.platforms.map((platform) => {
    const result = attempt.results.find((r) => r.platform === platform && r.status === "success");
    if (!result?.image) {
      throw new PublicationError(`No built image for ${platform} in attempt ${attempt.id}`, { platform });
    }
    return { platform, digest: result.image.digest };
  });

  const record: ProvenanceRecord = {
    schemaVersion: "1.0.0",
    createdAt: (input.createdAt ?? new Date()).toISOString(),
    attemptId: attempt.id,
    manifest: {
      name: manifest.name,
      identifier: manifest.metadata.identifier,
      project: manifest.metadata.project,
      version: manifest.version,
      digest: manifestDigest(manifest),
    },
    source: { ...attempt.source },
    builder: { ...attempt.builder },
    platforms,
    indexDigest: input.indexDigest,
    signatures: input.signatures.map((s) => ({ ...s })),
    ...(input.attestation ? { attestation: input.attestation } : {}),
    published: [...input.published],
  };

  const { valid, errors } = registry.validate("provenance", record);
  if (!valid) {
    throw new PublicationError(`Provenance record failed validation: ${errors}`, { attemptId: attempt.id });
  }
  return deepFreeze(record);
}
