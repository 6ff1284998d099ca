import type { Manifest } from "../types/manifest.js";
import type { BuildAttempt } from "../types/attempt.js";
import type { BuildState } from "../types/build-state.js";
import type { ProvenanceRecord } from "../types/provenance.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { BuildStateStore } from "../state/build-state-store.js";
import { expectedFrom } from "../state/build-state-store.js";
import {
  ConcurrentUpdateConflictError,
  PublicationError,
  SigningFailedError,
  errorMessage,
  isLibraryError,
} from "../core/errors.js";
import { silentLog, type EventLog } from "../log/progress-log.js";
import { buildProvenance } from "./provenance.js";
import { canonicalReference, digestReference, pinnedReference } from "./references.js";
import type { ImageRegistry } from "./registry.js";
import type { Signer } from "./cosign-signer.js";

export type PublishError = PublicationError | SigningFailedError | ConcurrentUpdateConflictError;

export type PublishResult =
  | { ok: true; record: ProvenanceRecord; state: BuildState }
  | { ok: false; error: PublishError };

export type PublisherOptions = {
  registry: string;
  namespace: string;
  /** Recorded as the reservation owner. */
  owner: string;
};

/** Reasons an attempt may not be published; empty when it may. */
export function publicationBlockers(manifest: Manifest, attempt: BuildAttempt): string[] {
  const blockers: string[] = [];
  if (attempt.manifest !== manifest.name) {
    blockers.push(`attempt ${attempt.id} belongs to ${attempt.manifest}, not ${manifest.name}`);
  }
  if (attempt.overall !== "success") {
    blockers.push(`attempt ${attempt.id} is ${attempt.overall}${attempt.cause ? ` (${attempt.cause})` : ""}`);
  }

  const built = new Set(attempt.results.filter((r) => r.status === "success" && r.image).map((r) => r.platform));
  const declared = new Set(manifest.build.platforms);
  const missing = [...declared].filter((p) => !built.has(p));
  const extra = [...built].filter((p) => !declared.has(p));
  if (missing.length > 0) blockers.push(`missing platforms: ${missing.join(", ")}`);
  if (extra.length > 0) blockers.push(`undeclared platforms: ${extra.join(", ")}`);
  return blockers;
}

function asPublishError(e: unknown): PublishError {
  if (e instanceof PublicationError || e instanceof SigningFailedError || e instanceof ConcurrentUpdateConflictError) {
    return e;
  }
  const details = isLibraryError(e) ? e.details : {};
  return new PublicationError(errorMessage(e), details, e);
}

/**
 * Turns a fully successful attempt into
 * live canonical tags, a signed provenance record and a new BuildState, or
 * into nothing at all.
 */
export class ProvenancePublisher {
  constructor(
    private readonly registry: ImageRegistry,
    private readonly signer: Signer,
    private readonly store: BuildStateStore,
    private readonly schemas: SchemaRegistry,
    private readonly opts: PublisherOptions,
    private readonly log: EventLog = silentLog,
  ) {}

  async publish(manifest: Manifest, attempt: BuildAttempt, prior: BuildState | null): Promise<PublishResult> {
    const blockers = publicationBlockers(manifest, attempt);
    if (blockers.length > 0) {
      return { ok: false, error: new PublicationError(`Refusing to publish: ${blockers.join("; ")}`, { attemptId: attempt.id }) };
    }

    const reserved = await this.store.reserve(manifest.name, expectedFrom(prior), this.opts.owner);
    if (!reserved.ok) return reserved;
    const { reservation } = reserved;
    const moved: string[] = [];

    try {
      const canonical = manifest.build.tags.map((tag) => canonicalReference(this.opts.registry, this.opts.namespace, manifest.name, tag));
      const candidate = canonicalReference(this.opts.registry, this.opts.namespace, manifest.name, `candidate-${attempt.source.commit.slice(0, 12)}`);

      const sources = attempt.results.flatMap((r) => (r.image ? [digestReference(r.image.reference, r.image.digest)] : []));
      this.log.info(`staging index ${candidate} from ${sources.length} platform images`);
      const indexDigest = await this.registry.createIndex(candidate, sources);

      const signatures: Array<{ reference: string; signature: string }> = [];
      for (const ref of canonical) {
        const reference = pinnedReference(ref, indexDigest);
        signatures.push({ reference, signature: await this.signer.sign(reference) });
      }
      this.log.info(`signed ${signatures.length} references at ${indexDigest}`);

      const predicate = buildProvenance({ manifest, attempt, indexDigest, signatures, published: canonical }, this.schemas);
      const attestation = await this.signer.attest(digestReference(candidate, indexDigest), predicate);
      const record = buildProvenance(
        { manifest, attempt, indexDigest, signatures, published: canonical, attestation, createdAt: new Date(predicate.createdAt) },
        this.schemas,
      );

      const source = digestReference(candidate, indexDigest);
      for (const ref of canonical) {
        await this.registry.tag(source, ref);
        moved.push(ref);
      }
      this.log.info(`published ${canonical.join(", ")}`);

      const digests: BuildState["digests"] = {};
      for (const p of record.platforms) digests[p.platform] = p.digest;

      const committed = await this.store.commit(reservation, {
        lastTag: attempt.source.ref,
        lastCommit: attempt.source.commit,
        builtAt: record.createdAt,
        digests,
        indexDigest,
        attemptId: attempt.id,
        published: canonical,
      });
      if (!committed.ok) throw committed.error;
      return { ok: true, record, state: committed.state };
    } catch (e) {
      const error = asPublishError(e);
      this.log.error(`publication aborted: ${error.message}`);
      await this.rollback(manifest.name, moved, prior);
      await this.store.release(reservation).catch((releaseError: unknown) => {
        this.log.warn(`could not release reservation of ${manifest.name}: ${errorMessage(releaseError)}`);
      });
      return { ok: false, error };
    }
  }

  /**
   * Point every tag this publication moved back at the index the stored
   * BuildState publishes it from, or remove it when the stored state does not
   * list it. The stored state is newer than `prior` when another writer took
   * over the reservation and committed.
   */
  private async rollback(name: string, moved: string[], prior: BuildState | null): Promise<void> {
    if (moved.length === 0) return;

    let recorded = prior;
    try {
      recorded = await this.store.read(name);
    } catch (e) {
      this.log.warn(`could not re-read BuildState of ${name}, restoring tags from the prior state: ${errorMessage(e)}`);
    }

    for (const ref of [...moved].reverse()) {
      try {
        if (recorded && recorded.published.includes(ref)) {
          await this.registry.tag(digestReference(ref, recorded.indexDigest), ref);
          this.log.warn(`restored ${ref} to ${recorded.indexDigest}`);
        } else {
          await this.registry.untag(ref);
          this.log.warn(`removed ${ref}`);
        }
      } catch (e) {
        this.log.error(`could not roll back ${ref}: ${errorMessage(e)}`);
      }
    }
  }
}
