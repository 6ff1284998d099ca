import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { BuildCoordinator, type BuildContext } from "../src/build/coordinator.js";
import { ProvenancePublisher, publicationBlockers } from "../src/publish/publisher.js";
import {
  FileBuildStateStore,
  compareAndSwap,
  type BuildStateRecord,
  type BuildStateStore,
  type CommitResult,
} from "../src/state/build-state-store.js";
import { ConcurrentUpdateConflictError } from "../src/core/errors.js";
import { createRegistry, type SchemaRegistry } from "../src/schema/registry.js";
import { sha256Digest } from "../src/artifact-writer/checksum.js";
import type { Manifest, Platform } from "../src/types/manifest.js";
import type { BuildAttempt } from "../src/types/attempt.js";
import type { ExpectedState, Reservation } from "../src/types/build-state.js";
import {
  COMMIT_A,
  FakeBuilder,
  FakeRegistry,
  FakeSigner,
  FakeTests,
  BASE_MANIFEST_YAML,
  REPO,
  fakeDigest,
  loadManifest,
  type BuildBehavior,
} from "./fakes.js";

const CTX: BuildContext = {
  attemptId: "base-v0.1.0-20260301-001",
  source: { repo: REPO, ref: "v0.1.0", commit: COMMIT_A },
  sourceDir: "/tmp/checkout",
};

const OPTIONS = { registry: "images.canfar.net", namespace: "library", owner: "runner-1" };

const AMD64_REF = "images.canfar.net/staging/base:aaaaaaaaaaaa-linux-amd64";
const ARM64_REF = "images.canfar.net/staging/base:aaaaaaaaaaaa-linux-arm64";
const SOURCES = [
  `images.canfar.net/staging/base@${fakeDigest(AMD64_REF)}`,
  `images.canfar.net/staging/base@${fakeDigest(ARM64_REF)}`,
];
const INDEX_DIGEST = sha256Digest(SOURCES.join(","));

const TWO_TAGS_YAML = BASE_MANIFEST_YAML.replace("    - latest\n", '    - latest\n    - "0.1"\n');
const LATEST = "images.canfar.net/library/base:latest";
const PREVIOUS_INDEX = sha256Digest("previous-index");

function publishedRecord(indexDigest: string, attemptId: string): BuildStateRecord {
  return {
    lastTag: "v0.0.9",
    lastCommit: COMMIT_A,
    builtAt: "2026-01-01T00:00:00.000Z",
    digests: {},
    indexDigest,
    attemptId,
    published: [LATEST],
  };
}

/** Another writer takes the reservation over and commits just before ours lands. */
class OvertakenStore implements BuildStateStore {
  constructor(
    private readonly inner: BuildStateStore,
    private readonly winner: BuildStateRecord | null,
  ) {}

  read(name: string) {
    return this.inner.read(name);
  }

  reserve(name: string, expected: ExpectedState, owner: string) {
    return this.inner.reserve(name, expected, owner);
  }

  async commit(reservation: Reservation): Promise<CommitResult> {
    await this.inner.release(reservation);
    if (this.winner) await compareAndSwap(this.inner, reservation.name, null, this.winner, "runner-2");
    return { ok: false, error: new ConcurrentUpdateConflictError(`Reservation of ${reservation.name} was taken over`) };
  }

  release(reservation: Reservation) {
    return this.inner.release(reservation);
  }

  list() {
    return this.inner.list();
  }
}

async function attemptFor(manifest: Manifest, behavior: Partial<Record<Platform, BuildBehavior>> = {}): Promise<BuildAttempt> {
  const coordinator = new BuildCoordinator(new FakeBuilder(behavior), new FakeTests(), {
    registry: "images.canfar.net",
    stagingNamespace: "staging",
    buildAttempts: 1,
    backoffMs: 0,
    timeoutMs: 10_000,
  });
  return coordinator.build(manifest, manifest.build.platforms, CTX);
}

describe("ProvenancePublisher", () => {
  let tmpDir: string;
  let schemas: SchemaRegistry;
  let store: FileBuildStateStore;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "libraryctl-publish-"));
    schemas = await createRegistry();
    store = new FileBuildStateStore(tmpDir, schemas, { leaseMs: 60_000 });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("publishes a fully successful attempt", async () => {
    const manifest = await loadManifest();
    const attempt = await attemptFor(manifest);
    const registry = new FakeRegistry();
    const signer = new FakeSigner();

    const res = await new ProvenancePublisher(registry, signer, store, schemas, OPTIONS).publish(manifest, attempt, null);
    if (!res.ok) throw res.error;

    expect(registry.indexes).toEqual([
      { target: "images.canfar.net/library/base:candidate-aaaaaaaaaaaa", sources: SOURCES, digest: INDEX_DIGEST },
    ]);
    expect(signer.signed).toEqual([`images.canfar.net/library/base:latest@${INDEX_DIGEST}`]);
    expect(signer.attested.map((a) => a.subject)).toEqual([`images.canfar.net/library/base@${INDEX_DIGEST}`]);
    expect(registry.tags).toEqual([
      { source: `images.canfar.net/library/base@${INDEX_DIGEST}`, target: "images.canfar.net/library/base:latest" },
    ]);

    expect(res.record).toMatchObject({
      schemaVersion: "1.0.0",
      attemptId: CTX.attemptId,
      manifest: { name: "base", identifier: "test-base", project: "testing", version: 0.2 },
      source: { repo: REPO, ref: "v0.1.0", commit: COMMIT_A },
      builder: { backend: "buildkit", name: "buildx", version: "0.0.0-test" },
      platforms: [
        { platform: "linux/amd64", digest: fakeDigest(AMD64_REF) },
        { platform: "linux/arm64", digest: fakeDigest(ARM64_REF) },
      ],
      indexDigest: INDEX_DIGEST,
      signatures: [{ reference: `images.canfar.net/library/base:latest@${INDEX_DIGEST}`, signature: "images.canfar.net/library/base:latest:sig" }],
      attestation: "images.canfar.net/library/base:att",
      published: ["images.canfar.net/library/base:latest"],
    });
    expect(Object.isFrozen(res.record)).toBe(true);
    expect(Object.isFrozen(res.record.platforms[0])).toBe(true);

    const predicate = signer.attested[0].predicate;
    expect(predicate).toMatchObject({ indexDigest: INDEX_DIGEST, createdAt: res.record.createdAt });
    expect(predicate).not.toHaveProperty("attestation");

    expect(res.state).toEqual({
      name: "base",
      version: 1,
      lastTag: "v0.1.0",
      lastCommit: COMMIT_A,
      builtAt: res.record.createdAt,
      digests: { "linux/amd64": fakeDigest(AMD64_REF), "linux/arm64": fakeDigest(ARM64_REF) },
      indexDigest: INDEX_DIGEST,
      attemptId: CTX.attemptId,
      published: ["images.canfar.net/library/base:latest"],
    });
    expect(await store.read("base")).toEqual(res.state);
  });

  it("refuses a partial attempt without touching the registry", async () => {
    const manifest = await loadManifest();
    const attempt = await attemptFor(manifest, { "linux/arm64": "fail" });
    const registry = new FakeRegistry();
    const signer = new FakeSigner();

    const res = await new ProvenancePublisher(registry, signer, store, schemas, OPTIONS).publish(manifest, attempt, null);

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.kind).toBe("PublicationError");
      expect(res.error.message).toBe(`Refusing to publish: attempt ${CTX.attemptId} is partial; missing platforms: linux/arm64`);
    }
    expect(registry.indexes).toEqual([]);
    expect(signer.signed).toEqual([]);
    expect(await store.read("base")).toBeNull();
  });

  it("leaves no tags and no state when signing fails", async () => {
    const manifest = await loadManifest();
    const attempt = await attemptFor(manifest);
    const registry = new FakeRegistry();

    const res = await new ProvenancePublisher(registry, new FakeSigner({ sign: true }), store, schemas, OPTIONS).publish(
      manifest,
      attempt,
      null,
    );

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.kind).toBe("SigningFailed");
      expect(res.error.message).toBe(`cosign sign failed for images.canfar.net/library/base:latest@${INDEX_DIGEST} (exit 1)`);
    }
    expect(registry.live()).toEqual([]);
    expect(await store.read("base")).toBeNull();
    expect((await store.reserve("base", null, "runner-2")).ok).toBe(true);
  });

  it("leaves the state unchanged when attestation fails", async () => {
    const manifest = await loadManifest();
    const attempt = await attemptFor(manifest);
    const registry = new FakeRegistry();

    const res = await new ProvenancePublisher(registry, new FakeSigner({ attest: true }), store, schemas, OPTIONS).publish(
      manifest,
      attempt,
      null,
    );

    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.kind).toBe("SigningFailed");
    expect(registry.live()).toEqual([]);
    expect(await store.read("base")).toBeNull();
  });

  it("removes tags already moved when a later tag fails on a first publish", async () => {
    const manifest = await loadManifest(TWO_TAGS_YAML);
    const attempt = await attemptFor(manifest);
    const registry = new FakeRegistry({ tag: "0.1" });

    const res = await new ProvenancePublisher(registry, new FakeSigner(), store, schemas, OPTIONS).publish(manifest, attempt, null);

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.kind).toBe("PublicationError");
      expect(res.error.message).toBe("imagetools create failed for images.canfar.net/library/base:0.1");
    }
    expect(registry.untagged).toEqual([LATEST]);
    expect(registry.live()).toEqual([]);
    expect(await store.read("base")).toBeNull();
    expect((await store.reserve("base", null, "runner-2")).ok).toBe(true);
  });

  it("restores tags to the published index when a later tag fails", async () => {
    const seeded = await compareAndSwap(store, "base", null, publishedRecord(PREVIOUS_INDEX, "base-v0.0.9-20260101-001"), "runner-0");
    if (!seeded.ok) throw seeded.error;
    const previous = `images.canfar.net/library/base@${PREVIOUS_INDEX}`;
    const manifest = await loadManifest(TWO_TAGS_YAML);
    const attempt = await attemptFor(manifest);
    const registry = new FakeRegistry({ tag: "0.1" }, { [LATEST]: previous });

    const res = await new ProvenancePublisher(registry, new FakeSigner(), store, schemas, OPTIONS).publish(
      manifest,
      attempt,
      seeded.state,
    );

    expect(res.ok).toBe(false);
    expect(registry.tags.map((t) => t.source)).toEqual([`images.canfar.net/library/base@${INDEX_DIGEST}`, previous]);
    expect(registry.live()).toEqual([LATEST]);
    expect(registry.pointer(LATEST)).toBe(previous);
    expect(registry.untagged).toEqual([]);
    expect(await store.read("base")).toEqual(seeded.state);
  });

  it("rolls tags back when the state commit is rejected", async () => {
    const manifest = await loadManifest();
    const attempt = await attemptFor(manifest);
    const registry = new FakeRegistry();

    const res = await new ProvenancePublisher(registry, new FakeSigner(), new OvertakenStore(store, null), schemas, OPTIONS).publish(
      manifest,
      attempt,
      null,
    );

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.kind).toBe("ConcurrentUpdateConflict");
      expect(res.error.message).toBe("Reservation of base was taken over");
    }
    expect(registry.live()).toEqual([]);
    expect(await store.read("base")).toBeNull();
  });

  it("leaves tags matching the state another writer committed", async () => {
    const winnerIndex = sha256Digest("winner-index");
    const manifest = await loadManifest();
    const attempt = await attemptFor(manifest);
    const registry = new FakeRegistry();
    const winner = publishedRecord(winnerIndex, "base-v0.1.0-20260301-002");

    const res = await new ProvenancePublisher(registry, new FakeSigner(), new OvertakenStore(store, winner), schemas, OPTIONS).publish(
      manifest,
      attempt,
      null,
    );

    expect(res.ok).toBe(false);
    expect(registry.pointer(LATEST)).toBe(`images.canfar.net/library/base@${winnerIndex}`);
    expect((await store.read("base"))?.indexDigest).toBe(winnerIndex);
  });

  it("reports a registry failure as PublicationError", async () => {
    const manifest = await loadManifest();
    const attempt = await attemptFor(manifest);

    const res = await new ProvenancePublisher(new FakeRegistry({ createIndex: true }), new FakeSigner(), store, schemas, OPTIONS).publish(
      manifest,
      attempt,
      null,
    );

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.kind).toBe("PublicationError");
      expect(res.error.message).toBe("imagetools create failed for images.canfar.net/library/base:candidate-aaaaaaaaaaaa");
    }
    expect(await store.read("base")).toBeNull();
  });

  it("lets only one of two concurrent publications win", async () => {
    const manifest = await loadManifest();
    const attempt = await attemptFor(manifest);
    const publisher = (owner: string) =>
      new ProvenancePublisher(new FakeRegistry(), new FakeSigner(), store, schemas, { ...OPTIONS, owner });

    const results = await Promise.all([
      publisher("runner-1").publish(manifest, attempt, null),
      publisher("runner-2").publish(manifest, attempt, null),
    ]);

    expect(results.filter((r) => r.ok)).toHaveLength(1);
    const losers = results.flatMap((r) => (r.ok ? [] : [r.error]));
    expect(losers.map((e) => e.kind)).toEqual(["ConcurrentUpdateConflict"]);
    expect((await store.read("base"))?.version).toBe(1);
  });

  it("refuses to publish against a stale prior state", async () => {
    const manifest = await loadManifest();
    const attempt = await attemptFor(manifest);
    const first = await new ProvenancePublisher(new FakeRegistry(), new FakeSigner(), store, schemas, OPTIONS).publish(manifest, attempt, null);
    expect(first.ok).toBe(true);

    const registry = new FakeRegistry();
    const res = await new ProvenancePublisher(registry, new FakeSigner(), store, schemas, OPTIONS).publish(manifest, attempt, null);

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.kind).toBe("ConcurrentUpdateConflict");
      expect(res.error.message).toBe("BuildState of base changed: expected no prior state, found v0.1.0 (version 1)");
    }
    expect(registry.indexes).toEqual([]);
  });
});

describe("publicationBlockers", () => {
  it("names undeclared platforms and a foreign manifest", async () => {
    const manifest = await loadManifest();
    const attempt = await attemptFor(manifest);
    const narrowed: Manifest = { ...manifest, name: "other", build: { ...manifest.build, platforms: ["linux/amd64"] } };

    expect(publicationBlockers(narrowed, attempt)).toEqual([
      `attempt ${CTX.attemptId} belongs to base, not other`,
      "undeclared platforms: linux/arm64",
    ]);
    expect(publicationBlockers(manifest, attempt)).toEqual([]);
  });
});
