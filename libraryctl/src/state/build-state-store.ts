import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { BuildState, BuildStateDocument, ExpectedState, Reservation } from "../types/build-state.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { ConcurrentUpdateConflictError } from "../core/errors.js";
import { atomicWriteJson, withFsLock } from "../core/fs-lock.js";
import { sanitizePathComponent } from "../core/security.js";

export type BuildStateRecord = Omit<BuildState, "name" | "version">;

export type ReserveResult = { ok: true; reservation: Reservation } | { ok: false; error: ConcurrentUpdateConflictError };

export type CommitResult = { ok: true; state: BuildState } | { ok: false; error: ConcurrentUpdateConflictError };

/**
 * Durable BuildState per manifest. Writers first `reserve` against the state
 * they expect (compare-and-swap), then `commit` or `release`.
 */
export interface BuildStateStore {
  read(name: string): Promise<BuildState | null>;
  reserve(name: string, expected: ExpectedState, owner: string): Promise<ReserveResult>;
  commit(reservation: Reservation, next: BuildStateRecord): Promise<CommitResult>;
  release(reservation: Reservation): Promise<void>;
  list(): Promise<BuildState[]>;
}

/** Expected state for replacing `current` (null when never built). */
export function expectedFrom(current: BuildState | null): ExpectedState {
  return current ? { lastTag: current.lastTag, version: current.version } : null;
}

/** Single-step compare-and-swap: reserve then commit. */
export async function compareAndSwap(
  store: BuildStateStore,
  name: string,
  expected: ExpectedState,
  next: BuildStateRecord,
  owner: string,
): Promise<CommitResult> {
  const reserved = await store.reserve(name, expected, owner);
  if (!reserved.ok) return reserved;
  return store.commit(reserved.reservation, next);
}

export type FileStoreOptions = {
  leaseMs: number;
  lockTimeoutMs?: number;
  now?: () => number;
  onWarn?: (msg: string) => void;
};

function toState(doc: BuildStateDocument): BuildState | null {
  return doc.current ? { name: doc.name, version: doc.version, ...doc.current } : null;
}

/**
 * File-backed store: `<stateDir>/<name>.json`, replaced atomically while
 * holding `<stateDir>/.locks/<name>.lock`.
 */
export class FileBuildStateStore implements BuildStateStore {
  private readonly now: () => number;
  private readonly lockTimeoutMs: number;

  constructor(
    private readonly stateDir: string,
    private readonly registry: SchemaRegistry,
    private readonly opts: FileStoreOptions,
  ) {
    this.now = opts.now ?? Date.now;
    this.lockTimeoutMs = opts.lockTimeoutMs ?? 10000;
  }

  async read(name: string): Promise<BuildState | null> {
    return toState(this.readDoc(name));
  }

  async reserve(name: string, expected: ExpectedState, owner: string): Promise<ReserveResult> {
    return this.locked<ReserveResult>(name, async () => {
      const doc = this.readDoc(name);

      if (doc.reservation && Date.parse(doc.reservation.expiresAt) > this.now()) {
        return this.conflict(`${name} is reserved by ${doc.reservation.owner} until ${doc.reservation.expiresAt}`, name);
      }
      if (doc.reservation) {
        this.opts.onWarn?.(`Ignoring expired reservation of ${name} by ${doc.reservation.owner}`);
      }

      if (!matches(doc, expected)) {
        const actual = doc.current ? `${doc.current.lastTag} (version ${doc.version})` : "no prior state";
        const wanted = expected ? `${expected.lastTag} (version ${expected.version})` : "no prior state";
        return this.conflict(`BuildState of ${name} changed: expected ${wanted}, found ${actual}`, name);
      }

      const reservation: Reservation = {
        name,
        owner,
        token: randomUUID(),
        expiresAt: new Date(this.now() + this.opts.leaseMs).toISOString(),
        baseVersion: doc.version,
      };
      await this.writeDoc({
        ...doc,
        reservation: { owner, token: reservation.token, expiresAt: reservation.expiresAt },
      });
      return { ok: true, reservation };
    });
  }

  async commit(reservation: Reservation, next: BuildStateRecord): Promise<CommitResult> {
    return this.locked<CommitResult>(reservation.name, async () => {
      const doc = this.readDoc(reservation.name);
      if (doc.reservation?.token !== reservation.token || doc.version !== reservation.baseVersion) {
        return this.conflict(`Reservation of ${reservation.name} by ${reservation.owner} is no longer held`, reservation.name);
      }

      const updated: BuildStateDocument = {
        name: reservation.name,
        version: doc.version + 1,
        current: next,
        reservation: null,
      };
      await this.writeDoc(updated);
      const state = toState(updated);
      if (!state) throw new Error(`Committed state of ${reservation.name} is empty`);
      return { ok: true, state };
    });
  }

  async release(reservation: Reservation): Promise<void> {
    await this.locked(reservation.name, async () => {
      const doc = this.readDoc(reservation.name);
      if (doc.reservation?.token !== reservation.token) return;
      await this.writeDoc({ ...doc, reservation: null });
    });
  }

  async list(): Promise<BuildState[]> {
    if (!fs.existsSync(this.stateDir)) return [];
    const states: BuildState[] = [];
    for (const file of fs.readdirSync(this.stateDir).filter((f) => f.endsWith(".json")).sort()) {
      const state = toState(this.readDoc(file.replace(/\.json$/, "")));
      if (state) states.push(state);
    }
    return states;
  }

  private filePath(name: string): string {
    return path.join(this.stateDir, `${sanitizePathComponent(name)}.json`);
  }

  private readDoc(name: string): BuildStateDocument {
    const file = this.filePath(name);
    if (!fs.existsSync(file)) {
      return { name, version: 0, current: null, reservation: null };
    }

    const data: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
    const validate = this.registry.getValidator<BuildStateDocument>("build-state");
    if (!validate(data)) {
      const { errors } = this.registry.validate("build-state", data);
      throw new Error(`Corrupt build state ${file}: ${errors ?? "schema validation failed"}`);
    }
    return data;
  }

  private async writeDoc(doc: BuildStateDocument): Promise<void> {
    const { valid, errors } = this.registry.validate("build-state", doc);
    if (!valid) throw new Error(`Refusing to write invalid build state for ${doc.name}: ${errors}`);
    await atomicWriteJson(this.filePath(doc.name), doc);
  }

  private locked<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const lockPath = path.join(this.stateDir, ".locks", `${sanitizePathComponent(name)}.lock`);
    return withFsLock(lockPath, this.lockTimeoutMs, fn, this.opts.onWarn);
  }

  private conflict(message: string, name: string): { ok: false; error: ConcurrentUpdateConflictError } {
    return { ok: false, error: new ConcurrentUpdateConflictError(message, { name }) };
  }
}

function matches(doc: BuildStateDocument, expected: ExpectedState): boolean {
  if (expected === null) return doc.current === null;
  return doc.current !== null && doc.current.lastTag === expected.lastTag && doc.version === expected.version;
}
