import { mkdir, open, readFile, rename, stat, unlink, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { errorMessage } from "./errors.js";

export const STALE_LOCK_AGE_MS = 300000; // 5 minutes

/** Write JSON through a temp file + fsync + rename so readers never see a torn document. */
export async function atomicWriteJson(path: string, data: unknown): Promise<void> {
  await atomicWriteText(path, JSON.stringify(data, null, 2) + "\n");
}

export async function atomicWriteText(path: string, payload: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp.${process.pid}.${Date.now()}.${Math.random().toString(16).slice(2, 8)}`;

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w");
    await fh.writeFile(payload, "utf8");
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, path);
  } catch (e) {
    if (fh) await fh.close().catch(() => undefined);
    await unlink(tmp).catch(() => undefined);
    throw e;
  }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

export type ReleaseLock = () => Promise<void>;

/**
 * Exclusive lock file (`open(..., "wx")`) holding `pid\ntimestamp`.
 * Locks older than STALE_LOCK_AGE_MS, or owned by a dead process, are broken.
 */
export async function acquireFsLock(lockPath: string, timeoutMs: number, onWarn?: (msg: string) => void): Promise<ReleaseLock> {
  await mkdir(dirname(lockPath), { recursive: true });
  const started = Date.now();
  const pid = process.pid;
  const token = `${pid}:${started}:${Math.random().toString(16).slice(2, 10)}`;
  let retries = 0;

  for (;;) {
    await breakStaleLock(lockPath, onWarn);

    try {
      const fh = await open(lockPath, "wx");
      try {
        await fh.writeFile(`${pid}\n${Date.now()}\n${token}\n`, "utf8");
        await fh.sync();
      } finally {
        await fh.close();
      }

      return async () => {
        const content = await readFile(lockPath, "utf8");
        const [, , owner] = content.split("\n");
        if (owner === token) {
          await unlink(lockPath);
        } else {
          onWarn?.(`Lock was taken over before release (ours: ${token}): ${lockPath}`);
        }
      };
    } catch (e) {
      if (!isErrnoException(e) || e.code !== "EEXIST") throw e;

      retries++;
      if (Date.now() - started > timeoutMs) {
        throw new Error(`Timed out acquiring lock after ${retries} retries: ${lockPath}`);
      }

      // Exponential backoff with jitter
      const backoff = Math.min(10 * Math.pow(1.5, retries), 250);
      const jitter = Math.random() * backoff * 0.1;
      await new Promise((r) => setTimeout(r, backoff + jitter));
    }
  }
}

async function breakStaleLock(lockPath: string, onWarn?: (msg: string) => void): Promise<void> {
  let age: number;
  try {
    age = Date.now() - (await stat(lockPath)).mtimeMs;
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return;
    throw e;
  }

  if (age > STALE_LOCK_AGE_MS) {
    onWarn?.(`Removing stale lock (age: ${Math.round(age / 1000)}s): ${lockPath}`);
    await unlink(lockPath).catch(() => undefined);
    return;
  }

  const content = await readFile(lockPath, "utf8").catch(() => "");
  const [lockPid] = content.split("\n");
  if (!lockPid || lockPid === String(process.pid)) return;
  try {
    process.kill(Number(lockPid), 0);
  } catch (e) {
    if (isErrnoException(e) && e.code === "ESRCH") {
      onWarn?.(`Removing orphaned lock (pid: ${lockPid}): ${lockPath}`);
      await unlink(lockPath).catch(() => undefined);
      return;
    }
    onWarn?.(`Cannot check lock owner ${lockPid}: ${errorMessage(e)}`);
  }
}

/** Run `fn` while holding the lock; the lock is released even when `fn` throws. */
export async function withFsLock<T>(lockPath: string, timeoutMs: number, fn: () => Promise<T>, onWarn?: (msg: string) => void): Promise<T> {
  const release = await acquireFsLock(lockPath, timeoutMs, onWarn);
  try {
    return await fn();
  } finally {
    await release();
  }
}
