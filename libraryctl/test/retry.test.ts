import { describe, expect, it, vi } from "vitest";
import { RetriesExhaustedError, withRetry } from "../src/core/retry.js";
import { BuildFailureError, TransientInfraError, isLibraryError } from "../src/core/errors.js";

const retryable = (e: unknown) => isLibraryError(e) && e.retryable;

describe("withRetry", () => {
  it("returns the value and the attempt count", async () => {
    const res = await withRetry(async () => "done", { attempts: 3, backoffMs: 0, isRetryable: retryable });
    expect(res).toEqual({ value: "done", attempts: 1 });
  });

  it("retries retryable failures until one succeeds", async () => {
    const onRetry = vi.fn();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransientInfraError("503"))
      .mockRejectedValueOnce(new TransientInfraError("503"))
      .mockResolvedValue("pushed");

    const res = await withRetry(fn, { attempts: 3, backoffMs: 0, isRetryable: retryable, onRetry });
    expect(res).toEqual({ value: "pushed", attempts: 3 });
    expect(fn.mock.calls.map((c) => c[0])).toEqual([1, 2, 3]);
    expect(onRetry.mock.calls.map((c) => c[0])).toEqual([1, 2]);
  });

  it("rethrows a non-retryable error without retrying", async () => {
    const failure = new BuildFailureError("RUN step failed");
    const fn = vi.fn(async () => {
      throw failure;
    });

    await expect(withRetry(fn, { attempts: 5, backoffMs: 0, isRetryable: retryable })).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("gives up after the configured attempts", async () => {
    const last = new TransientInfraError("connection reset");
    const fn = vi.fn(async () => {
      throw last;
    });

    const err = await withRetry(fn, { attempts: 2, backoffMs: 0, isRetryable: retryable }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetriesExhaustedError);
    if (err instanceof RetriesExhaustedError) {
      expect(err.attempts).toBe(2);
      expect(err.last).toBe(last);
      expect(err.message).toBe("Gave up after 2 attempts: connection reset");
    }
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("treats attempts below one as a single attempt", async () => {
    const fn = vi.fn(async () => {
      throw new TransientInfraError("timeout");
    });
    await expect(withRetry(fn, { attempts: 0, backoffMs: 0, isRetryable: retryable })).rejects.toBeInstanceOf(RetriesExhaustedError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("backs off exponentially", async () => {
    const delays: number[] = [];
    vi.spyOn(Math, "random").mockReturnValue(0);
    try {
      await withRetry(
        async (attempt) => {
          if (attempt < 3) throw new TransientInfraError("503");
          return attempt;
        },
        { attempts: 3, backoffMs: 1, isRetryable: retryable, onRetry: (_a, _e, delay) => delays.push(delay) },
      );
    } finally {
      vi.restoreAllMocks();
    }
    expect(delays).toEqual([1, 2]);
  });

  it("stops waiting once aborted", async () => {
    const controller = new AbortController();
    const reason = new Error("aborted by test");
    const run = withRetry(
      async () => {
        throw new TransientInfraError("503");
      },
      {
        attempts: 3,
        backoffMs: 60_000,
        isRetryable: retryable,
        signal: controller.signal,
        onRetry: () => controller.abort(reason),
      },
    );
    await expect(run).rejects.toBe(reason);
  });
});
