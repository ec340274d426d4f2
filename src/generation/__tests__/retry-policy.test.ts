import { describe, it, expect, vi } from "vitest";
import {
  RetryPolicy,
  backoffDelay,
  cancellableSleep,
  withRetry,
  DEFAULT_RETRY_OPTIONS,
} from "../retry-policy.ts";
import { GenerationError } from "../types.ts";
import { BufferLogger } from "../../observability/logger.ts";

describe("backoffDelay", () => {
  it("doubles from the base delay and caps at the maximum", () => {
    expect(backoffDelay(1, DEFAULT_RETRY_OPTIONS)).toBe(4_000);
    expect(backoffDelay(2, DEFAULT_RETRY_OPTIONS)).toBe(8_000);
    expect(backoffDelay(3, DEFAULT_RETRY_OPTIONS)).toBe(10_000);
  });
});

describe("withRetry", () => {
  it("succeeds on the third attempt after two backoffs", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    let calls = 0;
    const result = await withRetry(
      async (attempt) => {
        calls++;
        if (attempt < 3) throw new Error(`fail ${attempt}`);
        return "ok";
      },
      DEFAULT_RETRY_OPTIONS,
      { sleep },
    );

    expect(result).toBe("ok");
    expect(calls).toBe(3);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([4_000, 8_000]);
  });

  it("rethrows the last error once attempts run out", async () => {
    const logger = new BufferLogger();
    const sleep = vi.fn(async (_ms: number) => {});
    let attempts = 0;

    await expect(
      withRetry(
        async (attempt) => {
          attempts = attempt;
          throw new Error(`fail ${attempt}`);
        },
        DEFAULT_RETRY_OPTIONS,
        { sleep, logger, label: "research" },
      ),
    ).rejects.toThrow("fail 3");

    expect(attempts).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(logger.messages()).toEqual([
      "retry_scheduled",
      "retry_scheduled",
      "retry_exhausted",
    ]);
    expect(logger.entries[0]!.data).toEqual({
      label: "research",
      attempt: 1,
      maxAttempts: 3,
      delayMs: 4_000,
      error: "fail 1",
    });
  });

  it("makes a single attempt when maxAttempts is 1", async () => {
    const operation = vi.fn(async () => {
      throw new Error("once");
    });
    await expect(
      withRetry(operation, { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 }),
    ).rejects.toThrow("once");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("stops before the first attempt when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => "never");

    await expect(
      withRetry(operation, DEFAULT_RETRY_OPTIONS, { signal: controller.signal }),
    ).rejects.toMatchObject({ code: "ABORTED" });
    expect(operation).not.toHaveBeenCalled();
  });

  it("stops retrying when aborted during a backoff", async () => {
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      controller.abort();
      throw new Error("fail");
    });

    await expect(
      withRetry(operation, DEFAULT_RETRY_OPTIONS, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(GenerationError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe("cancellableSleep", () => {
  it("rejects at once for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(cancellableSleep(60_000, controller.signal)).rejects.toMatchObject({
      code: "ABORTED",
    });
  });

  it("resolves after the delay", async () => {
    await expect(cancellableSleep(1)).resolves.toBeUndefined();
  });
});

describe("RetryPolicy", () => {
  it("passes its options and sleep to every run", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const policy = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 50 }, undefined, sleep);
    let calls = 0;

    const value = await policy.run(async () => {
      calls++;
      if (calls === 1) throw new Error("transient");
      return 42;
    });

    expect(value).toBe(42);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([10]);
  });
});
