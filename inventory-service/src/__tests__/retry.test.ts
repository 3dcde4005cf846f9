import { describe, expect, it, vi } from "vitest";
import { TimeoutError } from "../common/errors";
import {
  backoffDelay,
  retry,
  withTimeout,
  type RetryPolicy,
} from "../common/retry";

const immediate: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 0,
  backoffMultiplier: 2,
  maxDelayMs: 0,
};

describe("backoffDelay", () => {
  it("doubles from the base delay", () => {
    expect(backoffDelay(1)).toBe(200);
    expect(backoffDelay(2)).toBe(400);
    expect(backoffDelay(3)).toBe(800);
  });

  it("is zero before any failure", () => {
    expect(backoffDelay(0)).toBe(0);
  });

  it("is capped by maxDelayMs", () => {
    const policy = { ...immediate, baseDelayMs: 200, maxDelayMs: 500 };
    expect(backoffDelay(3, policy)).toBe(500);
  });
});

describe("retry", () => {
  it("returns the value once an attempt succeeds", async () => {
    let calls = 0;
    const onRetry = vi.fn();

    const result = await retry(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`failure ${calls}`);
        return "done";
      },
      immediate,
      { onRetry }
    );

    expect(result).toEqual({ ok: true, value: "done", attempts: 3 });
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, new Error("failure 1"), 1, 0);
    expect(onRetry).toHaveBeenNthCalledWith(2, new Error("failure 2"), 2, 0);
  });

  it("returns the last error after maxAttempts", async () => {
    let calls = 0;
    const result = await retry(async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    }, immediate);

    expect(calls).toBe(3);
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.message).toBe("failure 3");
    expect(result.attempts).toBe(3);
  });

  it("wraps non-Error rejections", async () => {
    const result = await retry(() => Promise.reject("boom"), {
      ...immediate,
      maxAttempts: 1,
    });

    expect(!result.ok && result.error).toEqual(new Error("boom"));
  });
});

describe("withTimeout", () => {
  it("resolves with the operation's value", async () => {
    await expect(withTimeout("quick op", 100, async () => 7)).resolves.toBe(7);
  });

  it("rejects with a TimeoutError past the deadline", async () => {
    const pending = withTimeout(
      "slow op",
      10,
      () => new Promise<never>(() => undefined)
    );

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow("slow op timed out after 10ms");
  });
});
