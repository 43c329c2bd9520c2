// pattern: Imperative Shell

import { describe, it, expect, vi, afterEach } from "vitest";
import { callWithRetry, isRetryableModelError } from "./retry.js";
import { ModelError } from "./types.js";

describe("callWithRetry", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe("success path", () => {
    it("should call function once if successful on first attempt", async () => {
      let callCount = 0;

      const result = await callWithRetry(async () => {
        callCount++;
        return "success";
      });

      expect(result).toBe("success");
      expect(callCount).toBe(1);
    });
  });

  describe("retryable errors", () => {
    it("should retry up to 3 times for retryable model errors", async () => {
      let callCount = 0;

      await expect(
        callWithRetry(
          async () => {
            callCount++;
            throw new ModelError("rate_limit", true, "slow down");
          },
          { initialBackoffMs: 0 }
        )
      ).rejects.toThrow("slow down");

      expect(callCount).toBe(3);
    });

    it("should succeed after retrying", async () => {
      let callCount = 0;

      const result = await callWithRetry(
        async () => {
          callCount++;
          if (callCount < 2) {
            throw new ModelError("timeout", true, "timed out");
          }
          return "success after retry";
        },
        { initialBackoffMs: 0 }
      );

      expect(result).toBe("success after retry");
      expect(callCount).toBe(2);
    });

    it("should call onError callback on each attempt", async () => {
      const attempts: Array<number> = [];

      await expect(
        callWithRetry(
          async () => {
            throw new Error("always fail");
          },
          {
            initialBackoffMs: 0,
            isRetryableError: () => true,
            onError: (_error, attempt) => {
              attempts.push(attempt);
            },
          }
        )
      ).rejects.toThrow("always fail");

      expect(attempts).toEqual([0, 1, 2]);
    });

    it("should honor a custom attempt count", async () => {
      let callCount = 0;

      await expect(
        callWithRetry(
          async () => {
            callCount++;
            throw new ModelError("rate_limit", true, "slow down");
          },
          { maxAttempts: 5, initialBackoffMs: 0 }
        )
      ).rejects.toBeInstanceOf(ModelError);

      expect(callCount).toBe(5);
    });
  });

  describe("non-retryable errors", () => {
    it("should throw immediately for non-retryable errors", async () => {
      let callCount = 0;

      await expect(
        callWithRetry(async () => {
          callCount++;
          throw new ModelError("auth", false, "bad key");
        })
      ).rejects.toThrow("bad key");

      expect(callCount).toBe(1);
    });

    it("should not retry plain errors by default", async () => {
      expect(isRetryableModelError(new Error("boom"))).toBe(false);
      expect(isRetryableModelError(new ModelError("api_error", false))).toBe(false);
      expect(isRetryableModelError(new ModelError("rate_limit", true))).toBe(true);
    });
  });

  describe("backoff timing", () => {
    it("should double the backoff between attempts", async () => {
      vi.useFakeTimers();
      const timestamps: Array<number> = [];

      const pending = callWithRetry(
        async () => {
          timestamps.push(Date.now());
          throw new ModelError("rate_limit", true, "retry");
        },
        { initialBackoffMs: 1000 }
      );
      const assertion = expect(pending).rejects.toThrow("retry");

      await vi.runAllTimersAsync();
      await assertion;

      expect(timestamps.length).toBe(3);
      expect(timestamps.map((t) => t - (timestamps[0] ?? 0))).toEqual([0, 1000, 3000]);
    });
  });
});
