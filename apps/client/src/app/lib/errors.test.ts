import { describe, expect, it } from "vitest";
import { z } from "zod";

import { ApiError, EngineError, TimeoutError, toEngineErrorKind } from "./errors";
import { withTimeout } from "./withTimeout";

describe("toEngineErrorKind", () => {
  it("maps thrown values to engine error kinds", () => {
    expect(toEngineErrorKind(new EngineError("CACHE_CORRUPTION", "bad row"))).toBe(
      "CACHE_CORRUPTION"
    );
    expect(toEngineErrorKind(new ApiError(503, "down"))).toBe("REMOTE_UNAVAILABLE");
    expect(toEngineErrorKind(new TypeError("fetch failed"))).toBe("REMOTE_UNAVAILABLE");
    expect(toEngineErrorKind(new TimeoutError("profile", 5000))).toBe(
      "REMOTE_UNAVAILABLE"
    );
    expect(toEngineErrorKind("boom")).toBe("REMOTE_UNAVAILABLE");

    const parsed = z.object({ monthlyIncome: z.number() }).safeParse({});
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(toEngineErrorKind(parsed.error)).toBe("INVALID_PROFILE");
    }
  });
});

describe("withTimeout", () => {
  it("resolves with the task result", async () => {
    await expect(withTimeout("fast", 1000, async () => 42)).resolves.toBe(42);
  });

  it("rejects and aborts the signal after the timeout", async () => {
    const seen: { signal?: AbortSignal } = {};
    const never = (signal: AbortSignal) => {
      seen.signal = signal;
      return new Promise<number>(() => undefined);
    };

    await expect(withTimeout("slow", 10, never)).rejects.toBeInstanceOf(TimeoutError);
    expect(seen.signal?.aborted).toBe(true);
  });

  it("passes task errors through", async () => {
    await expect(
      withTimeout("failing", 1000, async () => {
        throw new ApiError(500, "server error");
      })
    ).rejects.toMatchObject({ name: "ApiError", status: 500 });
  });
});
