import { describe, expect, it } from "vitest";

import { AsyncLock } from "./asyncLock";
import { calendarKey, parseCalendarKey } from "./cacheKeys";

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

describe("AsyncLock", () => {
  it("runs tasks one at a time in call order", async () => {
    const lock = new AsyncLock();
    const events: string[] = [];

    const slow = lock.run(async () => {
      events.push("slow:start");
      await delay(20);
      events.push("slow:end");
      return 1;
    });
    const fast = lock.run(() => {
      events.push("fast");
      return 2;
    });

    await expect(Promise.all([slow, fast])).resolves.toEqual([1, 2]);
    expect(events).toEqual(["slow:start", "slow:end", "fast"]);
  });

  it("keeps going after a task fails", async () => {
    const lock = new AsyncLock();
    const failed = lock.run(async () => {
      throw new Error("boom");
    });
    const next = lock.run(() => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});

describe("cacheKeys", () => {
  it("builds and parses calendar keys", () => {
    expect(calendarKey(2024, 3)).toBe("calendar:2024:3");
    expect(parseCalendarKey("calendar:2024:3")).toEqual({ year: 2024, month: 3 });
    expect(parseCalendarKey("calendar:2024:13")).toBeNull();
    expect(parseCalendarKey("dashboard")).toBeNull();
  });
});
