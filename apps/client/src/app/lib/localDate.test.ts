import { describe, expect, it } from "vitest";

import { localDay } from "./localDate";

describe("localDay", () => {
  it("resolves the calendar day in the given time zone", () => {
    const instant = new Date("2024-03-01T03:30:00Z");
    expect(localDay(instant, "America/New_York")).toEqual({
      year: 2024,
      month: 2,
      day: 29,
      iso: "2024-02-29",
    });
    expect(localDay(instant, "Asia/Tokyo").iso).toBe("2024-03-01");
  });

  it("falls back to the default zone for an unknown one", () => {
    const instant = new Date("2024-03-01T03:30:00Z");
    expect(localDay(instant, "Not/AZone").iso).toBe("2024-02-29");
  });
});
