import { describe, expect, it } from "vitest";

import { toMajorUnits, toMinorUnits } from "./money";

describe("money", () => {
  it("converts major units to integer cents", () => {
    expect(toMinorUnits(5000)).toBe(500000);
    expect(toMinorUnits(12.34)).toBe(1234);
    expect(toMinorUnits("7.5")).toBe(750);
  });

  it("rounds half cents through the decimal representation", () => {
    expect(toMinorUnits(1.005)).toBe(101);
    expect(toMinorUnits(44935 / 12)).toBe(374458);
  });

  it("treats non-finite input as zero", () => {
    expect(toMinorUnits(Number.NaN)).toBe(0);
    expect(toMinorUnits(undefined)).toBe(0);
    expect(toMinorUnits("abc")).toBe(0);
  });

  it("handles exponent notation", () => {
    expect(toMinorUnits(1e-7)).toBe(0);
    expect(toMinorUnits(1e21)).toBe(1e23);
  });

  it("converts back to major units", () => {
    expect(toMajorUnits(1234)).toBe(12.34);
    expect(toMajorUnits(Number.POSITIVE_INFINITY)).toBe(0);
  });
});
