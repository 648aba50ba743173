import { describe, expect, it } from "vitest";

import {
  annualIncomeMinor,
  classifyAnnualMinor,
  classifyIncome,
  classifyProfile,
  getTierRange,
  isNearTierBoundary,
  TIER_LABELS,
} from "./incomeClassifier";
import { getIncomeThresholds } from "./thresholdTable";

describe("incomeClassifier", () => {
  const ca = getIncomeThresholds("US", "CA");

  it("puts an annual income exactly on a boundary in the lower tier", () => {
    expect(classifyAnnualMinor(4493500, ca)).toBe("low");
    expect(classifyAnnualMinor(4493501, ca)).toBe("lowerMiddle");
    expect(classifyAnnualMinor(7189600, ca)).toBe("lowerMiddle");
    expect(classifyAnnualMinor(7189601, ca)).toBe("middle");
    expect(classifyAnnualMinor(17974000, ca)).toBe("upperMiddle");
    expect(classifyAnnualMinor(17974001, ca)).toBe("high");
  });

  it("classifies monthly incomes derived from boundary values", () => {
    expect(classifyIncome(44935 / 12, "US", "CA")).toBe("low");
    expect(classifyIncome(44936 / 12, "US", "CA")).toBe("lowerMiddle");
    expect(classifyIncome(71896 / 12, "US", "CA")).toBe("lowerMiddle");
    expect(classifyIncome(71897 / 12, "US", "CA")).toBe("middle");
  });

  it("keeps a monthly amount that lands exactly on a boundary in the lower tier", () => {
    // MS middle boundary 62,400 / 12 = 5,200.00
    expect(classifyIncome(5200, "US", "MS")).toBe("middle");
    expect(classifyIncome(5200.01, "US", "MS")).toBe("upperMiddle");
  });

  it("classifies $5,000/month in California as lowerMiddle", () => {
    expect(classifyIncome(5000, "US", "CA")).toBe("lowerMiddle");
  });

  it("classifies $5,000/month in Mississippi as middle", () => {
    // $60,000 lies between MS lowerMiddle (41,600) and middle (62,400)
    expect(classifyIncome(5000, "US", "MS")).toBe("middle");
  });

  it("classifies zero, negative and non-numeric income as low", () => {
    expect(classifyIncome(0, "US", "CA")).toBe("low");
    expect(classifyIncome(-100, "US")).toBe("low");
    expect(classifyIncome(Number.NaN, "US")).toBe("low");
    expect(classifyIncome("not a number", "US")).toBe("low");
  });

  it("falls back to country and default thresholds for unknown locations", () => {
    // US country entry: upperMiddle 160,000 -> 13,333.33/month is still upperMiddle
    expect(classifyIncome(13333.33, "US", "ZZ")).toBe("upperMiddle");
    // default entry: upperMiddle 144,000 -> 12,000/month exactly
    expect(classifyIncome(12000, "XX")).toBe("upperMiddle");
    expect(classifyIncome(12000.01, "XX")).toBe("high");
  });

  it("classifies a profile and treats a missing profile as low", () => {
    expect(
      classifyProfile({
        monthlyIncome: 20000,
        countryCode: "US",
        subregionCode: "CA",
      })
    ).toBe("high");
    expect(classifyProfile(null)).toBe("low");
  });

  it("computes annual income in minor units", () => {
    expect(annualIncomeMinor(5000)).toBe(6000000);
  });

  it("flags incomes within 5% of the next tier", () => {
    // CA low boundary 44,935; 5% = 2,246.75 -> incomes from 42,688.25 upward are near
    expect(isNearTierBoundary(43000 / 12, "US", "CA")).toEqual({
      near: true,
      nextTier: "lowerMiddle",
    });
    expect(isNearTierBoundary(30000 / 12, "US", "CA")).toEqual({
      near: false,
      nextTier: null,
    });
    expect(isNearTierBoundary(50000, "US", "CA")).toEqual({
      near: false,
      nextTier: null,
    });
  });

  it("describes tier ranges and labels", () => {
    expect(getTierRange("low", ca)).toEqual({ minMajor: 0, maxMajor: 44935 });
    expect(getTierRange("middle", ca)).toEqual({
      minMajor: 71896,
      maxMajor: 107844,
    });
    expect(getTierRange("high", ca)).toEqual({
      minMajor: 179740,
      maxMajor: null,
    });
    expect(TIER_LABELS.upperMiddle).toBe("Established Professional");
  });
});
