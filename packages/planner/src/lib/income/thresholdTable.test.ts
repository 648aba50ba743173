import { describe, expect, it } from "vitest";

import {
  getCurrency,
  getIncomeThresholds,
  getSubregions,
  getSupportedCountries,
  getThresholdTable,
  hasSubregions,
  loadThresholdTable,
} from "./thresholdTable";

describe("thresholdTable", () => {
  it("loads every US state", () => {
    expect(getSupportedCountries()).toEqual(["US"]);
    expect(getSubregions("US")).toHaveLength(50);
    expect(hasSubregions("us")).toBe(true);
    expect(hasSubregions("FR")).toBe(false);
  });

  it("keeps boundaries strictly increasing for every entry", () => {
    const table = getThresholdTable();
    const entries = [
      table.default,
      ...Object.values(table.countries).flatMap((c) => [
        c.thresholds,
        ...Object.values(c.subregions),
      ]),
    ];

    for (const t of entries) {
      const ordered = [t.low, t.lowerMiddle, t.middle, t.upperMiddle, t.high];
      for (let i = 1; i < ordered.length; i++) {
        expect(ordered[i]).toBeGreaterThan(ordered[i - 1]);
      }
    }
  });

  it("resolves state-level thresholds", () => {
    expect(getIncomeThresholds("US", "CA")).toEqual({
      low: 44935,
      lowerMiddle: 71896,
      middle: 107844,
      upperMiddle: 179740,
      high: 242649,
    });
    expect(getIncomeThresholds(" us ", "ms").upperMiddle).toBe(104000);
  });

  it("falls back to the country entry for an unknown subregion", () => {
    expect(getIncomeThresholds("US", "ZZ").low).toBe(40000);
    expect(getIncomeThresholds("US", null).low).toBe(40000);
  });

  it("falls back to the default entry for an unknown country", () => {
    expect(getIncomeThresholds("FR", "IDF")).toEqual({
      low: 36000,
      lowerMiddle: 57600,
      middle: 86400,
      upperMiddle: 144000,
      high: 194400,
    });
    expect(getIncomeThresholds(undefined).low).toBe(36000);
  });

  it("reports the country currency with a USD default", () => {
    expect(getCurrency("US")).toBe("USD");
    expect(getCurrency("JP")).toBe("USD");
  });

  it("rejects tables whose boundaries are not increasing", () => {
    const bad = {
      version: 1,
      unit: "annual-major",
      default: {
        low: 50000,
        lowerMiddle: 40000,
        middle: 86400,
        upperMiddle: 144000,
        high: 194400,
      },
      countries: {},
    };
    expect(() => loadThresholdTable(bad)).toThrow(/strictly increasing/);
  });
});
