// packages/planner/src/lib/income/thresholdTable.ts
// Location-keyed income boundaries. Loaded and validated once at import time.

import { z } from "zod";
import {
  currencySchema,
  incomeThresholdsSchema,
  type Currency,
  type IncomeThresholds,
} from "@dayplan/shared";

import thresholdsData from "../../../data/incomeThresholds.json";

const countryProfileSchema = z.object({
  currency: currencySchema,
  thresholds: incomeThresholdsSchema,
  subregions: z.record(z.string(), incomeThresholdsSchema).default({}),
});

export const thresholdTableSchema = z.object({
  version: z.literal(1),
  unit: z.literal("annual-major"),
  default: incomeThresholdsSchema,
  countries: z.record(
    z.string().regex(/^[A-Z]{2}$/, "country codes are ISO alpha-2"),
    countryProfileSchema
  ),
});

export type ThresholdTable = z.infer<typeof thresholdTableSchema>;

/**
 * Parse raw reference data. Throws (ZodError) on malformed data: a broken
 * table is a deployment error and must fail at startup, not at use time.
 */
export function loadThresholdTable(raw: unknown): ThresholdTable {
  return thresholdTableSchema.parse(raw);
}

const THRESHOLD_TABLE: ThresholdTable = loadThresholdTable(thresholdsData);

export function getThresholdTable(): ThresholdTable {
  return THRESHOLD_TABLE;
}

function normalizeCode(raw: unknown): string {
  return typeof raw === "string" ? raw.trim().toUpperCase() : "";
}

/**
 * Thresholds for (country, subregion).
 * - unknown/missing subregion -> country-level entry
 * - unknown country -> table default
 */
export function getIncomeThresholds(
  countryCode: unknown,
  subregionCode?: unknown,
  table: ThresholdTable = THRESHOLD_TABLE
): IncomeThresholds {
  const country = table.countries[normalizeCode(countryCode)];
  if (!country) return table.default;

  const sub = normalizeCode(subregionCode);
  if (sub) {
    const subThresholds = country.subregions[sub];
    if (subThresholds) return subThresholds;
  }

  return country.thresholds;
}

export function getSupportedCountries(
  table: ThresholdTable = THRESHOLD_TABLE
): string[] {
  return Object.keys(table.countries);
}

export function hasSubregions(
  countryCode: unknown,
  table: ThresholdTable = THRESHOLD_TABLE
): boolean {
  return getSubregions(countryCode, table).length > 0;
}

export function getSubregions(
  countryCode: unknown,
  table: ThresholdTable = THRESHOLD_TABLE
): string[] {
  const country = table.countries[normalizeCode(countryCode)];
  return country ? Object.keys(country.subregions) : [];
}

export function getCurrency(
  countryCode: unknown,
  table: ThresholdTable = THRESHOLD_TABLE
): Currency {
  return table.countries[normalizeCode(countryCode)]?.currency ?? "USD";
}
