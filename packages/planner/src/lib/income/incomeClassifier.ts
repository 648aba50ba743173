// packages/planner/src/lib/income/incomeClassifier.ts
// Income -> tier. All comparisons run on integer minor units so a boundary
// value never flips tier through float rounding.

import {
  BOUNDED_TIER_VALUES,
  type IncomeThresholds,
  type IncomeTier,
  type UserFinancialProfile,
} from "@dayplan/shared";

import { toMinorUnits } from "../money";
import { getIncomeThresholds } from "./thresholdTable";

const MONTHS_PER_YEAR = 12;
// Within 5% of the current tier's upper boundary counts as "near".
const NEAR_BOUNDARY_DIVISOR = 20;

export const TIER_LABELS: Record<IncomeTier, string> = {
  low: "Essential Earner",
  lowerMiddle: "Rising Saver",
  middle: "Growing Professional",
  upperMiddle: "Established Professional",
  high: "High Achiever",
};

const NEXT_TIER: Record<IncomeTier, IncomeTier | null> = {
  low: "lowerMiddle",
  lowerMiddle: "middle",
  middle: "upperMiddle",
  upperMiddle: "high",
  high: null,
};

/**
 * Walk the ordered boundaries. Boundaries are inclusive upper bounds:
 * exactly-at-boundary belongs to the lower tier.
 */
export function classifyAnnualMinor(
  annualMinor: number,
  thresholds: IncomeThresholds
): IncomeTier {
  if (!Number.isFinite(annualMinor) || annualMinor <= 0) return "low";

  for (const tier of BOUNDED_TIER_VALUES) {
    if (annualMinor <= toMinorUnits(thresholds[tier])) return tier;
  }
  return "high";
}

export function annualIncomeMinor(monthlyIncome: unknown): number {
  return toMinorUnits(monthlyIncome) * MONTHS_PER_YEAR;
}

/**
 * Never throws. Negative, zero or non-numeric income classifies as `low`;
 * unknown locations use the table fallbacks.
 */
export function classifyIncome(
  monthlyIncome: unknown,
  countryCode: unknown,
  subregionCode?: unknown
): IncomeTier {
  const annualMinor = annualIncomeMinor(monthlyIncome);
  if (annualMinor <= 0) return "low";
  return classifyAnnualMinor(
    annualMinor,
    getIncomeThresholds(countryCode, subregionCode)
  );
}

export function classifyProfile(
  profile: UserFinancialProfile | null | undefined
): IncomeTier {
  if (!profile) return "low";
  return classifyIncome(
    profile.monthlyIncome,
    profile.countryCode,
    profile.subregionCode
  );
}

export type TierBoundaryProximity = {
  near: boolean;
  nextTier: IncomeTier | null;
};

export function isNearTierBoundary(
  monthlyIncome: unknown,
  countryCode: unknown,
  subregionCode?: unknown
): TierBoundaryProximity {
  const tier = classifyIncome(monthlyIncome, countryCode, subregionCode);
  if (tier === "high") return { near: false, nextTier: null };

  const thresholds = getIncomeThresholds(countryCode, subregionCode);
  const boundaryMinor = toMinorUnits(thresholds[tier]);
  const annualMinor = Math.max(0, annualIncomeMinor(monthlyIncome));
  const distance = boundaryMinor - annualMinor;

  const near = distance * NEAR_BOUNDARY_DIVISOR <= boundaryMinor;
  return { near, nextTier: near ? NEXT_TIER[tier] : null };
}

export type TierRange = {
  minMajor: number;
  // null = open-ended (high tier)
  maxMajor: number | null;
};

export function getTierRange(
  tier: IncomeTier,
  thresholds: IncomeThresholds
): TierRange {
  switch (tier) {
    case "low":
      return { minMajor: 0, maxMajor: thresholds.low };
    case "lowerMiddle":
      return { minMajor: thresholds.low, maxMajor: thresholds.lowerMiddle };
    case "middle":
      return { minMajor: thresholds.lowerMiddle, maxMajor: thresholds.middle };
    case "upperMiddle":
      return { minMajor: thresholds.middle, maxMajor: thresholds.upperMiddle };
    case "high":
    default:
      return { minMajor: thresholds.upperMiddle, maxMajor: null };
  }
}
