// packages/shared/src/income/types.ts

import { z } from "zod";

// Ordered from lowest to highest. Order matters: classification walks it.
export const INCOME_TIER_VALUES = [
  "low",
  "lowerMiddle",
  "middle",
  "upperMiddle",
  "high",
] as const;
export type IncomeTier = (typeof INCOME_TIER_VALUES)[number];

export const incomeTierSchema = z.enum(INCOME_TIER_VALUES);

/**
 * Annual income boundaries in major units.
 * `low`..`upperMiddle` are inclusive upper bounds of their tier;
 * `high` is the reference ceiling used for display ranges.
 */
export const incomeThresholdsSchema = z
  .object({
    low: z.number().positive(),
    lowerMiddle: z.number().positive(),
    middle: z.number().positive(),
    upperMiddle: z.number().positive(),
    high: z.number().positive(),
  })
  .refine(
    (t) =>
      t.low < t.lowerMiddle &&
      t.lowerMiddle < t.middle &&
      t.middle < t.upperMiddle &&
      t.upperMiddle < t.high,
    { message: "income thresholds must be strictly increasing" }
  );

export type IncomeThresholds = z.infer<typeof incomeThresholdsSchema>;

// Boundary keys used by the classifier (the last tier has no upper bound).
export const BOUNDED_TIER_VALUES = [
  "low",
  "lowerMiddle",
  "middle",
  "upperMiddle",
] as const satisfies readonly IncomeTier[];
export type BoundedIncomeTier = (typeof BOUNDED_TIER_VALUES)[number];
