// packages/planner/src/lib/income/tierWeights.ts
// Tier-dependent category weights. Lower tiers weight necessities higher.

import { z } from "zod";
import {
  FLEX_CATEGORY_KEYS,
  type FlexCategory,
  type IncomeTier,
} from "@dayplan/shared";

import tierWeightsData from "../../../data/tierWeights.json";

const weightSchema = z.number().min(0).max(1);

// .strict(): an unknown category name in the data file is a load error.
export const categoryWeightsSchema = z
  .object({
    food: weightSchema,
    transportation: weightSchema,
    entertainment: weightSchema,
    shopping: weightSchema,
    healthcare: weightSchema,
  })
  .strict()
  .refine((w) => sumWeights(w) <= 1 + 1e-9, {
    message: "category weights must sum to at most 1",
  });

export type CategoryWeights = Record<FlexCategory, number>;

export const tierWeightTableSchema = z.object({
  version: z.literal(1),
  tiers: z
    .object({
      low: categoryWeightsSchema,
      lowerMiddle: categoryWeightsSchema,
      middle: categoryWeightsSchema,
      upperMiddle: categoryWeightsSchema,
      high: categoryWeightsSchema,
    })
    .strict(),
});

export type TierWeightTable = z.infer<typeof tierWeightTableSchema>;

export function sumWeights(weights: CategoryWeights): number {
  let sum = 0;
  for (const k of FLEX_CATEGORY_KEYS) sum += weights[k];
  return sum;
}

export function loadTierWeights(raw: unknown): TierWeightTable {
  return tierWeightTableSchema.parse(raw);
}

const TIER_WEIGHTS: TierWeightTable = loadTierWeights(tierWeightsData);

export function getCategoryWeights(
  tier: IncomeTier,
  table: TierWeightTable = TIER_WEIGHTS
): CategoryWeights {
  // copy: callers own the result
  return { ...table.tiers[tier] };
}

/** Share of monthly income that is discretionary for the tier. */
export function flexibleShare(
  tier: IncomeTier,
  table: TierWeightTable = TIER_WEIGHTS
): number {
  return sumWeights(table.tiers[tier]);
}
