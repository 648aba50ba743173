// packages/shared/src/plans/categories.ts

/**
 * Flexible (discretionary) spending categories.
 *
 * IMPORTANT:
 * - This is a closed set. Weight tables are validated against it at load time.
 * - Fixed obligations (rent, debt) are not modeled here.
 * - Order is the canonical order of entries inside a day.
 */

import { z } from "zod";

export const FLEX_CATEGORY_KEYS = [
  "food",
  "transportation",
  "entertainment",
  "shopping",
  "healthcare",
] as const;

export type FlexCategory = (typeof FLEX_CATEGORY_KEYS)[number];

export const flexCategorySchema = z.enum(FLEX_CATEGORY_KEYS);

// Common aliases from legacy payloads / user-facing labels -> canonical keys.
const ALIASES: Record<string, FlexCategory> = {
  dining: "food",
  groceries: "food",
  "food & dining": "food",
  transport: "transportation",
  health: "healthcare",
  medical: "healthcare",
};

export function isFlexCategory(k: string): k is FlexCategory {
  return (FLEX_CATEGORY_KEYS as readonly string[]).includes(k);
}

/**
 * Canonicalize a category key coming from a remote payload.
 *
 * - trims whitespace
 * - lowercases
 * - folds known aliases
 * - returns null when the key is not part of the closed set
 */
export function canonicalFlexCategory(raw: unknown): FlexCategory | null {
  const k0 = String(raw ?? "")
    .trim()
    .toLowerCase();
  if (!k0) return null;
  const k = ALIASES[k0] ?? k0;
  return isFlexCategory(k) ? k : null;
}
