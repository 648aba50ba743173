// packages/shared/src/plans/types.ts

import { z } from "zod";

import { incomeTierSchema } from "../income/types";
import { minorAmountSchema, nonNegMinorAmountSchema } from "../money/types";
import { flexCategorySchema } from "./categories";

// ---------------------------------------------------------------------------
// 1) Common enum/union types (SSOT)
// ---------------------------------------------------------------------------

export const DAY_STATUS_VALUES = ["good", "warning", "over"] as const;
export type DayStatus = (typeof DAY_STATUS_VALUES)[number];

/**
 * Where a plan came from.
 * - server: persisted by the remote source of truth (authoritative)
 * - generated: built locally from a real profile
 * - fallback: synthesized from defaults before any real data arrived
 */
export const PLAN_SOURCE_VALUES = ["server", "generated", "fallback"] as const;
export type PlanSource = (typeof PLAN_SOURCE_VALUES)[number];

// YYYY-MM-DD local calendar date
export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

// ---------------------------------------------------------------------------
// 2) Domain model
// ---------------------------------------------------------------------------

export const dailyPlanEntrySchema = z.object({
  date: isoDateSchema,
  category: flexCategorySchema,
  plannedAmount: nonNegMinorAmountSchema,
  spentAmount: minorAmountSchema,
  status: z.enum(DAY_STATUS_VALUES),
});

export type DailyPlanEntry = z.infer<typeof dailyPlanEntrySchema>;

export const monthlyPlanSchema = z.object({
  year: z.number().int().min(1970).max(2100),
  month: z.number().int().min(1).max(12),
  tier: incomeTierSchema,
  monthlyIncomeMinor: nonNegMinorAmountSchema,
  source: z.enum(PLAN_SOURCE_VALUES),
  authoritative: z.boolean(),
  entries: z.array(dailyPlanEntrySchema),
});

export type MonthlyPlan = z.infer<typeof monthlyPlanSchema>;

// ---------------------------------------------------------------------------
// 3) API DTO (network contract)
// - The server always sends authoritative plans; source/authoritative are
//   assigned on the client.
// ---------------------------------------------------------------------------

export const serverPlanDTOSchema = z
  .object({
    year: z.number().int(),
    month: z.number().int().min(1).max(12),
    tier: incomeTierSchema,
    monthlyIncomeMinor: nonNegMinorAmountSchema,
    entries: z.array(dailyPlanEntrySchema),
  })
  .passthrough();

export type ServerPlanDTO = z.infer<typeof serverPlanDTOSchema>;

export type SubmitOnboardingPlanRequestDTO = {
  year: number;
  month: number;
  tier: MonthlyPlan["tier"];
  monthlyIncomeMinor: number;
  entries: DailyPlanEntry[];
};
