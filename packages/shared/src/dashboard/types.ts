// packages/shared/src/dashboard/types.ts

import { z } from "zod";

import { minorAmountSchema } from "../money/types";

export const dashboardDailyTargetSchema = z.object({
  category: z.string().min(1),
  limitMinor: minorAmountSchema,
  spentMinor: minorAmountSchema,
});

export type DashboardDailyTargetDTO = z.infer<
  typeof dashboardDailyTargetSchema
>;

// Only the fields the instant dashboard path relies on are required;
// anything else the server adds is kept as-is.
export const dashboardSnapshotSchema = z
  .object({
    balanceMinor: minorAmountSchema,
    todayBudgetMinor: minorAmountSchema,
    todaySpentMinor: minorAmountSchema,
    monthlyBudgetMinor: minorAmountSchema,
    monthlySpentMinor: minorAmountSchema,
    dailyTargets: z.array(dashboardDailyTargetSchema),
  })
  .passthrough();

export type DashboardSnapshot = z.infer<typeof dashboardSnapshotSchema>;
