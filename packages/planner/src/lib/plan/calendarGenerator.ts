// packages/planner/src/lib/plan/calendarGenerator.ts
// Builds a full month of daily entries from a profile and tier.
// Pure and deterministic: identical inputs -> deep-equal plans.

import {
  FLEX_CATEGORY_KEYS,
  type DailyPlanEntry,
  type IncomeTier,
  type MonthlyPlan,
  type PlanSource,
  type UserFinancialProfile,
} from "@dayplan/shared";

import { toMinorUnits } from "../money";
import { getCategoryWeights, type CategoryWeights } from "../income/tierWeights";
import {
  allocate,
  costOfLivingWeights,
  dayBudgetExact,
  monthlyFlexibleMinor,
  normalizeWeekendMultiplier,
  resolveIncomeMinor,
  type DayAttributes,
  type DayPattern,
} from "./budgetAllocator";
import { MONTHLY_OVERSHOOT_TOLERANCE } from "./defaults";
import {
  assertYearMonth,
  dayOfWeek,
  daysInMonth,
  isoDate,
  isWeekendDay,
} from "./monthUtils";

export type GenerateOptions = {
  weekendMultiplier?: number;
  dayPattern?: DayPattern;
  // local price level, 1 = baseline (see costOfLivingWeights)
  costOfLiving?: number;
  weights?: CategoryWeights;
  source?: PlanSource;
  authoritative?: boolean;
};

export function monthlyCeilingMinor(
  incomeMinor: number,
  weights: CategoryWeights
): number {
  return monthlyFlexibleMinor(incomeMinor, weights) * (1 + MONTHLY_OVERSHOOT_TOLERANCE);
}

/**
 * Generate the plan for `year`/`month` (1-based).
 *
 * Throws RangeError for an invalid year/month. Missing or non-positive income
 * uses the default income, so the plan is never all zeros.
 */
export function generateMonthlyPlan(
  year: number,
  month: number,
  profile: UserFinancialProfile | null | undefined,
  tier: IncomeTier,
  options: GenerateOptions = {}
): MonthlyPlan {
  assertYearMonth(year, month);

  const incomeMinor = resolveIncomeMinor(toMinorUnits(profile?.monthlyIncome));
  const weights = costOfLivingWeights(
    options.weights ?? getCategoryWeights(tier),
    options.costOfLiving ?? 1
  );
  const dayOptions = {
    weekendMultiplier: normalizeWeekendMultiplier(options.weekendMultiplier),
    dayPattern: options.dayPattern,
  };
  const nDays = daysInMonth(year, month);

  const days: DayAttributes[] = [];
  for (let d = 1; d <= nDays; d++) {
    days.push({
      dayOfMonth: d,
      daysInMonth: nDays,
      isWeekend: isWeekendDay(year, month, d),
      dayOfWeek: dayOfWeek(year, month, d),
    });
  }

  // Scale every day evenly when weekend/day-pattern uplift would overshoot the ceiling.
  const ceiling = monthlyCeilingMinor(incomeMinor, weights);
  const exactDays = days.map((day) =>
    dayBudgetExact(incomeMinor, tier, day, weights, dayOptions)
  );
  const exactTotal = exactDays.reduce((sum, x) => sum + x, 0);
  const scale = exactTotal > ceiling ? ceiling / exactTotal : 1;

  const entries: DailyPlanEntry[] = [];
  let cumulative = 0;

  days.forEach((attrs, i) => {
    const headroom = Math.max(0, ceiling - cumulative);
    const capMinor = Math.min(exactDays[i] * scale, headroom);

    const day = allocate(incomeMinor, tier, { ...attrs, capMinor }, { ...dayOptions, weights });
    cumulative += day.totalMinor;

    const date = isoDate(year, month, attrs.dayOfMonth);
    for (const category of FLEX_CATEGORY_KEYS) {
      entries.push({
        date,
        category,
        plannedAmount: day.allocations[category],
        spentAmount: 0,
        status: "good",
      });
    }
  });

  return {
    year,
    month,
    tier,
    monthlyIncomeMinor: incomeMinor,
    source: options.source ?? "generated",
    authoritative: options.authoritative ?? false,
    entries,
  };
}
