// packages/planner/src/lib/plan/fallbackPlan.ts
// Offline defaults: a plan and dashboard that exist before any real data does.
// Pure; no I/O, no clock (callers pass `today`).

import type {
  DashboardSnapshot,
  IncomeTier,
  MonthlyPlan,
  UserFinancialProfile,
} from "@dayplan/shared";

import { classifyIncome, classifyProfile } from "../income/incomeClassifier";
import { toMajorUnits } from "../money";
import { generateMonthlyPlan, type GenerateOptions } from "./calendarGenerator";
import {
  DEFAULT_COUNTRY_CODE,
  DEFAULT_MONTHLY_INCOME_MINOR,
  FALLBACK_BALANCE_SHARE,
} from "./defaults";
import { dayOfMonthFromIso, isWeekendDay } from "./monthUtils";
import { dayStatus, groupByDay, planTotals } from "./planProgress";

export type FallbackPlanOptions = {
  year: number;
  month: number;
  // YYYY-MM-DD; when set, days before it get simulated spending (demo data).
  today?: string;
} & Pick<GenerateOptions, "weekendMultiplier" | "dayPattern" | "costOfLiving">;

// ---------------------------------------------------------------------------
// Spend simulation
// ---------------------------------------------------------------------------

// mulberry32: tiny seeded PRNG, same sequence for the same seed.
function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const OVERSPEND_CHANCE = 0.1;
const OVERSPEND_FACTOR = 1.3;
const TODAY_SPEND_RATIO = 0.5;

/** Share of the day's plan spent on a past day, seeded by the day number. */
export function simulatedSpendRatio(
  dayOfMonth: number,
  tier: IncomeTier,
  isWeekend: boolean
): number {
  const rand = seededRandom(dayOfMonth);
  const r = rand();

  let ratio: number;
  if (tier === "low") ratio = 0.6 + r * 0.3;
  else if (tier === "high") ratio = 0.7 + r * 0.5;
  else if (isWeekend) ratio = 0.8 + r * 0.4;
  else ratio = 0.7 + r * 0.3;

  if (rand() < OVERSPEND_CHANCE) ratio *= OVERSPEND_FACTOR;
  return ratio;
}

/**
 * Fill spentAmount/status for days up to `today`. Past days use the seeded
 * ratio, today is half spent, future days stay untouched.
 */
export function simulateSpending(plan: MonthlyPlan, today: string): MonthlyPlan {
  const entries = plan.entries.map((e) => {
    let ratio = 0;
    if (e.date < today) {
      const d = dayOfMonthFromIso(e.date);
      ratio = simulatedSpendRatio(d, plan.tier, isWeekendDay(plan.year, plan.month, d));
    } else if (e.date === today) {
      ratio = TODAY_SPEND_RATIO;
    }

    const spentAmount = Math.round(e.plannedAmount * ratio);
    return { ...e, spentAmount, status: dayStatus(spentAmount, e.plannedAmount) };
  });

  return { ...plan, entries };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function fallbackTier(profile?: UserFinancialProfile | null): IncomeTier {
  if (profile) return classifyProfile(profile);
  return classifyIncome(
    toMajorUnits(DEFAULT_MONTHLY_INCOME_MINOR),
    DEFAULT_COUNTRY_CODE
  );
}

export function fallbackPlan(
  profile: UserFinancialProfile | null | undefined,
  options: FallbackPlanOptions
): MonthlyPlan {
  const plan = generateMonthlyPlan(
    options.year,
    options.month,
    profile,
    fallbackTier(profile),
    {
      weekendMultiplier: options.weekendMultiplier,
      dayPattern: options.dayPattern,
      costOfLiving: options.costOfLiving,
      source: "fallback",
      authoritative: false,
    }
  );
  return options.today ? simulateSpending(plan, options.today) : plan;
}

export function fallbackDashboard(
  plan: MonthlyPlan,
  today: string
): DashboardSnapshot {
  const days = groupByDay(plan);
  const totals = planTotals(plan);
  const todayGroup = days.find((d) => d.date === today);

  const entries = todayGroup?.entries ?? days[0]?.entries ?? [];

  return {
    balanceMinor: Math.round(plan.monthlyIncomeMinor * FALLBACK_BALANCE_SHARE),
    todayBudgetMinor: todayGroup?.plannedTotal ?? 0,
    todaySpentMinor: todayGroup?.spentTotal ?? 0,
    monthlyBudgetMinor: totals.plannedTotal,
    monthlySpentMinor: totals.spentTotal,
    dailyTargets: entries.map((e) => ({
      category: e.category,
      limitMinor: e.plannedAmount,
      spentMinor: todayGroup ? e.spentAmount : 0,
    })),
  };
}
