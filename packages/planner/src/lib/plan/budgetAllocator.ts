// packages/planner/src/lib/plan/budgetAllocator.ts
// Per-day budget and its split across the flexible categories.

import {
  FLEX_CATEGORY_KEYS,
  type FlexCategory,
  type IncomeTier,
} from "@dayplan/shared";

import {
  getCategoryWeights,
  sumWeights,
  type CategoryWeights,
} from "../income/tierWeights";
import {
  DEFAULT_MONTHLY_INCOME_MINOR,
  DEFAULT_WEEKEND_MULTIPLIER,
} from "./defaults";

export type DayAttributes = {
  dayOfMonth: number;
  daysInMonth: number;
  isWeekend: boolean;
  // 0 = Sunday ... 6 = Saturday (date-fns getDay); day-of-week effects need it.
  dayOfWeek?: number;
  // Upper bound for this day's budget (minor units, may be fractional).
  capMinor?: number;
};

/**
 * Spending rhythm within a month. Multipliers compound; the tier's
 * sensitivity then scales how far the day moves from the base budget.
 */
export type DayPattern = {
  fridayMultiplier: number;
  mondayMultiplier: number;
  paydays: readonly number[];
  paydayMultiplier: number;
  // last N days of the month
  monthEndDays: number;
  monthEndMultiplier: number;
  tierSensitivity: Readonly<Record<IncomeTier, number>>;
};

export const DEFAULT_DAY_PATTERN: DayPattern = {
  fridayMultiplier: 1.3,
  mondayMultiplier: 0.8,
  paydays: [15, 30, 31],
  paydayMultiplier: 1.2,
  monthEndDays: 3,
  monthEndMultiplier: 0.7,
  tierSensitivity: {
    low: 0.5,
    lowerMiddle: 1,
    middle: 1,
    upperMiddle: 1,
    high: 1.2,
  },
};

// Share of the cost-of-living difference each category feels.
export const COST_OF_LIVING_IMPACT: Readonly<CategoryWeights> = {
  food: 1,
  transportation: 1,
  entertainment: 0.7,
  shopping: 0.5,
  healthcare: 0.5,
};

export const MIN_COST_OF_LIVING = 0.5;
export const MAX_COST_OF_LIVING = 2;

export type DayBudgetOptions = {
  weekendMultiplier?: number;
  // day-of-week/payday/month-end effects; off when absent
  dayPattern?: DayPattern;
};

export type AllocatorOptions = DayBudgetOptions & {
  weights?: CategoryWeights;
};

export type CategoryAllocations = Record<FlexCategory, number>;

export type DayAllocation = {
  dayBudgetMinor: number;
  allocations: CategoryAllocations;
  totalMinor: number;
};

// Weights are quantized so the split runs on integers only.
const WEIGHT_SCALE = 1_000_000;

// ---------------------------------------------------------------------------
// Normalizers
// ---------------------------------------------------------------------------

export function resolveIncomeMinor(incomeMinor: number): number {
  if (!Number.isFinite(incomeMinor) || incomeMinor <= 0) {
    return DEFAULT_MONTHLY_INCOME_MINOR;
  }
  return Math.round(incomeMinor);
}

export function normalizeWeekendMultiplier(m: unknown): number {
  return typeof m === "number" && Number.isFinite(m) && m > 1
    ? m
    : DEFAULT_WEEKEND_MULTIPLIER;
}

/** Exact (unrounded) monthly discretionary budget in minor units. */
export function monthlyFlexibleMinor(
  incomeMinor: number,
  weights: CategoryWeights
): number {
  return resolveIncomeMinor(incomeMinor) * sumWeights(weights);
}

/** 1 means "no cost-of-living adjustment"; anything else is clamped. */
export function normalizeCostOfLiving(m: unknown): number {
  if (typeof m !== "number" || !Number.isFinite(m) || m <= 0) return 1;
  return Math.min(MAX_COST_OF_LIVING, Math.max(MIN_COST_OF_LIVING, m));
}

/**
 * Weights adjusted for local prices. Food and transportation take the full
 * difference, entertainment 70%, the rest 50%.
 */
export function costOfLivingWeights(
  weights: CategoryWeights,
  multiplier: number
): CategoryWeights {
  const m = normalizeCostOfLiving(multiplier);
  const out = { ...weights };
  if (m === 1) return out;
  for (const k of FLEX_CATEGORY_KEYS) {
    out[k] = weights[k] * (1 + (m - 1) * COST_OF_LIVING_IMPACT[k]);
  }
  return out;
}

/** Combined day-of-week, payday and month-end multiplier (before tier sensitivity). */
export function dayPatternMultiplier(day: DayAttributes, pattern: DayPattern): number {
  let m = 1;
  if (day.dayOfWeek === 5) m *= pattern.fridayMultiplier;
  else if (day.dayOfWeek === 1) m *= pattern.mondayMultiplier;
  if (pattern.paydays.includes(day.dayOfMonth)) m *= pattern.paydayMultiplier;
  if (day.daysInMonth - day.dayOfMonth < pattern.monthEndDays) {
    m *= pattern.monthEndMultiplier;
  }
  return m;
}

/** Exact (unrounded) budget for one day before any cap. */
export function dayBudgetExact(
  incomeMinor: number,
  tier: IncomeTier,
  day: DayAttributes,
  weights: CategoryWeights,
  options: DayBudgetOptions = {}
): number {
  const days = Math.max(1, Math.trunc(day.daysInMonth));
  const base = monthlyFlexibleMinor(incomeMinor, weights) / days;

  let m = day.isWeekend ? normalizeWeekendMultiplier(options.weekendMultiplier) : 1;
  const pattern = options.dayPattern;
  if (pattern) {
    m *= dayPatternMultiplier(day, pattern);
    m = 1 + (m - 1) * pattern.tierSensitivity[tier];
  }
  return base * m;
}

// ---------------------------------------------------------------------------
// Distribution
// ---------------------------------------------------------------------------

function emptyAllocations(): CategoryAllocations {
  return {
    food: 0,
    transportation: 0,
    entertainment: 0,
    shopping: 0,
    healthcare: 0,
  };
}

/**
 * Split `totalMinor` proportionally to `weights`.
 *
 * Largest remainder: each share is floored and the leftover units go to the
 * largest remainders (ties -> canonical category order), so the parts sum to
 * `totalMinor` and each is within one unit of its exact share.
 *
 * Floor rule: every weighted category gets at least 1 unit, which may push
 * the sum above `totalMinor` by at most the number of weighted categories.
 */
export function distribute(
  totalMinor: number,
  weights: CategoryWeights
): CategoryAllocations {
  const out = emptyAllocations();
  const total = Math.max(0, Math.round(totalMinor));

  const q = emptyAllocations();
  let qSum = 0;
  for (const k of FLEX_CATEGORY_KEYS) {
    const w = weights[k];
    // a positive weight never quantizes to zero
    q[k] = Number.isFinite(w) && w > 0 ? Math.max(1, Math.round(w * WEIGHT_SCALE)) : 0;
    qSum += q[k];
  }
  if (qSum <= 0) return out;

  const remainders: Array<{ key: FlexCategory; rem: number; order: number }> = [];
  let assigned = 0;
  FLEX_CATEGORY_KEYS.forEach((k, order) => {
    const num = total * q[k];
    const rem = num % qSum;
    out[k] = (num - rem) / qSum;
    assigned += out[k];
    remainders.push({ key: k, rem, order });
  });

  remainders.sort((a, b) => b.rem - a.rem || a.order - b.order);
  let leftover = total - assigned;
  for (const r of remainders) {
    if (leftover <= 0) break;
    out[r.key] += 1;
    leftover -= 1;
  }

  for (const k of FLEX_CATEGORY_KEYS) {
    if (q[k] > 0 && out[k] < 1) out[k] = 1;
  }

  return out;
}

export function sumAllocations(a: CategoryAllocations): number {
  let sum = 0;
  for (const k of FLEX_CATEGORY_KEYS) sum += a[k];
  return sum;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function allocate(
  monthlyIncomeMinor: number,
  tier: IncomeTier,
  day: DayAttributes,
  options: AllocatorOptions = {}
): DayAllocation {
  const weights = options.weights ?? getCategoryWeights(tier);

  let exact = dayBudgetExact(monthlyIncomeMinor, tier, day, weights, options);
  if (typeof day.capMinor === "number" && Number.isFinite(day.capMinor)) {
    exact = Math.min(exact, Math.max(0, day.capMinor));
  }

  const dayBudgetMinor = Math.round(exact);
  const allocations = distribute(dayBudgetMinor, weights);

  return {
    dayBudgetMinor,
    allocations,
    totalMinor: sumAllocations(allocations),
  };
}
