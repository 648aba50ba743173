// packages/planner/src/lib/plan/planProgress.ts

import type {
  DailyPlanEntry,
  DayStatus,
  MonthlyPlan,
} from "@dayplan/shared";

import { OVER_RATIO, WARNING_RATIO } from "./defaults";

export function dayStatus(spentMinor: number, limitMinor: number): DayStatus {
  if (limitMinor <= 0) return spentMinor > 0 ? "over" : "good";
  const ratio = spentMinor / limitMinor;
  if (ratio > OVER_RATIO) return "over";
  if (ratio > WARNING_RATIO) return "warning";
  return "good";
}

export type PlanDay = {
  date: string;
  entries: DailyPlanEntry[];
  plannedTotal: number;
  spentTotal: number;
  status: DayStatus;
};

// Entries are already ordered by date; groups keep that order.
export function groupByDay(plan: MonthlyPlan): PlanDay[] {
  const days: PlanDay[] = [];
  const byDate = new Map<string, PlanDay>();

  for (const e of plan.entries) {
    let day = byDate.get(e.date);
    if (!day) {
      day = {
        date: e.date,
        entries: [],
        plannedTotal: 0,
        spentTotal: 0,
        status: "good",
      };
      byDate.set(e.date, day);
      days.push(day);
    }
    day.entries.push(e);
    day.plannedTotal += e.plannedAmount;
    day.spentTotal += e.spentAmount;
  }

  for (const day of days) {
    day.status = dayStatus(day.spentTotal, day.plannedTotal);
  }
  return days;
}

export type PlanTotals = {
  plannedTotal: number;
  spentTotal: number;
  remaining: number;
  days: number;
};

export function planTotals(plan: MonthlyPlan): PlanTotals {
  let plannedTotal = 0;
  let spentTotal = 0;
  const dates = new Set<string>();
  for (const e of plan.entries) {
    plannedTotal += e.plannedAmount;
    spentTotal += e.spentAmount;
    dates.add(e.date);
  }
  return {
    plannedTotal,
    spentTotal,
    remaining: plannedTotal - spentTotal,
    days: dates.size,
  };
}

export function findDay(plan: MonthlyPlan, date: string): PlanDay | null {
  return groupByDay(plan).find((d) => d.date === date) ?? null;
}
