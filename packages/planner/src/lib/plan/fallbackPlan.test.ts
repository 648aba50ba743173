import { describe, expect, it } from "vitest";

import {
  fallbackDashboard,
  fallbackPlan,
  fallbackTier,
  simulatedSpendRatio,
  simulateSpending,
} from "./fallbackPlan";
import { generateMonthlyPlan } from "./calendarGenerator";
import { planTotals } from "./planProgress";

describe("fallbackPlan", () => {
  it("uses the default income and US thresholds without a profile", () => {
    const plan = fallbackPlan(null, { year: 2024, month: 2 });
    expect(plan.source).toBe("fallback");
    expect(plan.authoritative).toBe(false);
    expect(plan.tier).toBe("low");
    expect(plan.monthlyIncomeMinor).toBe(300_000);
    expect(planTotals(plan).plannedTotal).toBe(194_597);
  });

  it("classifies a given profile", () => {
    expect(fallbackTier({ monthlyIncome: 5000, countryCode: "US", subregionCode: "CA" })).toBe(
      "lowerMiddle"
    );
    expect(fallbackTier(undefined)).toBe("low");
  });

  it("simulates spending for past days and half of today", () => {
    const plan = fallbackPlan(null, { year: 2024, month: 2, today: "2024-02-10" });

    for (const e of plan.entries) {
      if (e.date < "2024-02-10") {
        expect(e.spentAmount).toBeGreaterThanOrEqual(Math.floor(e.plannedAmount * 0.6));
        expect(e.spentAmount).toBeLessThanOrEqual(Math.ceil(e.plannedAmount * 0.9 * 1.3));
      } else if (e.date === "2024-02-10") {
        expect(e.spentAmount).toBe(Math.round(e.plannedAmount * 0.5));
        expect(e.status).toBe("good");
      } else {
        expect(e.spentAmount).toBe(0);
        expect(e.status).toBe("good");
      }
    }
  });

  it("simulates the same spending for the same day", () => {
    const a = fallbackPlan(null, { year: 2024, month: 2, today: "2024-02-20" });
    const b = fallbackPlan(null, { year: 2024, month: 2, today: "2024-02-20" });
    expect(a).toEqual(b);
    expect(simulatedSpendRatio(7, "middle", false)).toBe(
      simulatedSpendRatio(7, "middle", false)
    );
  });

  it("keeps simulated ratios inside the tier ranges", () => {
    for (let d = 1; d <= 31; d++) {
      const low = simulatedSpendRatio(d, "low", false);
      expect(low).toBeGreaterThanOrEqual(0.6);
      expect(low).toBeLessThan(0.9 * 1.3);

      const high = simulatedSpendRatio(d, "high", true);
      expect(high).toBeGreaterThanOrEqual(0.7);
      expect(high).toBeLessThan(1.2 * 1.3);

      const weekend = simulatedSpendRatio(d, "middle", true);
      expect(weekend).toBeGreaterThanOrEqual(0.8);
      expect(weekend).toBeLessThan(1.2 * 1.3);
    }
  });

  it("does not change the planned amounts", () => {
    const plan = generateMonthlyPlan(2024, 2, null, "low");
    const simulated = simulateSpending(plan, "2024-02-15");
    expect(simulated.entries.map((e) => e.plannedAmount)).toEqual(
      plan.entries.map((e) => e.plannedAmount)
    );
    expect(plan.entries.every((e) => e.spentAmount === 0)).toBe(true);
  });
});

describe("fallbackDashboard", () => {
  it("derives today's numbers from the plan", () => {
    // 2024-02-10 is a Saturday: 8,845 planned, each category half spent
    const plan = fallbackPlan(null, { year: 2024, month: 2, today: "2024-02-10" });
    const dash = fallbackDashboard(plan, "2024-02-10");

    expect(dash.balanceMinor).toBe(255_000);
    expect(dash.todayBudgetMinor).toBe(8845);
    expect(dash.todaySpentMinor).toBe(4424);
    expect(dash.monthlyBudgetMinor).toBe(194_597);
    expect(dash.monthlySpentMinor).toBe(planTotals(plan).spentTotal);
    expect(dash.dailyTargets).toEqual([
      { category: "food", limitMinor: 3104, spentMinor: 1552 },
      { category: "transportation", limitMinor: 2793, spentMinor: 1397 },
      { category: "entertainment", limitMinor: 776, spentMinor: 388 },
      { category: "shopping", limitMinor: 1241, spentMinor: 621 },
      { category: "healthcare", limitMinor: 931, spentMinor: 466 },
    ]);
  });

  it("falls back to the first day's targets when today is outside the plan", () => {
    const plan = fallbackPlan(null, { year: 2024, month: 2 });
    const dash = fallbackDashboard(plan, "2024-03-01");
    expect(dash.todayBudgetMinor).toBe(0);
    expect(dash.todaySpentMinor).toBe(0);
    expect(dash.dailyTargets[0]).toEqual({
      category: "food",
      limitMinor: 2069,
      spentMinor: 0,
    });
  });
});
