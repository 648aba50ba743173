import { describe, expect, it } from "vitest";
import type { MonthlyPlan } from "@dayplan/shared";

import { dayStatus, findDay, groupByDay, planTotals } from "./planProgress";

function plan(): MonthlyPlan {
  return {
    year: 2024,
    month: 3,
    tier: "middle",
    monthlyIncomeMinor: 500_000,
    source: "generated",
    authoritative: false,
    entries: [
      { date: "2024-03-01", category: "food", plannedAmount: 600, spentAmount: 300, status: "good" },
      { date: "2024-03-01", category: "shopping", plannedAmount: 400, spentAmount: 600, status: "good" },
      { date: "2024-03-02", category: "food", plannedAmount: 1000, spentAmount: 1200, status: "good" },
      { date: "2024-03-03", category: "food", plannedAmount: 1000, spentAmount: 0, status: "good" },
    ],
  };
}

describe("dayStatus", () => {
  it("classifies by the spent/limit ratio", () => {
    expect(dayStatus(85, 100)).toBe("good");
    expect(dayStatus(86, 100)).toBe("warning");
    expect(dayStatus(110, 100)).toBe("warning");
    expect(dayStatus(111, 100)).toBe("over");
  });

  it("handles a zero limit", () => {
    expect(dayStatus(0, 0)).toBe("good");
    expect(dayStatus(5, 0)).toBe("over");
  });
});

describe("groupByDay", () => {
  it("groups entries by date with totals and status", () => {
    const days = groupByDay(plan());
    expect(days.map((d) => d.date)).toEqual(["2024-03-01", "2024-03-02", "2024-03-03"]);
    expect(days[0]).toMatchObject({ plannedTotal: 1000, spentTotal: 900, status: "warning" });
    expect(days[0].entries).toHaveLength(2);
    expect(days[1]).toMatchObject({ plannedTotal: 1000, spentTotal: 1200, status: "over" });
    expect(days[2].status).toBe("good");
  });

  it("finds a single day", () => {
    expect(findDay(plan(), "2024-03-02")?.spentTotal).toBe(1200);
    expect(findDay(plan(), "2024-03-09")).toBeNull();
  });
});

describe("planTotals", () => {
  it("sums the plan", () => {
    expect(planTotals(plan())).toEqual({
      plannedTotal: 3000,
      spentTotal: 2100,
      remaining: 900,
      days: 3,
    });
  });
});
