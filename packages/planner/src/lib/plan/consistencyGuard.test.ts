import { describe, expect, it, vi } from "vitest";
import type { MonthlyPlan } from "@dayplan/shared";

import {
  canReplace,
  plansDiverge,
  resolvePlan,
  toAuthoritativePlan,
} from "./consistencyGuard";
import { generateMonthlyPlan } from "./calendarGenerator";

const profile = { monthlyIncome: 4000, countryCode: "US" };

function localPlan(month = 3): MonthlyPlan {
  return generateMonthlyPlan(2024, month, profile, "low");
}

function serverPlan(month = 3, bump = 0): MonthlyPlan {
  const base = localPlan(month);
  return toAuthoritativePlan({
    year: base.year,
    month: base.month,
    tier: base.tier,
    monthlyIncomeMinor: base.monthlyIncomeMinor,
    entries: base.entries.map((e, i) =>
      i === 0 ? { ...e, plannedAmount: e.plannedAmount + bump } : e
    ),
  });
}

function spyLogger() {
  return { warn: vi.fn() };
}

describe("resolvePlan", () => {
  it("lets a server plan for the same period win", () => {
    const logger = spyLogger();
    const server = serverPlan(3, 10);
    const out = resolvePlan(localPlan(3), server, logger);
    expect(out).toEqual({ plan: server, reason: "server", conflict: false });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("flags a conflict when two authoritative plans differ, still taking the server's", () => {
    const logger = spyLogger();
    const cached = serverPlan(3, 0);
    const server = serverPlan(3, 25);
    const out = resolvePlan(cached, server, logger);
    expect(out.plan).toBe(server);
    expect(out.conflict).toBe(true);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toContain("CONSISTENCY_CONFLICT");
  });

  it("does not flag identical authoritative plans", () => {
    const logger = spyLogger();
    const out = resolvePlan(serverPlan(3), serverPlan(3), logger);
    expect(out.conflict).toBe(false);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("ignores a server plan for another period", () => {
    const logger = spyLogger();
    const cached = localPlan(3);
    const out = resolvePlan(cached, serverPlan(4), logger);
    expect(out).toEqual({ plan: cached, reason: "server-wrong-period", conflict: false });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("checks the server plan against an explicit period when nothing is cached", () => {
    const logger = spyLogger();
    const out = resolvePlan(null, serverPlan(4), logger, { year: 2024, month: 3 });
    expect(out).toEqual({ plan: null, reason: "server-wrong-period", conflict: false });
  });

  it("serves the cached plan without a server plan", () => {
    const cached = localPlan(3);
    expect(resolvePlan(cached, null, spyLogger())).toEqual({
      plan: cached,
      reason: "cached",
      conflict: false,
    });
    expect(resolvePlan(null, null, spyLogger())).toEqual({
      plan: null,
      reason: "none",
      conflict: false,
    });
  });
});

describe("canReplace", () => {
  it("never replaces an authoritative plan with a local one for the same period", () => {
    expect(canReplace(serverPlan(3), localPlan(3))).toBe(false);
    expect(canReplace(serverPlan(3), serverPlan(3, 5))).toBe(true);
    expect(canReplace(localPlan(3), serverPlan(3))).toBe(true);
    expect(canReplace(serverPlan(3), localPlan(4))).toBe(true);
    expect(canReplace(null, localPlan(3))).toBe(true);
  });
});

describe("plansDiverge", () => {
  it("compares entries and category sets", () => {
    expect(plansDiverge(localPlan(3), localPlan(3))).toBe(false);
    expect(plansDiverge(localPlan(3), serverPlan(3, 1))).toBe(true);

    const trimmed = localPlan(3);
    trimmed.entries = trimmed.entries.filter((e) => e.category !== "healthcare");
    expect(plansDiverge(localPlan(3), trimmed)).toBe(true);
  });

  it("marks server plans authoritative", () => {
    const plan = serverPlan(3);
    expect(plan.source).toBe("server");
    expect(plan.authoritative).toBe(true);
  });
});
