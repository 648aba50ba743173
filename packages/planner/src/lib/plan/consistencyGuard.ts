// packages/planner/src/lib/plan/consistencyGuard.ts
// Reconciles the locally cached plan with the server's persisted plan.
// The server is the source of truth; a persisted plan stays frozen until the
// server returns a different one.

import {
  FLEX_CATEGORY_KEYS,
  type MonthlyPlan,
  type ServerPlanDTO,
} from "@dayplan/shared";

export type GuardLogger = Pick<Console, "warn">;

export type ResolveReason =
  | "server"
  | "server-wrong-period"
  | "cached"
  | "none";

export type PlanPeriod = Pick<MonthlyPlan, "year" | "month">;

export type ResolvedPlan = {
  plan: MonthlyPlan | null;
  reason: ResolveReason;
  conflict: boolean;
};

export function samePeriod(a: PlanPeriod, b: PlanPeriod): boolean {
  return a.year === b.year && a.month === b.month;
}

export function categorySet(plan: MonthlyPlan): string[] {
  const seen = new Set<string>();
  for (const e of plan.entries) seen.add(e.category);
  return FLEX_CATEGORY_KEYS.filter((k) => seen.has(k));
}

/** False only for identical entries (dates, categories, amounts) in the same order. */
export function plansDiverge(a: MonthlyPlan, b: MonthlyPlan): boolean {
  if (a.entries.length !== b.entries.length) return true;
  if (categorySet(a).join(",") !== categorySet(b).join(",")) return true;

  for (let i = 0; i < a.entries.length; i++) {
    const x = a.entries[i];
    const y = b.entries[i];
    if (
      x.date !== y.date ||
      x.category !== y.category ||
      x.plannedAmount !== y.plannedAmount
    ) {
      return true;
    }
  }
  return false;
}

export function toAuthoritativePlan(dto: ServerPlanDTO): MonthlyPlan {
  return {
    year: dto.year,
    month: dto.month,
    tier: dto.tier,
    monthlyIncomeMinor: dto.monthlyIncomeMinor,
    source: "server",
    authoritative: true,
    entries: dto.entries.map((e) => ({ ...e })),
  };
}

/**
 * Pick the plan to serve for a period.
 *
 * - server plan for the cached period -> server wins
 * - both authoritative and different -> CONSISTENCY_CONFLICT warning, server still wins
 * - server plan for another period -> ignored
 * - no server plan -> cached plan
 *
 * `period` defaults to the cached plan's period.
 */
export function resolvePlan(
  cached: MonthlyPlan | null,
  server: MonthlyPlan | null,
  logger: GuardLogger = console,
  period?: PlanPeriod
): ResolvedPlan {
  const expected = period ?? cached;
  const local =
    cached && (!expected || samePeriod(cached, expected)) ? cached : null;

  if (!server) {
    return { plan: local, reason: local ? "cached" : "none", conflict: false };
  }

  if (expected && !samePeriod(expected, server)) {
    logger.warn("[consistencyGuard] server plan for another period ignored", {
      expected: `${expected.year}-${expected.month}`,
      server: `${server.year}-${server.month}`,
    });
    return { plan: local, reason: "server-wrong-period", conflict: false };
  }

  const conflict = Boolean(
    local && local.authoritative && plansDiverge(local, server)
  );
  if (conflict) {
    logger.warn(
      "[consistencyGuard] CONSISTENCY_CONFLICT: cached authoritative plan differs from server",
      { year: server.year, month: server.month }
    );
  }

  return { plan: server, reason: "server", conflict };
}

/** A non-authoritative plan never replaces an authoritative one for the same period. */
export function canReplace(
  existing: MonthlyPlan | null,
  candidate: MonthlyPlan
): boolean {
  if (!existing) return true;
  if (!samePeriod(existing, candidate)) return true;
  if (existing.authoritative && !candidate.authoritative) return false;
  return true;
}
