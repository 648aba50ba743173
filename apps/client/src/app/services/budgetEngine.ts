// apps/client/src/app/services/budgetEngine.ts
// Offline-first facade. Every read answers instantly from cache, stale cache,
// a locally generated plan or fallback defaults; the network only ever runs
// in the background (SyncScheduler) or under refreshData's timeout.

import {
  dashboardSnapshotSchema,
  monthlyPlanSchema,
  userProfileDTOSchema,
  type DashboardSnapshot,
  type IncomeTier,
  type MonthlyPlan,
  type UserFinancialProfile,
  type UserProfileDTO,
} from "@dayplan/shared";
import {
  canReplace,
  classifyProfile,
  DEFAULT_DAY_PATTERN,
  fallbackDashboard,
  fallbackPlan,
  generateMonthlyPlan,
  isValidYearMonth,
  resolvePlan,
  toAuthoritativePlan,
  type GenerateOptions,
} from "@dayplan/planner";

import type { FinanceApi } from "../api/financeApi";
import {
  calendarKey,
  DASHBOARD_KEY,
  parseCalendarKey,
  PROFILE_KEY,
} from "../cache/cacheKeys";
import type { PersistentCache, PersistentCacheWriter } from "../cache/persistentCache";
import type { EngineConfig } from "../config/env";
import { EngineError, toEngineErrorKind } from "../lib/errors";
import { localDay, type LocalDay } from "../lib/localDate";
import { defaultLogger, errorMessage, type Logger } from "../lib/logger";
import { withTimeout } from "../lib/withTimeout";
import { SyncScheduler, type SyncRunResult } from "../sync/syncScheduler";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type EngineSource = "cache" | "stale-cache" | "generated" | "fallback";

export type EngineResult<T> = {
  data: T;
  degraded: boolean;
  source: EngineSource;
  warnings: string[];
};

export type EnginePayloads = {
  profile: UserProfileDTO;
  dashboard: DashboardSnapshot;
  calendar: MonthlyPlan;
};

export type RefreshResult = {
  skipped: boolean;
  dashboard: EngineResult<DashboardSnapshot>;
  calendar: EngineResult<MonthlyPlan>;
  warnings: string[];
};

export type EngineStatus = {
  initialized: boolean;
  running: boolean;
  syncing: boolean;
  skippedCount: number;
  lastSyncAt: number | null;
  cached: { profile: boolean; dashboard: boolean; calendar: boolean };
};

export type BudgetEngineDeps = {
  cache: PersistentCache;
  api: FinanceApi;
  config: EngineConfig;
  logger?: Logger;
  now?: () => number;
};

// Calendar months kept in background sync besides the current one.
const MAX_WATCHED_MONTHS = 12;

// Marks dashboard payloads synthesized offline (passthrough key).
const FALLBACK_FLAG = "isFallback";

function isFallbackDashboard(d: DashboardSnapshot): boolean {
  return d[FALLBACK_FLAG] === true;
}

function toFinancialProfile(dto: UserProfileDTO): UserFinancialProfile {
  return {
    monthlyIncome: dto.monthlyIncome,
    countryCode: dto.countryCode,
    subregionCode: dto.subregionCode ?? null,
    timeZone: dto.timeZone ?? null,
    hasOnboarded: dto.hasOnboarded,
  };
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class BudgetEngine {
  readonly scheduler: SyncScheduler<EnginePayloads>;
  private cache: PersistentCache;
  private api: FinanceApi;
  private config: EngineConfig;
  private logger: Logger;
  private now: () => number;
  private initialized = false;
  // calendar keys requested through getCalendarData, oldest first
  private watchedPlans = new Set<string>();

  constructor(deps: BudgetEngineDeps) {
    this.cache = deps.cache;
    this.api = deps.api;
    this.config = deps.config;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => Date.now());

    const { config, api } = this;

    this.scheduler = new SyncScheduler<EnginePayloads>({
      cache: this.cache,
      intervalMs: config.syncIntervalMs,
      logger: this.logger,
      now: this.now,
      tasks: {
        profile: {
          key: () => PROFILE_KEY,
          schema: userProfileDTOSchema,
          ttlMs: config.profileTtlMs,
          timeoutMs: config.profileTimeoutMs,
          fetch: ({ signal }) => api.getUserProfile({ signal }),
        },
        dashboard: {
          key: () => DASHBOARD_KEY,
          schema: dashboardSnapshotSchema,
          ttlMs: config.dashboardTtlMs,
          timeoutMs: config.remoteTimeoutMs,
          fetch: ({ signal }) => api.getDashboardSnapshot({ signal }),
        },
        calendar: {
          key: () => this.calendarSyncKeys(),
          schema: monthlyPlanSchema,
          ttlMs: config.calendarTtlMs,
          timeoutMs: config.remoteTimeoutMs,
          fetch: ({ signal, key, previous }) => this.fetchPlan(key, previous, signal),
        },
      },
    });

    this.cache.setOnClear((w) => this.seedFallbacks(w));
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Seed fallback dashboard and current-month plan when nothing is cached. */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    try {
      const today = this.today();

      const dash = await this.cache.getStale(DASHBOARD_KEY, dashboardSnapshotSchema);
      const plan = await this.cache.getStale(
        calendarKey(today.year, today.month),
        monthlyPlanSchema
      );
      // only fill gaps; a sync may have written meanwhile
      const absent = (current: unknown) => current === null;
      if (!dash.found || !plan.found) {
        const seed = this.fallbackFor(today.year, today.month, null);
        if (!plan.found) {
          await this.cache.setIf(
            calendarKey(today.year, today.month),
            monthlyPlanSchema,
            absent,
            seed.plan,
            this.config.calendarTtlMs
          );
        }
        if (!dash.found) {
          await this.cache.setIf(
            DASHBOARD_KEY,
            dashboardSnapshotSchema,
            absent,
            seed.dashboard,
            this.config.dashboardTtlMs
          );
        }
      }
    } catch (e) {
      this.logger.error("[budgetEngine] initialize: seeding failed", e);
    }
    this.initialized = true;
    this.logger.info("[budgetEngine] initialized");
  }

  start(): void {
    this.scheduler.start();
  }

  stop(): void {
    this.scheduler.stop();
  }

  async dispose(): Promise<void> {
    this.stop();
    await this.cache.close();
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  async getDashboardData(): Promise<EngineResult<DashboardSnapshot>> {
    const warnings: string[] = [];
    try {
      const stale = await this.cache.getStale(DASHBOARD_KEY, dashboardSnapshotSchema);
      if (stale.found) {
        const fallback = isFallbackDashboard(stale.payload);
        if (fallback) warnings.push("showing estimated dashboard until the first sync");
        if (!fallback && stale.expired) warnings.push("dashboard data is out of date");
        return {
          data: stale.payload,
          degraded: fallback || stale.expired,
          source: fallback ? "fallback" : stale.expired ? "stale-cache" : "cache",
          warnings,
        };
      }
    } catch (e) {
      this.logger.warn("[budgetEngine] getDashboardData: cache read failed", e);
      warnings.push(`cache unavailable: ${errorMessage(e)}`);
    }

    const today = this.today();
    const profile = await this.cachedProfile();
    warnings.push("no dashboard cached; showing estimated dashboard");
    return {
      data: this.fallbackFor(today.year, today.month, profile).dashboard,
      degraded: true,
      source: "fallback",
      warnings,
    };
  }

  /**
   * Plan for `year`/`month` (1-based): cached plan -> plan generated from the
   * cached profile -> fallback. Never empty.
   */
  async getCalendarData(
    year: number,
    month: number
  ): Promise<EngineResult<MonthlyPlan>> {
    const warnings: string[] = [];
    if (!isValidYearMonth(year, month)) {
      const today = this.today();
      warnings.push(`invalid period ${year}-${month}; showing ${today.year}-${today.month}`);
      year = today.year;
      month = today.month;
    }

    const key = calendarKey(year, month);
    this.watch(key);
    let cached: MonthlyPlan | null = null;
    let expired = false;
    try {
      const stale = await this.cache.getStale(key, monthlyPlanSchema);
      if (stale.found) {
        cached = stale.payload;
        expired = stale.expired;
      }
    } catch (e) {
      this.logger.warn("[budgetEngine] getCalendarData: cache read failed", e);
      warnings.push(`cache unavailable: ${errorMessage(e)}`);
    }

    // A persisted plan stays frozen, even past its TTL.
    if (cached && (cached.authoritative || (!expired && cached.source !== "fallback"))) {
      if (expired) warnings.push("plan data is out of date");
      return {
        data: cached,
        degraded: expired,
        source: expired ? "stale-cache" : "cache",
        warnings,
      };
    }

    const profile = await this.cachedProfile();
    if (profile) {
      const plan = generateMonthlyPlan(
        year,
        month,
        profile,
        classifyProfile(profile),
        this.planOptions()
      );
      const stored = await this.storePlan(key, plan);
      if (stored !== plan) return { data: stored, degraded: false, source: "cache", warnings };
      return { data: plan, degraded: false, source: "generated", warnings };
    }

    if (cached) {
      const fallback = cached.source === "fallback";
      warnings.push(
        fallback ? "showing default plan until the first sync" : "plan data is out of date"
      );
      return {
        data: cached,
        degraded: true,
        source: fallback ? "fallback" : "stale-cache",
        warnings,
      };
    }

    const plan = this.fallbackFor(year, month, null).plan;
    const stored = await this.storePlan(key, plan);
    if (stored !== plan) return { data: stored, degraded: false, source: "cache", warnings };
    warnings.push("no plan available offline; showing defaults");
    return { data: plan, degraded: true, source: "fallback", warnings };
  }

  /**
   * Best-effort refresh bounded by `timeoutMs`, then the instant reads.
   * Never throws.
   */
  async refreshData(timeoutMs = this.config.remoteTimeoutMs): Promise<RefreshResult> {
    const warnings: string[] = [];
    let run: SyncRunResult<EnginePayloads> = { skipped: false, outcomes: [] };
    try {
      run = await this.scheduler.forceSync(undefined, timeoutMs);
    } catch (e) {
      warnings.push(`refresh failed: ${errorMessage(e)}`);
    }

    if (run.skipped) warnings.push("refresh already in progress");
    for (const o of run.outcomes) {
      if (!o.ok) warnings.push(`${o.name} refresh failed (${o.kind ?? "REMOTE_UNAVAILABLE"})`);
    }

    const today = this.today();
    const dashboard = await this.getDashboardData();
    const calendar = await this.getCalendarData(today.year, today.month);

    return { skipped: run.skipped, dashboard, calendar, warnings };
  }

  classifyIncome(profile: UserFinancialProfile): IncomeTier {
    return classifyProfile(profile);
  }

  /**
   * Generate the plan for a new user and persist it remotely. The server's
   * copy becomes the frozen plan for the month; offline, the generated plan
   * is cached instead (degraded).
   */
  async submitOnboardingPlan(
    profile: UserFinancialProfile,
    period?: { year: number; month: number }
  ): Promise<EngineResult<MonthlyPlan>> {
    const today = this.today();
    const year = period?.year ?? today.year;
    const month = period?.month ?? today.month;
    const key = calendarKey(year, month);

    const plan = generateMonthlyPlan(
      year,
      month,
      profile,
      classifyProfile(profile),
      this.planOptions()
    );

    try {
      const dto = await withTimeout("onboarding", this.config.remoteTimeoutMs, (signal) =>
        this.api.submitOnboardingPlan(
          {
            year,
            month,
            tier: plan.tier,
            monthlyIncomeMinor: plan.monthlyIncomeMinor,
            entries: plan.entries,
          },
          { signal }
        )
      );
      const persisted = toAuthoritativePlan(dto);
      await this.cache.set(key, persisted, this.config.calendarTtlMs);
      return { data: persisted, degraded: false, source: "cache", warnings: [] };
    } catch (e) {
      const kind = toEngineErrorKind(e);
      this.logger.warn("[budgetEngine] submitOnboardingPlan failed", { kind, error: errorMessage(e) });
      const warnings = [`plan not saved remotely (${kind})`];
      const stored = await this.storePlan(key, plan);
      if (stored !== plan) {
        warnings.push("kept the plan already persisted for this month");
        return { data: stored, degraded: true, source: "cache", warnings };
      }
      return { data: plan, degraded: true, source: "generated", warnings };
    }
  }

  async clearCache(): Promise<void> {
    try {
      await this.cache.clear();
    } catch (e) {
      this.logger.error("[budgetEngine] clearCache failed", e);
    }
  }

  async getStatus(): Promise<EngineStatus> {
    const today = this.today();
    const sync = this.scheduler.getState();
    const has = (k: string) => this.cache.has(k).catch(() => false);

    return {
      initialized: this.initialized,
      running: this.scheduler.isRunning(),
      syncing: sync.status === "syncing",
      skippedCount: sync.skippedCount,
      lastSyncAt: sync.lastFinishedAt,
      cached: {
        profile: await has(PROFILE_KEY),
        dashboard: await has(DASHBOARD_KEY),
        calendar: await has(calendarKey(today.year, today.month)),
      },
    };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private today(): LocalDay {
    return localDay(new Date(this.now()), this.config.timeZone);
  }

  private async cachedProfile(): Promise<UserFinancialProfile | null> {
    try {
      const stale = await this.cache.getStale(PROFILE_KEY, userProfileDTOSchema);
      return stale.found ? toFinancialProfile(stale.payload) : null;
    } catch (e) {
      this.logger.warn("[budgetEngine] profile cache read failed", e);
      return null;
    }
  }

  private planOptions(): Pick<
    GenerateOptions,
    "weekendMultiplier" | "dayPattern" | "costOfLiving"
  > {
    return {
      weekendMultiplier: this.config.weekendMultiplier,
      dayPattern: this.config.dayPatterns ? DEFAULT_DAY_PATTERN : undefined,
      costOfLiving: this.config.costOfLiving,
    };
  }

  private watch(key: string): void {
    this.watchedPlans.delete(key);
    this.watchedPlans.add(key);
    for (const oldest of this.watchedPlans) {
      if (this.watchedPlans.size <= MAX_WATCHED_MONTHS) break;
      this.watchedPlans.delete(oldest);
    }
  }

  private calendarSyncKeys(): string[] {
    const today = this.today();
    const current = calendarKey(today.year, today.month);
    return [current, ...[...this.watchedPlans].filter((k) => k !== current)];
  }

  private fallbackFor(
    year: number,
    month: number,
    profile: UserFinancialProfile | null
  ): { plan: MonthlyPlan; dashboard: DashboardSnapshot } {
    const plan = fallbackPlan(profile, { year, month, ...this.planOptions() });
    const dashboard = { ...fallbackDashboard(plan, this.today().iso), [FALLBACK_FLAG]: true };
    return { plan, dashboard };
  }

  /**
   * Cache `plan` unless the stored plan may not be replaced (checked against
   * the row at write time, not an earlier read). Returns the plan that ends
   * up stored.
   */
  private async storePlan(key: string, plan: MonthlyPlan): Promise<MonthlyPlan> {
    try {
      const res = await this.cache.setIf(
        key,
        monthlyPlanSchema,
        (current) => canReplace(current, plan),
        plan,
        this.config.calendarTtlMs
      );
      return !res.written && res.current ? res.current : plan;
    } catch (e) {
      this.logger.warn("[budgetEngine] plan cache write failed", e);
      return plan;
    }
  }

  private seedFallbacks(w: PersistentCacheWriter): void {
    const today = this.today();
    const seed = this.fallbackFor(today.year, today.month, null);
    w.setUnlocked(calendarKey(today.year, today.month), seed.plan, this.config.calendarTtlMs);
    w.setUnlocked(DASHBOARD_KEY, seed.dashboard, this.config.dashboardTtlMs);
  }

  private async fetchPlan(
    key: string,
    previous: MonthlyPlan | null,
    signal: AbortSignal
  ): Promise<MonthlyPlan | null> {
    const period = parseCalendarKey(key);
    if (!period) return null;

    const dto = await this.api.getPersistedPlan(period.year, period.month, { signal });
    if (!dto) return null;

    const resolved = resolvePlan(previous, toAuthoritativePlan(dto), this.logger, period);
    if (resolved.reason === "server-wrong-period") {
      // fails the sync for this key; the cached plan stays as is
      throw new EngineError(
        "CONSISTENCY_CONFLICT",
        `server returned ${dto.year}-${dto.month} for ${period.year}-${period.month}`
      );
    }
    return resolved.reason === "server" ? resolved.plan : null;
  }
}
