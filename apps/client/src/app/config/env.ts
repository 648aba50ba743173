// apps/client/src/app/config/env.ts

import { z } from "zod";

export const DEFAULT_API_BASE_URL = "http://localhost:3001";
export const DEFAULT_TIME_ZONE = "America/New_York";

const MINUTE_MS = 60_000;

const positiveMs = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  DAYPLAN_API_BASE_URL: z.string().url().default(DEFAULT_API_BASE_URL),
  // ":memory:" keeps the cache in-process (tests, ephemeral runs)
  DAYPLAN_CACHE_PATH: z.string().min(1).default("dayplan-cache.sqlite"),
  DAYPLAN_SYNC_INTERVAL_MS: positiveMs(5 * MINUTE_MS),
  DAYPLAN_REMOTE_TIMEOUT_MS: positiveMs(8_000),
  DAYPLAN_PROFILE_TIMEOUT_MS: positiveMs(5_000),
  DAYPLAN_WEEKEND_MULTIPLIER: z.coerce
    .number()
    .gt(1, "weekend multiplier must be > 1")
    .default(1.5),
  DAYPLAN_TIME_ZONE: z.string().min(1).default(DEFAULT_TIME_ZONE),
  // weekday/payday/month-end shaping of daily budgets
  DAYPLAN_DAY_PATTERNS: z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((v) => v === "true" || v === "1"),
  // local price level relative to the national baseline
  DAYPLAN_COST_OF_LIVING: z.coerce
    .number()
    .min(0.5, "cost of living must be between 0.5 and 2")
    .max(2, "cost of living must be between 0.5 and 2")
    .default(1),
});

export type EngineConfig = {
  apiBaseUrl: string;
  cachePath: string;
  syncIntervalMs: number;
  remoteTimeoutMs: number;
  profileTimeoutMs: number;
  weekendMultiplier: number;
  dayPatterns: boolean;
  costOfLiving: number;
  timeZone: string;
  // TTLs for cached resources
  profileTtlMs: number;
  dashboardTtlMs: number;
  calendarTtlMs: number;
};

const HOUR_MS = 60 * MINUTE_MS;

export const CACHE_TTLS = {
  profileTtlMs: 4 * HOUR_MS,
  dashboardTtlMs: 2 * HOUR_MS,
  calendarTtlMs: 2 * HOUR_MS,
} as const;

// Empty strings count as unset.
function presentOnly(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (typeof v === "string" && v.trim() !== "") out[k] = v.trim();
  }
  return out;
}

/**
 * Read engine config from the environment.
 * Throws (ZodError) when a variable is set but invalid.
 */
export function loadEngineConfig(
  env: NodeJS.ProcessEnv = process.env
): EngineConfig {
  const parsed = envSchema.parse(presentOnly(env));
  return {
    apiBaseUrl: parsed.DAYPLAN_API_BASE_URL,
    cachePath: parsed.DAYPLAN_CACHE_PATH,
    syncIntervalMs: parsed.DAYPLAN_SYNC_INTERVAL_MS,
    remoteTimeoutMs: parsed.DAYPLAN_REMOTE_TIMEOUT_MS,
    profileTimeoutMs: parsed.DAYPLAN_PROFILE_TIMEOUT_MS,
    weekendMultiplier: parsed.DAYPLAN_WEEKEND_MULTIPLIER,
    dayPatterns: parsed.DAYPLAN_DAY_PATTERNS,
    costOfLiving: parsed.DAYPLAN_COST_OF_LIVING,
    timeZone: parsed.DAYPLAN_TIME_ZONE,
    ...CACHE_TTLS,
  };
}
