// packages/planner/src/lib/plan/defaults.ts

// $3,000/month in minor units. Substituted for missing/invalid income so a
// plan is never all zeros.
export const DEFAULT_MONTHLY_INCOME_MINOR = 300_000;

export const DEFAULT_WEEKEND_MULTIPLIER = 1.5;

// Cumulative monthly planned total may exceed the flexible budget by at most 30%.
export const MONTHLY_OVERSHOOT_TOLERANCE = 0.3;

// Day status thresholds (spent / limit).
export const WARNING_RATIO = 0.85;
export const OVER_RATIO = 1.1;

// Country used when no profile exists yet.
export const DEFAULT_COUNTRY_CODE = "US";

// Fallback dashboard balance as a share of monthly income.
export const FALLBACK_BALANCE_SHARE = 0.85;

export const MIN_REASONABLE_YEAR = 1970;
export const MAX_REASONABLE_YEAR = 2100;
