// packages/planner/src/lib/money.ts

import { MINOR_PER_MAJOR } from "@dayplan/shared";

/**
 * Major units (dollars) -> integer minor units (cents).
 *
 * Scales through the decimal string ("3744.58e2") instead of multiplying the
 * binary float, so values like 1.005 round to 101 and not 100.
 * Non-finite input -> 0.
 */
export function toMinorUnits(major: unknown): number {
  const v = typeof major === "number" ? major : Number(major);
  if (!Number.isFinite(v)) return 0;

  const s = String(v);
  if (s.includes("e")) return Math.round(v * MINOR_PER_MAJOR);

  const scaled = Number(`${s}e2`);
  return Number.isFinite(scaled) ? Math.round(scaled) : 0;
}

export function toMajorUnits(minor: number): number {
  if (!Number.isFinite(minor)) return 0;
  return minor / MINOR_PER_MAJOR;
}
