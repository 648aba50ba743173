// packages/planner/src/lib/plan/monthUtils.ts

import { format, getDay, getDaysInMonth, isWeekend } from "date-fns";

import { MAX_REASONABLE_YEAR, MIN_REASONABLE_YEAR } from "./defaults";

export function isValidYearMonth(year: number, month: number): boolean {
  return (
    Number.isInteger(year) &&
    Number.isInteger(month) &&
    year >= MIN_REASONABLE_YEAR &&
    year <= MAX_REASONABLE_YEAR &&
    month >= 1 &&
    month <= 12
  );
}

export function assertYearMonth(year: number, month: number): void {
  if (!isValidYearMonth(year, month)) {
    throw new RangeError(`invalid year/month: ${year}-${month}`);
  }
}

// month is 1-based
export function daysInMonth(year: number, month: number): number {
  return getDaysInMonth(new Date(year, month - 1, 1));
}

export function isoDate(year: number, month: number, day: number): string {
  return format(new Date(year, month - 1, day), "yyyy-MM-dd");
}

export function isWeekendDay(year: number, month: number, day: number): boolean {
  return isWeekend(new Date(year, month - 1, day));
}

// 0 = Sunday ... 6 = Saturday
export function dayOfWeek(year: number, month: number, day: number): number {
  return getDay(new Date(year, month - 1, day));
}

export function dayOfMonthFromIso(date: string): number {
  return Number(date.slice(8, 10));
}
