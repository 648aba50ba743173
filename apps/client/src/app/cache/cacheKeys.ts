// apps/client/src/app/cache/cacheKeys.ts

export const PROFILE_KEY = "profile";
export const DASHBOARD_KEY = "dashboard";

const CALENDAR_PREFIX = "calendar";

export function calendarKey(year: number, month: number): string {
  return `${CALENDAR_PREFIX}:${year}:${month}`;
}

export function parseCalendarKey(key: string): { year: number; month: number } | null {
  const m = /^calendar:(\d{4}):(\d{1,2})$/.exec(key);
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  if (month < 1 || month > 12) return null;
  return { year, month };
}
