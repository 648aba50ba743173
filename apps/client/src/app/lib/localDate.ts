// apps/client/src/app/lib/localDate.ts

import { format } from "date-fns";
import { toZonedTime } from "date-fns-tz";

import { DEFAULT_TIME_ZONE } from "../config/env";

export type LocalDay = {
  year: number;
  month: number;
  day: number;
  iso: string;
};

function zoned(instant: Date, timeZone: string): Date {
  const z = toZonedTime(instant, timeZone);
  return Number.isFinite(z.getTime()) ? z : toZonedTime(instant, DEFAULT_TIME_ZONE);
}

/** Calendar day of `instant` in `timeZone` (unknown zones use the default). */
export function localDay(instant: Date, timeZone: string): LocalDay {
  const z = zoned(instant, timeZone);
  return {
    year: z.getFullYear(),
    month: z.getMonth() + 1,
    day: z.getDate(),
    iso: format(z, "yyyy-MM-dd"),
  };
}
