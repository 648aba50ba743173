// packages/shared/src/user/types.ts

import { z } from "zod";

/**
 * Caller-owned financial profile. Passed by value into classification and
 * allocation; never mutated by the planner.
 */
export type UserFinancialProfile = {
  // Major units (e.g. dollars); may carry cents.
  monthlyIncome: number;
  countryCode: string;
  subregionCode?: string | null;
  timeZone?: string | null;
  hasOnboarded?: boolean;
};

export const userProfileDTOSchema = z
  .object({
    monthlyIncome: z.number(),
    countryCode: z.string().min(1),
    subregionCode: z.string().min(1).optional().nullable(),
    timeZone: z.string().min(1).optional().nullable(),
    hasOnboarded: z.boolean().optional().default(false),
  })
  .passthrough();

export type UserProfileDTO = z.infer<typeof userProfileDTOSchema>;
