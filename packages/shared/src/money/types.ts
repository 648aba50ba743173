// packages/shared/src/money/types.ts
import { z } from "zod";

export const CURRENCY_VALUES = ["USD"] as const;
export type Currency = (typeof CURRENCY_VALUES)[number];

export const currencySchema = z.enum(CURRENCY_VALUES);

// Minor units per major unit (USD cents).
export const MINOR_PER_MAJOR = 100;

// Integer amount in minor units (cents). All planned/spent values use this.
export const minorAmountSchema = z.number().int();
export const nonNegMinorAmountSchema = z.number().int().nonnegative();
