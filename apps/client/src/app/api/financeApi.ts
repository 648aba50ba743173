// apps/client/src/app/api/financeApi.ts
// Remote source of truth. Every response is validated before it reaches the cache.

import {
  canonicalFlexCategory,
  dashboardSnapshotSchema,
  serverPlanDTOSchema,
  userProfileDTOSchema,
  type DashboardSnapshot,
  type ServerPlanDTO,
  type SubmitOnboardingPlanRequestDTO,
  type UserProfileDTO,
} from "@dayplan/shared";

import { ApiError } from "../lib/errors";
import { createHttpClient, type HttpClient, type HttpClientOptions } from "./http";

export type RequestOptions = { signal?: AbortSignal };

export interface FinanceApi {
  getUserProfile(opts?: RequestOptions): Promise<UserProfileDTO>;
  // null when the server has no plan for the month (404)
  getPersistedPlan(
    year: number,
    month: number,
    opts?: RequestOptions
  ): Promise<ServerPlanDTO | null>;
  getDashboardSnapshot(opts?: RequestOptions): Promise<DashboardSnapshot>;
  submitOnboardingPlan(
    plan: SubmitOnboardingPlanRequestDTO,
    opts?: RequestOptions
  ): Promise<ServerPlanDTO>;
}

// Responses may wrap the payload under { data }, or a plan under { plan }.
function unwrap(payload: unknown, key?: string): unknown {
  if (!payload || typeof payload !== "object") return payload;
  if (key && key in payload) return Reflect.get(payload, key);
  if ("data" in payload) return Reflect.get(payload, "data");
  return payload;
}

// Folds legacy category labels ("dining", "Transport") into canonical keys.
// Unknown labels are left as-is so validation rejects them.
function normalizePlanPayload(payload: unknown): unknown {
  if (!payload || typeof payload !== "object") return payload;
  const entries: unknown = Reflect.get(payload, "entries");
  if (!Array.isArray(entries)) return payload;
  return {
    ...payload,
    entries: entries.map((e: unknown) => {
      if (!e || typeof e !== "object") return e;
      const category: unknown = Reflect.get(e, "category");
      return { ...e, category: canonicalFlexCategory(category) ?? category };
    }),
  };
}

export function createHttpFinanceApi(
  opts: HttpClientOptions | { http: HttpClient }
): FinanceApi {
  const http = "http" in opts ? opts.http : createHttpClient(opts);

  return {
    getUserProfile: async (o = {}) => {
      const res = await http.request("/api/users/me", { signal: o.signal });
      return userProfileDTOSchema.parse(unwrap(res, "user"));
    },

    getPersistedPlan: async (year, month, o = {}) => {
      const qs = new URLSearchParams();
      qs.set("year", String(year));
      qs.set("month", String(month));
      try {
        const res = await http.request(`/api/calendar/plan?${qs.toString()}`, {
          signal: o.signal,
        });
        if (res === null) return null;
        return serverPlanDTOSchema.parse(normalizePlanPayload(unwrap(res, "plan")));
      } catch (e) {
        if (e instanceof ApiError && e.status === 404) return null;
        throw e;
      }
    },

    getDashboardSnapshot: async (o = {}) => {
      const res = await http.request("/api/dashboard", { signal: o.signal });
      return dashboardSnapshotSchema.parse(unwrap(res, "dashboard"));
    },

    submitOnboardingPlan: async (plan, o = {}) => {
      const res = await http.request("/api/onboarding/plan", {
        method: "POST",
        body: JSON.stringify(plan),
        signal: o.signal,
      });
      return serverPlanDTOSchema.parse(normalizePlanPayload(unwrap(res, "plan")));
    },
  };
}
