// apps/client/src/app/api/http.ts

import { ApiError } from "../lib/errors";
import { defaultLogger, type Logger } from "../lib/logger";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpClientOptions = {
  baseUrl: string;
  fetchImpl?: FetchLike;
  logger?: Logger;
};

export type HttpClient = {
  // Parsed JSON body (or text); null for 204.
  request: (endpoint: string, options?: RequestInit) => Promise<unknown>;
};

function errorText(details: unknown, fallback: string): string {
  if (details && typeof details === "object" && "error" in details) {
    const e = details.error;
    if (typeof e === "string" && e) return e;
  }
  return fallback;
}

export function createHttpClient(opts: HttpClientOptions): HttpClient {
  const base = String(opts.baseUrl ?? "").replace(/\/$/, "");
  const fetchImpl: FetchLike = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  const logger = opts.logger ?? defaultLogger;

  return {
    request: async (endpoint, options = {}) => {
      const path = endpoint.startsWith("/") ? endpoint : `/${endpoint}`;
      const url = `${base}${path}`;

      const headers = new Headers(options.headers);
      if (!headers.has("Content-Type"))
        headers.set("Content-Type", "application/json");

      const method = String(options.method ?? "GET").toUpperCase();
      logger.debug("[http]", method, url);

      const response = await fetchImpl(url, { ...options, method, headers });

      if (!response.ok) {
        const text = await response.text().catch(() => "");
        let details: unknown = { error: "Unknown error" };
        try {
          details = text ? JSON.parse(text) : details;
        } catch {
          details = { error: text || "Request failed" };
        }
        throw new ApiError(
          response.status,
          errorText(details, "Request failed"),
          details
        );
      }

      if (response.status === 204) return null;

      const contentType = response.headers.get("Content-Type") || "";
      if (contentType.includes("application/json")) return response.json();
      return response.text();
    },
  };
}
