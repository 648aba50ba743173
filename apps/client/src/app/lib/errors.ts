// apps/client/src/app/lib/errors.ts

export class ApiError extends Error {
  constructor(
    public status: number,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export class TimeoutError extends Error {
  constructor(
    public label: string,
    public timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export const ENGINE_ERROR_KINDS = [
  "REMOTE_UNAVAILABLE",
  "INVALID_PROFILE",
  "CACHE_CORRUPTION",
  "CONSISTENCY_CONFLICT",
] as const;
export type EngineErrorKind = (typeof ENGINE_ERROR_KINDS)[number];

export class EngineError extends Error {
  constructor(
    public kind: EngineErrorKind,
    message: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = "EngineError";
  }
}

/**
 * Map any thrown value to an engine error kind.
 * - EngineError -> its own kind
 * - ZodError from a remote payload -> INVALID_PROFILE (bad profile data)
 * - timeouts, aborts, ApiError, network TypeError, anything else -> REMOTE_UNAVAILABLE
 */
export function toEngineErrorKind(e: unknown): EngineErrorKind {
  if (e instanceof EngineError) return e.kind;
  if (e instanceof Error && e.name === "ZodError") return "INVALID_PROFILE";
  return "REMOTE_UNAVAILABLE";
}
