// apps/client/src/app/lib/logger.ts

// Console-shaped logger. Components take one so tests can pass spies.
export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

export const defaultLogger: Logger = console;

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
