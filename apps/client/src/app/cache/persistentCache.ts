// apps/client/src/app/cache/persistentCache.ts
// Offline-first key/value cache with TTLs. Payloads are JSON text validated
// with zod on the way out; a row that fails to parse is dropped.

import type { z } from "zod";

import { defaultLogger, errorMessage, type Logger } from "../lib/logger";
import { AsyncLock } from "./asyncLock";
import type { CacheStorage } from "./cacheStorage";

export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type CacheHit<T> = { found: true; payload: T; expiresAt: number };
export type CacheMiss = { found: false };
export type CacheLookup<T> = CacheHit<T> | CacheMiss;

export type StaleLookup<T> =
  | { found: true; payload: T; expiresAt: number; expired: boolean }
  | CacheMiss;

export type ConditionalWrite<T> = {
  written: boolean;
  // value seen before the write (expired values included)
  current: T | null;
};

export type PersistentCacheOptions = {
  storage: CacheStorage;
  logger?: Logger;
  now?: () => number;
  // Runs inside the lock after clear(); used to reseed fallback defaults.
  onClear?: (cache: PersistentCacheWriter) => void | Promise<void>;
};

// Write access handed to onClear (already inside the lock).
export type PersistentCacheWriter = {
  setUnlocked: (key: string, payload: unknown, ttlMs: number) => void;
};

const MISS: CacheMiss = { found: false };

export class PersistentCache {
  private storage: CacheStorage;
  private logger: Logger;
  private now: () => number;
  private onClear?: PersistentCacheOptions["onClear"];
  private lock = new AsyncLock();

  constructor(opts: PersistentCacheOptions) {
    this.storage = opts.storage;
    this.logger = opts.logger ?? defaultLogger;
    this.now = opts.now ?? (() => Date.now());
    this.onClear = opts.onClear;
  }

  setOnClear(hook: PersistentCacheOptions["onClear"]): void {
    this.onClear = hook;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  /** Fresh entries only; an expired entry is a miss (and stays stored for getStale). */
  get<T>(key: string, schema: PayloadSchema<T>): Promise<CacheLookup<T>> {
    return this.lock.run((): CacheLookup<T> => {
      const hit = this.readValid(key, schema);
      if (!hit) return MISS;
      if (hit.expiresAt <= this.now()) return MISS;
      return { found: true, payload: hit.payload, expiresAt: hit.expiresAt };
    });
  }

  /** Last known value even after expiry. */
  getStale<T>(key: string, schema: PayloadSchema<T>): Promise<StaleLookup<T>> {
    return this.lock.run((): StaleLookup<T> => {
      const hit = this.readValid(key, schema);
      if (!hit) return MISS;
      return {
        found: true,
        payload: hit.payload,
        expiresAt: hit.expiresAt,
        expired: hit.expiresAt <= this.now(),
      };
    });
  }

  has(key: string): Promise<boolean> {
    return this.lock.run(() => {
      const row = this.storage.read(key);
      return Boolean(row && row.expiresAt > this.now());
    });
  }

  keys(): Promise<string[]> {
    return this.lock.run(() => this.storage.keys());
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  set(key: string, payload: unknown, ttlMs: number): Promise<void> {
    return this.lock.run(() => this.setUnlocked(key, payload, ttlMs));
  }

  /**
   * Write only when `accept` approves the stored value (null when absent).
   * The read and the write happen in one lock hold, so nothing written by
   * another caller can slip in between.
   */
  setIf<T>(
    key: string,
    schema: PayloadSchema<T>,
    accept: (current: T | null) => boolean,
    payload: T,
    ttlMs: number
  ): Promise<ConditionalWrite<T>> {
    return this.lock.run((): ConditionalWrite<T> => {
      const current = this.readValid(key, schema)?.payload ?? null;
      if (!accept(current)) return { written: false, current };
      this.setUnlocked(key, payload, ttlMs);
      return { written: true, current };
    });
  }

  invalidate(key: string): Promise<void> {
    return this.lock.run(() => this.storage.remove(key));
  }

  /** Drop everything, then let onClear reseed defaults. */
  clear(): Promise<void> {
    return this.lock.run(async () => {
      this.storage.removeAll();
      if (this.onClear) {
        await this.onClear({
          setUnlocked: (k, p, ttl) => this.setUnlocked(k, p, ttl),
        });
      }
    });
  }

  purgeExpired(): Promise<number> {
    return this.lock.run(() => this.storage.removeExpired(this.now()));
  }

  close(): Promise<void> {
    return this.lock.run(() => this.storage.close());
  }

  // ---------------------------------------------------------------------------
  // Internals (caller holds the lock)
  // ---------------------------------------------------------------------------

  private setUnlocked(key: string, payload: unknown, ttlMs: number): void {
    const now = this.now();
    const ttl = Number.isFinite(ttlMs) ? Math.max(0, ttlMs) : 0;
    this.storage.write({
      key,
      payload: JSON.stringify(payload),
      expiresAt: now + ttl,
      updatedAt: now,
    });
  }

  private readValid<T>(
    key: string,
    schema: PayloadSchema<T>
  ): { payload: T; expiresAt: number } | null {
    const row = this.storage.read(key);
    if (!row) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(row.payload);
    } catch (e) {
      this.dropCorrupt(key, errorMessage(e));
      return null;
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      this.dropCorrupt(key, parsed.error.issues[0]?.message ?? "schema mismatch");
      return null;
    }
    return { payload: parsed.data, expiresAt: row.expiresAt };
  }

  private dropCorrupt(key: string, reason: string): void {
    this.logger.warn("[persistentCache] CACHE_CORRUPTION: dropping entry", {
      key,
      reason,
    });
    this.storage.remove(key);
  }
}
