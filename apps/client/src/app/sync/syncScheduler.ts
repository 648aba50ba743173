// apps/client/src/app/sync/syncScheduler.ts
// Background refresh of cached resources. One timer, one sync at a time.
// Each resource runs independently with its own timeout; success overwrites
// the cache entry (fresh TTL), failure leaves it untouched.

import type { PayloadSchema, PersistentCache } from "../cache/persistentCache";
import { toEngineErrorKind, type EngineErrorKind } from "../lib/errors";
import { defaultLogger, errorMessage, type Logger } from "../lib/logger";
import { withTimeout } from "../lib/withTimeout";
import { createSyncStore, type SyncState, type SyncStore } from "../store/syncStore";

export type SyncContext<T> = {
  signal: AbortSignal;
  key: string;
  // last cached value (possibly expired), null when none
  previous: T | null;
};

export type SyncTask<T> = {
  // one cache key, or several keys fetched and written independently
  key: () => string | readonly string[];
  schema: PayloadSchema<T>;
  ttlMs: number;
  timeoutMs: number;
  // null = nothing new; the cache is left as is
  fetch: (ctx: SyncContext<T>) => Promise<T | null>;
};

export type SyncName<M> = Extract<keyof M, string>;

export type SyncTaskMap<M> = { [K in SyncName<M>]: SyncTask<M[K]> };

export type SyncOutcome<T> = {
  key: string;
  ok: boolean;
  updated: boolean;
  // new value on success, previous cached value otherwise
  value: T | null;
  kind?: EngineErrorKind;
  error?: string;
};

export type NamedSyncOutcome<M, K extends SyncName<M> = SyncName<M>> =
  SyncOutcome<M[K]> & { name: K };

export type SyncRunResult<M> = {
  skipped: boolean;
  outcomes: Array<NamedSyncOutcome<M>>;
};

export type SyncSchedulerOptions<M> = {
  cache: PersistentCache;
  tasks: SyncTaskMap<M>;
  intervalMs: number;
  logger?: Logger;
  now?: () => number;
  store?: SyncStore;
};

export class SyncScheduler<M> {
  readonly store: SyncStore;
  private cache: PersistentCache;
  private tasks: SyncTaskMap<M>;
  private names: Array<SyncName<M>>;
  private intervalMs: number;
  private logger: Logger;
  private now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(opts: SyncSchedulerOptions<M>) {
    this.cache = opts.cache;
    this.tasks = opts.tasks;
    this.names = Object.keys(opts.tasks).filter(
      (k): k is SyncName<M> => k in opts.tasks
    );
    this.intervalMs = opts.intervalMs;
    this.logger = opts.logger ?? defaultLogger;
    this.now = opts.now ?? (() => Date.now());
    this.store = opts.store ?? createSyncStore();
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Immediate sync, then every intervalMs. No-op when already started. */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.timer.unref();
    this.tick();
  }

  /** Cancels the timer. In-flight fetches finish and still write through. */
  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getState(): SyncState {
    return this.store.getState();
  }

  private tick(): void {
    this.syncNow().catch((e: unknown) => {
      this.logger.error("[syncScheduler] periodic sync failed", e);
    });
  }

  // ---------------------------------------------------------------------------
  // Sync
  // ---------------------------------------------------------------------------

  syncNow(): Promise<SyncRunResult<M>> {
    return this.forceSync();
  }

  /**
   * Refresh the named resources (all by default). `timeoutMs` caps every
   * task's own timeout. Dropped with `skipped: true` while a sync is running.
   * Never throws.
   */
  async forceSync(
    names: Array<SyncName<M>> = this.names,
    timeoutMs?: number
  ): Promise<SyncRunResult<M>> {
    if (!this.store.getState().beginSync(this.now())) {
      this.logger.debug("[syncScheduler] sync already running; request dropped");
      return { skipped: true, outcomes: [] };
    }

    const outcomes: Array<NamedSyncOutcome<M>> = [];
    try {
      const results = await Promise.all(
        names.map((name) => this.runTask(name, timeoutMs))
      );
      outcomes.push(...results.flat());
    } finally {
      this.store.getState().endSync(
        this.now(),
        outcomes.map((o) => ({ name: o.name, ok: o.ok, error: o.error }))
      );
    }
    return { skipped: false, outcomes };
  }

  /** One resource (every key it covers), outside the sync flag. Never throws. */
  async runTask<K extends SyncName<M>>(
    name: K,
    timeoutMs?: number
  ): Promise<Array<NamedSyncOutcome<M, K>>> {
    const task: SyncTask<M[K]> = this.tasks[name];
    let keys: readonly string[];
    try {
      const k = task.key();
      keys = typeof k === "string" ? [k] : k;
    } catch (e) {
      return [this.failed(name, name, null, e)];
    }
    return Promise.all(keys.map((key) => this.runKey(name, task, key, timeoutMs)));
  }

  private async runKey<K extends SyncName<M>>(
    name: K,
    task: SyncTask<M[K]>,
    key: string,
    timeoutMs?: number
  ): Promise<NamedSyncOutcome<M, K>> {
    let previous: M[K] | null = null;
    try {
      const stale = await this.cache.getStale(key, task.schema);
      previous = stale.found ? stale.payload : null;

      const limit =
        timeoutMs === undefined ? task.timeoutMs : Math.min(task.timeoutMs, timeoutMs);
      const prev = previous;
      const value = await withTimeout(name, limit, (signal) =>
        task.fetch({ signal, key, previous: prev })
      );

      if (value === null) {
        return { name, key, ok: true, updated: false, value: previous };
      }

      await this.cache.set(key, value, task.ttlMs);
      return { name, key, ok: true, updated: true, value };
    } catch (e) {
      return this.failed(name, key, previous, e);
    }
  }

  private failed<K extends SyncName<M>>(
    name: K,
    key: string,
    previous: M[K] | null,
    e: unknown
  ): NamedSyncOutcome<M, K> {
    const kind = toEngineErrorKind(e);
    const error = errorMessage(e);
    this.logger.warn(`[syncScheduler] ${name} sync failed`, { key, kind, error });
    return { name, key, ok: false, updated: false, value: previous, kind, error };
  }
}
