// apps/client/src/app/cache/cacheStorage.ts
// Durable key/value rows behind the persistent cache.

import Database from "better-sqlite3";

export type CacheRow = {
  key: string;
  payload: string;
  expiresAt: number;
  updatedAt: number;
};

export interface CacheStorage {
  read(key: string): CacheRow | null;
  write(row: CacheRow): void;
  remove(key: string): void;
  removeAll(): void;
  removeExpired(now: number): number;
  keys(): string[];
  close(): void;
}

type RawRow = {
  key: unknown;
  payload: unknown;
  expires_at: unknown;
  updated_at: unknown;
};

function toCacheRow(raw: RawRow | undefined): CacheRow | null {
  if (!raw) return null;
  if (typeof raw.key !== "string" || typeof raw.payload !== "string") return null;
  return {
    key: raw.key,
    payload: raw.payload,
    expiresAt: Number(raw.expires_at),
    updatedAt: Number(raw.updated_at),
  };
}

export class SqliteCacheStorage implements CacheStorage {
  private db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cache_entries (
        key TEXT PRIMARY KEY,
        payload TEXT NOT NULL,
        expires_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );
    `);
  }

  read(key: string): CacheRow | null {
    const raw = this.db
      .prepare<[string], RawRow>(
        "SELECT key, payload, expires_at, updated_at FROM cache_entries WHERE key = ?"
      )
      .get(key);
    return toCacheRow(raw);
  }

  write(row: CacheRow): void {
    this.db
      .prepare(
        `INSERT INTO cache_entries (key, payload, expires_at, updated_at)
         VALUES (@key, @payload, @expiresAt, @updatedAt)
         ON CONFLICT(key) DO UPDATE SET
           payload = excluded.payload,
           expires_at = excluded.expires_at,
           updated_at = excluded.updated_at`
      )
      .run(row);
  }

  remove(key: string): void {
    this.db.prepare("DELETE FROM cache_entries WHERE key = ?").run(key);
  }

  removeAll(): void {
    this.db.prepare("DELETE FROM cache_entries").run();
  }

  removeExpired(now: number): number {
    return this.db
      .prepare("DELETE FROM cache_entries WHERE expires_at <= ?")
      .run(now).changes;
  }

  keys(): string[] {
    const rows = this.db
      .prepare<[], { key: unknown }>("SELECT key FROM cache_entries ORDER BY key")
      .all();
    return rows.flatMap((r) => (typeof r.key === "string" ? [r.key] : []));
  }

  close(): void {
    this.db.close();
  }
}
