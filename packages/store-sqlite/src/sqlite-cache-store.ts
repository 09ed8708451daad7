import Database from 'better-sqlite3';
import { and, eq, lte, ne, sql } from 'drizzle-orm';
import {
  drizzle,
  type BetterSQLite3Database,
} from 'drizzle-orm/better-sqlite3';
import { PageCacheError, type CacheStore } from '@page-cache/core';
import { CACHE_TABLE_DDL, cacheTable } from './schema.js';

export interface SQLiteCacheStoreOptions {
  /**
   * File path, `':memory:'`, or an open better-sqlite3 connection.
   * A connection passed in is shared and is not closed by the store.
   * Default: `':memory:'`
   */
  database?: string | Database.Database;
  /** Interval between sweeps of expired rows. 0 disables the sweep. Default: 60000 */
  cleanupIntervalMs?: number;
  /** Serialized values larger than this are not stored. Default: 5MB */
  maxEntrySizeBytes?: number;
}

const DEFAULT_CLEANUP_INTERVAL_MS = 60_000;
const DEFAULT_MAX_ENTRY_SIZE_BYTES = 5 * 1024 * 1024;

export class SQLiteCacheStore implements CacheStore {
  private readonly sqlite: Database.Database;
  private readonly db: BetterSQLite3Database;
  private readonly ownsConnection: boolean;
  private readonly maxEntrySizeBytes: number;
  private cleanupInterval: ReturnType<typeof setInterval> | undefined;
  private closed = false;

  constructor(options: SQLiteCacheStoreOptions = {}) {
    const database = options.database ?? ':memory:';
    this.ownsConnection = typeof database === 'string';
    this.sqlite =
      typeof database === 'string' ? new Database(database) : database;
    this.sqlite.exec(CACHE_TABLE_DDL);
    this.db = drizzle(this.sqlite);
    this.maxEntrySizeBytes =
      options.maxEntrySizeBytes ?? DEFAULT_MAX_ENTRY_SIZE_BYTES;

    const cleanupIntervalMs =
      options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    if (cleanupIntervalMs > 0) {
      this.cleanupInterval = setInterval(
        () => this.cleanupExpiredItems(),
        cleanupIntervalMs,
      );
      this.cleanupInterval.unref();
    }
  }

  async get(hash: string): Promise<unknown> {
    this.assertOpen();
    const row = this.db
      .select()
      .from(cacheTable)
      .where(eq(cacheTable.hash, hash))
      .limit(1)
      .get();
    if (!row) {
      return undefined;
    }

    if (row.expiresAt !== 0 && row.expiresAt <= Date.now()) {
      this.deleteRow(hash);
      return undefined;
    }

    try {
      const value: unknown = JSON.parse(row.value);
      return value;
    } catch {
      // Unreadable rows are dropped and reported as a miss.
      this.deleteRow(hash);
      return undefined;
    }
  }

  async set(hash: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.assertOpen();
    if (ttlSeconds < 0 || value === undefined) {
      this.deleteRow(hash);
      return;
    }

    let serialized: string;
    try {
      serialized = JSON.stringify(value);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PageCacheError(`Failed to serialize value: ${reason}`);
    }

    if (Buffer.byteLength(serialized, 'utf8') > this.maxEntrySizeBytes) {
      this.deleteRow(hash);
      return;
    }

    const now = Date.now();
    const expiresAt = ttlSeconds === 0 ? 0 : Math.ceil(now + ttlSeconds * 1000);
    this.db
      .insert(cacheTable)
      .values({ hash, value: serialized, expiresAt, createdAt: now })
      .onConflictDoUpdate({
        target: cacheTable.hash,
        set: { value: serialized, expiresAt, createdAt: now },
      })
      .run();
  }

  async delete(hash: string): Promise<void> {
    this.assertOpen();
    this.deleteRow(hash);
  }

  async clear(scope?: string): Promise<void> {
    this.assertOpen();
    if (!scope) {
      this.db.delete(cacheTable).run();
      return;
    }
    this.db
      .delete(cacheTable)
      .where(
        sql`substr(${cacheTable.hash}, 1, length(${scope})) = ${scope}`,
      )
      .run();
  }

  /** Delete expired rows, returning how many were removed */
  cleanupExpiredItems(): number {
    if (this.closed) {
      return 0;
    }
    const result = this.db
      .delete(cacheTable)
      .where(this.expiredCondition(Date.now()))
      .run();
    return result.changes;
  }

  async close(): Promise<void> {
    this.destroy();
  }

  /** Stop the sweep and close the connection if the store opened it */
  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.ownsConnection) {
      this.sqlite.close();
    }
  }

  private expiredCondition(now: number) {
    return and(ne(cacheTable.expiresAt, 0), lte(cacheTable.expiresAt, now));
  }

  private deleteRow(hash: string): void {
    this.db.delete(cacheTable).where(eq(cacheTable.hash, hash)).run();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new PageCacheError('SQLiteCacheStore has been closed');
    }
  }
}
