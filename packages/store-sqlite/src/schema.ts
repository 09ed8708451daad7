import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const cacheTable = sqliteTable('cache', {
  hash: text('hash').primaryKey(),
  /** JSON-serialized value */
  value: text('value').notNull(),
  /** Epoch ms; 0 for entries that never expire */
  expiresAt: integer('expires_at').notNull(),
  createdAt: integer('created_at').notNull(),
});

export type CacheRow = typeof cacheTable.$inferSelect;

/** DDL applied when a store opens a database */
export const CACHE_TABLE_DDL = `
  CREATE TABLE IF NOT EXISTS cache (
    hash TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    expires_at INTEGER NOT NULL,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_cache_expires_at ON cache (expires_at);
`;
