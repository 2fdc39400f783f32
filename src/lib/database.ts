/**
 * Ledger database connection
 * One SQLite file per ledger, opened with better-sqlite3 and queried through drizzle.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { RunResult } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { ledgerSchema } from '@/features/inventory/db/schema';
import type { LedgerSchema } from '@/features/inventory/db/schema';
import { runMigrations } from '@/features/inventory/db/migrations';

/** Clock returning ISO-8601 timestamps; injected so tests can step time */
export type Clock = () => string;

export const systemClock: Clock = () => new Date().toISOString();

/** The drizzle handle or an open transaction on it */
export type LedgerExecutor = BaseSQLiteDatabase<'sync', RunResult, LedgerSchema>;

export interface LedgerDatabase {
  readonly sqlite: Database.Database;
  readonly orm: BetterSQLite3Database<LedgerSchema>;
  readonly now: Clock;
  readonly path: string;
}

export interface OpenLedgerOptions {
  /** File path, or ':memory:' */
  path: string;
  busyTimeoutMs?: number;
  now?: Clock;
}

export function openLedgerDatabase(options: OpenLedgerOptions): LedgerDatabase {
  const inMemory = options.path === ':memory:';
  if (!inMemory) {
    mkdirSync(dirname(options.path), { recursive: true });
  }

  const sqlite = new Database(options.path, { timeout: options.busyTimeoutMs ?? 5000 });
  const now = options.now ?? systemClock;

  try {
    if (!inMemory) sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('foreign_keys = ON');
    runMigrations(sqlite, { now });
  } catch (error) {
    console.error('Error opening ledger database:', error);
    sqlite.close();
    throw error;
  }

  return {
    sqlite,
    orm: drizzle(sqlite, { schema: ledgerSchema }),
    now,
    path: options.path,
  };
}

export function closeLedgerDatabase(db: LedgerDatabase): void {
  if (db.sqlite.open) db.sqlite.close();
}

/**
 * Run a write unit of work in one BEGIN IMMEDIATE transaction.
 * Any throw rolls the whole unit back.
 */
export function writeTransaction<T>(db: LedgerDatabase, work: (tx: LedgerExecutor) => T): T {
  return db.orm.transaction((tx) => work(tx), { behavior: 'immediate' });
}

/** Read-only unit of work on one consistent snapshot */
export function readTransaction<T>(db: LedgerDatabase, work: (tx: LedgerExecutor) => T): T {
  return db.orm.transaction((tx) => work(tx), { behavior: 'deferred' });
}
