/**
 * @guild-ledger/ledger — SQLite connection and migrations.
 *
 * One better-sqlite3 connection per process, wrapped by drizzle for typed
 * queries. Schema DDL lives in .sql files beside each package and is
 * applied once per database, tracked in `schema_migrations`.
 *
 * Rules:
 * - Foreign keys are always enforced
 * - File databases run in WAL mode with a busy timeout
 * - Driver errors are classified here, nowhere else
 */

import { readFileSync } from "node:fs";
import Database from "better-sqlite3";
import type { RunResult } from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";

// =============================================================================
// Types
// =============================================================================

/**
 * Anything queries can run against: the root database or an open
 * transaction handle.
 */
export type Executor = BaseSQLiteDatabase<"sync", RunResult>;

/**
 * A named DDL script.
 */
export interface Migration {
  readonly id: string;
  readonly sql: string;
}

export interface OpenDatabaseOptions {
  /** File path, or ":memory:" */
  readonly path: string;
  /** Applied after the ledger's own migrations, in order */
  readonly migrations?: readonly Migration[] | undefined;
  readonly busyTimeoutMs?: number | undefined;
}

export interface LedgerDatabase {
  readonly sqlite: Database.Database;
  readonly db: BetterSQLite3Database;
  close(): void;
}

// =============================================================================
// Migrations
// =============================================================================

/**
 * Read a migration script from disk.
 */
export function loadMigration(id: string, file: URL): Migration {
  return { id, sql: readFileSync(file, "utf8") };
}

export const LEDGER_MIGRATIONS: readonly Migration[] = [
  loadMigration("ledger/001_ledger", new URL("../sql/001_ledger.sql", import.meta.url)),
];

/**
 * Apply every migration not yet recorded. Each script runs in its own
 * transaction together with its bookkeeping row.
 *
 * @returns ids of the migrations applied by this call
 */
export function applyMigrations(
  sqlite: Database.Database,
  migrations: readonly Migration[],
): readonly string[] {
  sqlite.exec(
    "CREATE TABLE IF NOT EXISTS schema_migrations (id TEXT PRIMARY KEY, applied_at TEXT NOT NULL)",
  );

  const isApplied = sqlite.prepare("SELECT 1 FROM schema_migrations WHERE id = ?");
  const record = sqlite.prepare("INSERT INTO schema_migrations (id, applied_at) VALUES (?, ?)");
  const applied: string[] = [];

  for (const migration of migrations) {
    if (isApplied.get(migration.id) !== undefined) {
      continue;
    }
    sqlite.transaction(() => {
      sqlite.exec(migration.sql);
      record.run(migration.id, new Date().toISOString());
    })();
    applied.push(migration.id);
  }

  return applied;
}

// =============================================================================
// Connection
// =============================================================================

/**
 * Open (or create) a ledger database and bring its schema up to date.
 */
export function openDatabase(options: OpenDatabaseOptions): LedgerDatabase {
  const sqlite = new Database(options.path);

  if (options.path !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.pragma(`busy_timeout = ${String(options.busyTimeoutMs ?? 5000)}`);
  sqlite.pragma("foreign_keys = ON");

  applyMigrations(sqlite, [...LEDGER_MIGRATIONS, ...(options.migrations ?? [])]);

  const db = drizzle(sqlite);

  return {
    sqlite,
    db,
    close: () => {
      sqlite.close();
    },
  };
}

// =============================================================================
// Driver error classification
// =============================================================================

/**
 * Extract the SQLite result code from a driver error, following `cause`
 * chains left by wrappers.
 */
export function sqliteErrorCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    if ("code" in current && typeof current.code === "string" && current.code.startsWith("SQLITE_")) {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

export function isUniqueViolation(err: unknown): boolean {
  const code = sqliteErrorCode(err);
  return code === "SQLITE_CONSTRAINT_UNIQUE" || code === "SQLITE_CONSTRAINT_PRIMARYKEY";
}

/** Lock contention with another connection. Safe to retry. */
export function isBusyError(err: unknown): boolean {
  const code = sqliteErrorCode(err);
  return code !== undefined && (code.startsWith("SQLITE_BUSY") || code.startsWith("SQLITE_LOCKED"));
}
