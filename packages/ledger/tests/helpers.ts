/**
 * Shared fixtures: an in-memory ledger with a silent logger and no
 * backoff sleeps.
 */

import pino from "pino";
import { openDatabase } from "../src/database.js";
import type { LedgerDatabase, Migration } from "../src/database.js";
import { Ledger } from "../src/ledger.js";
import type { LedgerOptions } from "../src/ledger.js";
import { TransactionFactory } from "../src/transaction-factory.js";

export const TENANT = "guild-1";
export const OTHER_TENANT = "guild-2";

export interface TestLedger {
  readonly database: LedgerDatabase;
  readonly ledger: Ledger;
  readonly factory: TransactionFactory;
}

export function createTestLedger(
  overrides: Partial<Omit<LedgerOptions, "db">> = {},
  migrations: readonly Migration[] = [],
): TestLedger {
  const database = openDatabase({ path: ":memory:", migrations });
  const ledger = new Ledger({
    db: database.db,
    logger: pino({ level: "silent" }),
    sleep: () => Promise.resolve(),
    ...overrides,
  });
  return { database, ledger, factory: new TransactionFactory(ledger) };
}

/**
 * Number of rows in a table, read straight from SQLite.
 */
export function countRows(database: LedgerDatabase, table: string, where = "1 = 1"): number {
  const row: unknown = database.sqlite.prepare(`SELECT COUNT(*) AS n FROM ${table} WHERE ${where}`).get();
  if (row !== null && typeof row === "object" && "n" in row && typeof row.n === "number") {
    return row.n;
  }
  throw new Error(`Could not count rows of ${table}`);
}
