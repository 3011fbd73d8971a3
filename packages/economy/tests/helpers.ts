/**
 * Shared fixtures: an in-memory ledger with the economy schema, a silent
 * logger and no backoff sleeps.
 */

import pino from "pino";
import { Ledger, TransactionFactory, openDatabase } from "@guild-ledger/ledger";
import type { LedgerDatabase } from "@guild-ledger/ledger";
import { createEconomy } from "../src/economy.js";
import type { Economy, EconomyOptions } from "../src/economy.js";
import { ECONOMY_MIGRATIONS } from "../src/migrations.js";

export const TENANT = "guild-1";
export const OTHER_TENANT = "guild-2";

export interface TestEconomy {
  readonly database: LedgerDatabase;
  readonly ledger: Ledger;
  readonly factory: TransactionFactory;
  readonly economy: Economy;
}

export function createTestEconomy(options: EconomyOptions = {}): TestEconomy {
  const database = openDatabase({ path: ":memory:", migrations: ECONOMY_MIGRATIONS });
  const logger = pino({ level: "silent" });
  const ledger = new Ledger({ db: database.db, logger, sleep: () => Promise.resolve() });
  const factory = new TransactionFactory(ledger);
  const economy = createEconomy({ factory, logger }, options);
  return { database, ledger, factory, economy };
}

export function countRows(database: LedgerDatabase, table: string, where = "1 = 1"): number {
  const row: unknown = database.sqlite.prepare(`SELECT COUNT(*) AS n FROM ${table} WHERE ${where}`).get();
  if (row !== null && typeof row === "object" && "n" in row && typeof row.n === "number") {
    return row.n;
  }
  throw new Error(`Could not count rows of ${table}`);
}

/**
 * Fund a user's wallet from the treasury.
 */
export async function fund(t: TestEconomy, userId: string, symbol: string, amount: string): Promise<void> {
  await t.factory.issue({ tenantId: TENANT, userId, symbol, amount });
}
