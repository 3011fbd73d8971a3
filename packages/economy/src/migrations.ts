import { loadMigration } from "@guild-ledger/ledger";
import type { Migration } from "@guild-ledger/ledger";

/** Applied after the ledger's own migrations. */
export const ECONOMY_MIGRATIONS: readonly Migration[] = [
  loadMigration("economy/001_economy", new URL("../sql/001_economy.sql", import.meta.url)),
];
