/**
 * @guild-ledger/ledger — Drizzle table definitions.
 *
 * Mirrors sql/001_ledger.sql. Amounts are TEXT decimal strings at the
 * asset's precision; they are only ever summed through bigint.
 */

import {
  index,
  integer,
  primaryKey,
  sqliteTable,
  text,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";

const ACCOUNT_TYPES = ["user", "treasury", "burn", "issuance", "bank", "escrow"] as const;

export const assets = sqliteTable(
  "assets",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id").notNull(),
    symbol: text("symbol").notNull(),
    name: text("name").notNull(),
    decimals: integer("decimals").notNull(),
    createdAt: text("created_at").notNull(),
  },
  (t) => ({
    tenantSymbol: uniqueIndex("assets_tenant_symbol").on(t.tenantId, t.symbol),
  }),
);

export const accounts = sqliteTable(
  "accounts",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id").notNull(),
    ownerUserId: text("owner_user_id"),
    name: text("name").notNull(),
    type: text("type", { enum: ACCOUNT_TYPES }).notNull(),
    createdAt: text("created_at").notNull(),
  },
  (t) => ({
    name: uniqueIndex("accounts_name").on(t.name),
    tenant: index("accounts_tenant").on(t.tenantId),
  }),
);

export const transactions = sqliteTable(
  "transactions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    kind: text("kind").notNull(),
    createdBy: text("created_by"),
    idempotencyKey: text("idempotency_key"),
    reference: text("reference"),
    createdAt: text("created_at").notNull(),
  },
  (t) => ({
    kindKey: uniqueIndex("transactions_kind_key").on(t.kind, t.idempotencyKey),
    kind: index("transactions_kind").on(t.kind),
  }),
);

export const ledgerEntries = sqliteTable(
  "ledger_entries",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    txId: integer("tx_id")
      .notNull()
      .references(() => transactions.id),
    accountId: integer("account_id")
      .notNull()
      .references(() => accounts.id),
    assetId: integer("asset_id")
      .notNull()
      .references(() => assets.id),
    amount: text("amount").notNull(),
  },
  (t) => ({
    accountAsset: index("ledger_entries_account_asset").on(t.accountId, t.assetId),
    tx: index("ledger_entries_tx").on(t.txId),
    asset: index("ledger_entries_asset").on(t.assetId),
  }),
);

export const accountBalances = sqliteTable(
  "account_balances",
  {
    accountId: integer("account_id")
      .notNull()
      .references(() => accounts.id),
    assetId: integer("asset_id")
      .notNull()
      .references(() => assets.id),
    balance: text("balance").notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.accountId, t.assetId] }),
  }),
);

