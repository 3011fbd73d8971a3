/**
 * @guild-ledger/economy — Drizzle table definitions for the subledgers.
 *
 * Mirrors sql/001_economy.sql. Every amount column is a TEXT decimal at
 * the precision of the referenced asset.
 */

import { sql } from "drizzle-orm";
import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";
import { ledgerSchema } from "@guild-ledger/ledger";

const { assets } = ledgerSchema;

// ─── Bank ────────────────────────────────────────────────────────────────

export const bankAccounts = sqliteTable(
  "bank_accounts",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id").notNull(),
    userId: text("user_id").notNull(),
    assetId: integer("asset_id")
      .notNull()
      .references(() => assets.id),
    balance: text("balance").notNull(),
    createdAt: text("created_at").notNull(),
    updatedAt: text("updated_at").notNull(),
  },
  (t) => ({
    owner: uniqueIndex("bank_accounts_owner").on(t.tenantId, t.userId, t.assetId),
  }),
);

export const bankTransactions = sqliteTable(
  "bank_transactions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id").notNull(),
    userId: text("user_id").notNull(),
    assetId: integer("asset_id")
      .notNull()
      .references(() => assets.id),
    type: text("type", { enum: ["deposit", "withdraw"] }).notNull(),
    amount: text("amount").notNull(),
    balanceAfter: text("balance_after").notNull(),
    txId: integer("tx_id").notNull(),
    createdAt: text("created_at").notNull(),
  },
  (t) => ({
    owner: index("bank_transactions_owner").on(t.tenantId, t.userId),
  }),
);

// ─── Auto-rewards ────────────────────────────────────────────────────────

export const autoRewardConfigs = sqliteTable(
  "auto_reward_configs",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id").notNull(),
    channelId: text("channel_id").notNull(),
    triggerMessage: text("trigger_message").notNull(),
    rewardAmount: text("reward_amount").notNull(),
    assetId: integer("asset_id")
      .notNull()
      .references(() => assets.id),
    enabled: integer("enabled", { mode: "boolean" }).notNull().default(true),
    createdBy: text("created_by"),
    createdAt: text("created_at").notNull(),
  },
  (t) => ({
    channel: uniqueIndex("auto_reward_configs_channel").on(t.tenantId, t.channelId),
  }),
);

export const autoRewardClaims = sqliteTable(
  "auto_reward_claims",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    configId: integer("config_id")
      .notNull()
      .references(() => autoRewardConfigs.id),
    tenantId: text("tenant_id").notNull(),
    userId: text("user_id").notNull(),
    txId: integer("tx_id").notNull(),
    claimedAt: text("claimed_at").notNull(),
  },
  (t) => ({
    once: uniqueIndex("auto_reward_claims_once").on(t.configId, t.userId),
  }),
);

// ─── Role shop ───────────────────────────────────────────────────────────

export const rolePanels = sqliteTable(
  "role_panels",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id").notNull(),
    name: text("name").notNull(),
    description: text("description"),
    createdAt: text("created_at").notNull(),
  },
  (t) => ({
    name: uniqueIndex("role_panels_name").on(t.tenantId, t.name),
  }),
);

export const rolePlans = sqliteTable(
  "role_plans",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    panelId: integer("panel_id")
      .notNull()
      .references(() => rolePanels.id),
    tenantId: text("tenant_id").notNull(),
    name: text("name").notNull(),
    roleId: text("role_id").notNull(),
    price: text("price").notNull(),
    currencySymbol: text("currency_symbol").notNull(),
    durationHours: integer("duration_hours").notNull(),
    description: text("description"),
  },
  (t) => ({
    panel: index("role_plans_panel").on(t.panelId),
  }),
);

export const rolePurchases = sqliteTable(
  "role_purchases",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id").notNull(),
    userId: text("user_id").notNull(),
    planId: integer("plan_id").notNull(),
    roleId: text("role_id").notNull(),
    txId: integer("tx_id").notNull(),
    purchasedAt: text("purchased_at").notNull(),
    expiresAt: text("expires_at").notNull(),
  },
  (t) => ({
    expiry: index("role_purchases_expiry").on(t.expiresAt),
  }),
);

// ─── Monthly allowance ───────────────────────────────────────────────────

export const monthlyAllowances = sqliteTable(
  "monthly_allowances",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id").notNull(),
    roleId: text("role_id").notNull(),
    assetId: integer("asset_id")
      .notNull()
      .references(() => assets.id),
    amount: text("amount").notNull(),
    enabled: integer("enabled", { mode: "boolean" }).notNull().default(true),
    createdAt: text("created_at").notNull(),
  },
  (t) => ({
    role: uniqueIndex("monthly_allowances_role").on(t.tenantId, t.roleId, t.assetId),
  }),
);

export const monthlyAllowanceHistory = sqliteTable(
  "monthly_allowance_history",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id").notNull(),
    roleId: text("role_id").notNull(),
    userId: text("user_id").notNull(),
    assetId: integer("asset_id")
      .notNull()
      .references(() => assets.id),
    amount: text("amount").notNull(),
    yearMonth: text("year_month").notNull(),
    txId: integer("tx_id").notNull(),
    paidAt: text("paid_at").notNull(),
  },
  (t) => ({
    period: uniqueIndex("monthly_allowance_history_period").on(
      t.tenantId,
      t.roleId,
      t.userId,
      t.assetId,
      t.yearMonth,
    ),
  }),
);

// ─── Voice earnings ──────────────────────────────────────────────────────

export const vcEarningRates = sqliteTable(
  "vc_earning_rates",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id").notNull(),
    categoryId: text("category_id").notNull(),
    assetId: integer("asset_id")
      .notNull()
      .references(() => assets.id),
    ratePerMinute: text("rate_per_minute").notNull(),
    createdAt: text("created_at").notNull(),
  },
  (t) => ({
    category: uniqueIndex("vc_earning_rates_category").on(t.tenantId, t.categoryId),
  }),
);

export const vcSessions = sqliteTable(
  "vc_sessions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id").notNull(),
    userId: text("user_id").notNull(),
    channelId: text("channel_id").notNull(),
    categoryId: text("category_id").notNull(),
    startedAt: text("started_at").notNull(),
    lastPaidAt: text("last_paid_at"),
  },
  (t) => ({
    user: uniqueIndex("vc_sessions_user").on(t.tenantId, t.userId),
  }),
);

export const vcEarningDaily = sqliteTable(
  "vc_earning_daily",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id").notNull(),
    userId: text("user_id").notNull(),
    assetId: integer("asset_id")
      .notNull()
      .references(() => assets.id),
    date: text("date").notNull(),
    totalEarned: text("total_earned").notNull(),
  },
  (t) => ({
    day: uniqueIndex("vc_earning_daily_day").on(t.tenantId, t.userId, t.assetId, t.date),
  }),
);

// ─── Betting ─────────────────────────────────────────────────────────────

export const BETTING_STATUSES = ["open", "settled", "cancelled"] as const;

export const bettingEvents = sqliteTable(
  "betting_events",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id").notNull(),
    name: text("name").notNull(),
    assetId: integer("asset_id")
      .notNull()
      .references(() => assets.id),
    status: text("status", { enum: BETTING_STATUSES }).notNull(),
    winnerUserId: text("winner_user_id"),
    createdBy: text("created_by"),
    createdAt: text("created_at").notNull(),
    closedAt: text("closed_at"),
  },
  (t) => ({
    oneOpen: uniqueIndex("betting_events_one_open").on(t.tenantId).where(sql`status = 'open'`),
  }),
);

export const bettingPlayers = sqliteTable(
  "betting_players",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    eventId: integer("event_id")
      .notNull()
      .references(() => bettingEvents.id),
    userId: text("user_id").notNull(),
  },
  (t) => ({
    once: uniqueIndex("betting_players_once").on(t.eventId, t.userId),
  }),
);

export const bets = sqliteTable(
  "bets",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    eventId: integer("event_id")
      .notNull()
      .references(() => bettingEvents.id),
    userId: text("user_id").notNull(),
    targetUserId: text("target_user_id").notNull(),
    amount: text("amount").notNull(),
    txId: integer("tx_id").notNull(),
    placedAt: text("placed_at").notNull(),
  },
  (t) => ({
    event: index("bets_event").on(t.eventId),
  }),
);
