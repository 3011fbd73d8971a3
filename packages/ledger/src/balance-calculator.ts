/**
 * @guild-ledger/ledger — Balance replay.
 *
 * The journal is the source of truth; `account_balances` is a cache.
 * These functions recompute balances from postings to verify or rebuild it.
 *
 * Rules:
 * - Balances are computed per asset (never cross-asset)
 * - All sums use bigint at the asset's precision
 */

import { and, eq } from "drizzle-orm";
import type { Executor } from "./database.js";
import { formatAmount, parseAmount } from "./money-math.js";
import { accountBalances, assets, ledgerEntries } from "./schema.js";
import type { BalanceDrift } from "./types.js";

/**
 * Key for grouping postings by account + asset.
 */
function balanceKey(accountId: number, assetId: number): string {
  return `${String(accountId)}::${String(assetId)}`;
}

interface ReplayedBalance {
  readonly accountId: number;
  readonly assetId: number;
  readonly decimals: number;
  scaled: bigint;
}

/**
 * Sum every posting into per-(account, asset) balances.
 */
export function replayAllBalances(exec: Executor): Map<string, ReplayedBalance> {
  const rows = exec
    .select({
      accountId: ledgerEntries.accountId,
      assetId: ledgerEntries.assetId,
      amount: ledgerEntries.amount,
      decimals: assets.decimals,
    })
    .from(ledgerEntries)
    .innerJoin(assets, eq(assets.id, ledgerEntries.assetId))
    .all();

  const balances = new Map<string, ReplayedBalance>();
  for (const row of rows) {
    const key = balanceKey(row.accountId, row.assetId);
    let acc = balances.get(key);
    if (acc === undefined) {
      acc = { accountId: row.accountId, assetId: row.assetId, decimals: row.decimals, scaled: 0n };
      balances.set(key, acc);
    }
    acc.scaled += parseAmount(row.amount, row.decimals);
  }
  return balances;
}

/**
 * Exact sum of one account's postings in one asset, scaled.
 */
export function replayBalance(exec: Executor, accountId: number, assetId: number): bigint {
  const rows = exec
    .select({ amount: ledgerEntries.amount, decimals: assets.decimals })
    .from(ledgerEntries)
    .innerJoin(assets, eq(assets.id, ledgerEntries.assetId))
    .where(and(eq(ledgerEntries.accountId, accountId), eq(ledgerEntries.assetId, assetId)))
    .all();

  let total = 0n;
  for (const row of rows) {
    total += parseAmount(row.amount, row.decimals);
  }
  return total;
}

/**
 * Compare the cache against a full replay.
 */
export function findBalanceDrift(exec: Executor): readonly BalanceDrift[] {
  const replayed = replayAllBalances(exec);
  const cached = exec
    .select({
      accountId: accountBalances.accountId,
      assetId: accountBalances.assetId,
      balance: accountBalances.balance,
      decimals: assets.decimals,
    })
    .from(accountBalances)
    .innerJoin(assets, eq(assets.id, accountBalances.assetId))
    .all();

  const drift: BalanceDrift[] = [];
  const seen = new Set<string>();

  for (const row of cached) {
    const key = balanceKey(row.accountId, row.assetId);
    seen.add(key);
    const expected = replayed.get(key)?.scaled ?? 0n;
    if (parseAmount(row.balance, row.decimals) !== expected) {
      drift.push({
        accountId: row.accountId,
        assetId: row.assetId,
        materialized: row.balance,
        replayed: formatAmount(expected, row.decimals),
      });
    }
  }

  for (const [key, acc] of replayed) {
    if (!seen.has(key) && acc.scaled !== 0n) {
      drift.push({
        accountId: acc.accountId,
        assetId: acc.assetId,
        materialized: "missing",
        replayed: formatAmount(acc.scaled, acc.decimals),
      });
    }
  }

  return drift;
}

/**
 * Discard the cache and regenerate it from postings.
 *
 * @returns number of (account, asset) balances written
 */
export function rebuildBalances(exec: Executor): number {
  const replayed = replayAllBalances(exec);
  exec.delete(accountBalances).run();

  let written = 0;
  for (const acc of replayed.values()) {
    exec
      .insert(accountBalances)
      .values({
        accountId: acc.accountId,
        assetId: acc.assetId,
        balance: formatAmount(acc.scaled, acc.decimals),
      })
      .run();
    written++;
  }
  return written;
}
