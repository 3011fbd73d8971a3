/**
 * @guild-ledger/ledger — Asset registry.
 *
 * Per-tenant currency definitions. A symbol is unique within its tenant
 * and stored upper-cased; precision is fixed at creation.
 *
 * Rules:
 * - Symbols are trimmed and upper-cased before any lookup
 * - Decimals are an integer in 0..8
 * - Deletion removes every dependent row in the caller's transaction
 */

import { and, eq, inArray, ne, notExists, sql } from "drizzle-orm";
import { isAssetDecimals, MAX_ASSET_DECIMALS } from "@guild-ledger/types";
import type { Asset, Currency, TenantId } from "@guild-ledger/types";
import type { Executor } from "./database.js";
import { isUniqueViolation } from "./database.js";
import { accountBalances, assets, ledgerEntries, transactions } from "./schema.js";
import type { DeletionReport } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * A table family that references assets and must be cleared when one is
 * deleted. Subledgers register themselves with the Ledger.
 */
export interface AssetDependent {
  readonly name: string;
  /**
   * Remove every row referencing the asset.
   *
   * @returns removed row counts keyed by table name
   */
  deleteForAsset(exec: Executor, asset: Asset): Readonly<Record<string, number>>;
}

export function normalizeSymbol(symbol: string): Currency {
  return symbol.trim().toUpperCase();
}

/**
 * Asset lookups and lifecycle against one executor.
 */
export class AssetRegistry {
  constructor(
    private readonly _exec: Executor,
    private readonly _now: () => Date = () => new Date(),
  ) {}

  /**
   * Register a new asset for a tenant.
   * Fails with DUPLICATE_ASSET when the symbol is taken in that tenant.
   */
  createAsset(tenantId: TenantId, symbol: string, name: string, decimals: number): Asset {
    const normalized = normalizeSymbol(symbol);
    if (normalized === "") {
      throw new LedgerError("INVALID_ASSET", "Asset symbol must not be empty");
    }
    if (!isAssetDecimals(decimals)) {
      throw new LedgerError(
        "INVALID_ASSET",
        `Asset decimals must be an integer between 0 and ${String(MAX_ASSET_DECIMALS)}, got ${String(decimals)}`,
      );
    }

    try {
      return this._exec
        .insert(assets)
        .values({
          tenantId,
          symbol: normalized,
          name: name.trim() === "" ? normalized : name.trim(),
          decimals,
          createdAt: this._now().toISOString(),
        })
        .returning()
        .get();
    } catch (err: unknown) {
      if (isUniqueViolation(err)) {
        throw new LedgerError(
          "DUPLICATE_ASSET",
          `Asset "${normalized}" already exists in tenant "${tenantId}"`,
          { cause: err },
        );
      }
      throw err;
    }
  }

  /**
   * Fails with ASSET_NOT_FOUND when absent.
   */
  getAsset(tenantId: TenantId, symbol: string): Asset {
    const asset = this.findAsset(tenantId, symbol);
    if (asset === undefined) {
      throw new LedgerError(
        "ASSET_NOT_FOUND",
        `Asset "${normalizeSymbol(symbol)}" not found in tenant "${tenantId}"`,
      );
    }
    return asset;
  }

  findAsset(tenantId: TenantId, symbol: string): Asset | undefined {
    return this._exec
      .select()
      .from(assets)
      .where(and(eq(assets.tenantId, tenantId), eq(assets.symbol, normalizeSymbol(symbol))))
      .get();
  }

  getAssetById(id: number): Asset {
    const asset = this._exec.select().from(assets).where(eq(assets.id, id)).get();
    if (asset === undefined) {
      throw new LedgerError("ASSET_NOT_FOUND", `Unknown asset id ${String(id)}`);
    }
    return asset;
  }

  listAssets(tenantId: TenantId): readonly Asset[] {
    return this._exec
      .select()
      .from(assets)
      .where(eq(assets.tenantId, tenantId))
      .orderBy(assets.symbol)
      .all();
  }

  /**
   * Delete an asset and everything that references it.
   *
   * Order: subledger rows, materialized balances, transactions whose
   * postings are all in this asset, the postings, then the asset row.
   * Foreign keys are deferred to commit so the order of the ledger
   * tables is free; the caller must hold an open transaction.
   */
  deleteAsset(
    tenantId: TenantId,
    symbol: string,
    dependents: readonly AssetDependent[] = [],
  ): DeletionReport {
    const asset = this.getAsset(tenantId, symbol);
    this._exec.run(sql`PRAGMA defer_foreign_keys = ON`);

    const removed: Record<string, number> = {};

    for (const dependent of dependents) {
      for (const [table, count] of Object.entries(dependent.deleteForAsset(this._exec, asset))) {
        removed[table] = (removed[table] ?? 0) + count;
      }
    }

    removed["account_balances"] = this._exec
      .delete(accountBalances)
      .where(eq(accountBalances.assetId, asset.id))
      .run().changes;

    const touched = this._exec
      .select({ id: ledgerEntries.txId })
      .from(ledgerEntries)
      .where(eq(ledgerEntries.assetId, asset.id));
    const otherAssetLeg = this._exec
      .select({ id: ledgerEntries.id })
      .from(ledgerEntries)
      .where(and(eq(ledgerEntries.txId, transactions.id), ne(ledgerEntries.assetId, asset.id)));

    removed["transactions"] = this._exec
      .delete(transactions)
      .where(and(inArray(transactions.id, touched), notExists(otherAssetLeg)))
      .run().changes;

    removed["ledger_entries"] = this._exec
      .delete(ledgerEntries)
      .where(eq(ledgerEntries.assetId, asset.id))
      .run().changes;

    removed["assets"] = this._exec.delete(assets).where(eq(assets.id, asset.id)).run().changes;

    return { asset, removed };
  }
}
