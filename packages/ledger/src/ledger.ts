/**
 * @guild-ledger/ledger — Core Ledger class.
 *
 * Append-only double-entry journal over SQLite. Once a posting commits,
 * it is permanent. Corrections are new reversing transactions.
 *
 * API surface:
 * - transact() — Run a unit of work atomically, with bounded retry
 * - createAsset() / getAsset() / deleteAsset() — Asset lifecycle
 * - ensureSystemAccounts() / ensureUserAccount() / accountIdByName()
 * - balanceOf() — Exact balance of an (account, asset) pair
 * - autoRefillTreasuryIfNeeded() — Top up a drained treasury, committed on its own
 * - verifyBalances() / rebuildBalances() — Cache maintenance
 *
 * Every unit runs under BEGIN IMMEDIATE, so writers are serialized by the
 * database lock and check-then-post sequences cannot interleave.
 */

import { setTimeout as delay } from "node:timers/promises";
import { and, desc, eq, inArray } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { Logger } from "pino";
import type {
  Account,
  Asset,
  Money,
  Posting,
  SystemAccountType,
  TenantId,
  TransactionRecord,
  UserId,
} from "@guild-ledger/types";
import { AccountDirectory } from "./account-directory.js";
import type { AssetDependent } from "./asset-registry.js";
import { AssetRegistry } from "./asset-registry.js";
import { findBalanceDrift, rebuildBalances, replayBalance } from "./balance-calculator.js";
import type { Executor } from "./database.js";
import { isBusyError } from "./database.js";
import { LedgerUnit } from "./ledger-unit.js";
import { formatAmount, parseAmount, scaleWhole, toMoney } from "./money-math.js";
import type { RetryConfig } from "./retry.js";
import { DEFAULT_RETRY_CONFIG, retryOnConflict } from "./retry.js";
import { ledgerEntries, transactions } from "./schema.js";
import type {
  BalanceDrift,
  DeletionReport,
  SystemAccounts,
  TransactionFilter,
} from "./types.js";
import { LedgerError, SYSTEM_KINDS, TREASURY_REFILL_QUANTUM } from "./types.js";

export interface LedgerOptions {
  readonly db: Executor;
  readonly logger: Logger;
  readonly retry?: RetryConfig | undefined;
  /** Whole units per treasury refill. Default: 1,000,000,000 */
  readonly treasuryRefillAmount?: string | undefined;
  readonly now?: (() => Date) | undefined;
  readonly sleep?: ((ms: number) => Promise<void>) | undefined;
}

export interface CreateAssetOptions {
  /**
   * Whole units minted into the treasury at creation.
   * Defaults to the refill amount; "0" skips the initial issue.
   */
  readonly initialSupply?: string | undefined;
}

export class Ledger {
  private readonly _db: Executor;
  private readonly _logger: Logger;
  private readonly _retry: RetryConfig;
  private readonly _refillAmount: string;
  private readonly _now: () => Date;
  private readonly _sleep: (ms: number) => Promise<void>;
  private readonly _dependents: AssetDependent[] = [];
  private readonly _assets: AssetRegistry;
  private readonly _accounts: AccountDirectory;

  constructor(options: LedgerOptions) {
    this._db = options.db;
    this._logger = options.logger;
    this._retry = options.retry ?? DEFAULT_RETRY_CONFIG;
    this._refillAmount = options.treasuryRefillAmount ?? TREASURY_REFILL_QUANTUM;
    this._now = options.now ?? (() => new Date());
    this._sleep = options.sleep ?? ((ms) => delay(ms));
    this._assets = new AssetRegistry(this._db, this._now);
    this._accounts = new AccountDirectory(this._db, this._now);

    // Validates the configured quantum eagerly.
    scaleWhole(this._refillAmount, 0);
  }

  get logger(): Logger {
    return this._logger;
  }

  /**
   * Root executor, for reads outside a unit. Writes go through transact().
   */
  get db(): Executor {
    return this._db;
  }

  now(): Date {
    return this._now();
  }

  // ─── Units of Work ───────────────────────────────────────────────────

  /**
   * Run `work` inside one atomic SQLite transaction.
   *
   * `work` is synchronous: everything it does commits together or not at
   * all. Transactions it opens must balance per asset, otherwise the unit
   * rolls back with UNBALANCED_TRANSACTION. Lock contention surfaces as
   * STORAGE_CONFLICT and is retried with backoff.
   */
  async transact<T>(work: (unit: LedgerUnit) => T): Promise<T> {
    return retryOnConflict(() => this._runUnit(work), this._retry, this._sleep);
  }

  private _runUnit<T>(work: (unit: LedgerUnit) => T): T {
    try {
      return this._db.transaction(
        (tx) => {
          const unit = new LedgerUnit(tx, this._now);
          const result = work(unit);
          this._assertBalanced(unit);
          return result;
        },
        { behavior: "immediate" },
      );
    } catch (err: unknown) {
      if (isBusyError(err)) {
        this._logger.warn({ err }, "Ledger unit hit a locked database");
        throw new LedgerError("STORAGE_CONFLICT", "Database is locked by another writer", {
          cause: err,
        });
      }
      throw err;
    }
  }

  private _assertBalanced(unit: LedgerUnit): void {
    const imbalances = unit.imbalances();
    if (imbalances.length === 0) {
      return;
    }
    this._logger.error({ imbalances }, "Unbalanced transaction rejected; unit rolled back");
    const detail = imbalances
      .map((i) => `tx ${String(i.txId)} (${i.kind}) asset ${String(i.assetId)} nets ${i.sum}`)
      .join("; ");
    throw new LedgerError("UNBALANCED_TRANSACTION", `Postings do not sum to zero: ${detail}`);
  }

  // ─── Assets ──────────────────────────────────────────────────────────

  /**
   * Register an asset, make sure the tenant's system accounts exist and
   * seed the treasury, all in one unit.
   */
  async createAsset(
    tenantId: TenantId,
    symbol: string,
    name: string,
    decimals: number,
    options: CreateAssetOptions = {},
  ): Promise<Asset> {
    const supply = scaleWhole(options.initialSupply ?? this._refillAmount, decimals);
    const asset = await this.transact((unit) => {
      const system = unit.accounts.ensureSystemAccounts(tenantId);
      const created = unit.assets.createAsset(tenantId, symbol, name, decimals);
      if (supply > 0n) {
        const txId = unit.newTransaction(SYSTEM_KINDS.initialIssue, {
          reference: `initial supply of ${created.symbol}`,
        });
        unit.postEntry(txId, system.issuance.id, created.id, formatAmount(-supply, decimals));
        unit.postEntry(txId, system.treasury.id, created.id, formatAmount(supply, decimals));
      }
      return created;
    });
    this._logger.info(
      { tenantId, symbol: asset.symbol, decimals, initialSupply: formatAmount(supply, decimals) },
      "Asset created",
    );
    return asset;
  }

  getAsset(tenantId: TenantId, symbol: string): Asset {
    return this._assets.getAsset(tenantId, symbol);
  }

  findAsset(tenantId: TenantId, symbol: string): Asset | undefined {
    return this._assets.findAsset(tenantId, symbol);
  }

  getAssetById(id: number): Asset {
    return this._assets.getAssetById(id);
  }

  listAssets(tenantId: TenantId): readonly Asset[] {
    return this._assets.listAssets(tenantId);
  }

  /**
   * Register tables that must be cleared when an asset is deleted.
   */
  registerDependent(dependent: AssetDependent): void {
    this._dependents.push(dependent);
  }

  /**
   * Delete an asset with all postings, balances and dependent rows in one
   * unit. Either everything goes or nothing does.
   */
  async deleteAsset(tenantId: TenantId, symbol: string): Promise<DeletionReport> {
    const report = await this.transact((unit) =>
      unit.assets.deleteAsset(tenantId, symbol, this._dependents),
    );
    this._logger.info(
      { tenantId, symbol: report.asset.symbol, removed: report.removed },
      "Asset deleted",
    );
    return report;
  }

  // ─── Accounts ────────────────────────────────────────────────────────

  async ensureSystemAccounts(tenantId: TenantId): Promise<SystemAccounts> {
    return this.transact((unit) => unit.accounts.ensureSystemAccounts(tenantId));
  }

  async ensureUserAccount(tenantId: TenantId, userId: UserId): Promise<number> {
    return this.transact((unit) => unit.accounts.ensureUserAccount(tenantId, userId));
  }

  accountIdByName(tenantId: TenantId, logicalName: SystemAccountType): number {
    return this._accounts.accountIdByName(tenantId, logicalName);
  }

  getAccount(id: number): Account {
    return this._accounts.getAccount(id);
  }

  findUserAccount(tenantId: TenantId, userId: UserId): Account | undefined {
    return this._accounts.findUserAccount(tenantId, userId);
  }

  listAccounts(tenantId: TenantId): readonly Account[] {
    return this._accounts.listAccounts(tenantId);
  }

  // ─── Balances ────────────────────────────────────────────────────────

  balanceOf(accountId: number, assetId: number): Money {
    return new LedgerUnit(this._db, this._now).balanceOf(accountId, assetId);
  }

  /**
   * Balance of a user's wallet; zero when the account was never created.
   */
  userBalance(tenantId: TenantId, userId: UserId, symbol: string): Money {
    const asset = this.getAsset(tenantId, symbol);
    const account = this.findUserAccount(tenantId, userId);
    if (account === undefined) {
      return toMoney(0n, asset);
    }
    return this.balanceOf(account.id, asset.id);
  }

  /**
   * Sum the postings directly, bypassing the materialized cache.
   */
  replayBalance(accountId: number, assetId: number): Money {
    const asset = this.getAssetById(assetId);
    return toMoney(replayBalance(this._db, accountId, assetId), asset);
  }

  verifyBalances(): readonly BalanceDrift[] {
    return findBalanceDrift(this._db);
  }

  async rebuildBalances(): Promise<number> {
    const written = await this.transact((unit) => rebuildBalances(unit.executor));
    this._logger.info({ written }, "Materialized balances rebuilt");
    return written;
  }

  // ─── Treasury ────────────────────────────────────────────────────────

  /**
   * Credit the treasury one refill quantum when it is drained (balance
   * ≤ 0) or cannot cover `requiredAmount`. Runs and commits as its own
   * unit, so the refill survives a failure of the caller's operation.
   * Call it immediately before any treasury debit.
   *
   * @returns true when a refill was posted
   */
  async autoRefillTreasuryIfNeeded(
    treasuryAccountId: number,
    assetId: number,
    tenantId: TenantId,
    requiredAmount?: string,
  ): Promise<boolean> {
    const refilled = await this.transact((unit) => {
      const treasury = unit.accounts.getAccount(treasuryAccountId);
      if (treasury.type !== "treasury" || treasury.tenantId !== tenantId) {
        throw new LedgerError(
          "ACCOUNT_NOT_FOUND",
          `Account ${String(treasuryAccountId)} is not the treasury of tenant "${tenantId}"`,
        );
      }
      const asset = unit.assets.getAssetById(assetId);
      const balance = unit.scaledBalance(treasury.id, asset.id);
      const required =
        requiredAmount === undefined ? undefined : parseAmount(requiredAmount, asset.decimals);

      if (balance > 0n && (required === undefined || required <= balance)) {
        return undefined;
      }

      const quantum = scaleWhole(this._refillAmount, asset.decimals);
      const issuanceId = unit.accounts.accountIdByName(tenantId, "issuance");
      const txId = unit.newTransaction(SYSTEM_KINDS.treasuryRefill, {
        reference: `refill ${asset.symbol}`,
      });
      unit.postEntry(txId, issuanceId, asset.id, formatAmount(-quantum, asset.decimals));
      unit.postEntry(txId, treasury.id, asset.id, formatAmount(quantum, asset.decimals));
      return {
        txId,
        symbol: asset.symbol,
        before: formatAmount(balance, asset.decimals),
        added: formatAmount(quantum, asset.decimals),
      };
    });

    if (refilled === undefined) {
      return false;
    }
    this._logger.info({ tenantId, ...refilled }, "Treasury auto-refilled");
    return true;
  }

  // ─── Journal Queries ─────────────────────────────────────────────────

  getTransaction(id: number): TransactionRecord | undefined {
    return this._db.select().from(transactions).where(eq(transactions.id, id)).get();
  }

  findTransactionByKey(kind: string, idempotencyKey: string): TransactionRecord | undefined {
    return new LedgerUnit(this._db, this._now).findTransactionByKey(kind, idempotencyKey);
  }

  entriesForTransaction(txId: number): readonly Posting[] {
    return this._db
      .select()
      .from(ledgerEntries)
      .where(eq(ledgerEntries.txId, txId))
      .orderBy(ledgerEntries.id)
      .all();
  }

  /**
   * Newest first.
   */
  listTransactions(filter: TransactionFilter = {}): readonly TransactionRecord[] {
    const conditions: SQL[] = [];
    if (filter.kind !== undefined) {
      conditions.push(eq(transactions.kind, filter.kind));
    }
    if (filter.accountId !== undefined) {
      const touching = this._db
        .select({ id: ledgerEntries.txId })
        .from(ledgerEntries)
        .where(eq(ledgerEntries.accountId, filter.accountId));
      conditions.push(inArray(transactions.id, touching));
    }

    const query = this._db
      .select()
      .from(transactions)
      .where(conditions.length === 0 ? undefined : and(...conditions))
      .orderBy(desc(transactions.id));

    return filter.limit === undefined ? query.all() : query.limit(filter.limit).all();
  }
}
