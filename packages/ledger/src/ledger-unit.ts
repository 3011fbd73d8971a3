/**
 * @guild-ledger/ledger — Unit of work.
 *
 * A LedgerUnit is the handle handed to code running inside one atomic
 * SQLite transaction. All posting goes through it.
 *
 * Rules:
 * - Only transactions opened in this unit accept postings
 * - Amounts must already fit the asset's precision; nothing is re-rounded
 * - Each posting updates the materialized balance in the same unit
 * - A debit that would take a non-exempt account below zero fails
 * - Every transaction opened here must net to zero per asset before commit
 */

import { and, eq } from "drizzle-orm";
import type { Account, Asset, Money, TransactionRecord } from "@guild-ledger/types";
import { AccountDirectory } from "./account-directory.js";
import { AssetRegistry } from "./asset-registry.js";
import type { Executor } from "./database.js";
import { isUniqueViolation } from "./database.js";
import { formatAmount, parseAmount, toMoney } from "./money-math.js";
import { accountBalances, ledgerEntries, transactions } from "./schema.js";
import type { NewTransactionOptions } from "./types.js";
import { DuplicateTransactionError, LedgerError, OVERDRAFT_EXEMPT } from "./types.js";

/**
 * Net of one asset within one transaction that failed to reach zero.
 */
export interface Imbalance {
  readonly txId: number;
  readonly kind: string;
  readonly assetId: number;
  readonly sum: string;
}

interface OpenTransaction {
  readonly kind: string;
  readonly sums: Map<number, bigint>;
}

export function isOverdraftExempt(account: Account): boolean {
  return account.type !== "user" && OVERDRAFT_EXEMPT.has(account.type);
}

export class LedgerUnit {
  readonly assets: AssetRegistry;
  readonly accounts: AccountDirectory;

  private readonly _open = new Map<number, OpenTransaction>();
  private readonly _assetCache = new Map<number, Asset>();
  private readonly _accountCache = new Map<number, Account>();

  constructor(
    private readonly _exec: Executor,
    private readonly _now: () => Date = () => new Date(),
  ) {
    this.assets = new AssetRegistry(_exec, _now);
    this.accounts = new AccountDirectory(_exec, _now);
  }

  /**
   * Transaction handle for subledger rows written alongside postings.
   */
  get executor(): Executor {
    return this._exec;
  }

  // ─── Transactions ──────────────────────────────────────────────────────

  /**
   * Insert a transaction header. It carries no postings yet.
   * A repeated (kind, idempotencyKey) fails with DUPLICATE_TRANSACTION.
   */
  newTransaction(kind: string, options: NewTransactionOptions = {}): number {
    if (kind.trim() === "") {
      throw new LedgerError("INVALID_REQUEST", "Transaction kind must not be empty");
    }

    let row: { id: number };
    try {
      row = this._exec
        .insert(transactions)
        .values({
          kind,
          createdBy: options.creator ?? null,
          idempotencyKey: options.idempotencyKey ?? null,
          reference: options.reference ?? null,
          createdAt: this._now().toISOString(),
        })
        .returning({ id: transactions.id })
        .get();
    } catch (err: unknown) {
      const key = options.idempotencyKey;
      if (isUniqueViolation(err) && key !== undefined) {
        const existing = this.findTransactionByKey(kind, key);
        if (existing !== undefined) {
          throw new DuplicateTransactionError(kind, key, existing.id, { cause: err });
        }
      }
      throw err;
    }

    this._open.set(row.id, { kind, sums: new Map() });
    return row.id;
  }

  findTransactionByKey(kind: string, idempotencyKey: string): TransactionRecord | undefined {
    return this._exec
      .select()
      .from(transactions)
      .where(and(eq(transactions.kind, kind), eq(transactions.idempotencyKey, idempotencyKey)))
      .get();
  }

  // ─── Postings ──────────────────────────────────────────────────────────

  /**
   * Append one signed posting. Positive credits, negative debits.
   */
  postEntry(txId: number, accountId: number, assetId: number, amount: string): void {
    const open = this._open.get(txId);
    if (open === undefined) {
      throw new LedgerError(
        "UNKNOWN_TRANSACTION",
        `Transaction ${String(txId)} is not open in this unit; committed transactions are immutable`,
      );
    }

    const asset = this._asset(assetId);
    const account = this._account(accountId);
    if (account.tenantId !== asset.tenantId) {
      throw new LedgerError(
        "INVALID_ASSET",
        `Asset "${asset.symbol}" belongs to tenant "${asset.tenantId}", account ${String(accountId)} to "${account.tenantId}"`,
      );
    }

    const scaled = parseAmount(amount, asset.decimals);
    if (scaled === 0n) {
      throw new LedgerError("INVALID_AMOUNT", `Posting amount must be non-zero for ${asset.symbol}`);
    }

    const current = this.scaledBalance(accountId, assetId);
    const next = current + scaled;
    if (scaled < 0n && next < 0n && !isOverdraftExempt(account)) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${account.name}" holds ${formatAmount(current, asset.decimals)} ${asset.symbol}, cannot debit ${formatAmount(-scaled, asset.decimals)}`,
      );
    }

    this._exec
      .insert(ledgerEntries)
      .values({ txId, accountId, assetId, amount: formatAmount(scaled, asset.decimals) })
      .run();

    const balance = formatAmount(next, asset.decimals);
    this._exec
      .insert(accountBalances)
      .values({ accountId, assetId, balance })
      .onConflictDoUpdate({
        target: [accountBalances.accountId, accountBalances.assetId],
        set: { balance },
      })
      .run();

    open.sums.set(assetId, (open.sums.get(assetId) ?? 0n) + scaled);
  }

  // ─── Balances ──────────────────────────────────────────────────────────

  /**
   * Exact balance; "0" at the asset's precision when nothing was posted.
   */
  balanceOf(accountId: number, assetId: number): Money {
    return toMoney(this.scaledBalance(accountId, assetId), this._asset(assetId));
  }

  scaledBalance(accountId: number, assetId: number): bigint {
    const row = this._exec
      .select({ balance: accountBalances.balance })
      .from(accountBalances)
      .where(and(eq(accountBalances.accountId, accountId), eq(accountBalances.assetId, assetId)))
      .get();
    if (row === undefined) {
      return 0n;
    }
    return parseAmount(row.balance, this._asset(assetId).decimals);
  }

  /**
   * Fail with INSUFFICIENT_BALANCE unless the account can cover `scaled`.
   * Exempt system accounts always pass.
   */
  requireFunds(accountId: number, assetId: number, scaled: bigint): void {
    const account = this._account(accountId);
    if (isOverdraftExempt(account)) {
      return;
    }
    const balance = this.scaledBalance(accountId, assetId);
    if (balance < scaled) {
      const asset = this._asset(assetId);
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${account.name}" holds ${formatAmount(balance, asset.decimals)} ${asset.symbol}, needs ${formatAmount(scaled, asset.decimals)}`,
      );
    }
  }

  // ─── Commit checks ─────────────────────────────────────────────────────

  /**
   * Per-asset sums that did not reach zero, across every transaction
   * opened in this unit.
   */
  imbalances(): readonly Imbalance[] {
    const found: Imbalance[] = [];
    for (const [txId, open] of this._open) {
      for (const [assetId, sum] of open.sums) {
        if (sum !== 0n) {
          found.push({
            txId,
            kind: open.kind,
            assetId,
            sum: formatAmount(sum, this._asset(assetId).decimals),
          });
        }
      }
    }
    return found;
  }

  // ─── Internals ─────────────────────────────────────────────────────────

  private _asset(id: number): Asset {
    let asset = this._assetCache.get(id);
    if (asset === undefined) {
      asset = this.assets.getAssetById(id);
      this._assetCache.set(id, asset);
    }
    return asset;
  }

  private _account(id: number): Account {
    let account = this._accountCache.get(id);
    if (account === undefined) {
      account = this.accounts.getAccount(id);
      this._accountCache.set(id, account);
    }
    return account;
  }
}
