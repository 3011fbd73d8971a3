/**
 * @guild-ledger/economy — Bank.
 *
 * A user's bank funds are held in the tenant's `bank` system account;
 * `bank_accounts` splits that pool per user. Every deposit and withdrawal
 * moves value between the user's wallet and the bank account in the same
 * unit that updates the user's subledger row, so for each (tenant, asset)
 * the subledger sum equals the bank account's ledger balance.
 */

import { and, desc, eq } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { Logger } from "pino";
import type { Asset, TenantId, UserId } from "@guild-ledger/types";
import type { Executor, Ledger, TransactionFactory } from "@guild-ledger/ledger";
import {
  LedgerError,
  addMoney,
  formatAmount,
  parseAmount,
  parsePositiveAmount,
  toMoney,
} from "@guild-ledger/ledger";
import { bankAccounts, bankTransactions } from "./schema.js";
import type {
  AssetBankBalances,
  BankBalances,
  BankHistoryEntry,
  BankSearchFilter,
  BankSearchHit,
  BankMovement,
  BankReconciliation,
  BankTransactionType,
  EconomyDeps,
} from "./types.js";
import { ECONOMY_KINDS, EconomyError } from "./types.js";

export interface BankMovementRequest {
  readonly tenantId: TenantId;
  readonly userId: UserId;
  readonly symbol: string;
  readonly amount: string;
}

const MAX_SEARCH_LIMIT = 100;

export class BankService {
  private readonly _factory: TransactionFactory;
  private readonly _ledger: Ledger;
  private readonly _db: Executor;
  private readonly _logger: Logger;

  constructor(deps: EconomyDeps) {
    this._factory = deps.factory;
    this._ledger = deps.factory.ledger;
    this._db = this._ledger.db;
    this._logger = deps.logger.child({ component: "bank" });
  }

  /**
   * Move funds from the wallet into the bank. Rounded half-even.
   */
  async deposit(request: BankMovementRequest): Promise<BankMovement> {
    const asset = this._ledger.getAsset(request.tenantId, request.symbol);
    const scaled = parsePositiveAmount(request.amount, asset.decimals);
    return this._move(request, asset, scaled, "deposit");
  }

  /**
   * Move funds from the bank back to the wallet. Truncated, so a user never
   * withdraws more than they typed.
   */
  async withdraw(request: BankMovementRequest): Promise<BankMovement> {
    const asset = this._ledger.getAsset(request.tenantId, request.symbol);
    const scaled = parsePositiveAmount(request.amount, asset.decimals, "down");
    if (this._findAccount(this._db, request.tenantId, request.userId, asset.id) === undefined) {
      throw new EconomyError(
        "NO_BANK_ACCOUNT",
        `User "${request.userId}" has no ${asset.symbol} bank account in tenant "${request.tenantId}"`,
      );
    }
    return this._move(request, asset, scaled, "withdraw");
  }

  getBalances(tenantId: TenantId, userId: UserId, symbol: string): BankBalances {
    const asset = this._ledger.getAsset(tenantId, symbol);
    const wallet = this._ledger.userBalance(tenantId, userId, symbol);
    const row = this._findAccount(this._db, tenantId, userId, asset.id);
    const bank = toMoney(row === undefined ? 0n : parseAmount(row.balance, asset.decimals), asset);
    return { wallet, bank, total: addMoney(wallet, bank) };
  }

  /**
   * Wallet and bank for every asset of the tenant, ordered by symbol.
   */
  balancesFor(tenantId: TenantId, userId: UserId): readonly AssetBankBalances[] {
    return this._ledger
      .listAssets(tenantId)
      .map((asset) => ({ symbol: asset.symbol, ...this.getBalances(tenantId, userId, asset.symbol) }));
  }

  /**
   * Newest first.
   */
  history(tenantId: TenantId, userId: UserId, symbol: string, limit = 10): readonly BankHistoryEntry[] {
    const asset = this._ledger.getAsset(tenantId, symbol);
    return this._db
      .select()
      .from(bankTransactions)
      .where(
        and(
          eq(bankTransactions.tenantId, tenantId),
          eq(bankTransactions.userId, userId),
          eq(bankTransactions.assetId, asset.id),
        ),
      )
      .orderBy(desc(bankTransactions.id))
      .limit(limit)
      .all()
      .map((row) => ({
        type: row.type,
        amount: toMoney(parseAmount(row.amount, asset.decimals), asset),
        balanceAfter: toMoney(parseAmount(row.balanceAfter, asset.decimals), asset),
        transactionId: row.txId,
        createdAt: row.createdAt,
      }));
  }

  /**
   * Bank movements across the tenant, newest first. Every filter is optional.
   */
  search(tenantId: TenantId, filter: BankSearchFilter = {}): readonly BankSearchHit[] {
    const limit = filter.limit ?? 20;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_SEARCH_LIMIT) {
      throw new LedgerError(
        "INVALID_REQUEST",
        `Search limit must be between 1 and ${String(MAX_SEARCH_LIMIT)}, got ${String(limit)}`,
      );
    }

    const conditions: SQL[] = [eq(bankTransactions.tenantId, tenantId)];
    if (filter.type !== undefined) {
      conditions.push(eq(bankTransactions.type, filter.type));
    }
    if (filter.symbol !== undefined) {
      conditions.push(eq(bankTransactions.assetId, this._ledger.getAsset(tenantId, filter.symbol).id));
    }
    if (filter.userId !== undefined) {
      conditions.push(eq(bankTransactions.userId, filter.userId));
    }

    return this._db
      .select()
      .from(bankTransactions)
      .where(and(...conditions))
      .orderBy(desc(bankTransactions.createdAt), desc(bankTransactions.id))
      .limit(limit)
      .all()
      .map((row) => {
        const asset = this._ledger.getAssetById(row.assetId);
        return {
          userId: row.userId,
          type: row.type,
          amount: toMoney(parseAmount(row.amount, asset.decimals), asset),
          balanceAfter: toMoney(parseAmount(row.balanceAfter, asset.decimals), asset),
          transactionId: row.txId,
          createdAt: row.createdAt,
        };
      });
  }

  /**
   * Compare the bank system account with the sum of user balances.
   */
  reconcile(tenantId: TenantId, symbol: string): BankReconciliation {
    const asset = this._ledger.getAsset(tenantId, symbol);
    const bankId = this._ledger.accountIdByName(tenantId, "bank");
    const ledger = this._ledger.balanceOf(bankId, asset.id);

    const rows = this._db
      .select({ balance: bankAccounts.balance })
      .from(bankAccounts)
      .where(and(eq(bankAccounts.tenantId, tenantId), eq(bankAccounts.assetId, asset.id)))
      .all();
    const sum = rows.reduce((acc, row) => acc + parseAmount(row.balance, asset.decimals), 0n);
    const subledger = toMoney(sum, asset);

    const balanced = ledger.amount === subledger.amount;
    if (!balanced) {
      this._logger.error({ tenantId, symbol: asset.symbol, ledger, subledger }, "Bank subledger drift");
    }
    return { ledger, subledger, balanced };
  }

  // ─── Internals ─────────────────────────────────────────────────────────

  private async _move(
    request: BankMovementRequest,
    asset: Asset,
    scaled: bigint,
    type: BankTransactionType,
  ): Promise<BankMovement> {
    const wallet = await this._ledger.ensureUserAccount(request.tenantId, request.userId);
    const bank = this._ledger.accountIdByName(request.tenantId, "bank");
    const amount = formatAmount(scaled, asset.decimals);
    const [from, to] = type === "deposit" ? [wallet, bank] : [bank, wallet];

    const result = await this._factory.execute(
      {
        tenantId: request.tenantId,
        kind: type === "deposit" ? ECONOMY_KINDS.bankDeposit : ECONOMY_KINDS.bankWithdraw,
        creator: request.userId,
        legs: [
          { accountId: from, assetId: asset.id, amount: `-${amount}` },
          { accountId: to, assetId: asset.id, amount },
        ],
      },
      (unit, txId) => {
        const exec = unit.executor;
        const now = this._ledger.now().toISOString();
        const row = this._findAccount(exec, request.tenantId, request.userId, asset.id);
        const current = row === undefined ? 0n : parseAmount(row.balance, asset.decimals);
        const next = type === "deposit" ? current + scaled : current - scaled;
        if (next < 0n) {
          throw new LedgerError(
            "INSUFFICIENT_BALANCE",
            `Bank holds ${formatAmount(current, asset.decimals)} ${asset.symbol}, cannot withdraw ${amount}`,
          );
        }
        const balance = formatAmount(next, asset.decimals);

        exec
          .insert(bankAccounts)
          .values({
            tenantId: request.tenantId,
            userId: request.userId,
            assetId: asset.id,
            balance,
            createdAt: now,
            updatedAt: now,
          })
          .onConflictDoUpdate({
            target: [bankAccounts.tenantId, bankAccounts.userId, bankAccounts.assetId],
            set: { balance, updatedAt: now },
          })
          .run();

        exec
          .insert(bankTransactions)
          .values({
            tenantId: request.tenantId,
            userId: request.userId,
            assetId: asset.id,
            type,
            amount,
            balanceAfter: balance,
            txId,
            createdAt: now,
          })
          .run();

        return next;
      },
    );

    const next = result.value ?? 0n;
    this._logger.info(
      { tenantId: request.tenantId, userId: request.userId, symbol: asset.symbol, type, amount },
      "Bank movement committed",
    );
    return {
      transactionId: result.transactionId,
      amount: toMoney(scaled, asset),
      bankBalance: toMoney(next, asset),
    };
  }

  private _findAccount(
    exec: Executor,
    tenantId: TenantId,
    userId: UserId,
    assetId: number,
  ): { readonly balance: string } | undefined {
    return exec
      .select({ balance: bankAccounts.balance })
      .from(bankAccounts)
      .where(
        and(
          eq(bankAccounts.tenantId, tenantId),
          eq(bankAccounts.userId, userId),
          eq(bankAccounts.assetId, assetId),
        ),
      )
      .get();
  }
}
