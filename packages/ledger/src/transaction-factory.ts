/**
 * @guild-ledger/ledger — Transaction factory.
 *
 * The one path by which economic actions reach the journal. Each call
 * creates exactly one transaction and posts a balanced set of legs.
 *
 * Flow for execute():
 * 1. Collapse a replayed idempotency key to the original transaction
 * 2. Refill any treasury about to be debited (separate, committed unit)
 * 3. In one unit: re-check the key, check funds for every net debit,
 *    open the transaction, post credits then debits, run side effects
 *
 * Rounding is chosen here, per action: transfers truncate, issues round
 * half-even. The core never re-rounds.
 */

import type { Money, TenantId, UserId } from "@guild-ledger/types";
import type { Ledger } from "./ledger.js";
import type { LedgerUnit } from "./ledger-unit.js";
import { formatAmount, parseAmount, parsePositiveAmount, toMoney } from "./money-math.js";
import type { TransactionLeg } from "./types.js";
import { LedgerError } from "./types.js";

// ─── Types ───────────────────────────────────────────────────────────────

export interface TransactionRequest {
  readonly tenantId: TenantId;
  readonly kind: string;
  readonly legs: readonly TransactionLeg[];
  readonly creator?: UserId | undefined;
  readonly idempotencyKey?: string | undefined;
  readonly reference?: string | undefined;
}

/**
 * Subledger writes that must commit with the postings.
 */
export type SideEffects<T> = (unit: LedgerUnit, transactionId: number) => T;

export interface TransactionResult<T = void> {
  readonly transactionId: number;
  /** True when the idempotency key matched an earlier transaction */
  readonly replayed: boolean;
  /** Side-effect return value; undefined on replay */
  readonly value: T | undefined;
}

/**
 * Common inputs of the user-facing operations.
 */
export interface MovementRequest {
  readonly tenantId: TenantId;
  readonly symbol: string;
  readonly amount: string;
  readonly creator?: UserId | undefined;
  readonly idempotencyKey?: string | undefined;
  readonly reference?: string | undefined;
}

export interface TransferRequest extends MovementRequest {
  readonly fromUserId: UserId;
  readonly toUserId: UserId;
}

export interface UserMovementRequest extends MovementRequest {
  readonly userId: UserId;
}

export interface MovementResult extends TransactionResult {
  readonly amount: Money;
}

// ─── Factory ─────────────────────────────────────────────────────────────

export class TransactionFactory {
  constructor(private readonly _ledger: Ledger) {}

  get ledger(): Ledger {
    return this._ledger;
  }

  /**
   * Post a balanced set of legs as one transaction.
   */
  async execute<T = void>(
    request: TransactionRequest,
    sideEffects?: SideEffects<T>,
  ): Promise<TransactionResult<T>> {
    if (request.legs.length === 0) {
      throw new LedgerError("INVALID_REQUEST", `Transaction "${request.kind}" has no legs`);
    }

    const key = request.idempotencyKey;
    if (key !== undefined) {
      const existing = this._ledger.findTransactionByKey(request.kind, key);
      if (existing !== undefined) {
        return this._replayed(existing.id, request);
      }
    }

    await this._refillDebitedTreasuries(request);

    const result = await this._ledger.transact((unit): TransactionResult<T> => {
      if (key !== undefined) {
        const existing = unit.findTransactionByKey(request.kind, key);
        if (existing !== undefined) {
          return { transactionId: existing.id, replayed: true, value: undefined };
        }
      }

      const nets = netByAccountAsset(unit, request.legs);
      for (const net of nets) {
        const account = unit.accounts.getAccount(net.accountId);
        if (account.tenantId !== request.tenantId) {
          throw new LedgerError(
            "ACCOUNT_NOT_FOUND",
            `Account ${String(account.id)} does not belong to tenant "${request.tenantId}"`,
          );
        }
        if (net.scaled < 0n) {
          unit.requireFunds(net.accountId, net.assetId, -net.scaled);
        }
      }

      const transactionId = unit.newTransaction(request.kind, {
        creator: request.creator,
        idempotencyKey: key,
        reference: request.reference,
      });

      const ordered = [...request.legs].sort(
        (a, b) => Number(a.amount.trim().startsWith("-")) - Number(b.amount.trim().startsWith("-")),
      );
      for (const leg of ordered) {
        unit.postEntry(transactionId, leg.accountId, leg.assetId, leg.amount);
      }

      const value = sideEffects === undefined ? undefined : sideEffects(unit, transactionId);
      return { transactionId, replayed: false, value };
    });

    if (result.replayed) {
      return this._replayed(result.transactionId, request);
    }
    this._ledger.logger.debug(
      { txId: result.transactionId, kind: request.kind, tenantId: request.tenantId },
      "Transaction committed",
    );
    return result;
  }

  /**
   * Move funds between two users. The amount is truncated to the asset's
   * precision, so a sender never parts with more than they typed.
   */
  async transfer(request: TransferRequest): Promise<MovementResult> {
    if (request.fromUserId === request.toUserId) {
      throw new LedgerError("INVALID_REQUEST", `"${request.fromUserId}" cannot transfer to themselves`);
    }
    const asset = this._ledger.getAsset(request.tenantId, request.symbol);
    const scaled = parsePositiveAmount(request.amount, asset.decimals, "down");
    const from = await this._ledger.ensureUserAccount(request.tenantId, request.fromUserId);
    const to = await this._ledger.ensureUserAccount(request.tenantId, request.toUserId);
    const amount = formatAmount(scaled, asset.decimals);

    const result = await this.execute({
      tenantId: request.tenantId,
      kind: "transfer",
      creator: request.creator ?? request.fromUserId,
      idempotencyKey: request.idempotencyKey,
      reference: request.reference,
      legs: [
        { accountId: from, assetId: asset.id, amount: `-${amount}` },
        { accountId: to, assetId: asset.id, amount },
      ],
    });
    return { ...result, amount: toMoney(scaled, asset) };
  }

  /**
   * Mint to a user from the treasury.
   */
  async issue(request: UserMovementRequest): Promise<MovementResult> {
    const asset = this._ledger.getAsset(request.tenantId, request.symbol);
    const scaled = parsePositiveAmount(request.amount, asset.decimals);
    const user = await this._ledger.ensureUserAccount(request.tenantId, request.userId);
    const treasury = this._ledger.accountIdByName(request.tenantId, "treasury");
    const amount = formatAmount(scaled, asset.decimals);

    const result = await this.execute({
      tenantId: request.tenantId,
      kind: "issue",
      creator: request.creator,
      idempotencyKey: request.idempotencyKey,
      reference: request.reference,
      legs: [
        { accountId: treasury, assetId: asset.id, amount: `-${amount}` },
        { accountId: user, assetId: asset.id, amount },
      ],
    });
    return { ...result, amount: toMoney(scaled, asset) };
  }

  /**
   * Destroy a user's funds into the tenant's burn account.
   */
  async burn(request: UserMovementRequest): Promise<MovementResult> {
    const asset = this._ledger.getAsset(request.tenantId, request.symbol);
    const scaled = parsePositiveAmount(request.amount, asset.decimals);
    const user = await this._ledger.ensureUserAccount(request.tenantId, request.userId);
    const burn = this._ledger.accountIdByName(request.tenantId, "burn");
    const amount = formatAmount(scaled, asset.decimals);

    const result = await this.execute({
      tenantId: request.tenantId,
      kind: "burn",
      creator: request.creator,
      idempotencyKey: request.idempotencyKey,
      reference: request.reference,
      legs: [
        { accountId: user, assetId: asset.id, amount: `-${amount}` },
        { accountId: burn, assetId: asset.id, amount },
      ],
    });
    return { ...result, amount: toMoney(scaled, asset) };
  }

  // ─── Internals ─────────────────────────────────────────────────────────

  private async _refillDebitedTreasuries(request: TransactionRequest): Promise<void> {
    const required = new Map<string, { accountId: number; assetId: number; scaled: bigint }>();
    for (const leg of request.legs) {
      const account = this._ledger.getAccount(leg.accountId);
      if (account.type !== "treasury") {
        continue;
      }
      const asset = this._ledger.getAssetById(leg.assetId);
      const scaled = parseAmount(leg.amount, asset.decimals);
      const key = `${String(leg.accountId)}::${String(leg.assetId)}`;
      const entry = required.get(key) ?? { accountId: leg.accountId, assetId: leg.assetId, scaled: 0n };
      required.set(key, { ...entry, scaled: entry.scaled - scaled });
    }

    for (const need of required.values()) {
      if (need.scaled <= 0n) {
        continue;
      }
      const asset = this._ledger.getAssetById(need.assetId);
      await this._ledger.autoRefillTreasuryIfNeeded(
        need.accountId,
        need.assetId,
        request.tenantId,
        formatAmount(need.scaled, asset.decimals),
      );
    }
  }

  private _replayed<T>(transactionId: number, request: TransactionRequest): TransactionResult<T> {
    this._ledger.logger.info(
      { txId: transactionId, kind: request.kind, idempotencyKey: request.idempotencyKey },
      "Idempotent replay collapsed to original transaction",
    );
    return { transactionId, replayed: true, value: undefined };
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

interface NetPosition {
  readonly accountId: number;
  readonly assetId: number;
  readonly scaled: bigint;
}

/**
 * Net each account's legs per asset, so a debit offset by a credit to the
 * same account in the same request is judged on the difference.
 */
function netByAccountAsset(unit: LedgerUnit, legs: readonly TransactionLeg[]): readonly NetPosition[] {
  const nets = new Map<string, NetPosition>();
  for (const leg of legs) {
    const asset = unit.assets.getAssetById(leg.assetId);
    const scaled = parseAmount(leg.amount, asset.decimals);
    const key = `${String(leg.accountId)}::${String(leg.assetId)}`;
    const prior = nets.get(key);
    nets.set(key, {
      accountId: leg.accountId,
      assetId: leg.assetId,
      scaled: (prior?.scaled ?? 0n) + scaled,
    });
  }
  return [...nets.values()];
}
