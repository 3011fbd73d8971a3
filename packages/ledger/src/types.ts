/**
 * @guild-ledger/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @guild-ledger/types with ledger-specific
 * structures used by the core and its callers.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of committed postings
 * - Fail-closed: invalid postings throw, never silently succeed
 */

import type { Account, Asset, SystemAccountType } from "@guild-ledger/types";

// ─── Constants ───────────────────────────────────────────────────────────

/**
 * Units credited to a treasury per refill, and seeded when an asset is
 * created. Unscaled: 1,000,000,000 whole units regardless of decimals.
 */
export const TREASURY_REFILL_QUANTUM = "1000000000";

/** Transaction kinds written by the core itself. */
export const SYSTEM_KINDS = {
  initialIssue: "initial_issue",
  treasuryRefill: "auto_treasury_refill",
} as const;

/**
 * Account types that may hold a negative balance.
 * Everything else must cover each debit.
 */
export const OVERDRAFT_EXEMPT: ReadonlySet<SystemAccountType> = new Set<SystemAccountType>([
  "treasury",
  "burn",
  "issuance",
]);

// ─── Transactions ────────────────────────────────────────────────────────

/**
 * Optional header fields for a new transaction.
 */
export interface NewTransactionOptions {
  /** User who initiated the event */
  readonly creator?: string | undefined;
  /** Unique per kind; replays of the same key are rejected */
  readonly idempotencyKey?: string | undefined;
  /** Human-readable note */
  readonly reference?: string | undefined;
}

/**
 * One signed leg of a transaction request.
 * Positive credits the account, negative debits it.
 */
export interface TransactionLeg {
  readonly accountId: number;
  readonly assetId: number;
  readonly amount: string;
}

/**
 * Filter criteria for listing transactions.
 */
export interface TransactionFilter {
  readonly kind?: string | undefined;
  readonly accountId?: number | undefined;
  readonly limit?: number | undefined;
}

// ─── Reports ─────────────────────────────────────────────────────────────

/**
 * Disagreement between the materialized balance and the replayed postings.
 */
export interface BalanceDrift {
  readonly accountId: number;
  readonly assetId: number;
  readonly materialized: string;
  readonly replayed: string;
}

/**
 * Row counts removed by an asset deletion, keyed by table name.
 */
export interface DeletionReport {
  readonly asset: Asset;
  readonly removed: Readonly<Record<string, number>>;
}

/**
 * Resolved accounts for one tenant.
 */
export type SystemAccounts = Readonly<Record<SystemAccountType, Account>>;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "DUPLICATE_ASSET"
  | "ASSET_NOT_FOUND"
  | "INVALID_ASSET"
  | "ACCOUNT_NOT_FOUND"
  | "INSUFFICIENT_BALANCE"
  | "UNBALANCED_TRANSACTION"
  | "DUPLICATE_CLAIM"
  | "STORAGE_CONFLICT"
  | "INVALID_AMOUNT"
  | "DUPLICATE_TRANSACTION"
  | "UNKNOWN_TRANSACTION"
  | "CURRENCY_MISMATCH"
  | "INVALID_REQUEST";

/**
 * Structured error from the ledger engine.
 * Always thrown, never returned as a code.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
  }
}

/**
 * A (kind, idempotencyKey) pair that was already used. Carries the id of
 * the transaction that holds it.
 */
export class DuplicateTransactionError extends LedgerError {
  public readonly existingTransactionId: number;

  constructor(kind: string, idempotencyKey: string, existingTransactionId: number, options?: ErrorOptions) {
    super(
      "DUPLICATE_TRANSACTION",
      `A "${kind}" transaction with idempotency key "${idempotencyKey}" already exists (tx ${String(existingTransactionId)})`,
      options,
    );
    this.name = "DuplicateTransactionError";
    this.existingTransactionId = existingTransactionId;
  }
}

/**
 * Narrow an unknown error to a LedgerError with the given code.
 */
export function isLedgerError(err: unknown, code?: LedgerErrorCode): err is LedgerError {
  return err instanceof LedgerError && (code === undefined || err.code === code);
}
