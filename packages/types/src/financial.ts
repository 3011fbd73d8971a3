/**
 * Financial Types
 *
 * Core financial primitives for the multi-tenant ledger.
 *
 * Rules:
 * - All amounts are decimal strings to avoid floating-point errors
 * - The asset symbol is always explicit
 * - Postings are append-only by contract
 */

/** A tenant is one isolated community space (a guild). */
export type TenantId = string;

/** A platform user identifier. Snowflake-sized, so always a string. */
export type UserId = string;

/**
 * Asset symbol, unique per tenant (e.g. "GOLD", "GEM").
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 */
export interface Money {
  /** Decimal string at the asset's precision (e.g., "100.50", "-3") */
  readonly amount: string;

  /** Asset symbol */
  readonly currency: Currency;

  /** Number of decimal places for this asset (0..8). */
  readonly decimals: number;
}

/**
 * Per-tenant currency definition.
 */
export interface Asset {
  readonly id: number;
  readonly tenantId: TenantId;
  readonly symbol: Currency;
  readonly name: string;
  readonly decimals: number;
  readonly createdAt: string;
}

/**
 * Ledger participant roles.
 *
 * - user: one per (user, tenant), created lazily
 * - treasury: the tenant's minting faucet, self-refilling
 * - burn: sink for destroyed value
 * - issuance: counter-leg of every mint
 * - bank: pooled funds held by the bank subledger
 * - escrow: stakes held by open betting events
 */
export type AccountType = "user" | "treasury" | "burn" | "issuance" | "bank" | "escrow";

/** Account types owned by the tenant rather than a user. */
export type SystemAccountType = Exclude<AccountType, "user">;

/**
 * A named ledger participant.
 */
export interface Account {
  readonly id: number;
  readonly tenantId: TenantId;
  /** Null for system accounts */
  readonly ownerUserId: UserId | null;
  /** Globally unique durable name, e.g. "treasury:123" or "user:42:123" */
  readonly name: string;
  readonly type: AccountType;
  readonly createdAt: string;
}

/**
 * Header of a logical economic event. Immutable once committed.
 */
export interface TransactionRecord {
  readonly id: number;
  /** Reporting tag: transfer, issue, auto_reward, monthly_allowance, ... */
  readonly kind: string;
  readonly createdBy: UserId | null;
  readonly idempotencyKey: string | null;
  readonly reference: string | null;
  readonly createdAt: string;
}

/**
 * A single signed line in the journal.
 * Positive credits the account, negative debits it.
 */
export interface Posting {
  readonly id: number;
  readonly txId: number;
  readonly accountId: number;
  readonly assetId: number;
  readonly amount: string;
}

/**
 * Rounding applied when an arbitrary decimal is fitted to an asset's precision.
 *
 * - down: truncate toward zero (withdrawals, transfers)
 * - half-even: banker's rounding (default)
 * - half-up: ties away from zero
 */
export type RoundingMode = "down" | "half-even" | "half-up";
