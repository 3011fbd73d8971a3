/**
 * @guild-ledger/economy — Subledger types.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are Money or decimal strings, never numbers
 * - Platform collaborators are interfaces; the economy never talks to a
 *   chat platform directly
 */

import type { Logger } from "pino";
import type { Money, TenantId, UserId } from "@guild-ledger/types";
import type { TransactionFactory } from "@guild-ledger/ledger";

// ─── Wiring ──────────────────────────────────────────────────────────────

/**
 * What every subledger service is built from.
 */
export interface EconomyDeps {
  readonly factory: TransactionFactory;
  readonly logger: Logger;
}

/** Transaction kinds posted by the subledgers. */
export const ECONOMY_KINDS = {
  bankDeposit: "bank_deposit",
  bankWithdraw: "bank_withdraw",
  autoReward: "auto_reward",
  rolePurchase: "role_purchase",
  monthlyAllowance: "monthly_allowance",
  vcEarning: "vc_earning",
  betStake: "bet_stake",
  betSettlement: "bet_settlement",
  betRefund: "bet_refund",
} as const;

// ─── Platform collaborators ──────────────────────────────────────────────

/**
 * Grants and revokes platform roles.
 */
export interface RoleGateway {
  removeRole(tenantId: TenantId, userId: UserId, roleId: string): Promise<void>;
}

/**
 * Resolves who currently holds a role.
 */
export interface MemberDirectory {
  membersWithRole(tenantId: TenantId, roleId: string): Promise<readonly UserId[]>;
}

/**
 * Where a user is connected right now; undefined when not in voice.
 */
export interface VoicePresence {
  currentChannel(tenantId: TenantId, userId: UserId): Promise<string | undefined>;
}

// ─── Bank ────────────────────────────────────────────────────────────────

export type BankTransactionType = "deposit" | "withdraw";

export interface BankMovement {
  readonly transactionId: number;
  readonly amount: Money;
  /** Subledger balance after the movement */
  readonly bankBalance: Money;
}

export interface BankBalances {
  readonly wallet: Money;
  readonly bank: Money;
  readonly total: Money;
}

export interface AssetBankBalances extends BankBalances {
  readonly symbol: string;
}

export interface BankHistoryEntry {
  readonly type: BankTransactionType;
  readonly amount: Money;
  readonly balanceAfter: Money;
  readonly transactionId: number;
  readonly createdAt: string;
}

export interface BankSearchFilter {
  readonly type?: BankTransactionType | undefined;
  readonly symbol?: string | undefined;
  readonly userId?: UserId | undefined;
  /** 1 to 100. Default: 20 */
  readonly limit?: number | undefined;
}

export interface BankSearchHit extends BankHistoryEntry {
  readonly userId: UserId;
}

export interface BankReconciliation {
  /** Balance of the tenant's bank system account */
  readonly ledger: Money;
  /** Sum of per-user bank balances */
  readonly subledger: Money;
  readonly balanced: boolean;
}

// ─── Auto-rewards ────────────────────────────────────────────────────────

export interface AutoRewardConfig {
  readonly id: number;
  readonly tenantId: TenantId;
  readonly channelId: string;
  readonly triggerMessage: string;
  readonly reward: Money;
  readonly enabled: boolean;
  readonly createdBy: UserId | null;
  readonly createdAt: string;
}

export type RewardOutcome =
  | { readonly status: "paid"; readonly transactionId: number; readonly amount: Money }
  | { readonly status: "no_config" }
  | { readonly status: "disabled" }
  | { readonly status: "no_match" }
  | { readonly status: "already_claimed" };

export interface AutoRewardStats {
  readonly claims: number;
  readonly totalPaid: Money;
}

// ─── Role shop ───────────────────────────────────────────────────────────

export interface RolePanel {
  readonly id: number;
  readonly tenantId: TenantId;
  readonly name: string;
  readonly description: string | null;
  readonly createdAt: string;
}

export interface RolePlan {
  readonly id: number;
  readonly panelId: number;
  readonly tenantId: TenantId;
  readonly name: string;
  readonly roleId: string;
  readonly price: string;
  readonly currencySymbol: string;
  readonly durationHours: number;
  readonly description: string | null;
}

export interface RolePurchase {
  readonly id: number;
  readonly tenantId: TenantId;
  readonly userId: UserId;
  readonly planId: number;
  readonly roleId: string;
  readonly txId: number;
  readonly purchasedAt: string;
  readonly expiresAt: string;
}

export interface ExpirySweep {
  readonly revoked: number;
  /** Records kept because the gateway failed */
  readonly failed: number;
}

// ─── Monthly allowance ───────────────────────────────────────────────────

export interface MonthlyAllowance {
  readonly id: number;
  readonly tenantId: TenantId;
  readonly roleId: string;
  readonly amount: Money;
  readonly enabled: boolean;
  readonly createdAt: string;
}

export interface AllowanceRun {
  readonly paid: number;
  readonly skipped: number;
  readonly failed: number;
}

export interface AllowancePayment {
  readonly roleId: string;
  readonly userId: UserId;
  readonly amount: Money;
  readonly transactionId: number;
  readonly paidAt: string;
}

/** Everything paid for one (role, asset) in a period. */
export interface AllowanceTotal {
  readonly roleId: string;
  readonly symbol: string;
  readonly count: number;
  readonly total: Money;
}

export interface AllowanceHistory {
  readonly yearMonth: string;
  /** Newest first, capped by the requested limit. */
  readonly payments: readonly AllowancePayment[];
  /** Over the whole period, ordered by role then symbol. */
  readonly totals: readonly AllowanceTotal[];
}

// ─── Voice earnings ──────────────────────────────────────────────────────

export interface VoiceRate {
  readonly tenantId: TenantId;
  readonly categoryId: string;
  readonly symbol: string;
  readonly ratePerMinute: string;
}

export interface VoiceSession {
  readonly tenantId: TenantId;
  readonly userId: UserId;
  readonly channelId: string;
  readonly categoryId: string;
  readonly startedAt: string;
  readonly lastPaidAt: string | null;
}

export interface VoiceTick {
  readonly paid: number;
  readonly dropped: number;
  readonly failed: number;
}

// ─── Betting ─────────────────────────────────────────────────────────────

export type BettingStatus = "open" | "settled" | "cancelled";

export interface BettingEvent {
  readonly id: number;
  readonly tenantId: TenantId;
  readonly name: string;
  readonly assetId: number;
  readonly status: BettingStatus;
  readonly winnerUserId: UserId | null;
  readonly createdBy: UserId | null;
  readonly createdAt: string;
  readonly closedAt: string | null;
}

export interface Bet {
  readonly id: number;
  readonly eventId: number;
  readonly userId: UserId;
  readonly targetUserId: UserId;
  readonly amount: string;
  readonly txId: number;
  readonly placedAt: string;
}

export interface PlayerOdds {
  readonly userId: UserId;
  readonly stake: Money;
  /** Two decimal places, e.g. "1.85" */
  readonly odds: string;
}

export interface Payout {
  readonly userId: UserId;
  readonly stake: Money;
  readonly payout: Money;
}

export interface Settlement {
  readonly event: BettingEvent;
  readonly odds: string;
  readonly pool: Money;
  readonly payouts: readonly Payout[];
  /** Positive: the treasury kept the remainder. Negative: it covered a shortfall. */
  readonly treasuryNet: Money;
  readonly transactionId: number;
}

export interface Refund {
  readonly userId: UserId;
  readonly amount: Money;
}

export interface Cancellation {
  readonly event: BettingEvent;
  readonly refunds: readonly Refund[];
  /** Null when nobody had bet */
  readonly transactionId: number | null;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type EconomyErrorCode =
  | "CONFIG_NOT_FOUND"
  | "INVALID_CONFIG"
  | "PANEL_NOT_FOUND"
  | "PANEL_EXISTS"
  | "PLAN_NOT_FOUND"
  | "INVALID_PLAN"
  | "NO_BANK_ACCOUNT"
  | "EVENT_EXISTS"
  | "EVENT_NOT_FOUND"
  | "EVENT_CLOSED"
  | "NOT_A_PLAYER"
  | "PLAYER_HAS_BETS"
  | "NO_WINNING_BETS"
  | "STAKES_CHANGED"
  | "RATE_NOT_FOUND"
  | "SESSION_NOT_FOUND";

/**
 * Subledger state-machine error. Ledger failures (funds, amounts, assets)
 * stay LedgerErrors and pass through unchanged.
 */
export class EconomyError extends Error {
  public readonly code: EconomyErrorCode;

  constructor(code: EconomyErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EconomyError";
    this.code = code;
  }
}

export function isEconomyError(err: unknown, code?: EconomyErrorCode): err is EconomyError {
  return err instanceof EconomyError && (code === undefined || err.code === code);
}
