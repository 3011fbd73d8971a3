/**
 * @guild-ledger/economy — Derived subledgers.
 *
 * Every service posts through the TransactionFactory: each economic
 * action is one balanced transaction, and its subledger rows commit in
 * the same unit.
 */

export { createEconomy } from "./economy.js";
export type { Economy, EconomyOptions } from "./economy.js";

export { BankService } from "./bank.js";
export type { BankMovementRequest } from "./bank.js";
export { AutoRewardService } from "./auto-rewards.js";
export type { ConfigureRewardRequest, IncomingMessage } from "./auto-rewards.js";
export { RoleShopService } from "./role-purchases.js";
export type { AddPlanRequest, PurchaseRequest } from "./role-purchases.js";
export { MonthlyAllowanceService, allowanceKey } from "./monthly-allowance.js";
export type {
  AllowanceOptions,
  ConfigureAllowanceRequest,
  RunPeriodRequest,
} from "./monthly-allowance.js";
export { VoiceEarningService } from "./vc-earning.js";
export type { SetRateRequest, StartSessionRequest, VoiceEarningOptions } from "./vc-earning.js";
export {
  BettingService,
  computeOdds,
  payoutFor,
  formatOdds,
  MIN_ODDS,
  DEFAULT_ODDS,
} from "./betting.js";
export type { OpenEventRequest, PlaceBetRequest } from "./betting.js";

export { economyAssetDependent } from "./dependents.js";
export { ECONOMY_MIGRATIONS } from "./migrations.js";
export { yearMonthKey, dateKey, dayOfMonth, dateKeyDaysAgo, addHours } from "./time.js";
export * as economySchema from "./schema.js";

export type {
  EconomyDeps,
  RoleGateway,
  MemberDirectory,
  VoicePresence,
  BankTransactionType,
  BankMovement,
  BankBalances,
  AssetBankBalances,
  BankHistoryEntry,
  BankSearchFilter,
  BankSearchHit,
  BankReconciliation,
  AutoRewardConfig,
  RewardOutcome,
  AutoRewardStats,
  RolePanel,
  RolePlan,
  RolePurchase,
  ExpirySweep,
  MonthlyAllowance,
  AllowanceRun,
  AllowancePayment,
  AllowanceTotal,
  AllowanceHistory,
  VoiceRate,
  VoiceSession,
  VoiceTick,
  BettingStatus,
  BettingEvent,
  Bet,
  PlayerOdds,
  Payout,
  Settlement,
  Refund,
  Cancellation,
  EconomyErrorCode,
} from "./types.js";
export { EconomyError, isEconomyError, ECONOMY_KINDS } from "./types.js";
