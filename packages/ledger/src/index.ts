/**
 * @guild-ledger/ledger — Multi-tenant double-entry ledger on SQLite.
 *
 * Enforces double-entry invariants at the protocol level:
 * - Every transaction nets to zero per asset, checked before commit
 * - Postings are immutable once committed
 * - Regular accounts can never go negative
 * - All monetary arithmetic uses bigint (no floating point)
 * - Treasuries refill themselves in fixed quanta
 *
 * Design rules:
 * - All types are readonly
 * - Fail-closed: invalid postings throw, never silently succeed
 * - One atomic unit per economic action, retried on lock contention
 */

// Core engine
export { Ledger } from "./ledger.js";
export type { LedgerOptions, CreateAssetOptions } from "./ledger.js";
export { LedgerUnit, isOverdraftExempt } from "./ledger-unit.js";
export type { Imbalance } from "./ledger-unit.js";

// Factory
export { TransactionFactory } from "./transaction-factory.js";
export type {
  TransactionRequest,
  TransactionResult,
  SideEffects,
  MovementRequest,
  TransferRequest,
  UserMovementRequest,
  MovementResult,
} from "./transaction-factory.js";

// Registry and directory
export { AssetRegistry, normalizeSymbol } from "./asset-registry.js";
export type { AssetDependent } from "./asset-registry.js";
export {
  AccountDirectory,
  SYSTEM_ACCOUNT_TYPES,
  userAccountName,
  systemAccountName,
} from "./account-directory.js";

// Balance replay
export {
  replayAllBalances,
  replayBalance,
  findBalanceDrift,
  rebuildBalances,
} from "./balance-calculator.js";

// Storage
export {
  openDatabase,
  applyMigrations,
  loadMigration,
  LEDGER_MIGRATIONS,
  isUniqueViolation,
  isBusyError,
  sqliteErrorCode,
} from "./database.js";
export type { Executor, Migration, OpenDatabaseOptions, LedgerDatabase } from "./database.js";
export * as ledgerSchema from "./schema.js";

// Retry
export { retryOnConflict, backoffDelay, RetryExhaustedError, DEFAULT_RETRY_CONFIG } from "./retry.js";
export type { RetryConfig } from "./retry.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  scaleWhole,
  quantize,
  quantizeScaled,
  parsePositiveAmount,
  toMoney,
  addMoney,
} from "./money-math.js";

// Types
export type {
  NewTransactionOptions,
  TransactionLeg,
  TransactionFilter,
  BalanceDrift,
  DeletionReport,
  SystemAccounts,
  LedgerErrorCode,
} from "./types.js";

export {
  LedgerError,
  DuplicateTransactionError,
  isLedgerError,
  TREASURY_REFILL_QUANTUM,
  SYSTEM_KINDS,
  OVERDRAFT_EXEMPT,
} from "./types.js";
