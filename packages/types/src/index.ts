/**
 * @guild-ledger/types — Shared domain types for the guild ledger.
 *
 * These types are used across all packages:
 * - Financial primitives (Money, assets, accounts)
 * - Journal records (transactions, postings)
 * - Rounding policy names
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

export type {
  Money,
  Currency,
  Asset,
  Account,
  AccountType,
  SystemAccountType,
  TransactionRecord,
  Posting,
  RoundingMode,
  TenantId,
  UserId,
} from "./financial.js";

export { MAX_ASSET_DECIMALS, isAssetDecimals } from "./guards.js";
