/**
 * @guild-ledger/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Currency must match for all operations
 * - Amounts must be valid decimal strings
 * - Rounding happens only in quantize(); parseAmount() never rounds
 */

import type { Asset, Money, RoundingMode } from "@guild-ledger/types";
import { LedgerError } from "./types.js";

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

// ─── Internal Helpers ────────────────────────────────────────────────────

interface DecimalParts {
  readonly negative: boolean;
  readonly intPart: string;
  readonly fracPart: string;
}

function splitDecimal(amount: string): DecimalParts {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");
  return { negative, intPart, fracPart };
}

/**
 * Decide whether the discarded digits push the kept magnitude up by one.
 */
function roundsUp(kept: bigint, discarded: string, mode: RoundingMode): boolean {
  if (mode === "down" || discarded === "" || /^0*$/.test(discarded)) {
    return false;
  }
  const first = discarded.charCodeAt(0) - 48;
  if (mode === "half-up") {
    return first >= 5;
  }
  // half-even
  if (first !== 5) {
    return first > 5;
  }
  if (!/^0*$/.test(discarded.slice(1))) {
    return true;
  }
  return kept % 2n === 1n;
}

// ─── Parsing & Formatting ────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 *
 * Fails with INVALID_AMOUNT when the string carries more fractional
 * digits than the asset allows.
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const { negative, intPart, fracPart } = splitDecimal(amount);

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${amount.trim()}" has ${String(fracPart.length)} decimal places, but the asset allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Scale a count of whole units to the asset's precision.
 *
 * scaleWhole("1000000000", 2) → 100000000000n
 */
export function scaleWhole(units: string, decimals: number): bigint {
  return parseAmount(units, 0) * 10n ** BigInt(decimals);
}

// ─── Rounding ────────────────────────────────────────────────────────────

/**
 * Fit an arbitrary decimal string to `decimals` places and return it scaled.
 * Rounding is symmetric around zero: "down" truncates toward zero.
 *
 * quantizeScaled("30.009", 2, "down") → 3000n
 * quantizeScaled("0.125", 2) → 12n (half-even)
 * quantizeScaled("0.125", 2, "half-up") → 13n
 */
export function quantizeScaled(
  amount: string,
  decimals: number,
  mode: RoundingMode = "half-even",
): bigint {
  const { negative, intPart, fracPart } = splitDecimal(amount);

  const keptFrac = fracPart.slice(0, decimals).padEnd(decimals, "0");
  const discarded = fracPart.slice(decimals);
  let magnitude = BigInt(intPart + keptFrac);

  if (roundsUp(magnitude, discarded, mode)) {
    magnitude += 1n;
  }

  return negative ? -magnitude : magnitude;
}

/**
 * String form of quantizeScaled().
 */
export function quantize(
  amount: string,
  decimals: number,
  mode: RoundingMode = "half-even",
): string {
  return formatAmount(quantizeScaled(amount, decimals, mode), decimals);
}

/**
 * Parse an amount typed by a user: rounded to the asset's precision with
 * the given mode and required to be strictly positive after rounding.
 */
export function parsePositiveAmount(
  amount: string,
  decimals: number,
  mode: RoundingMode = "half-even",
): bigint {
  const scaled = quantizeScaled(amount, decimals, mode);
  if (scaled <= 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount must be positive at ${String(decimals)} decimal places, got "${amount.trim()}"`,
    );
  }
  return scaled;
}

// ─── Money ───────────────────────────────────────────────────────────────

/**
 * Build a Money value for an asset from a scaled amount.
 */
export function toMoney(scaled: bigint, asset: Pick<Asset, "symbol" | "decimals">): Money {
  return {
    amount: formatAmount(scaled, asset.decimals),
    currency: asset.symbol,
    decimals: asset.decimals,
  };
}

function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
    );
  }
  if (a.decimals !== b.decimals) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Decimal mismatch for currency "${a.currency}": ${String(a.decimals)} vs ${String(b.decimals)}`,
    );
  }
}

/**
 * Add two Money values. They must have the same currency.
 */
export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  const sum = parseAmount(a.amount, a.decimals) + parseAmount(b.amount, b.decimals);
  return {
    amount: formatAmount(sum, a.decimals),
    currency: a.currency,
    decimals: a.decimals,
  };
}
