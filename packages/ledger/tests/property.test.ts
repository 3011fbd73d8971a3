/**
 * Property-Based Tests for @guild-ledger/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Every committed transaction nets to zero per asset
 * 2. No value from nothing: all balances of an asset sum to zero
 * 3. Materialized balances always equal a replay of the postings
 * 4. No regular account is ever negative
 * 5. parse → format is the identity on canonical amounts
 * 6. Quantized values always fit the target precision
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { formatAmount, parseAmount, quantize } from "../src/money-math.js";
import { createTestLedger, TENANT } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

/** Valid asset precision. */
const arbDecimals = fc.integer({ min: 0, max: 8 });

/** A scaled amount that stays well inside safe sizes. */
const arbScaled = fc.bigInt({ min: -(10n ** 15n), max: 10n ** 15n });

const USERS = ["u1", "u2", "u3", "u4"] as const;

type Operation =
  | { readonly op: "issue"; readonly user: number; readonly cents: number }
  | { readonly op: "transfer"; readonly from: number; readonly to: number; readonly cents: number }
  | { readonly op: "burn"; readonly user: number; readonly cents: number };

const arbUser = fc.integer({ min: 0, max: USERS.length - 1 });
const arbCents = fc.integer({ min: 1, max: 50_000 });

const arbOperation: fc.Arbitrary<Operation> = fc.oneof(
  fc.record({ op: fc.constant("issue" as const), user: arbUser, cents: arbCents }),
  fc.record({ op: fc.constant("transfer" as const), from: arbUser, to: arbUser, cents: arbCents }),
  fc.record({ op: fc.constant("burn" as const), user: arbUser, cents: arbCents }),
);

function centsToAmount(cents: number): string {
  return formatAmount(BigInt(cents), 2);
}

function userAt(index: number): string {
  return USERS[index] ?? "u1";
}

// =============================================================================
// Money math
// =============================================================================

describe("money math properties", () => {
  it("format then parse is the identity", () => {
    fc.assert(
      fc.property(arbScaled, arbDecimals, (scaled, decimals) => {
        expect(parseAmount(formatAmount(scaled, decimals), decimals)).toBe(scaled);
      }),
    );
  });

  it("quantized output always parses at the target precision", () => {
    fc.assert(
      fc.property(arbScaled, fc.integer({ min: 0, max: 12 }), arbDecimals, (scaled, from, to) => {
        const amount = formatAmount(scaled, from);
        for (const mode of ["down", "half-even", "half-up"] as const) {
          const q = quantize(amount, to, mode);
          expect(() => parseAmount(q, to)).not.toThrow();
        }
      }),
    );
  });

  it("truncation never increases the magnitude", () => {
    fc.assert(
      fc.property(arbScaled, arbDecimals, (scaled, to) => {
        const amount = formatAmount(scaled, 8);
        const truncated = parseAmount(quantize(amount, to, "down"), to) * 10n ** BigInt(8 - to);
        const abs = (v: bigint): bigint => (v < 0n ? -v : v);
        expect(abs(truncated) <= abs(scaled)).toBe(true);
      }),
    );
  });
});

// =============================================================================
// Ledger invariants
// =============================================================================

describe("ledger invariants under random operation sequences", () => {
  it("conserves value, keeps users non-negative and the cache exact", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(arbOperation, { minLength: 1, maxLength: 25 }), async (ops) => {
        const t = createTestLedger();
        const gold = await t.ledger.createAsset(TENANT, "GOLD", "Gold", 2, { initialSupply: "0" });

        for (const step of ops) {
          try {
            if (step.op === "issue") {
              await t.factory.issue({
                tenantId: TENANT,
                userId: userAt(step.user),
                symbol: "GOLD",
                amount: centsToAmount(step.cents),
              });
            } else if (step.op === "transfer") {
              await t.factory.transfer({
                tenantId: TENANT,
                fromUserId: userAt(step.from),
                toUserId: userAt(step.to),
                symbol: "GOLD",
                amount: centsToAmount(step.cents),
              });
            } else {
              await t.factory.burn({
                tenantId: TENANT,
                userId: userAt(step.user),
                symbol: "GOLD",
                amount: centsToAmount(step.cents),
              });
            }
          } catch (err: unknown) {
            const selfTransfer = step.op === "transfer" && userAt(step.from) === userAt(step.to);
            expect(err).toMatchObject({ code: selfTransfer ? "INVALID_REQUEST" : "INSUFFICIENT_BALANCE" });
          }
        }

        let total = 0n;
        for (const account of t.ledger.listAccounts(TENANT)) {
          const scaled = parseAmount(t.ledger.balanceOf(account.id, gold.id).amount, 2);
          total += scaled;
          if (account.type === "user") {
            expect(scaled >= 0n).toBe(true);
          }
        }
        expect(total).toBe(0n);

        for (const tx of t.ledger.listTransactions()) {
          const net = t.ledger
            .entriesForTransaction(tx.id)
            .reduce((sum, e) => sum + parseAmount(e.amount, 2), 0n);
          expect(net).toBe(0n);
        }

        expect(t.ledger.verifyBalances()).toEqual([]);
        t.database.close();
      }),
      { numRuns: 30 },
    );
  });
});
