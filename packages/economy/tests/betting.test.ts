/**
 * Tests for betting pools.
 *
 * Covers:
 * - Odds: pool over stake on target, half-even to 2 places, floor 1.10
 * - Stakes held in escrow and escrow returning to zero on close
 * - Treasury covering shortfalls and keeping remainders
 * - Event lifecycle and player registration
 * - Bets landing while an event is being closed
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { Asset } from "@guild-ledger/types";
import { computeOdds, formatOdds, payoutFor } from "../src/betting.js";
import type { BettingEvent } from "../src/types.js";
import { createTestEconomy, fund, TENANT } from "./helpers.js";
import type { TestEconomy } from "./helpers.js";

describe("computeOdds", () => {
  it("defaults to 2.00 while either side is empty", () => {
    expect(computeOdds(0n, 0n)).toBe(200n);
    expect(computeOdds(500n, 0n)).toBe(200n);
  });

  it("divides the pool by the stake on the target", () => {
    expect(computeOdds(500n, 200n)).toBe(250n);
    expect(computeOdds(500n, 300n)).toBe(167n);
  });

  it("never goes below 1.10", () => {
    expect(computeOdds(1010n, 1000n)).toBe(110n);
    expect(computeOdds(100n, 100n)).toBe(110n);
  });

  it("rounds ties to even", () => {
    expect(computeOdds(9n, 8n)).toBe(112n);
    expect(computeOdds(11n, 8n)).toBe(138n);
  });

  it("formats hundredths", () => {
    expect(formatOdds(167n)).toBe("1.67");
  });
});

describe("payoutFor", () => {
  it("floors stake times odds to whole units", () => {
    expect(payoutFor(3n, 233n, 0)).toBe(6n);
    expect(payoutFor(150n, 167n, 2)).toBe(200n);
  });
});

describe("BettingService", () => {
  let t: TestEconomy;
  let gem: Asset;
  let event: BettingEvent;

  function escrowBalance(): string {
    return t.ledger.balanceOf(t.ledger.accountIdByName(TENANT, "escrow"), gem.id).amount;
  }

  function wallet(userId: string): string {
    return t.ledger.userBalance(TENANT, userId, "GEM").amount;
  }

  async function bet(userId: string, targetUserId: string, amount: string): Promise<void> {
    await t.economy.betting.placeBet({ eventId: event.id, userId, targetUserId, amount });
  }

  beforeEach(async () => {
    t = createTestEconomy();
    gem = await t.ledger.createAsset(TENANT, "GEM", "Gem", 0);
    for (const user of ["u1", "u2", "u3"]) {
      await fund(t, user, "GEM", "1000");
    }
    event = await t.economy.betting.openEvent({
      tenantId: TENANT,
      name: "Final",
      symbol: "gem",
      createdBy: "admin",
      players: ["p1", "p2"],
    });
  });

  describe("events and players", () => {
    it("allows one open event per tenant", async () => {
      expect(t.economy.betting.findOpenEvent(TENANT)?.id).toBe(event.id);
      await expect(
        t.economy.betting.openEvent({ tenantId: TENANT, name: "Second", symbol: "GEM" }),
      ).rejects.toMatchObject({ code: "EVENT_EXISTS" });

      await t.economy.betting.cancel(event.id);
      const next = await t.economy.betting.openEvent({ tenantId: TENANT, name: "Second", symbol: "GEM" });
      expect(next.status).toBe("open");
    });

    it("registers players idempotently", async () => {
      await t.economy.betting.addPlayer(event.id, "p3");
      await t.economy.betting.addPlayer(event.id, "p3");
      expect(t.economy.betting.listPlayers(event.id)).toEqual(["p1", "p2", "p3"]);
    });

    it("removes only players nobody backed", async () => {
      await bet("u1", "p1", "10");
      await expect(t.economy.betting.removePlayer(event.id, "p1")).rejects.toMatchObject({
        code: "PLAYER_HAS_BETS",
      });
      await t.economy.betting.removePlayer(event.id, "p2");
      expect(t.economy.betting.listPlayers(event.id)).toEqual(["p1"]);
      await expect(t.economy.betting.removePlayer(event.id, "p2")).rejects.toMatchObject({
        code: "NOT_A_PLAYER",
      });
    });

    it("fails with EVENT_NOT_FOUND for unknown events", () => {
      expect(() => t.economy.betting.getEvent(999)).toThrow(/not found/);
    });
  });

  describe("placeBet", () => {
    it("moves the stake into escrow", async () => {
      await bet("u1", "p1", "100");

      expect(wallet("u1")).toBe("900");
      expect(escrowBalance()).toBe("100");
      expect(t.economy.betting.listBets(event.id)).toMatchObject([
        { userId: "u1", targetUserId: "p1", amount: "100" },
      ]);
    });

    it("only accepts bets on registered players", async () => {
      await expect(bet("u1", "stranger", "10")).rejects.toMatchObject({ code: "NOT_A_PLAYER" });
    });

    it("rejects stakes the wallet cannot cover", async () => {
      await expect(bet("u1", "p1", "1001")).rejects.toMatchObject({ code: "INSUFFICIENT_BALANCE" });
      expect(t.economy.betting.listBets(event.id)).toEqual([]);
    });
  });

  describe("odds", () => {
    it("reflects the current pools", async () => {
      await bet("u1", "p1", "100");
      await bet("u2", "p2", "300");
      await bet("u3", "p1", "100");

      expect(t.economy.betting.odds(event.id, "p1")).toBe("2.50");
      expect(t.economy.betting.odds(event.id, "p2")).toBe("1.67");
      expect(t.economy.betting.oddsTable(event.id)).toEqual([
        { userId: "p1", stake: { amount: "200", currency: "GEM", decimals: 0 }, odds: "2.50" },
        { userId: "p2", stake: { amount: "300", currency: "GEM", decimals: 0 }, odds: "1.67" },
      ]);
    });
  });

  describe("settle", () => {
    it("pays backers of the winner and empties escrow", async () => {
      await bet("u1", "p1", "100");
      await bet("u2", "p2", "300");
      await bet("u3", "p1", "100");

      const settlement = await t.economy.betting.settle(event.id, "p1");

      expect(settlement.odds).toBe("2.50");
      expect(settlement.pool.amount).toBe("500");
      expect(settlement.payouts.map((p) => [p.userId, p.payout.amount])).toEqual([
        ["u1", "250"],
        ["u3", "250"],
      ]);
      expect(settlement.treasuryNet.amount).toBe("0");
      expect(settlement.event).toMatchObject({ status: "settled", winnerUserId: "p1" });
      expect([wallet("u1"), wallet("u2"), wallet("u3")]).toEqual(["1150", "700", "1150"]);
      expect(escrowBalance()).toBe("0");
    });

    it("draws a shortfall from the treasury", async () => {
      await bet("u1", "p1", "1000");
      await bet("u2", "p2", "10");

      const settlement = await t.economy.betting.settle(event.id, "p1");

      expect(settlement.odds).toBe("1.10");
      expect(settlement.treasuryNet.amount).toBe("-90");
      expect(wallet("u1")).toBe("1100");
      expect(escrowBalance()).toBe("0");
    });

    it("returns the rounding remainder to the treasury", async () => {
      await bet("u1", "p1", "3");
      await bet("u2", "p2", "4");

      const settlement = await t.economy.betting.settle(event.id, "p1");

      expect(settlement.odds).toBe("2.33");
      expect(settlement.payouts[0]?.payout.amount).toBe("6");
      expect(settlement.treasuryNet.amount).toBe("1");
      expect(escrowBalance()).toBe("0");
    });

    it("refuses a winner nobody backed or who is not a player", async () => {
      await bet("u1", "p1", "10");
      await expect(t.economy.betting.settle(event.id, "p2")).rejects.toMatchObject({
        code: "NO_WINNING_BETS",
      });
      await expect(t.economy.betting.settle(event.id, "stranger")).rejects.toMatchObject({
        code: "NOT_A_PLAYER",
      });
      expect(t.economy.betting.getEvent(event.id).status).toBe("open");
    });

    it("closes the event for further bets and settlements", async () => {
      await bet("u1", "p1", "10");
      await t.economy.betting.settle(event.id, "p1");

      await expect(bet("u2", "p1", "10")).rejects.toMatchObject({ code: "EVENT_CLOSED" });
      await expect(t.economy.betting.settle(event.id, "p1")).rejects.toMatchObject({ code: "EVENT_CLOSED" });
      await expect(t.economy.betting.cancel(event.id)).rejects.toMatchObject({ code: "EVENT_CLOSED" });
    });
  });

  describe("cancel", () => {
    it("refunds every stake", async () => {
      await bet("u1", "p1", "100");
      await bet("u2", "p2", "300");
      await bet("u1", "p2", "50");

      const cancellation = await t.economy.betting.cancel(event.id);

      expect(cancellation.refunds.map((r) => [r.userId, r.amount.amount])).toEqual([
        ["u1", "150"],
        ["u2", "300"],
      ]);
      expect(cancellation.event.status).toBe("cancelled");
      expect([wallet("u1"), wallet("u2")]).toEqual(["1000", "1000"]);
      expect(escrowBalance()).toBe("0");
    });

    it("closes an event without bets without posting", async () => {
      const cancellation = await t.economy.betting.cancel(event.id);
      expect(cancellation.transactionId).toBeNull();
      expect(t.ledger.listTransactions({ kind: "bet_refund" })).toEqual([]);
    });
  });

  describe("bets placed while closing", () => {
    /** Place a bet the first time the close looks up a payee account. */
    function betDuringClose(userId: string, targetUserId: string, amount: string): void {
      const original = t.ledger.ensureUserAccount.bind(t.ledger);
      vi.spyOn(t.ledger, "ensureUserAccount").mockImplementationOnce(async (tenantId, payee) => {
        await bet(userId, targetUserId, amount);
        return original(tenantId, payee);
      });
    }

    it("settles over the bet that slipped in", async () => {
      await bet("u1", "p1", "100");
      await bet("u3", "p2", "100");
      betDuringClose("u2", "p1", "300");

      const settlement = await t.economy.betting.settle(event.id, "p1");

      expect(settlement.pool.amount).toBe("500");
      expect(settlement.odds).toBe("1.25");
      expect(settlement.payouts.map((p) => [p.userId, p.payout.amount])).toEqual([
        ["u1", "125"],
        ["u2", "375"],
      ]);
      expect([wallet("u1"), wallet("u2"), wallet("u3")]).toEqual(["1025", "1075", "900"]);
      expect(escrowBalance()).toBe("0");
    });

    it("refunds the bet that slipped in", async () => {
      await bet("u1", "p1", "100");
      betDuringClose("u2", "p2", "300");

      const cancellation = await t.economy.betting.cancel(event.id);

      expect(cancellation.refunds.map((r) => [r.userId, r.amount.amount])).toEqual([
        ["u1", "100"],
        ["u2", "300"],
      ]);
      expect([wallet("u1"), wallet("u2")]).toEqual(["1000", "1000"]);
      expect(escrowBalance()).toBe("0");
    });

    it("leaves nothing in escrow when a bet races a cancel", async () => {
      await bet("u1", "p1", "100");
      await bet("u3", "p2", "100");

      const [placed, cancelled] = await Promise.allSettled([
        bet("u2", "p1", "300"),
        t.economy.betting.cancel(event.id),
      ]);

      expect(cancelled.status).toBe("fulfilled");
      if (placed.status === "rejected") {
        expect(placed.reason).toMatchObject({ code: "EVENT_CLOSED" });
      }
      expect(wallet("u2")).toBe("1000");
      expect(escrowBalance()).toBe("0");
      expect(t.economy.betting.getEvent(event.id).status).toBe("cancelled");
    });

    it("pays the racing bet or rejects it when a bet races a settle", async () => {
      await bet("u1", "p1", "100");
      await bet("u3", "p2", "100");

      const [placed, settled] = await Promise.allSettled([
        bet("u2", "p1", "300"),
        t.economy.betting.settle(event.id, "p1"),
      ]);

      expect(settled.status).toBe("fulfilled");
      expect(wallet("u2")).toBe(placed.status === "fulfilled" ? "1075" : "1000");
      expect(escrowBalance()).toBe("0");
      expect(t.economy.betting.getEvent(event.id).status).toBe("settled");
    });
  });
});
