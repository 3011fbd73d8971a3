/**
 * Tests for voice-channel earnings.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { dateKey } from "../src/time.js";
import type { VoicePresence } from "../src/types.js";
import { createTestEconomy, TENANT } from "./helpers.js";
import type { TestEconomy } from "./helpers.js";

const NOW = new Date("2024-05-01T03:00:00.000Z");

let t: TestEconomy;
let where: Map<string, string>;
let presenceFails: boolean;

const presence: VoicePresence = {
  currentChannel: async (_tenantId, userId) => {
    if (presenceFails) {
      throw new Error("gateway timeout");
    }
    return where.get(userId);
  },
};

beforeEach(async () => {
  t = createTestEconomy();
  where = new Map([["alice", "vc-1"]]);
  presenceFails = false;
  await t.ledger.createAsset(TENANT, "GOLD", "Gold", 2);
  await t.economy.voice.setRate({ tenantId: TENANT, categoryId: "cat-1", symbol: "GOLD", ratePerMinute: "1.005" });
  await t.economy.voice.startSession({
    tenantId: TENANT,
    userId: "alice",
    channelId: "vc-1",
    categoryId: "cat-1",
    now: NOW,
  });
});

describe("rates", () => {
  it("lists the rate as configured", () => {
    expect(t.economy.voice.listRates(TENANT)).toEqual([
      { tenantId: TENANT, categoryId: "cat-1", symbol: "GOLD", ratePerMinute: "1.005" },
    ]);
  });

  it("rejects non-positive rates", async () => {
    await expect(
      t.economy.voice.setRate({ tenantId: TENANT, categoryId: "cat-2", symbol: "GOLD", ratePerMinute: "0" }),
    ).rejects.toMatchObject({ code: "INVALID_AMOUNT" });
  });

  it("fails with RATE_NOT_FOUND when removing an unknown rate", async () => {
    await expect(t.economy.voice.removeRate(TENANT, "cat-9")).rejects.toMatchObject({
      code: "RATE_NOT_FOUND",
    });
  });
});

describe("sessions", () => {
  it("opens nothing in a category without a rate", async () => {
    const started = await t.economy.voice.startSession({
      tenantId: TENANT,
      userId: "bob",
      channelId: "vc-9",
      categoryId: "cat-9",
    });
    expect(started).toBe(false);
    expect(t.economy.voice.listSessions(TENANT).map((s) => s.userId)).toEqual(["alice"]);
  });

  it("keeps one session per user and follows channel moves", async () => {
    await t.economy.voice.startSession({
      tenantId: TENANT,
      userId: "alice",
      channelId: "vc-2",
      categoryId: "cat-1",
    });
    const sessions = t.economy.voice.listSessions(TENANT);
    expect(sessions).toHaveLength(1);
    expect(sessions[0]?.channelId).toBe("vc-2");
  });

  it("ends and clears sessions", async () => {
    await t.economy.voice.endSession(TENANT, "alice");
    await expect(t.economy.voice.endSession(TENANT, "alice")).rejects.toMatchObject({
      code: "SESSION_NOT_FOUND",
    });

    await t.economy.voice.startSession({ tenantId: TENANT, userId: "alice", channelId: "vc-1", categoryId: "cat-1" });
    await t.economy.voice.startSession({ tenantId: TENANT, userId: "bob", channelId: "vc-1", categoryId: "cat-1" });
    expect(await t.economy.voice.clearSessions()).toBe(2);
    expect(t.economy.voice.listSessions(TENANT)).toEqual([]);
  });
});

describe("payoutTick", () => {
  it("credits one minute rounded half-even and tracks the daily total", async () => {
    const tick = await t.economy.voice.payoutTick(NOW, presence);

    expect(tick).toEqual({ paid: 1, dropped: 0, failed: 0 });
    // 1.005 rounds half-even to 1.00
    expect(t.ledger.userBalance(TENANT, "alice", "GOLD").amount).toBe("1.00");
    expect(t.economy.voice.dailyTotal(TENANT, "alice", "GOLD", dateKey(NOW, 540)).amount).toBe("1.00");
    expect(t.economy.voice.listSessions(TENANT)[0]?.lastPaidAt).toBe(NOW.toISOString());

    await t.economy.voice.payoutTick(NOW, presence);
    expect(t.economy.voice.dailyTotal(TENANT, "alice", "GOLD", "2024-05-01").amount).toBe("2.00");
    expect(t.ledger.listTransactions({ kind: "vc_earning" })).toHaveLength(2);
  });

  it("drops the session of a user who moved channel", async () => {
    where.set("alice", "vc-2");
    expect(await t.economy.voice.payoutTick(NOW, presence)).toEqual({ paid: 0, dropped: 1, failed: 0 });
    expect(t.economy.voice.listSessions(TENANT)).toEqual([]);
    expect(t.ledger.userBalance(TENANT, "alice", "GOLD").amount).toBe("0.00");
  });

  it("drops the session of a user who left voice", async () => {
    where.clear();
    expect(await t.economy.voice.payoutTick(NOW, presence)).toEqual({ paid: 0, dropped: 1, failed: 0 });
  });

  it("drops sessions whose category lost its rate", async () => {
    await t.economy.voice.removeRate(TENANT, "cat-1");
    expect(await t.economy.voice.payoutTick(NOW, presence)).toEqual({ paid: 0, dropped: 1, failed: 0 });
  });

  it("keeps the session but pays nothing when the rate rounds to zero", async () => {
    await t.ledger.createAsset(TENANT, "GEM", "Gem", 0);
    await t.economy.voice.setRate({ tenantId: TENANT, categoryId: "cat-1", symbol: "GEM", ratePerMinute: "0.4" });

    expect(await t.economy.voice.payoutTick(NOW, presence)).toEqual({ paid: 0, dropped: 0, failed: 0 });
    expect(t.economy.voice.listSessions(TENANT)).toHaveLength(1);
  });

  it("pays nothing for a session that ended while presence was checked", async () => {
    const ending: VoicePresence = {
      currentChannel: async (tenantId, userId) => {
        await t.economy.voice.endSession(tenantId, userId);
        return "vc-1";
      },
    };

    expect(await t.economy.voice.payoutTick(NOW, ending)).toEqual({ paid: 0, dropped: 1, failed: 0 });
    expect(t.ledger.userBalance(TENANT, "alice", "GOLD").amount).toBe("0.00");
    expect(t.ledger.listTransactions({ kind: "vc_earning" })).toEqual([]);
    expect(t.economy.voice.dailyTotal(TENANT, "alice", "GOLD", "2024-05-01").amount).toBe("0.00");
  });

  it("counts presence failures and keeps the session", async () => {
    presenceFails = true;
    expect(await t.economy.voice.payoutTick(NOW, presence)).toEqual({ paid: 0, dropped: 0, failed: 1 });
    expect(t.economy.voice.listSessions(TENANT)).toHaveLength(1);
  });
});

describe("pruneDaily", () => {
  it("removes totals older than the retention window", async () => {
    const later = new Date("2024-05-10T03:00:00.000Z");
    await t.economy.voice.payoutTick(NOW, presence);
    await t.economy.voice.payoutTick(later, presence);

    expect(await t.economy.voice.pruneDaily(later, 7)).toBe(1);
    expect(t.economy.voice.dailyTotal(TENANT, "alice", "GOLD", "2024-05-01").amount).toBe("0.00");
    expect(t.economy.voice.dailyTotal(TENANT, "alice", "GOLD", "2024-05-10").amount).toBe("1.00");
  });
});
