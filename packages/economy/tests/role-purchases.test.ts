/**
 * Tests for the role shop and expiry sweep.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { RolePanel, RolePlan } from "../src/types.js";
import { countRows, createTestEconomy, fund, OTHER_TENANT, TENANT } from "./helpers.js";
import type { TestEconomy } from "./helpers.js";

const T0 = new Date("2024-05-01T00:00:00.000Z");
const HOUR = 3_600_000;

let t: TestEconomy;
let panel: RolePanel;
let week: RolePlan;

function at(hours: number): Date {
  return new Date(T0.getTime() + hours * HOUR);
}

beforeEach(async () => {
  t = createTestEconomy();
  await t.ledger.createAsset(TENANT, "GOLD", "Gold", 0);
  await fund(t, "alice", "GOLD", "500");
  panel = await t.economy.roleShop.createPanel(TENANT, "VIP", "Supporter roles");
  week = await t.economy.roleShop.addPlan({
    tenantId: TENANT,
    panelId: panel.id,
    name: "Week",
    roleId: "role-vip",
    price: "100",
    symbol: "gold",
    durationHours: 168,
  });
});

describe("panels and plans", () => {
  it("stores the plan priced in the asset's symbol", () => {
    expect(week).toMatchObject({ price: "100", currencySymbol: "GOLD", durationHours: 168 });
    expect(t.economy.roleShop.listPlans(TENANT, panel.id).map((p) => p.name)).toEqual(["Week"]);
  });

  it("rejects a second panel with the same name in a tenant", async () => {
    await expect(t.economy.roleShop.createPanel(TENANT, " VIP ")).rejects.toMatchObject({
      code: "PANEL_EXISTS",
    });
    const other = await t.economy.roleShop.createPanel(OTHER_TENANT, "VIP");
    expect(other.tenantId).toBe(OTHER_TENANT);
  });

  it("rejects durations that are not positive whole hours", async () => {
    for (const durationHours of [0, -1, 1.5]) {
      await expect(
        t.economy.roleShop.addPlan({
          tenantId: TENANT,
          panelId: panel.id,
          name: "Bad",
          roleId: "role-x",
          price: "1",
          symbol: "GOLD",
          durationHours,
        }),
      ).rejects.toMatchObject({ code: "INVALID_PLAN" });
    }
  });

  it("fails with PANEL_NOT_FOUND for another tenant's panel", async () => {
    await t.ledger.createAsset(OTHER_TENANT, "GOLD", "Gold", 0);
    await expect(
      t.economy.roleShop.addPlan({
        tenantId: OTHER_TENANT,
        panelId: panel.id,
        name: "Week",
        roleId: "role-vip",
        price: "1",
        symbol: "GOLD",
        durationHours: 1,
      }),
    ).rejects.toMatchObject({ code: "PANEL_NOT_FOUND" });
  });

  it("removes a panel with its plans", async () => {
    expect(await t.economy.roleShop.removePanel(TENANT, panel.id)).toBe(1);
    expect(t.economy.roleShop.listPanels(TENANT)).toEqual([]);
    expect(() => t.economy.roleShop.getPlan(TENANT, week.id)).toThrow(/not found/);
  });
});

describe("purchase", () => {
  it("charges the price and records the expiry", async () => {
    const purchase = await t.economy.roleShop.purchase({
      tenantId: TENANT,
      userId: "alice",
      planId: week.id,
      now: T0,
    });

    expect(purchase).toMatchObject({
      userId: "alice",
      roleId: "role-vip",
      purchasedAt: "2024-05-01T00:00:00.000Z",
      expiresAt: "2024-05-08T00:00:00.000Z",
    });
    expect(t.ledger.userBalance(TENANT, "alice", "GOLD").amount).toBe("400");
    expect(t.ledger.getTransaction(purchase.txId)?.kind).toBe("role_purchase");
  });

  it("records nothing when the user cannot pay", async () => {
    await expect(
      t.economy.roleShop.purchase({ tenantId: TENANT, userId: "bob", planId: week.id, now: T0 }),
    ).rejects.toMatchObject({ code: "INSUFFICIENT_BALANCE" });
    expect(countRows(t.database, "role_purchases")).toBe(0);
  });

  it("fails with PLAN_NOT_FOUND for unknown or foreign plans", async () => {
    await expect(
      t.economy.roleShop.purchase({ tenantId: TENANT, userId: "alice", planId: 999 }),
    ).rejects.toMatchObject({ code: "PLAN_NOT_FOUND" });
    await expect(
      t.economy.roleShop.purchase({ tenantId: OTHER_TENANT, userId: "alice", planId: week.id }),
    ).rejects.toMatchObject({ code: "PLAN_NOT_FOUND" });
  });

  it("keeps running purchases when their panel is removed", async () => {
    await t.economy.roleShop.purchase({ tenantId: TENANT, userId: "alice", planId: week.id, now: T0 });
    await t.economy.roleShop.removePanel(TENANT, panel.id);
    expect(t.economy.roleShop.activePurchases(TENANT, "alice", at(1))).toHaveLength(1);
  });
});

describe("sweepExpired", () => {
  const removeRole = vi.fn(async (_tenantId: string, _userId: string, _roleId: string): Promise<void> => {});

  beforeEach(async () => {
    removeRole.mockReset();
    removeRole.mockResolvedValue(undefined);
    await t.economy.roleShop.purchase({ tenantId: TENANT, userId: "alice", planId: week.id, now: T0 });
  });

  it("leaves unexpired purchases alone", async () => {
    const sweep = await t.economy.roleShop.sweepExpired(at(167), { removeRole });
    expect(sweep).toEqual({ revoked: 0, failed: 0 });
    expect(removeRole).not.toHaveBeenCalled();
    expect(countRows(t.database, "role_purchases")).toBe(1);
  });

  it("revokes and deletes a purchase once it expires", async () => {
    const sweep = await t.economy.roleShop.sweepExpired(at(168), { removeRole });
    expect(sweep).toEqual({ revoked: 1, failed: 0 });
    expect(removeRole).toHaveBeenCalledWith(TENANT, "alice", "role-vip");
    expect(countRows(t.database, "role_purchases")).toBe(0);
  });

  it("keeps the record when the gateway fails and retries next sweep", async () => {
    removeRole.mockRejectedValueOnce(new Error("platform unavailable"));

    expect(await t.economy.roleShop.sweepExpired(at(200), { removeRole })).toEqual({
      revoked: 0,
      failed: 1,
    });
    expect(countRows(t.database, "role_purchases")).toBe(1);

    expect(await t.economy.roleShop.sweepExpired(at(201), { removeRole })).toEqual({
      revoked: 1,
      failed: 0,
    });
    expect(countRows(t.database, "role_purchases")).toBe(0);
  });

  it("does not revoke a role another purchase still covers", async () => {
    const month = await t.economy.roleShop.addPlan({
      tenantId: TENANT,
      panelId: panel.id,
      name: "Month",
      roleId: "role-vip",
      price: "300",
      symbol: "GOLD",
      durationHours: 720,
    });
    await t.economy.roleShop.purchase({ tenantId: TENANT, userId: "alice", planId: month.id, now: T0 });

    const sweep = await t.economy.roleShop.sweepExpired(at(169), { removeRole });
    expect(sweep).toEqual({ revoked: 1, failed: 0 });
    expect(removeRole).not.toHaveBeenCalled();
    expect(t.economy.roleShop.activePurchases(TENANT, "alice", at(169)).map((p) => p.planId)).toEqual([
      month.id,
    ]);
  });
});
