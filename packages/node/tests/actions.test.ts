/**
 * Tests for action id resolution and the action router.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { RolePanel, RolePlan } from "@guild-ledger/economy";
import { ActionError, panelActionId, planActionId, resolveAction } from "../src/actions.js";
import type { Runtime } from "../src/runtime.js";
import { createFakeGateway, createTestRuntime, TENANT } from "./helpers.js";
import type { FakeGateway } from "./helpers.js";

const NOW = new Date("2024-05-01T00:00:00.000Z");

describe("resolveAction", () => {
  it("maps panel and plan ids", () => {
    expect(resolveAction("panel:3")).toEqual({ kind: "show_panel", panelId: 3 });
    expect(resolveAction("plan:12")).toEqual({ kind: "purchase_plan", planId: 12 });
  });

  it("round-trips the id builders", () => {
    expect(resolveAction(panelActionId(4))).toEqual({ kind: "show_panel", panelId: 4 });
    expect(planActionId(7)).toBe("plan:7");
  });

  it.each(["", "plan:0", "plan:x", "panel:1:2", "shop:1", " plan:1"])("rejects %j", (actionId) => {
    expect(() => resolveAction(actionId)).toThrow(ActionError);
  });
});

describe("ActionRouter", () => {
  let gateway: FakeGateway;
  let runtime: Runtime;
  let panel: RolePanel;
  let plan: RolePlan;

  beforeEach(async () => {
    gateway = createFakeGateway();
    runtime = createTestRuntime(gateway, NOW);
    await runtime.ledger.createAsset(TENANT, "GOLD", "Gold", 0);
    await runtime.factory.issue({ tenantId: TENANT, userId: "alice", symbol: "GOLD", amount: "500" });
    panel = await runtime.economy.roleShop.createPanel(TENANT, "Shop");
    plan = await runtime.economy.roleShop.addPlan({
      tenantId: TENANT,
      panelId: panel.id,
      name: "Week",
      roleId: "r-vip",
      price: "100",
      symbol: "GOLD",
      durationHours: 168,
    });
  });

  afterEach(async () => {
    await runtime.stop();
  });

  it("shows a panel with one button per plan", async () => {
    const outcome = await runtime.actions.dispatch(panelActionId(panel.id), { tenantId: TENANT, userId: "alice" });

    expect(outcome.kind).toBe("panel");
    if (outcome.kind === "panel") {
      expect(outcome.panel.name).toBe("Shop");
      expect(outcome.plans).toEqual([{ plan, actionId: `plan:${String(plan.id)}` }]);
    }
  });

  it("does not show another tenant's panel", async () => {
    await expect(
      runtime.actions.dispatch(panelActionId(panel.id), { tenantId: "guild-2", userId: "alice" }),
    ).rejects.toMatchObject({ code: "PANEL_NOT_FOUND" });
  });

  it("charges the plan and grants the role", async () => {
    const outcome = await runtime.actions.dispatch(planActionId(plan.id), {
      tenantId: TENANT,
      userId: "alice",
      now: NOW,
    });

    expect(outcome).toMatchObject({
      kind: "purchased",
      granted: true,
      purchase: { userId: "alice", roleId: "r-vip", expiresAt: "2024-05-08T00:00:00.000Z" },
    });
    expect(gateway.addRole).toHaveBeenCalledWith(TENANT, "alice", "r-vip");
    expect(runtime.ledger.userBalance(TENANT, "alice", "GOLD").amount).toBe("400");
  });

  it("keeps the purchase when the grant fails", async () => {
    gateway.addRole = async () => {
      throw new Error("missing permissions");
    };
    const outcome = await runtime.actions.dispatch(planActionId(plan.id), { tenantId: TENANT, userId: "alice" });

    expect(outcome).toMatchObject({ kind: "purchased", granted: false });
    expect(runtime.economy.roleShop.activePurchases(TENANT, "alice", NOW)).toHaveLength(1);
  });

  it("grants nothing when the wallet cannot pay", async () => {
    await expect(
      runtime.actions.dispatch(planActionId(plan.id), { tenantId: TENANT, userId: "bob" }),
    ).rejects.toMatchObject({ code: "INSUFFICIENT_BALANCE" });
    expect(gateway.addRole).not.toHaveBeenCalled();
  });
});
