/**
 * @guild-ledger/node — UI actions.
 *
 * Buttons on a role panel carry a string id. resolveAction() turns that
 * id into an Action without touching storage, and ActionRouter performs
 * it. Ids are "panel:<panelId>" to show a panel's plans and
 * "plan:<planId>" to buy one.
 */

import type { Logger } from "pino";
import type { RolePanel, RolePlan, RolePurchase, RoleShopService } from "@guild-ledger/economy";
import { EconomyError } from "@guild-ledger/economy";
import type { TenantId, UserId } from "@guild-ledger/types";
import type { PlatformGateway } from "./platform.js";

export type Action =
  | { readonly kind: "show_panel"; readonly panelId: number }
  | { readonly kind: "purchase_plan"; readonly planId: number };

export type ActionErrorCode = "UNKNOWN_ACTION";

export class ActionError extends Error {
  public readonly code: ActionErrorCode;

  constructor(code: ActionErrorCode, message: string) {
    super(message);
    this.name = "ActionError";
    this.code = code;
  }
}

const ACTION_ID = /^(panel|plan):([1-9]\d*)$/;

export function panelActionId(panelId: number): string {
  return `panel:${String(panelId)}`;
}

export function planActionId(planId: number): string {
  return `plan:${String(planId)}`;
}

export function resolveAction(actionId: string): Action {
  const match = ACTION_ID.exec(actionId);
  const id = match?.[2];
  if (match === null || id === undefined) {
    throw new ActionError("UNKNOWN_ACTION", `Unknown action id "${actionId}"`);
  }
  return match[1] === "panel"
    ? { kind: "show_panel", panelId: Number(id) }
    : { kind: "purchase_plan", planId: Number(id) };
}

export interface ActionContext {
  readonly tenantId: TenantId;
  readonly userId: UserId;
  readonly now?: Date | undefined;
}

export interface PlanButton {
  readonly plan: RolePlan;
  readonly actionId: string;
}

export type ActionOutcome =
  | { readonly kind: "panel"; readonly panel: RolePanel; readonly plans: readonly PlanButton[] }
  | { readonly kind: "purchased"; readonly purchase: RolePurchase; readonly granted: boolean };

export interface ActionRouterDeps {
  readonly roleShop: RoleShopService;
  readonly gateway: PlatformGateway;
  readonly logger: Logger;
}

export class ActionRouter {
  private readonly _roleShop: RoleShopService;
  private readonly _gateway: PlatformGateway;
  private readonly _logger: Logger;

  constructor(deps: ActionRouterDeps) {
    this._roleShop = deps.roleShop;
    this._gateway = deps.gateway;
    this._logger = deps.logger.child({ component: "actions" });
  }

  async dispatch(actionId: string, context: ActionContext): Promise<ActionOutcome> {
    const action = resolveAction(actionId);
    switch (action.kind) {
      case "show_panel":
        return this._showPanel(action.panelId, context);
      case "purchase_plan":
        return this._purchase(action.planId, context);
    }
  }

  private _showPanel(panelId: number, context: ActionContext): ActionOutcome {
    const panel = this._roleShop.listPanels(context.tenantId).find((p) => p.id === panelId);
    if (panel === undefined) {
      throw new EconomyError("PANEL_NOT_FOUND", `Panel ${String(panelId)} not found in tenant "${context.tenantId}"`);
    }
    const plans = this._roleShop
      .listPlans(context.tenantId, panelId)
      .map((plan) => ({ plan, actionId: planActionId(plan.id) }));
    return { kind: "panel", panel, plans };
  }

  /**
   * A failed grant keeps the purchase; the expiry sweep still removes the
   * role when it runs out.
   */
  private async _purchase(planId: number, context: ActionContext): Promise<ActionOutcome> {
    const purchase = await this._roleShop.purchase({
      tenantId: context.tenantId,
      userId: context.userId,
      planId,
      now: context.now,
    });
    let granted = true;
    try {
      await this._gateway.addRole(purchase.tenantId, purchase.userId, purchase.roleId);
    } catch (err: unknown) {
      granted = false;
      this._logger.error(
        { err, tenantId: purchase.tenantId, userId: purchase.userId, roleId: purchase.roleId },
        "Role grant failed after purchase",
      );
    }
    return { kind: "purchased", purchase, granted };
  }
}
