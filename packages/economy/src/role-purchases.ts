/**
 * @guild-ledger/economy — Role shop.
 *
 * Panels group plans; a plan sells a platform role for a number of hours.
 * A purchase pays the treasury and records when the role expires. The
 * sweep revokes expired roles through the platform gateway and deletes
 * the record only once the revoke succeeded, so a failed revoke is
 * retried on the next sweep.
 */

import { and, eq, gt, lte, ne } from "drizzle-orm";
import type { Logger } from "pino";
import type { TenantId, UserId } from "@guild-ledger/types";
import type { Executor, Ledger, TransactionFactory } from "@guild-ledger/ledger";
import {
  LedgerError,
  formatAmount,
  isUniqueViolation,
  parseAmount,
  parsePositiveAmount,
  toMoney,
} from "@guild-ledger/ledger";
import { rolePanels, rolePlans, rolePurchases } from "./schema.js";
import { addHours } from "./time.js";
import type {
  EconomyDeps,
  ExpirySweep,
  RoleGateway,
  RolePanel,
  RolePlan,
  RolePurchase,
} from "./types.js";
import { ECONOMY_KINDS, EconomyError } from "./types.js";

export interface AddPlanRequest {
  readonly tenantId: TenantId;
  readonly panelId: number;
  readonly name: string;
  readonly roleId: string;
  readonly price: string;
  readonly symbol: string;
  readonly durationHours: number;
  readonly description?: string | undefined;
}

export interface PurchaseRequest {
  readonly tenantId: TenantId;
  readonly userId: UserId;
  readonly planId: number;
  readonly now?: Date | undefined;
}

export class RoleShopService {
  private readonly _factory: TransactionFactory;
  private readonly _ledger: Ledger;
  private readonly _db: Executor;
  private readonly _logger: Logger;

  constructor(deps: EconomyDeps) {
    this._factory = deps.factory;
    this._ledger = deps.factory.ledger;
    this._db = this._ledger.db;
    this._logger = deps.logger.child({ component: "role-shop" });
  }

  // ─── Panels and plans ──────────────────────────────────────────────────

  async createPanel(tenantId: TenantId, name: string, description?: string): Promise<RolePanel> {
    const trimmed = name.trim();
    try {
      return await this._ledger.transact((unit) =>
        unit.executor
          .insert(rolePanels)
          .values({
            tenantId,
            name: trimmed,
            description: description ?? null,
            createdAt: this._ledger.now().toISOString(),
          })
          .returning()
          .get(),
      );
    } catch (err: unknown) {
      if (isUniqueViolation(err)) {
        throw new EconomyError("PANEL_EXISTS", `Panel "${trimmed}" already exists in tenant "${tenantId}"`, {
          cause: err,
        });
      }
      throw err;
    }
  }

  listPanels(tenantId: TenantId): readonly RolePanel[] {
    return this._db
      .select()
      .from(rolePanels)
      .where(eq(rolePanels.tenantId, tenantId))
      .orderBy(rolePanels.id)
      .all();
  }

  async addPlan(request: AddPlanRequest): Promise<RolePlan> {
    const asset = this._ledger.getAsset(request.tenantId, request.symbol);
    if (!Number.isInteger(request.durationHours) || request.durationHours <= 0) {
      throw new EconomyError(
        "INVALID_PLAN",
        `Duration must be a positive whole number of hours, got ${String(request.durationHours)}`,
      );
    }
    const price = formatAmount(parsePositiveAmount(request.price, asset.decimals), asset.decimals);

    const plan = await this._ledger.transact((unit) => {
      this._requirePanel(unit.executor, request.tenantId, request.panelId);
      return unit.executor
        .insert(rolePlans)
        .values({
          panelId: request.panelId,
          tenantId: request.tenantId,
          name: request.name.trim(),
          roleId: request.roleId,
          price,
          currencySymbol: asset.symbol,
          durationHours: request.durationHours,
          description: request.description ?? null,
        })
        .returning()
        .get();
    });
    this._logger.info(
      { tenantId: request.tenantId, planId: plan.id, roleId: plan.roleId, price, symbol: asset.symbol },
      "Role plan added",
    );
    return plan;
  }

  listPlans(tenantId: TenantId, panelId: number): readonly RolePlan[] {
    this._requirePanel(this._db, tenantId, panelId);
    return this._db
      .select()
      .from(rolePlans)
      .where(eq(rolePlans.panelId, panelId))
      .orderBy(rolePlans.id)
      .all();
  }

  getPlan(tenantId: TenantId, planId: number): RolePlan {
    const plan = this._db
      .select()
      .from(rolePlans)
      .where(and(eq(rolePlans.id, planId), eq(rolePlans.tenantId, tenantId)))
      .get();
    if (plan === undefined) {
      throw new EconomyError("PLAN_NOT_FOUND", `Plan ${String(planId)} not found in tenant "${tenantId}"`);
    }
    return plan;
  }

  /**
   * Delete a panel and its plans. Purchases already made keep running
   * until they expire.
   */
  async removePanel(tenantId: TenantId, panelId: number): Promise<number> {
    const removed = await this._ledger.transact((unit) => {
      this._requirePanel(unit.executor, tenantId, panelId);
      const plans = unit.executor.delete(rolePlans).where(eq(rolePlans.panelId, panelId)).run();
      unit.executor.delete(rolePanels).where(eq(rolePanels.id, panelId)).run();
      return plans.changes;
    });
    this._logger.info({ tenantId, panelId, plans: removed }, "Role panel removed");
    return removed;
  }

  // ─── Purchases ─────────────────────────────────────────────────────────

  /**
   * Charge the plan's price and record the purchase. The caller grants the
   * returned role on the platform.
   */
  async purchase(request: PurchaseRequest): Promise<RolePurchase> {
    const plan = this.getPlan(request.tenantId, request.planId);
    const asset = this._ledger.getAsset(request.tenantId, plan.currencySymbol);
    const user = await this._ledger.ensureUserAccount(request.tenantId, request.userId);
    const treasury = this._ledger.accountIdByName(request.tenantId, "treasury");
    const now = request.now ?? this._ledger.now();
    const expiresAt = addHours(now, plan.durationHours).toISOString();

    const result = await this._factory.execute(
      {
        tenantId: request.tenantId,
        kind: ECONOMY_KINDS.rolePurchase,
        creator: request.userId,
        reference: `plan ${String(plan.id)} (${plan.name})`,
        legs: [
          { accountId: user, assetId: asset.id, amount: `-${plan.price}` },
          { accountId: treasury, assetId: asset.id, amount: plan.price },
        ],
      },
      (unit, txId) =>
        unit.executor
          .insert(rolePurchases)
          .values({
            tenantId: request.tenantId,
            userId: request.userId,
            planId: plan.id,
            roleId: plan.roleId,
            txId,
            purchasedAt: now.toISOString(),
            expiresAt,
          })
          .returning()
          .get(),
    );

    if (result.value === undefined) {
      throw new LedgerError(
        "UNKNOWN_TRANSACTION",
        `Transaction ${String(result.transactionId)} recorded no purchase`,
      );
    }
    this._logger.info(
      {
        tenantId: request.tenantId,
        userId: request.userId,
        roleId: plan.roleId,
        price: toMoney(parseAmount(plan.price, asset.decimals), asset),
        expiresAt,
      },
      "Role purchased",
    );
    return result.value;
  }

  activePurchases(tenantId: TenantId, userId: UserId, now: Date = this._ledger.now()): readonly RolePurchase[] {
    return this._db
      .select()
      .from(rolePurchases)
      .where(
        and(
          eq(rolePurchases.tenantId, tenantId),
          eq(rolePurchases.userId, userId),
          gt(rolePurchases.expiresAt, now.toISOString()),
        ),
      )
      .orderBy(rolePurchases.expiresAt)
      .all();
  }

  /**
   * Revoke and delete every purchase with `expiresAt <= now`, one record
   * at a time. A role still covered by another unexpired purchase of the
   * same user is not revoked; only the expired record goes.
   */
  async sweepExpired(now: Date, gateway: RoleGateway): Promise<ExpirySweep> {
    const cutoff = now.toISOString();
    const expired = this._db
      .select()
      .from(rolePurchases)
      .where(lte(rolePurchases.expiresAt, cutoff))
      .orderBy(rolePurchases.expiresAt)
      .all();

    let revoked = 0;
    let failed = 0;
    for (const record of expired) {
      if (!this._stillCovered(record, cutoff)) {
        try {
          await gateway.removeRole(record.tenantId, record.userId, record.roleId);
        } catch (err: unknown) {
          failed++;
          this._logger.warn(
            { err, tenantId: record.tenantId, userId: record.userId, roleId: record.roleId },
            "Role revoke failed; purchase kept for the next sweep",
          );
          continue;
        }
      }
      await this._ledger.transact((unit) =>
        unit.executor.delete(rolePurchases).where(eq(rolePurchases.id, record.id)).run(),
      );
      revoked++;
    }

    if (expired.length > 0) {
      this._logger.info({ revoked, failed }, "Role expiry sweep finished");
    }
    return { revoked, failed };
  }

  // ─── Internals ─────────────────────────────────────────────────────────

  private _stillCovered(record: RolePurchase, cutoff: string): boolean {
    const other = this._db
      .select({ id: rolePurchases.id })
      .from(rolePurchases)
      .where(
        and(
          eq(rolePurchases.tenantId, record.tenantId),
          eq(rolePurchases.userId, record.userId),
          eq(rolePurchases.roleId, record.roleId),
          ne(rolePurchases.id, record.id),
          gt(rolePurchases.expiresAt, cutoff),
        ),
      )
      .get();
    return other !== undefined;
  }

  private _requirePanel(exec: Executor, tenantId: TenantId, panelId: number): RolePanel {
    const panel = exec
      .select()
      .from(rolePanels)
      .where(and(eq(rolePanels.id, panelId), eq(rolePanels.tenantId, tenantId)))
      .get();
    if (panel === undefined) {
      throw new EconomyError("PANEL_NOT_FOUND", `Panel ${String(panelId)} not found in tenant "${tenantId}"`);
    }
    return panel;
  }
}

