/**
 * @guild-ledger/economy — Monthly allowance.
 *
 * Holders of a configured role receive a fixed amount from the treasury
 * once per calendar month, on payday in the configured UTC offset. Each
 * payment carries an idempotency key derived from
 * (tenant, role, user, asset, year-month) and writes a history row in
 * the same unit, so re-running a period never pays anyone twice.
 */

import { and, desc, eq } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { Logger } from "pino";
import type { Asset, TenantId, UserId } from "@guild-ledger/types";
import type { Executor, Ledger, TransactionFactory } from "@guild-ledger/ledger";
import {
  formatAmount,
  isUniqueViolation,
  parseAmount,
  parsePositiveAmount,
  toMoney,
} from "@guild-ledger/ledger";
import { monthlyAllowanceHistory, monthlyAllowances } from "./schema.js";
import { dayOfMonth, yearMonthKey } from "./time.js";
import type {
  AllowanceHistory,
  AllowanceRun,
  AllowanceTotal,
  EconomyDeps,
  MemberDirectory,
  MonthlyAllowance,
} from "./types.js";
import { ECONOMY_KINDS, EconomyError } from "./types.js";

type AllowanceRow = typeof monthlyAllowances.$inferSelect;

export interface AllowanceOptions {
  /** Minutes east of UTC. Default: 540 */
  readonly offsetMinutes?: number | undefined;
  /** Day of month payments go out. Default: 28 */
  readonly payday?: number | undefined;
}

export interface ConfigureAllowanceRequest {
  readonly tenantId: TenantId;
  readonly roleId: string;
  readonly symbol: string;
  readonly amount: string;
}

export interface RunPeriodRequest {
  readonly tenantId: TenantId;
  /** "YYYY-MM" */
  readonly yearMonth: string;
  readonly members: MemberDirectory;
}

const YEAR_MONTH = /^\d{4}-(0[1-9]|1[0-2])$/;

const DEFAULT_HISTORY_LIMIT = 50;

export function allowanceKey(
  tenantId: TenantId,
  roleId: string,
  userId: UserId,
  assetId: number,
  yearMonth: string,
): string {
  return `${tenantId}:${roleId}:${userId}:${String(assetId)}:${yearMonth}`;
}

export class MonthlyAllowanceService {
  private readonly _factory: TransactionFactory;
  private readonly _ledger: Ledger;
  private readonly _db: Executor;
  private readonly _logger: Logger;
  private readonly _offsetMinutes: number;
  private readonly _payday: number;

  constructor(deps: EconomyDeps, options: AllowanceOptions = {}) {
    this._factory = deps.factory;
    this._ledger = deps.factory.ledger;
    this._db = this._ledger.db;
    this._logger = deps.logger.child({ component: "monthly-allowance" });
    this._offsetMinutes = options.offsetMinutes ?? 540;
    this._payday = options.payday ?? 28;
  }

  // ─── Configuration ─────────────────────────────────────────────────────

  async configure(request: ConfigureAllowanceRequest): Promise<MonthlyAllowance> {
    const asset = this._ledger.getAsset(request.tenantId, request.symbol);
    const amount = formatAmount(parsePositiveAmount(request.amount, asset.decimals), asset.decimals);

    const row = await this._ledger.transact((unit) =>
      unit.executor
        .insert(monthlyAllowances)
        .values({
          tenantId: request.tenantId,
          roleId: request.roleId,
          assetId: asset.id,
          amount,
          enabled: true,
          createdAt: this._ledger.now().toISOString(),
        })
        .onConflictDoUpdate({
          target: [monthlyAllowances.tenantId, monthlyAllowances.roleId, monthlyAllowances.assetId],
          set: { amount, enabled: true },
        })
        .returning()
        .get(),
    );
    this._logger.info(
      { tenantId: request.tenantId, roleId: request.roleId, amount, symbol: asset.symbol },
      "Monthly allowance configured",
    );
    return toAllowance(row, asset);
  }

  async setEnabled(
    tenantId: TenantId,
    roleId: string,
    symbol: string,
    enabled: boolean,
  ): Promise<MonthlyAllowance> {
    const asset = this._ledger.getAsset(tenantId, symbol);
    const row = await this._ledger.transact((unit) =>
      unit.executor
        .update(monthlyAllowances)
        .set({ enabled })
        .where(matching(tenantId, roleId, asset.id))
        .returning()
        .get(),
    );
    if (row === undefined) {
      throw notConfigured(tenantId, roleId, asset.symbol);
    }
    return toAllowance(row, asset);
  }

  /**
   * Stop paying a role. Payment history is kept.
   */
  async remove(tenantId: TenantId, roleId: string, symbol: string): Promise<void> {
    const asset = this._ledger.getAsset(tenantId, symbol);
    const result = await this._ledger.transact((unit) =>
      unit.executor.delete(monthlyAllowances).where(matching(tenantId, roleId, asset.id)).run(),
    );
    if (result.changes === 0) {
      throw notConfigured(tenantId, roleId, asset.symbol);
    }
  }

  list(tenantId: TenantId): readonly MonthlyAllowance[] {
    return this._db
      .select()
      .from(monthlyAllowances)
      .where(eq(monthlyAllowances.tenantId, tenantId))
      .orderBy(monthlyAllowances.id)
      .all()
      .map((row) => toAllowance(row, this._ledger.getAssetById(row.assetId)));
  }

  /**
   * Payments made for one period: the newest `limit` rows, plus count and
   * total per (role, asset) across the whole period.
   */
  history(tenantId: TenantId, yearMonth: string, limit = DEFAULT_HISTORY_LIMIT): AllowanceHistory {
    requirePeriod(yearMonth);
    const rows = this._db
      .select()
      .from(monthlyAllowanceHistory)
      .where(and(eq(monthlyAllowanceHistory.tenantId, tenantId), eq(monthlyAllowanceHistory.yearMonth, yearMonth)))
      .orderBy(desc(monthlyAllowanceHistory.paidAt), desc(monthlyAllowanceHistory.id))
      .all();

    const sums = new Map<string, { roleId: string; asset: Asset; count: number; scaled: bigint }>();
    for (const row of rows) {
      const key = `${row.roleId}\u0000${String(row.assetId)}`;
      const entry = sums.get(key) ?? {
        roleId: row.roleId,
        asset: this._ledger.getAssetById(row.assetId),
        count: 0,
        scaled: 0n,
      };
      entry.count++;
      entry.scaled += parseAmount(row.amount, entry.asset.decimals);
      sums.set(key, entry);
    }
    const totals: AllowanceTotal[] = [...sums.values()]
      .sort((a, b) => a.roleId.localeCompare(b.roleId) || a.asset.symbol.localeCompare(b.asset.symbol))
      .map((entry) => ({
        roleId: entry.roleId,
        symbol: entry.asset.symbol,
        count: entry.count,
        total: toMoney(entry.scaled, entry.asset),
      }));

    return {
      yearMonth,
      payments: rows.slice(0, limit).map((row) => {
        const asset = this._ledger.getAssetById(row.assetId);
        return {
          roleId: row.roleId,
          userId: row.userId,
          amount: toMoney(parseAmount(row.amount, asset.decimals), asset),
          transactionId: row.txId,
          paidAt: row.paidAt,
        };
      }),
      totals,
    };
  }

  // ─── Payment ───────────────────────────────────────────────────────────

  isPayday(now: Date): boolean {
    return dayOfMonth(now, this._offsetMinutes) === this._payday;
  }

  periodOf(now: Date): string {
    return yearMonthKey(now, this._offsetMinutes);
  }

  /**
   * Pay every enabled allowance of a tenant for one period. Each member is
   * paid in its own unit; one failure does not stop the rest.
   */
  async runPeriod(request: RunPeriodRequest): Promise<AllowanceRun> {
    requirePeriod(request.yearMonth);

    const allowances = this._db
      .select()
      .from(monthlyAllowances)
      .where(and(eq(monthlyAllowances.tenantId, request.tenantId), eq(monthlyAllowances.enabled, true)))
      .orderBy(monthlyAllowances.id)
      .all();

    let paid = 0;
    let skipped = 0;
    let failed = 0;

    for (const allowance of allowances) {
      let members: readonly UserId[];
      try {
        members = await request.members.membersWithRole(request.tenantId, allowance.roleId);
      } catch (err: unknown) {
        this._logger.warn(
          { err, tenantId: request.tenantId, roleId: allowance.roleId },
          "Could not resolve role members; allowance skipped this run",
        );
        continue;
      }

      for (const userId of new Set(members)) {
        try {
          if (await this._pay(allowance, userId, request.yearMonth)) {
            paid++;
          } else {
            skipped++;
          }
        } catch (err: unknown) {
          failed++;
          this._logger.error(
            { err, tenantId: request.tenantId, roleId: allowance.roleId, userId, yearMonth: request.yearMonth },
            "Monthly allowance payment failed",
          );
        }
      }
    }

    this._logger.info(
      { tenantId: request.tenantId, yearMonth: request.yearMonth, paid, skipped, failed },
      "Monthly allowance run finished",
    );
    return { paid, skipped, failed };
  }

  /**
   * Scheduler entry: on payday, run the current period for every tenant
   * with an enabled allowance. Undefined on any other day.
   */
  async runDue(now: Date, members: MemberDirectory): Promise<AllowanceRun | undefined> {
    if (!this.isPayday(now)) {
      return undefined;
    }
    const yearMonth = this.periodOf(now);
    const tenants = this._db
      .selectDistinct({ tenantId: monthlyAllowances.tenantId })
      .from(monthlyAllowances)
      .where(eq(monthlyAllowances.enabled, true))
      .all();

    const total = { paid: 0, skipped: 0, failed: 0 };
    for (const { tenantId } of tenants) {
      const run = await this.runPeriod({ tenantId, yearMonth, members });
      total.paid += run.paid;
      total.skipped += run.skipped;
      total.failed += run.failed;
    }
    return total;
  }

  /**
   * @returns false when this period was already paid
   */
  private async _pay(allowance: AllowanceRow, userId: UserId, yearMonth: string): Promise<boolean> {
    if (this._alreadyPaid(allowance, userId, yearMonth)) {
      return false;
    }

    const user = await this._ledger.ensureUserAccount(allowance.tenantId, userId);
    const treasury = this._ledger.accountIdByName(allowance.tenantId, "treasury");

    try {
      const result = await this._factory.execute(
        {
          tenantId: allowance.tenantId,
          kind: ECONOMY_KINDS.monthlyAllowance,
          idempotencyKey: allowanceKey(allowance.tenantId, allowance.roleId, userId, allowance.assetId, yearMonth),
          reference: `role ${allowance.roleId} ${yearMonth}`,
          legs: [
            { accountId: treasury, assetId: allowance.assetId, amount: `-${allowance.amount}` },
            { accountId: user, assetId: allowance.assetId, amount: allowance.amount },
          ],
        },
        (unit, txId) => {
          unit.executor
            .insert(monthlyAllowanceHistory)
            .values({
              tenantId: allowance.tenantId,
              roleId: allowance.roleId,
              userId,
              assetId: allowance.assetId,
              amount: allowance.amount,
              yearMonth,
              txId,
              paidAt: this._ledger.now().toISOString(),
            })
            .run();
        },
      );
      return !result.replayed;
    } catch (err: unknown) {
      if (isUniqueViolation(err)) {
        return false;
      }
      throw err;
    }
  }

  private _alreadyPaid(allowance: AllowanceRow, userId: UserId, yearMonth: string): boolean {
    const row = this._db
      .select({ id: monthlyAllowanceHistory.id })
      .from(monthlyAllowanceHistory)
      .where(
        and(
          eq(monthlyAllowanceHistory.tenantId, allowance.tenantId),
          eq(monthlyAllowanceHistory.roleId, allowance.roleId),
          eq(monthlyAllowanceHistory.userId, userId),
          eq(monthlyAllowanceHistory.assetId, allowance.assetId),
          eq(monthlyAllowanceHistory.yearMonth, yearMonth),
        ),
      )
      .get();
    return row !== undefined;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

function matching(tenantId: TenantId, roleId: string, assetId: number): SQL | undefined {
  return and(
    eq(monthlyAllowances.tenantId, tenantId),
    eq(monthlyAllowances.roleId, roleId),
    eq(monthlyAllowances.assetId, assetId),
  );
}

function toAllowance(row: AllowanceRow, asset: Asset): MonthlyAllowance {
  return {
    id: row.id,
    tenantId: row.tenantId,
    roleId: row.roleId,
    amount: toMoney(parseAmount(row.amount, asset.decimals), asset),
    enabled: row.enabled,
    createdAt: row.createdAt,
  };
}

function requirePeriod(yearMonth: string): void {
  if (!YEAR_MONTH.test(yearMonth)) {
    throw new EconomyError("INVALID_CONFIG", `Period must look like YYYY-MM, got "${yearMonth}"`);
  }
}

function notConfigured(tenantId: TenantId, roleId: string, symbol: string): EconomyError {
  return new EconomyError(
    "CONFIG_NOT_FOUND",
    `No ${symbol} allowance configured for role "${roleId}" in tenant "${tenantId}"`,
  );
}
