/**
 * @guild-ledger/economy — Voice-channel earnings.
 *
 * A category of voice channels can carry a per-minute rate. While a user
 * sits in such a channel they hold a durable session; every payout tick
 * credits one minute at the category's rate from the treasury and adds it
 * to the user's daily total in the same unit. Sessions whose user left or
 * moved channel are dropped on the tick that notices.
 */

import { and, eq, lt } from "drizzle-orm";
import type { Logger } from "pino";
import type { Money, TenantId, UserId } from "@guild-ledger/types";
import { MAX_ASSET_DECIMALS } from "@guild-ledger/types";
import type { Executor, Ledger, TransactionFactory } from "@guild-ledger/ledger";
import { formatAmount, parseAmount, parsePositiveAmount, quantizeScaled, toMoney } from "@guild-ledger/ledger";
import { vcEarningDaily, vcEarningRates, vcSessions } from "./schema.js";
import { dateKey, dateKeyDaysAgo } from "./time.js";
import type { EconomyDeps, VoicePresence, VoiceRate, VoiceSession, VoiceTick } from "./types.js";
import { ECONOMY_KINDS, EconomyError, isEconomyError } from "./types.js";

type RateRow = typeof vcEarningRates.$inferSelect;
type SessionRow = typeof vcSessions.$inferSelect;

export interface VoiceEarningOptions {
  /** Minutes east of UTC used for daily totals. Default: 540 */
  readonly offsetMinutes?: number | undefined;
}

export interface SetRateRequest {
  readonly tenantId: TenantId;
  readonly categoryId: string;
  readonly symbol: string;
  readonly ratePerMinute: string;
}

export interface StartSessionRequest {
  readonly tenantId: TenantId;
  readonly userId: UserId;
  readonly channelId: string;
  readonly categoryId: string;
  readonly now?: Date | undefined;
}

export class VoiceEarningService {
  private readonly _factory: TransactionFactory;
  private readonly _ledger: Ledger;
  private readonly _db: Executor;
  private readonly _logger: Logger;
  private readonly _offsetMinutes: number;

  constructor(deps: EconomyDeps, options: VoiceEarningOptions = {}) {
    this._factory = deps.factory;
    this._ledger = deps.factory.ledger;
    this._db = this._ledger.db;
    this._logger = deps.logger.child({ component: "vc-earning" });
    this._offsetMinutes = options.offsetMinutes ?? 540;
  }

  // ─── Rates ─────────────────────────────────────────────────────────────

  /**
   * Set the category's per-minute rate. The rate may be finer than the
   * asset; it is rounded at payout.
   */
  async setRate(request: SetRateRequest): Promise<VoiceRate> {
    const asset = this._ledger.getAsset(request.tenantId, request.symbol);
    parsePositiveAmount(request.ratePerMinute, MAX_ASSET_DECIMALS);
    const rate = request.ratePerMinute.trim();

    await this._ledger.transact((unit) =>
      unit.executor
        .insert(vcEarningRates)
        .values({
          tenantId: request.tenantId,
          categoryId: request.categoryId,
          assetId: asset.id,
          ratePerMinute: rate,
          createdAt: this._ledger.now().toISOString(),
        })
        .onConflictDoUpdate({
          target: [vcEarningRates.tenantId, vcEarningRates.categoryId],
          set: { assetId: asset.id, ratePerMinute: rate },
        })
        .run(),
    );
    this._logger.info(
      { tenantId: request.tenantId, categoryId: request.categoryId, rate, symbol: asset.symbol },
      "Voice earning rate set",
    );
    return { tenantId: request.tenantId, categoryId: request.categoryId, symbol: asset.symbol, ratePerMinute: rate };
  }

  async removeRate(tenantId: TenantId, categoryId: string): Promise<void> {
    const result = await this._ledger.transact((unit) =>
      unit.executor
        .delete(vcEarningRates)
        .where(and(eq(vcEarningRates.tenantId, tenantId), eq(vcEarningRates.categoryId, categoryId)))
        .run(),
    );
    if (result.changes === 0) {
      throw new EconomyError(
        "RATE_NOT_FOUND",
        `No voice earning rate for category "${categoryId}" in tenant "${tenantId}"`,
      );
    }
  }

  listRates(tenantId: TenantId): readonly VoiceRate[] {
    return this._db
      .select()
      .from(vcEarningRates)
      .where(eq(vcEarningRates.tenantId, tenantId))
      .orderBy(vcEarningRates.id)
      .all()
      .map((row) => ({
        tenantId: row.tenantId,
        categoryId: row.categoryId,
        symbol: this._ledger.getAssetById(row.assetId).symbol,
        ratePerMinute: row.ratePerMinute,
      }));
  }

  // ─── Sessions ──────────────────────────────────────────────────────────

  /**
   * Open (or move) the user's session. Nothing is recorded when the
   * category earns nothing.
   *
   * @returns true when a session is now open
   */
  async startSession(request: StartSessionRequest): Promise<boolean> {
    if (this._rateFor(this._db, request.tenantId, request.categoryId) === undefined) {
      return false;
    }
    const startedAt = (request.now ?? this._ledger.now()).toISOString();
    await this._ledger.transact((unit) =>
      unit.executor
        .insert(vcSessions)
        .values({
          tenantId: request.tenantId,
          userId: request.userId,
          channelId: request.channelId,
          categoryId: request.categoryId,
          startedAt,
          lastPaidAt: null,
        })
        .onConflictDoUpdate({
          target: [vcSessions.tenantId, vcSessions.userId],
          set: { channelId: request.channelId, categoryId: request.categoryId, startedAt, lastPaidAt: null },
        })
        .run(),
    );
    return true;
  }

  async endSession(tenantId: TenantId, userId: UserId): Promise<void> {
    const result = await this._ledger.transact((unit) =>
      unit.executor
        .delete(vcSessions)
        .where(and(eq(vcSessions.tenantId, tenantId), eq(vcSessions.userId, userId)))
        .run(),
    );
    if (result.changes === 0) {
      throw new EconomyError("SESSION_NOT_FOUND", `User "${userId}" has no voice session in tenant "${tenantId}"`);
    }
  }

  /**
   * Drop every session. Run at startup: presence from before a restart
   * cannot be trusted.
   */
  async clearSessions(): Promise<number> {
    const result = await this._ledger.transact((unit) => unit.executor.delete(vcSessions).run());
    if (result.changes > 0) {
      this._logger.info({ cleared: result.changes }, "Stale voice sessions cleared");
    }
    return result.changes;
  }

  listSessions(tenantId: TenantId): readonly VoiceSession[] {
    return this._db
      .select()
      .from(vcSessions)
      .where(eq(vcSessions.tenantId, tenantId))
      .orderBy(vcSessions.id)
      .all()
      .map(toSession);
  }

  // ─── Payout ────────────────────────────────────────────────────────────

  /**
   * Credit one minute to every session whose user is still in its
   * channel. Each session is paid in its own unit.
   */
  async payoutTick(now: Date, presence: VoicePresence): Promise<VoiceTick> {
    const sessions = this._db.select().from(vcSessions).orderBy(vcSessions.id).all();
    let paid = 0;
    let dropped = 0;
    let failed = 0;

    for (const session of sessions) {
      try {
        const current = await presence.currentChannel(session.tenantId, session.userId);
        const rate = this._rateFor(this._db, session.tenantId, session.categoryId);
        if (current !== session.channelId || rate === undefined) {
          await this._dropSession(session);
          dropped++;
          continue;
        }
        if (await this._credit(session, rate, now)) {
          paid++;
        }
      } catch (err: unknown) {
        if (isEconomyError(err, "SESSION_NOT_FOUND")) {
          dropped++;
          continue;
        }
        failed++;
        this._logger.error(
          { err, tenantId: session.tenantId, userId: session.userId },
          "Voice earning payout failed",
        );
      }
    }

    if (sessions.length > 0) {
      this._logger.debug({ paid, dropped, failed }, "Voice payout tick finished");
    }
    return { paid, dropped, failed };
  }

  dailyTotal(tenantId: TenantId, userId: UserId, symbol: string, date: string): Money {
    const asset = this._ledger.getAsset(tenantId, symbol);
    const row = this._db
      .select({ totalEarned: vcEarningDaily.totalEarned })
      .from(vcEarningDaily)
      .where(
        and(
          eq(vcEarningDaily.tenantId, tenantId),
          eq(vcEarningDaily.userId, userId),
          eq(vcEarningDaily.assetId, asset.id),
          eq(vcEarningDaily.date, date),
        ),
      )
      .get();
    return toMoney(row === undefined ? 0n : parseAmount(row.totalEarned, asset.decimals), asset);
  }

  /**
   * Delete daily totals older than `retentionDays` before today.
   */
  async pruneDaily(now: Date, retentionDays = 7): Promise<number> {
    const cutoff = dateKeyDaysAgo(now, retentionDays, this._offsetMinutes);
    const result = await this._ledger.transact((unit) =>
      unit.executor.delete(vcEarningDaily).where(lt(vcEarningDaily.date, cutoff)).run(),
    );
    if (result.changes > 0) {
      this._logger.info({ cutoff, removed: result.changes }, "Old voice earning totals pruned");
    }
    return result.changes;
  }

  // ─── Internals ─────────────────────────────────────────────────────────

  /**
   * Fails with SESSION_NOT_FOUND when the session ended while the tick
   * was waiting on presence.
   *
   * @returns false when the rate rounds to nothing at the asset's precision
   */
  private async _credit(session: SessionRow, rate: RateRow, now: Date): Promise<boolean> {
    const asset = this._ledger.getAssetById(rate.assetId);
    const scaled = quantizeScaled(rate.ratePerMinute, asset.decimals, "half-even");
    if (scaled <= 0n) {
      return false;
    }
    const amount = formatAmount(scaled, asset.decimals);
    const user = await this._ledger.ensureUserAccount(session.tenantId, session.userId);
    const treasury = this._ledger.accountIdByName(session.tenantId, "treasury");
    const date = dateKey(now, this._offsetMinutes);

    await this._factory.execute(
      {
        tenantId: session.tenantId,
        kind: ECONOMY_KINDS.vcEarning,
        reference: `voice ${session.channelId}`,
        legs: [
          { accountId: treasury, assetId: asset.id, amount: `-${amount}` },
          { accountId: user, assetId: asset.id, amount },
        ],
      },
      (unit) => {
        const exec = unit.executor;
        const touched = exec
          .update(vcSessions)
          .set({ lastPaidAt: now.toISOString() })
          .where(and(eq(vcSessions.id, session.id), eq(vcSessions.channelId, session.channelId)))
          .run();
        if (touched.changes === 0) {
          throw new EconomyError("SESSION_NOT_FOUND", `Voice session ${String(session.id)} ended before it was paid`);
        }
        const existing = exec
          .select({ totalEarned: vcEarningDaily.totalEarned })
          .from(vcEarningDaily)
          .where(
            and(
              eq(vcEarningDaily.tenantId, session.tenantId),
              eq(vcEarningDaily.userId, session.userId),
              eq(vcEarningDaily.assetId, asset.id),
              eq(vcEarningDaily.date, date),
            ),
          )
          .get();
        const total = formatAmount(
          (existing === undefined ? 0n : parseAmount(existing.totalEarned, asset.decimals)) + scaled,
          asset.decimals,
        );
        exec
          .insert(vcEarningDaily)
          .values({ tenantId: session.tenantId, userId: session.userId, assetId: asset.id, date, totalEarned: total })
          .onConflictDoUpdate({
            target: [vcEarningDaily.tenantId, vcEarningDaily.userId, vcEarningDaily.assetId, vcEarningDaily.date],
            set: { totalEarned: total },
          })
          .run();
      },
    );
    return true;
  }

  private async _dropSession(session: SessionRow): Promise<void> {
    await this._ledger.transact((unit) =>
      unit.executor.delete(vcSessions).where(eq(vcSessions.id, session.id)).run(),
    );
    this._logger.debug({ tenantId: session.tenantId, userId: session.userId }, "Voice session dropped");
  }

  private _rateFor(exec: Executor, tenantId: TenantId, categoryId: string): RateRow | undefined {
    return exec
      .select()
      .from(vcEarningRates)
      .where(and(eq(vcEarningRates.tenantId, tenantId), eq(vcEarningRates.categoryId, categoryId)))
      .get();
  }
}

function toSession(row: SessionRow): VoiceSession {
  return {
    tenantId: row.tenantId,
    userId: row.userId,
    channelId: row.channelId,
    categoryId: row.categoryId,
    startedAt: row.startedAt,
    lastPaidAt: row.lastPaidAt,
  };
}
