/**
 * @guild-ledger/economy — Betting pools.
 *
 * A tenant runs at most one open event at a time. Users stake on
 * registered players; stakes move from the user's wallet into the
 * tenant's escrow account. Settlement pays every bet on the winner
 * floor(stake × odds) whole units out of escrow. The treasury covers a
 * shortfall or keeps the remainder, so escrow always returns to zero.
 *
 * Odds are pool / stake-on-target rounded half-even to two places, never
 * below 1.10, and 2.00 while either side is empty.
 */

import { and, eq, sql } from "drizzle-orm";
import type { Logger } from "pino";
import type { Asset, TenantId, UserId } from "@guild-ledger/types";
import type { Executor, Ledger, TransactionFactory, TransactionLeg } from "@guild-ledger/ledger";
import {
  LedgerError,
  formatAmount,
  isUniqueViolation,
  parseAmount,
  parsePositiveAmount,
  toMoney,
} from "@guild-ledger/ledger";
import { bets, bettingEvents, bettingPlayers } from "./schema.js";
import type {
  Bet,
  BettingEvent,
  Cancellation,
  EconomyDeps,
  Payout,
  PlayerOdds,
  Refund,
  Settlement,
} from "./types.js";
import { ECONOMY_KINDS, EconomyError, isEconomyError } from "./types.js";

/** Odds in hundredths. */
export const MIN_ODDS = 110n;
export const DEFAULT_ODDS = 200n;

/** Reads a close may take before giving up on a busy event. */
const CLOSE_ATTEMPTS = 5;

export interface OpenEventRequest {
  readonly tenantId: TenantId;
  readonly name: string;
  readonly symbol: string;
  readonly createdBy?: UserId | undefined;
  readonly players?: readonly UserId[] | undefined;
}

export interface PlaceBetRequest {
  readonly eventId: number;
  readonly userId: UserId;
  readonly targetUserId: UserId;
  readonly amount: string;
}

/**
 * max(1.10, round_half_even(pool / onTarget, 2)) in hundredths;
 * 2.00 when either side is zero.
 */
export function computeOdds(pool: bigint, onTarget: bigint): bigint {
  if (pool <= 0n || onTarget <= 0n) {
    return DEFAULT_ODDS;
  }
  const numerator = pool * 100n;
  let quotient = numerator / onTarget;
  const twiceRemainder = (numerator % onTarget) * 2n;
  if (twiceRemainder > onTarget || (twiceRemainder === onTarget && quotient % 2n === 1n)) {
    quotient += 1n;
  }
  return quotient < MIN_ODDS ? MIN_ODDS : quotient;
}

/**
 * floor(stake × odds) in whole units, returned at the asset's scale.
 */
export function payoutFor(stake: bigint, oddsHundredths: bigint, decimals: number): bigint {
  const unit = 10n ** BigInt(decimals);
  return ((stake * oddsHundredths) / 100n / unit) * unit;
}

export function formatOdds(hundredths: bigint): string {
  return formatAmount(hundredths, 2);
}

export class BettingService {
  private readonly _factory: TransactionFactory;
  private readonly _ledger: Ledger;
  private readonly _db: Executor;
  private readonly _logger: Logger;

  constructor(deps: EconomyDeps) {
    this._factory = deps.factory;
    this._ledger = deps.factory.ledger;
    this._db = this._ledger.db;
    this._logger = deps.logger.child({ component: "betting" });
  }

  // ─── Events and players ────────────────────────────────────────────────

  async openEvent(request: OpenEventRequest): Promise<BettingEvent> {
    const asset = this._ledger.getAsset(request.tenantId, request.symbol);
    let event: BettingEvent;
    try {
      event = await this._ledger.transact((unit) => {
        const row = unit.executor
          .insert(bettingEvents)
          .values({
            tenantId: request.tenantId,
            name: request.name.trim(),
            assetId: asset.id,
            status: "open",
            createdBy: request.createdBy ?? null,
            createdAt: this._ledger.now().toISOString(),
          })
          .returning()
          .get();
        for (const userId of new Set(request.players ?? [])) {
          unit.executor.insert(bettingPlayers).values({ eventId: row.id, userId }).run();
        }
        return row;
      });
    } catch (err: unknown) {
      if (isUniqueViolation(err)) {
        throw new EconomyError("EVENT_EXISTS", `Tenant "${request.tenantId}" already has an open event`, {
          cause: err,
        });
      }
      throw err;
    }
    this._logger.info({ tenantId: request.tenantId, eventId: event.id, name: event.name }, "Betting event opened");
    return event;
  }

  getEvent(eventId: number): BettingEvent {
    const event = this._db.select().from(bettingEvents).where(eq(bettingEvents.id, eventId)).get();
    if (event === undefined) {
      throw new EconomyError("EVENT_NOT_FOUND", `Betting event ${String(eventId)} not found`);
    }
    return event;
  }

  findOpenEvent(tenantId: TenantId): BettingEvent | undefined {
    return this._db
      .select()
      .from(bettingEvents)
      .where(and(eq(bettingEvents.tenantId, tenantId), eq(bettingEvents.status, "open")))
      .get();
  }

  async addPlayer(eventId: number, userId: UserId): Promise<void> {
    await this._ledger.transact((unit) => {
      requireOpen(unit.executor, eventId);
      unit.executor.insert(bettingPlayers).values({ eventId, userId }).onConflictDoNothing().run();
    });
  }

  /**
   * Only players nobody has bet on can be removed.
   */
  async removePlayer(eventId: number, userId: UserId): Promise<void> {
    await this._ledger.transact((unit) => {
      const exec = unit.executor;
      requireOpen(exec, eventId);
      requirePlayer(exec, eventId, userId);
      const backed = exec
        .select({ count: sql<number>`count(*)` })
        .from(bets)
        .where(and(eq(bets.eventId, eventId), eq(bets.targetUserId, userId)))
        .get();
      if (backed !== undefined && backed.count > 0) {
        throw new EconomyError(
          "PLAYER_HAS_BETS",
          `Player "${userId}" already has ${String(backed.count)} bet(s) on them`,
        );
      }
      exec
        .delete(bettingPlayers)
        .where(and(eq(bettingPlayers.eventId, eventId), eq(bettingPlayers.userId, userId)))
        .run();
    });
  }

  listPlayers(eventId: number): readonly UserId[] {
    return this._db
      .select({ userId: bettingPlayers.userId })
      .from(bettingPlayers)
      .where(eq(bettingPlayers.eventId, eventId))
      .orderBy(bettingPlayers.id)
      .all()
      .map((row) => row.userId);
  }

  // ─── Bets ──────────────────────────────────────────────────────────────

  /**
   * Move the stake into escrow and record the bet. Stakes are truncated
   * to the asset's precision.
   */
  async placeBet(request: PlaceBetRequest): Promise<Bet> {
    const event = this.getEvent(request.eventId);
    if (event.status !== "open") {
      throw closed(event);
    }
    requirePlayer(this._db, event.id, request.targetUserId);

    const asset = this._ledger.getAssetById(event.assetId);
    const scaled = parsePositiveAmount(request.amount, asset.decimals, "down");
    const amount = formatAmount(scaled, asset.decimals);
    const user = await this._ledger.ensureUserAccount(event.tenantId, request.userId);
    const escrow = this._ledger.accountIdByName(event.tenantId, "escrow");

    const result = await this._factory.execute(
      {
        tenantId: event.tenantId,
        kind: ECONOMY_KINDS.betStake,
        creator: request.userId,
        reference: `event ${String(event.id)} on ${request.targetUserId}`,
        legs: [
          { accountId: user, assetId: asset.id, amount: `-${amount}` },
          { accountId: escrow, assetId: asset.id, amount },
        ],
      },
      (unit, txId) => {
        requireOpen(unit.executor, event.id);
        return unit.executor
          .insert(bets)
          .values({
            eventId: event.id,
            userId: request.userId,
            targetUserId: request.targetUserId,
            amount,
            txId,
            placedAt: this._ledger.now().toISOString(),
          })
          .returning()
          .get();
      },
    );
    if (result.value === undefined) {
      throw new LedgerError("UNKNOWN_TRANSACTION", `Transaction ${String(result.transactionId)} recorded no bet`);
    }
    this._logger.info(
      { tenantId: event.tenantId, eventId: event.id, userId: request.userId, target: request.targetUserId, amount },
      "Bet placed",
    );
    return result.value;
  }

  listBets(eventId: number): readonly Bet[] {
    return this._db.select().from(bets).where(eq(bets.eventId, eventId)).orderBy(bets.id).all();
  }

  /**
   * Current odds on one player, e.g. "1.85".
   */
  odds(eventId: number, targetUserId: UserId): string {
    const event = this.getEvent(eventId);
    const asset = this._ledger.getAssetById(event.assetId);
    const stakes = this._stakes(eventId, asset);
    return formatOdds(computeOdds(stakes.pool, stakes.byTarget.get(targetUserId) ?? 0n));
  }

  oddsTable(eventId: number): readonly PlayerOdds[] {
    const event = this.getEvent(eventId);
    const asset = this._ledger.getAssetById(event.assetId);
    const stakes = this._stakes(eventId, asset);
    return this.listPlayers(eventId).map((userId) => {
      const onTarget = stakes.byTarget.get(userId) ?? 0n;
      return {
        userId,
        stake: toMoney(onTarget, asset),
        odds: formatOdds(computeOdds(stakes.pool, onTarget)),
      };
    });
  }

  // ─── Closing ───────────────────────────────────────────────────────────

  /**
   * Close the event and pay everyone who backed the winner, in one unit.
   */
  async settle(eventId: number, winnerUserId: UserId): Promise<Settlement> {
    return this._closeWithRecompute(eventId, () => this._settleOnce(eventId, winnerUserId));
  }

  /**
   * Close the event and return every stake to its bettor.
   */
  async cancel(eventId: number): Promise<Cancellation> {
    return this._closeWithRecompute(eventId, () => this._cancelOnce(eventId));
  }

  // ─── Internals ─────────────────────────────────────────────────────────

  /**
   * Payouts are computed from a read taken before the closing unit. A bet
   * that lands in between fails that unit with STAKES_CHANGED, and the
   * close starts over from a fresh read.
   */
  private async _closeWithRecompute<T>(eventId: number, close: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await close();
      } catch (err: unknown) {
        if (!isEconomyError(err, "STAKES_CHANGED") || attempt >= CLOSE_ATTEMPTS) {
          throw err;
        }
        this._logger.debug({ eventId, attempt }, "Bets changed while closing; recomputing");
      }
    }
  }

  private async _settleOnce(eventId: number, winnerUserId: UserId): Promise<Settlement> {
    const event = this.getEvent(eventId);
    if (event.status !== "open") {
      throw closed(event);
    }
    requirePlayer(this._db, eventId, winnerUserId);

    const asset = this._ledger.getAssetById(event.assetId);
    const stakes = this._stakes(eventId, asset);
    const winning = stakes.rows.filter((bet) => bet.targetUserId === winnerUserId);
    if (winning.length === 0) {
      throw new EconomyError("NO_WINNING_BETS", `Nobody bet on "${winnerUserId}" in event ${String(eventId)}`);
    }

    const odds = computeOdds(stakes.pool, stakes.byTarget.get(winnerUserId) ?? 0n);
    const payouts: Payout[] = [];
    const credits = new Map<UserId, bigint>();
    let totalPaid = 0n;
    for (const bet of winning) {
      const stake = parseAmount(bet.amount, asset.decimals);
      const payout = payoutFor(stake, odds, asset.decimals);
      payouts.push({ userId: bet.userId, stake: toMoney(stake, asset), payout: toMoney(payout, asset) });
      credits.set(bet.userId, (credits.get(bet.userId) ?? 0n) + payout);
      totalPaid += payout;
    }
    const treasuryNet = stakes.pool - totalPaid;

    const escrow = this._ledger.accountIdByName(event.tenantId, "escrow");
    const treasury = this._ledger.accountIdByName(event.tenantId, "treasury");
    const legs: TransactionLeg[] = [
      { accountId: escrow, assetId: asset.id, amount: formatAmount(-stakes.pool, asset.decimals) },
    ];
    for (const [userId, credit] of credits) {
      if (credit > 0n) {
        const account = await this._ledger.ensureUserAccount(event.tenantId, userId);
        legs.push({ accountId: account, assetId: asset.id, amount: formatAmount(credit, asset.decimals) });
      }
    }
    if (treasuryNet !== 0n) {
      legs.push({ accountId: treasury, assetId: asset.id, amount: formatAmount(treasuryNet, asset.decimals) });
    }

    const result = await this._factory.execute(
      {
        tenantId: event.tenantId,
        kind: ECONOMY_KINDS.betSettlement,
        reference: `event ${String(eventId)} won by ${winnerUserId}`,
        legs,
      },
      (unit) => {
        requireSameBets(unit.executor, eventId, stakes.rows);
        return this._close(unit.executor, event, "settled", winnerUserId);
      },
    );

    this._logger.info(
      {
        tenantId: event.tenantId,
        eventId,
        winner: winnerUserId,
        odds: formatOdds(odds),
        pool: formatAmount(stakes.pool, asset.decimals),
        paid: formatAmount(totalPaid, asset.decimals),
      },
      "Betting event settled",
    );
    return {
      event: result.value ?? event,
      odds: formatOdds(odds),
      pool: toMoney(stakes.pool, asset),
      payouts,
      treasuryNet: toMoney(treasuryNet, asset),
      transactionId: result.transactionId,
    };
  }

  private async _cancelOnce(eventId: number): Promise<Cancellation> {
    const event = this.getEvent(eventId);
    if (event.status !== "open") {
      throw closed(event);
    }
    const asset = this._ledger.getAssetById(event.assetId);
    const stakes = this._stakes(eventId, asset);

    if (stakes.pool === 0n) {
      const cancelled = await this._ledger.transact((unit) => {
        requireSameBets(unit.executor, eventId, stakes.rows);
        return this._close(unit.executor, event, "cancelled", null);
      });
      this._logger.info({ tenantId: event.tenantId, eventId }, "Betting event cancelled");
      return { event: cancelled, refunds: [], transactionId: null };
    }

    const escrow = this._ledger.accountIdByName(event.tenantId, "escrow");
    const legs: TransactionLeg[] = [
      { accountId: escrow, assetId: asset.id, amount: formatAmount(-stakes.pool, asset.decimals) },
    ];
    const refunds: Refund[] = [];
    for (const [userId, staked] of stakes.byUser) {
      const account = await this._ledger.ensureUserAccount(event.tenantId, userId);
      legs.push({ accountId: account, assetId: asset.id, amount: formatAmount(staked, asset.decimals) });
      refunds.push({ userId, amount: toMoney(staked, asset) });
    }

    const result = await this._factory.execute(
      {
        tenantId: event.tenantId,
        kind: ECONOMY_KINDS.betRefund,
        reference: `event ${String(eventId)} cancelled`,
        legs,
      },
      (unit) => {
        requireSameBets(unit.executor, eventId, stakes.rows);
        return this._close(unit.executor, event, "cancelled", null);
      },
    );
    this._logger.info(
      { tenantId: event.tenantId, eventId, refunded: formatAmount(stakes.pool, asset.decimals) },
      "Betting event cancelled",
    );
    return { event: result.value ?? event, refunds, transactionId: result.transactionId };
  }

  private _stakes(
    eventId: number,
    asset: Asset,
  ): {
    readonly rows: readonly Bet[];
    readonly pool: bigint;
    readonly byTarget: ReadonlyMap<UserId, bigint>;
    readonly byUser: ReadonlyMap<UserId, bigint>;
  } {
    const rows = this.listBets(eventId);
    const byTarget = new Map<UserId, bigint>();
    const byUser = new Map<UserId, bigint>();
    let pool = 0n;
    for (const bet of rows) {
      const stake = parseAmount(bet.amount, asset.decimals);
      pool += stake;
      byTarget.set(bet.targetUserId, (byTarget.get(bet.targetUserId) ?? 0n) + stake);
      byUser.set(bet.userId, (byUser.get(bet.userId) ?? 0n) + stake);
    }
    return { rows, pool, byTarget, byUser };
  }

  /**
   * Flip an open event to its final status; fails if another closer won.
   */
  private _close(
    exec: Executor,
    event: BettingEvent,
    status: "settled" | "cancelled",
    winnerUserId: UserId | null,
  ): BettingEvent {
    const row = exec
      .update(bettingEvents)
      .set({ status, winnerUserId, closedAt: this._ledger.now().toISOString() })
      .where(and(eq(bettingEvents.id, event.id), eq(bettingEvents.status, "open")))
      .returning()
      .get();
    if (row === undefined) {
      throw closed(event);
    }
    return row;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

/**
 * Bets are append-only while the event is open, so count and last id
 * identify the set a payout was computed from.
 */
function requireSameBets(exec: Executor, eventId: number, seen: readonly Bet[]): void {
  const current = exec
    .select({ count: sql<number>`count(*)`, lastId: sql<number | null>`max(${bets.id})` })
    .from(bets)
    .where(eq(bets.eventId, eventId))
    .get();
  const lastSeen = seen[seen.length - 1]?.id ?? null;
  if (current === undefined || current.count !== seen.length || current.lastId !== lastSeen) {
    throw new EconomyError(
      "STAKES_CHANGED",
      `Bets on event ${String(eventId)} changed while it was being closed`,
    );
  }
}

function requireOpen(exec: Executor, eventId: number): BettingEvent {
  const event = exec.select().from(bettingEvents).where(eq(bettingEvents.id, eventId)).get();
  if (event === undefined) {
    throw new EconomyError("EVENT_NOT_FOUND", `Betting event ${String(eventId)} not found`);
  }
  if (event.status !== "open") {
    throw closed(event);
  }
  return event;
}

function requirePlayer(exec: Executor, eventId: number, userId: UserId): void {
  const row = exec
    .select({ id: bettingPlayers.id })
    .from(bettingPlayers)
    .where(and(eq(bettingPlayers.eventId, eventId), eq(bettingPlayers.userId, userId)))
    .get();
  if (row === undefined) {
    throw new EconomyError("NOT_A_PLAYER", `"${userId}" is not a player in event ${String(eventId)}`);
  }
}

function closed(event: BettingEvent): EconomyError {
  return new EconomyError("EVENT_CLOSED", `Betting event ${String(event.id)} is already ${event.status}`);
}
