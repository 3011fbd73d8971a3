/**
 * @guild-ledger/economy — Auto-rewards.
 *
 * A channel can carry one trigger message. The first time a user posts
 * exactly that message (surrounding whitespace ignored), the treasury pays
 * them the configured reward. The claim row and the payout commit in the
 * same unit; the unique (config, user) claim index and an idempotency key
 * on the payout both make a second claim impossible.
 */

import { and, eq } from "drizzle-orm";
import type { Logger } from "pino";
import type { Asset, TenantId, UserId } from "@guild-ledger/types";
import type { Executor, Ledger, TransactionFactory } from "@guild-ledger/ledger";
import {
  LedgerError,
  formatAmount,
  isLedgerError,
  isUniqueViolation,
  parseAmount,
  parsePositiveAmount,
  toMoney,
} from "@guild-ledger/ledger";
import { autoRewardClaims, autoRewardConfigs } from "./schema.js";
import type { AutoRewardConfig, AutoRewardStats, EconomyDeps, RewardOutcome } from "./types.js";
import { ECONOMY_KINDS, EconomyError } from "./types.js";

type ConfigRow = typeof autoRewardConfigs.$inferSelect;

export interface ConfigureRewardRequest {
  readonly tenantId: TenantId;
  readonly channelId: string;
  readonly triggerMessage: string;
  readonly rewardAmount: string;
  readonly symbol: string;
  readonly createdBy?: UserId | undefined;
}

export interface IncomingMessage {
  readonly tenantId: TenantId;
  readonly channelId: string;
  readonly userId: UserId;
  readonly content: string;
}

export class AutoRewardService {
  private readonly _factory: TransactionFactory;
  private readonly _ledger: Ledger;
  private readonly _db: Executor;
  private readonly _logger: Logger;

  constructor(deps: EconomyDeps) {
    this._factory = deps.factory;
    this._ledger = deps.factory.ledger;
    this._db = this._ledger.db;
    this._logger = deps.logger.child({ component: "auto-rewards" });
  }

  /**
   * Create or replace the channel's reward. Replacing keeps earlier claims.
   */
  async configure(request: ConfigureRewardRequest): Promise<AutoRewardConfig> {
    const asset = this._ledger.getAsset(request.tenantId, request.symbol);
    const trigger = request.triggerMessage.trim();
    if (trigger === "") {
      throw new EconomyError("INVALID_CONFIG", "Trigger message must not be empty");
    }
    const reward = formatAmount(parsePositiveAmount(request.rewardAmount, asset.decimals), asset.decimals);
    const now = this._ledger.now().toISOString();

    const row = await this._ledger.transact((unit) =>
      unit.executor
        .insert(autoRewardConfigs)
        .values({
          tenantId: request.tenantId,
          channelId: request.channelId,
          triggerMessage: trigger,
          rewardAmount: reward,
          assetId: asset.id,
          enabled: true,
          createdBy: request.createdBy ?? null,
          createdAt: now,
        })
        .onConflictDoUpdate({
          target: [autoRewardConfigs.tenantId, autoRewardConfigs.channelId],
          set: { triggerMessage: trigger, rewardAmount: reward, assetId: asset.id, enabled: true },
        })
        .returning()
        .get(),
    );

    this._logger.info(
      { tenantId: request.tenantId, channelId: request.channelId, reward, symbol: asset.symbol },
      "Auto-reward configured",
    );
    return this._toConfig(row, asset);
  }

  async setEnabled(tenantId: TenantId, channelId: string, enabled: boolean): Promise<AutoRewardConfig> {
    const row = await this._ledger.transact((unit) =>
      unit.executor
        .update(autoRewardConfigs)
        .set({ enabled })
        .where(and(eq(autoRewardConfigs.tenantId, tenantId), eq(autoRewardConfigs.channelId, channelId)))
        .returning()
        .get(),
    );
    if (row === undefined) {
      throw notConfigured(tenantId, channelId);
    }
    return this._toConfig(row, this._ledger.getAssetById(row.assetId));
  }

  /**
   * Delete the channel's reward together with its claim history.
   */
  async remove(tenantId: TenantId, channelId: string): Promise<void> {
    await this._ledger.transact((unit) => {
      const row = findConfig(unit.executor, tenantId, channelId);
      if (row === undefined) {
        throw notConfigured(tenantId, channelId);
      }
      unit.executor.delete(autoRewardClaims).where(eq(autoRewardClaims.configId, row.id)).run();
      unit.executor.delete(autoRewardConfigs).where(eq(autoRewardConfigs.id, row.id)).run();
    });
    this._logger.info({ tenantId, channelId }, "Auto-reward removed");
  }

  list(tenantId: TenantId): readonly AutoRewardConfig[] {
    return this._db
      .select()
      .from(autoRewardConfigs)
      .where(eq(autoRewardConfigs.tenantId, tenantId))
      .orderBy(autoRewardConfigs.id)
      .all()
      .map((row) => this._toConfig(row, this._ledger.getAssetById(row.assetId)));
  }

  /**
   * Claim count and total paid at the current reward amount's asset.
   */
  stats(tenantId: TenantId, channelId: string): AutoRewardStats {
    const row = findConfig(this._db, tenantId, channelId);
    if (row === undefined) {
      throw notConfigured(tenantId, channelId);
    }
    const asset = this._ledger.getAssetById(row.assetId);
    const claims = this._db
      .select({ txId: autoRewardClaims.txId })
      .from(autoRewardClaims)
      .where(eq(autoRewardClaims.configId, row.id))
      .all();

    let total = 0n;
    for (const claim of claims) {
      const credit = this._ledger
        .entriesForTransaction(claim.txId)
        .find((entry) => entry.assetId === asset.id && !entry.amount.startsWith("-"));
      total += credit === undefined ? 0n : parseAmount(credit.amount, asset.decimals);
    }
    return { claims: claims.length, totalPaid: toMoney(total, asset) };
  }

  /**
   * Pay the reward if `content` is the channel's trigger and the user has
   * not claimed it before.
   */
  async handleMessage(message: IncomingMessage): Promise<RewardOutcome> {
    const config = findConfig(this._db, message.tenantId, message.channelId);
    if (config === undefined) {
      return { status: "no_config" };
    }
    if (!config.enabled) {
      return { status: "disabled" };
    }
    if (message.content.trim() !== config.triggerMessage) {
      return { status: "no_match" };
    }
    if (this._hasClaimed(config.id, message.userId)) {
      return { status: "already_claimed" };
    }

    const asset = this._ledger.getAssetById(config.assetId);
    const user = await this._ledger.ensureUserAccount(message.tenantId, message.userId);
    const treasury = this._ledger.accountIdByName(message.tenantId, "treasury");

    try {
      const result = await this._factory.execute(
        {
          tenantId: message.tenantId,
          kind: ECONOMY_KINDS.autoReward,
          creator: message.userId,
          idempotencyKey: `${String(config.id)}:${message.userId}`,
          reference: `channel ${message.channelId}`,
          legs: [
            { accountId: treasury, assetId: asset.id, amount: `-${config.rewardAmount}` },
            { accountId: user, assetId: asset.id, amount: config.rewardAmount },
          ],
        },
        (unit, txId) => {
          insertClaim(unit.executor, {
            configId: config.id,
            tenantId: message.tenantId,
            userId: message.userId,
            txId,
            claimedAt: this._ledger.now().toISOString(),
          });
        },
      );
      if (result.replayed) {
        return { status: "already_claimed" };
      }

      this._logger.info(
        { tenantId: message.tenantId, channelId: message.channelId, userId: message.userId, txId: result.transactionId },
        "Auto-reward paid",
      );
      return {
        status: "paid",
        transactionId: result.transactionId,
        amount: toMoney(parseAmount(config.rewardAmount, asset.decimals), asset),
      };
    } catch (err: unknown) {
      if (isLedgerError(err, "DUPLICATE_CLAIM")) {
        return { status: "already_claimed" };
      }
      throw err;
    }
  }

  private _hasClaimed(configId: number, userId: UserId): boolean {
    const row = this._db
      .select({ id: autoRewardClaims.id })
      .from(autoRewardClaims)
      .where(and(eq(autoRewardClaims.configId, configId), eq(autoRewardClaims.userId, userId)))
      .get();
    return row !== undefined;
  }

  private _toConfig(row: ConfigRow, asset: Asset): AutoRewardConfig {
    return {
      id: row.id,
      tenantId: row.tenantId,
      channelId: row.channelId,
      triggerMessage: row.triggerMessage,
      reward: toMoney(parseAmount(row.rewardAmount, asset.decimals), asset),
      enabled: row.enabled,
      createdBy: row.createdBy,
      createdAt: row.createdAt,
    };
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

function findConfig(exec: Executor, tenantId: TenantId, channelId: string): ConfigRow | undefined {
  return exec
    .select()
    .from(autoRewardConfigs)
    .where(and(eq(autoRewardConfigs.tenantId, tenantId), eq(autoRewardConfigs.channelId, channelId)))
    .get();
}

function insertClaim(exec: Executor, claim: typeof autoRewardClaims.$inferInsert): void {
  try {
    exec.insert(autoRewardClaims).values(claim).run();
  } catch (err: unknown) {
    if (isUniqueViolation(err)) {
      throw new LedgerError(
        "DUPLICATE_CLAIM",
        `User "${claim.userId}" already claimed reward ${String(claim.configId)}`,
        { cause: err },
      );
    }
    throw err;
  }
}

function notConfigured(tenantId: TenantId, channelId: string): EconomyError {
  return new EconomyError(
    "CONFIG_NOT_FOUND",
    `No auto-reward configured for channel "${channelId}" in tenant "${tenantId}"`,
  );
}
