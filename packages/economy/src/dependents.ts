/**
 * Rows the subledgers hold against an asset. Registered on the ledger so
 * deleteAsset() clears them in the same unit as the asset's postings.
 */

import { and, eq, inArray } from "drizzle-orm";
import type { Asset } from "@guild-ledger/types";
import type { AssetDependent, Executor } from "@guild-ledger/ledger";
import {
  autoRewardClaims,
  autoRewardConfigs,
  bankAccounts,
  bankTransactions,
  bets,
  bettingEvents,
  bettingPlayers,
  monthlyAllowanceHistory,
  monthlyAllowances,
  rolePlans,
  vcEarningDaily,
  vcEarningRates,
} from "./schema.js";

function deleteForAsset(exec: Executor, asset: Asset): Readonly<Record<string, number>> {
  const rewardConfigs = exec
    .select({ id: autoRewardConfigs.id })
    .from(autoRewardConfigs)
    .where(eq(autoRewardConfigs.assetId, asset.id));
  const events = exec
    .select({ id: bettingEvents.id })
    .from(bettingEvents)
    .where(eq(bettingEvents.assetId, asset.id));

  // Children first: claims, bets and players reference their parents.
  return {
    bank_transactions: exec.delete(bankTransactions).where(eq(bankTransactions.assetId, asset.id)).run()
      .changes,
    bank_accounts: exec.delete(bankAccounts).where(eq(bankAccounts.assetId, asset.id)).run().changes,
    auto_reward_claims: exec
      .delete(autoRewardClaims)
      .where(inArray(autoRewardClaims.configId, rewardConfigs))
      .run().changes,
    auto_reward_configs: exec.delete(autoRewardConfigs).where(eq(autoRewardConfigs.assetId, asset.id)).run()
      .changes,
    role_plans: exec
      .delete(rolePlans)
      .where(and(eq(rolePlans.tenantId, asset.tenantId), eq(rolePlans.currencySymbol, asset.symbol)))
      .run().changes,
    monthly_allowance_history: exec
      .delete(monthlyAllowanceHistory)
      .where(eq(monthlyAllowanceHistory.assetId, asset.id))
      .run().changes,
    monthly_allowances: exec.delete(monthlyAllowances).where(eq(monthlyAllowances.assetId, asset.id)).run()
      .changes,
    vc_earning_daily: exec.delete(vcEarningDaily).where(eq(vcEarningDaily.assetId, asset.id)).run().changes,
    vc_earning_rates: exec.delete(vcEarningRates).where(eq(vcEarningRates.assetId, asset.id)).run().changes,
    bets: exec.delete(bets).where(inArray(bets.eventId, events)).run().changes,
    betting_players: exec.delete(bettingPlayers).where(inArray(bettingPlayers.eventId, events)).run().changes,
    betting_events: exec.delete(bettingEvents).where(eq(bettingEvents.assetId, asset.id)).run().changes,
  };
}

export const economyAssetDependent: AssetDependent = {
  name: "economy",
  deleteForAsset,
};
