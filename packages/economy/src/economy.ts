/**
 * @guild-ledger/economy — Service composition.
 */

import { AutoRewardService } from "./auto-rewards.js";
import { BankService } from "./bank.js";
import { BettingService } from "./betting.js";
import { economyAssetDependent } from "./dependents.js";
import { MonthlyAllowanceService } from "./monthly-allowance.js";
import { RoleShopService } from "./role-purchases.js";
import type { EconomyDeps } from "./types.js";
import { VoiceEarningService } from "./vc-earning.js";

export interface EconomyOptions {
  /** Minutes east of UTC for paydays and daily totals. Default: 540 */
  readonly offsetMinutes?: number | undefined;
  /** Default: 28 */
  readonly payday?: number | undefined;
}

export interface Economy {
  readonly bank: BankService;
  readonly autoRewards: AutoRewardService;
  readonly roleShop: RoleShopService;
  readonly allowance: MonthlyAllowanceService;
  readonly voice: VoiceEarningService;
  readonly betting: BettingService;
}

/**
 * Build every subledger service over one factory and register the
 * economy's tables for asset deletion.
 */
export function createEconomy(deps: EconomyDeps, options: EconomyOptions = {}): Economy {
  deps.factory.ledger.registerDependent(economyAssetDependent);
  return {
    bank: new BankService(deps),
    autoRewards: new AutoRewardService(deps),
    roleShop: new RoleShopService(deps),
    allowance: new MonthlyAllowanceService(deps, options),
    voice: new VoiceEarningService(deps, options),
    betting: new BettingService(deps),
  };
}
