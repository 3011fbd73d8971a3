/**
 * @guild-ledger/node — Chat platform boundary.
 *
 * The ledger never talks to the chat platform itself. Role changes,
 * role rosters and voice presence come in through this gateway.
 */

import type { Logger } from "pino";
import type { MemberDirectory, RoleGateway, VoicePresence } from "@guild-ledger/economy";
import type { TenantId, UserId } from "@guild-ledger/types";

export interface PlatformGateway extends RoleGateway, MemberDirectory, VoicePresence {
  addRole(tenantId: TenantId, userId: UserId, roleId: string): Promise<void>;
}

/**
 * Gateway for running without a platform connection: role changes are
 * logged, rosters are empty and nobody is in voice.
 */
export function createOfflineGateway(logger: Logger): PlatformGateway {
  const log = logger.child({ component: "offline-gateway" });
  return {
    addRole: async (tenantId, userId, roleId) => {
      log.info({ tenantId, userId, roleId }, "Role grant requested");
    },
    removeRole: async (tenantId, userId, roleId) => {
      log.info({ tenantId, userId, roleId }, "Role removal requested");
    },
    membersWithRole: async () => [],
    currentChannel: async () => undefined,
  };
}
