/**
 * @guild-ledger/ledger — Account directory.
 *
 * Resolves and lazily creates ledger accounts. Every account has a
 * globally unique durable name, which is also its lookup key:
 *
 *   user:{userId}:{tenantId}
 *   treasury:{tenantId}   burn:{tenantId}   issuance:{tenantId}
 *   bank:{tenantId}       escrow:{tenantId}
 *
 * Rules:
 * - Creation is get-or-create: insert-or-ignore, then read back by name
 * - Concurrent creators never error; exactly one row survives
 * - Accounts are never modified or removed
 */

import { and, eq } from "drizzle-orm";
import type { Account, SystemAccountType, TenantId, UserId } from "@guild-ledger/types";
import type { Executor } from "./database.js";
import { accounts } from "./schema.js";
import type { SystemAccounts } from "./types.js";
import { LedgerError } from "./types.js";

/** Every system role a tenant carries, in creation order. */
export const SYSTEM_ACCOUNT_TYPES: readonly SystemAccountType[] = [
  "treasury",
  "burn",
  "issuance",
  "bank",
  "escrow",
];

export function userAccountName(tenantId: TenantId, userId: UserId): string {
  return `user:${userId}:${tenantId}`;
}

export function systemAccountName(tenantId: TenantId, type: SystemAccountType): string {
  return `${type}:${tenantId}`;
}

/**
 * Account lookups and get-or-create against one executor.
 */
export class AccountDirectory {
  constructor(
    private readonly _exec: Executor,
    private readonly _now: () => Date = () => new Date(),
  ) {}

  /**
   * Idempotently create the tenant's system accounts.
   */
  ensureSystemAccounts(tenantId: TenantId): SystemAccounts {
    const createdAt = this._now().toISOString();
    this._exec
      .insert(accounts)
      .values(
        SYSTEM_ACCOUNT_TYPES.map((type) => ({
          tenantId,
          ownerUserId: null,
          name: systemAccountName(tenantId, type),
          type,
          createdAt,
        })),
      )
      .onConflictDoNothing()
      .run();

    return {
      treasury: this._requireByName(systemAccountName(tenantId, "treasury")),
      burn: this._requireByName(systemAccountName(tenantId, "burn")),
      issuance: this._requireByName(systemAccountName(tenantId, "issuance")),
      bank: this._requireByName(systemAccountName(tenantId, "bank")),
      escrow: this._requireByName(systemAccountName(tenantId, "escrow")),
    };
  }

  /**
   * Idempotently create a user's account for a tenant.
   *
   * @returns the account id
   */
  ensureUserAccount(tenantId: TenantId, userId: UserId): number {
    const name = userAccountName(tenantId, userId);
    this._exec
      .insert(accounts)
      .values({
        tenantId,
        ownerUserId: userId,
        name,
        type: "user",
        createdAt: this._now().toISOString(),
      })
      .onConflictDoNothing()
      .run();

    return this._requireByName(name).id;
  }

  /**
   * Resolve a system role ("treasury", "burn", ...) to its account id.
   * Fails with ACCOUNT_NOT_FOUND when the tenant was never initialized.
   */
  accountIdByName(tenantId: TenantId, logicalName: SystemAccountType): number {
    const account = this.findByName(systemAccountName(tenantId, logicalName));
    if (account === undefined) {
      throw new LedgerError(
        "ACCOUNT_NOT_FOUND",
        `Tenant "${tenantId}" has no ${logicalName} account; ensureSystemAccounts was never called`,
      );
    }
    return account.id;
  }

  getAccount(id: number): Account {
    const account = this.findAccount(id);
    if (account === undefined) {
      throw new LedgerError("ACCOUNT_NOT_FOUND", `Unknown account id ${String(id)}`);
    }
    return account;
  }

  findAccount(id: number): Account | undefined {
    return this._exec.select().from(accounts).where(eq(accounts.id, id)).get();
  }

  findByName(name: string): Account | undefined {
    return this._exec.select().from(accounts).where(eq(accounts.name, name)).get();
  }

  findUserAccount(tenantId: TenantId, userId: UserId): Account | undefined {
    return this.findByName(userAccountName(tenantId, userId));
  }

  listAccounts(tenantId: TenantId): readonly Account[] {
    return this._exec
      .select()
      .from(accounts)
      .where(eq(accounts.tenantId, tenantId))
      .orderBy(accounts.id)
      .all();
  }

  listUserAccounts(tenantId: TenantId): readonly Account[] {
    return this._exec
      .select()
      .from(accounts)
      .where(and(eq(accounts.tenantId, tenantId), eq(accounts.type, "user")))
      .orderBy(accounts.id)
      .all();
  }

  private _requireByName(name: string): Account {
    const account = this.findByName(name);
    if (account === undefined) {
      throw new LedgerError("ACCOUNT_NOT_FOUND", `Account "${name}" missing after insert`);
    }
    return account;
  }
}
