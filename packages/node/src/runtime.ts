/**
 * @guild-ledger/node — Runtime composition.
 *
 * Opens the database, builds the ledger and the economy services over
 * it, and wires the background jobs:
 *
 *   role-expiry     revoke and delete expired role purchases
 *   allowance       pay monthly allowances on payday
 *   vc-payout       credit one minute of voice time per live session
 *   daily-prune     drop voice daily totals past retention
 */

import type { Logger } from "pino";
import { Ledger, TransactionFactory, openDatabase } from "@guild-ledger/ledger";
import type { LedgerDatabase } from "@guild-ledger/ledger";
import { ECONOMY_MIGRATIONS, createEconomy } from "@guild-ledger/economy";
import type { Economy } from "@guild-ledger/economy";
import { ActionRouter } from "./actions.js";
import type { AppConfig } from "./config.js";
import { retryConfigFrom } from "./config.js";
import type { PlatformGateway } from "./platform.js";
import { PeriodicTask } from "./scheduler.js";

export interface RuntimeOptions {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly gateway: PlatformGateway;
  readonly now?: (() => Date) | undefined;
}

export interface Runtime {
  readonly database: LedgerDatabase;
  readonly ledger: Ledger;
  readonly factory: TransactionFactory;
  readonly economy: Economy;
  readonly actions: ActionRouter;
  readonly tasks: readonly PeriodicTask[];
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createRuntime(options: RuntimeOptions): Runtime {
  const { config, logger, gateway } = options;
  const now = options.now ?? ((): Date => new Date());

  const database = openDatabase({ path: config.DATABASE_PATH, migrations: ECONOMY_MIGRATIONS });
  const ledger = new Ledger({
    db: database.db,
    logger,
    retry: retryConfigFrom(config),
    treasuryRefillAmount: config.TREASURY_REFILL_AMOUNT,
    now,
  });
  const factory = new TransactionFactory(ledger);
  const economy = createEconomy(
    { factory, logger },
    { offsetMinutes: config.TIMEZONE_OFFSET_MINUTES, payday: config.ALLOWANCE_PAYDAY },
  );
  const actions = new ActionRouter({ roleShop: economy.roleShop, gateway, logger });

  const tasks: PeriodicTask[] = [
    new PeriodicTask({
      name: "role-expiry",
      intervalMs: config.ROLE_EXPIRY_INTERVAL_MS,
      run: () => economy.roleShop.sweepExpired(now(), gateway),
      logger,
    }),
    new PeriodicTask({
      name: "allowance",
      intervalMs: config.ALLOWANCE_INTERVAL_MS,
      run: () => economy.allowance.runDue(now(), gateway),
      logger,
    }),
    new PeriodicTask({
      name: "vc-payout",
      intervalMs: config.VC_PAYOUT_INTERVAL_MS,
      run: () => economy.voice.payoutTick(now(), gateway),
      logger,
    }),
    new PeriodicTask({
      name: "daily-prune",
      intervalMs: config.DAILY_PRUNE_INTERVAL_MS,
      run: () => economy.voice.pruneDaily(now(), config.VC_DAILY_RETENTION_DAYS),
      logger,
    }),
  ];

  let started = false;

  return {
    database,
    ledger,
    factory,
    economy,
    actions,
    tasks,

    async start(): Promise<void> {
      if (started) {
        return;
      }
      started = true;
      // Presence is not tracked across restarts.
      await economy.voice.clearSessions();
      for (const task of tasks) {
        task.start();
      }
      logger.info({ database: config.DATABASE_PATH, tasks: tasks.map((t) => t.name) }, "Runtime started");
    },

    async stop(): Promise<void> {
      await Promise.all(tasks.map((task) => task.stop()));
      if (database.sqlite.open) {
        database.close();
      }
      started = false;
      logger.info("Runtime stopped");
    },
  };
}
