/**
 * @guild-ledger/node — Entry point.
 *
 * Loads config, starts the runtime with the offline gateway, and handles
 * graceful shutdown.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createOfflineGateway } from "./platform.js";
import { createRuntime } from "./runtime.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  if (config.DATABASE_PATH !== ":memory:") {
    mkdirSync(dirname(config.DATABASE_PATH), { recursive: true });
  }

  const runtime = createRuntime({ config, logger, gateway: createOfflineGateway(logger) });
  await runtime.start();

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    await runtime.stop();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
