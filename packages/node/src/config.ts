/**
 * @guild-ledger/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { RetryConfig } from "@guild-ledger/ledger";
import { DEFAULT_RETRY_CONFIG } from "@guild-ledger/ledger";

// =============================================================================
// Schema
// =============================================================================

const intervalMs = (fallback: number) => z.coerce.number().int().min(1000).default(fallback);

export const ConfigSchema = z.object({
  DATABASE_PATH: z.string().min(1).default("data/guild-ledger.db"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Calendar
  TIMEZONE_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(540),

  // Ledger
  TREASURY_REFILL_AMOUNT: z
    .string()
    .regex(/^[1-9]\d*$/, "must be a positive whole number")
    .default("1000000000"),
  STORAGE_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(5),

  // Schedulers
  ROLE_EXPIRY_INTERVAL_MS: intervalMs(300_000),
  ALLOWANCE_INTERVAL_MS: intervalMs(3_600_000),
  ALLOWANCE_PAYDAY: z.coerce.number().int().min(1).max(28).default(28),
  VC_PAYOUT_INTERVAL_MS: intervalMs(60_000),
  VC_DAILY_RETENTION_DAYS: z.coerce.number().int().min(1).default(7),
  DAILY_PRUNE_INTERVAL_MS: intervalMs(86_400_000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

export function retryConfigFrom(config: AppConfig): RetryConfig {
  return { ...DEFAULT_RETRY_CONFIG, maxAttempts: config.STORAGE_RETRY_ATTEMPTS };
}
