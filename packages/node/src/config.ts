/**
 * @ledgerview/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Books
  DATA_FILE: z.string().min(1).default("./data/ledgerview.jsonl"),
  AMOUNT_DECIMALS: z.coerce.number().int().min(0).max(6).default(2),
  DAY_FIRST: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("true"),

  // Report behaviour
  SETTLEMENT_POLICY: z
    .enum(["fifo-on-account", "strict-reference"])
    .default("fifo-on-account"),
  INCONSISTENCY_POLICY: z.enum(["report", "fail"]).default("report"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
