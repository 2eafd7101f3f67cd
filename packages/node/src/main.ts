/**
 * @ledgerview/node — Entry point.
 *
 * Loads config, opens the JSONL books, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { JsonlTransactionStore } from "@ledgerview/store";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const store = new JsonlTransactionStore({ filePath: config.DATA_FILE });
  for (const skipped of store.skipped) {
    logger.warn({ file: store.filePath, line: skipped.line, reason: skipped.reason }, "Skipped data line");
  }
  logger.info({ file: store.filePath, companies: store.companyCount }, "Books loaded");

  const { app } = createApp({
    store,
    logger,
    engine: {
      decimals: config.AMOUNT_DECIMALS,
      dayFirst: config.DAY_FIRST,
      settlementPolicy: config.SETTLEMENT_POLICY,
      inconsistencyPolicy: config.INCONSISTENCY_POLICY,
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, settlementPolicy: config.SETTLEMENT_POLICY },
    "Ledgerview node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Server close failed");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
