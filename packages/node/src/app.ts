/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts: tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { ReportEngineOptions } from "@ledgerview/reports";
import type { TransactionStore } from "@ledgerview/store";
import type { AppEnv } from "./types/api-contract.js";
import { ReportService } from "./services/report-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createCompanyRoutes } from "./routes/companies.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly store: TransactionStore;
  /** Decimals, date order, settlement and inconsistency policies */
  readonly engine?: ReportEngineOptions;
  /** Request and report logger. Default: a silent pino logger */
  readonly logger?: Logger;
  /** Log one line per request. Default: true when a logger is given */
  readonly logRequests?: boolean;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ReportService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const service = new ReportService(options.store, logger, options.engine);
  const logRequests = options.logRequests ?? options.logger !== undefined;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (logRequests) {
    app.use("*", loggerMiddleware(logger));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(
    createErrorHandler((err, requestId) => {
      logger.error({ err, requestId }, "Unhandled error");
    }),
  );

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/api/v1/companies", createCompanyRoutes());

  return { app, service };
}
