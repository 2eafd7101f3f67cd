/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(now: () => Date = () => new Date()): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      settlementPolicy: c.get("service").engine.settlementPolicyName,
      timestamp: now().toISOString(),
    });
  });

  return routes;
}
