/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { captureLogger, createTestApp, jsonRequest } from "../setup.js";

describe("loggerMiddleware", () => {
  it("logs one line per request with its details", async () => {
    const { logger, lines } = captureLogger();
    const { app } = createTestApp({ logger });

    await app.request(jsonRequest("/health", "GET", { "X-Request-Id": "log-1" }));

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "GET /health 200",
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "log-1",
    });
  });

  it("logs client errors at warn", async () => {
    const { logger, lines } = captureLogger();
    const { app } = createTestApp({ logger });

    await app.request("/api/v1/companies/nope/ledgers");

    expect(lines.map((l) => [l.level, l.msg])).toEqual([[40, "GET /api/v1/companies/nope/ledgers 404"]]);
  });

  it("can be turned off while keeping report logs", async () => {
    const { logger, lines } = captureLogger();
    const { app } = createTestApp({ logger, logRequests: false });

    await app.request("/health");

    expect(lines).toEqual([]);
  });
});
