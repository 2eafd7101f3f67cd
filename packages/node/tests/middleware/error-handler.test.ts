/**
 * Tests for error handler middleware.
 *
 * Verifies report errors are mapped to the correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { z } from "zod";
import { ReportError } from "@ledgerview/ledger";
import type { ReportErrorCode } from "@ledgerview/ledger";
import { createErrorHandler, STATUS_MAP } from "../../src/middleware/error-handler.js";
import type { AppEnv } from "../../src/types/api-contract.js";

function appThrowing(error: Error, logged: string[] = []): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.use("*", async (c, next) => {
    c.set("requestId", "req-1");
    await next();
  });
  app.onError(createErrorHandler((err, requestId) => logged.push(`${requestId ?? "-"}: ${err.message}`)));
  app.get("/boom", () => {
    throw error;
  });
  return app;
}

describe("error handler", () => {
  it.each<[ReportErrorCode, number]>([
    ["NOT_FOUND", 404],
    ["INVALID_RANGE", 400],
    ["INVALID_DATE", 400],
    ["INVALID_AMOUNT", 400],
    ["INVALID_POLICY", 400],
    ["INCONSISTENT_DATA", 422],
    ["STORAGE_ERROR", 503],
    ["CANCELLED", 499],
  ])("maps %s to %i", async (code, status) => {
    expect(STATUS_MAP[code]).toBe(status);

    const res = await appThrowing(new ReportError(code, "failed", { companyId: "c1" })).request("/boom");
    expect(res.status).toBe(status);
    expect(await res.json()).toEqual({
      error: { code, message: "failed", details: { companyId: "c1" } },
    });
  });

  it("maps Zod failures to VALIDATION_ERROR", async () => {
    const result = z.object({ limit: z.number() }).safeParse({ limit: "x" });
    if (result.success) throw new Error("expected a validation failure");

    const res = await appThrowing(result.error).request("/boom");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Invalid query parameters",
        details: { issues: [{ path: "limit", message: "Expected number, received string" }] },
      },
    });
  });

  it("hides unexpected errors behind a 500 and logs them", async () => {
    const logged: string[] = [];
    const res = await appThrowing(new Error("secret internals"), logged).request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
    expect(logged).toEqual(["req-1: secret internals"]);
  });
});
