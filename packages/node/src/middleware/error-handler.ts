/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps ReportError codes to HTTP status codes and Zod failures to
 * VALIDATION_ERROR. Anything else is a 500 with no internal detail.
 */

import type { Context, ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { ZodError } from "zod";
import { ReportError } from "@ledgerview/ledger";
import type { ReportErrorCode } from "@ledgerview/ledger";
import type { AppEnv } from "../types/api-contract.js";
import type { ErrorEnvelope } from "../types/error.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP: Readonly<Record<ReportErrorCode, number>> = {
  NOT_FOUND: 404,
  INVALID_RANGE: 400,
  INVALID_DATE: 400,
  INVALID_AMOUNT: 400,
  INVALID_POLICY: 400,
  INCONSISTENT_DATA: 422,
  // Client closed request
  CANCELLED: 499,
  STORAGE_ERROR: 503,
};

/**
 * Called for errors that become a 500, so they are never lost.
 */
export type InternalErrorLog = (err: Error, requestId: string | undefined) => void;

function jsonResponse(envelope: ErrorEnvelope, status: number): Response {
  return new Response(JSON.stringify(envelope), {
    status,
    headers: { "Content-Type": "application/json; charset=UTF-8" },
  });
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Build the global error handler. Registered as Hono's onError handler.
 */
export function createErrorHandler(logInternal?: InternalErrorLog): ErrorHandler<AppEnv> {
  return (err: Error, c: Context<AppEnv>): Response => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    if (err instanceof ReportError) {
      return jsonResponse(createErrorEnvelope(err.code, err.message, err.details), STATUS_MAP[err.code]);
    }

    if (err instanceof ZodError) {
      return jsonResponse(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(err),
        }),
        400,
      );
    }

    logInternal?.(err, c.get("requestId"));
    return jsonResponse(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
