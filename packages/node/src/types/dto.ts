/**
 * Query DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. Dates stay
 * strings here: the engine normalizes them with the configured day/month
 * order and reports INVALID_DATE itself.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

const DateParam = z.string().trim().min(1).max(32);

const NameParam = z.string().trim().min(1).max(256);

// =============================================================================
// Report Queries
// =============================================================================

export const StatementQuerySchema = z.object({
  from: DateParam.optional(),
  to: DateParam.optional(),
});

export type StatementQuery = z.infer<typeof StatementQuerySchema>;

export const OutstandingQuerySchema = z.object({
  type: z.enum(["receivables", "payables", "both"]).default("both"),
  asOn: DateParam.optional(),
  ledger: NameParam.optional(),
  policy: z.string().trim().min(1).max(64).optional(),
});

export type OutstandingQuery = z.infer<typeof OutstandingQuerySchema>;

export const PartiesQuerySchema = z.object({
  asOn: DateParam.optional(),
});

export type PartiesQuery = z.infer<typeof PartiesQuerySchema>;

export const DashboardQuerySchema = z.object({
  asOn: DateParam.optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export type DashboardQuery = z.infer<typeof DashboardQuerySchema>;

export const SalesRegisterQuerySchema = z.object({
  from: DateParam.optional(),
  to: DateParam.optional(),
});

export type SalesRegisterQuery = z.infer<typeof SalesRegisterQuerySchema>;
