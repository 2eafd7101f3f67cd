/**
 * Company report routes.
 *
 * GET /api/v1/companies                                          — Company list
 * GET /api/v1/companies/:companyId/ledgers                        — Ledger list
 * GET /api/v1/companies/:companyId/period                         — Voucher date range
 * GET /api/v1/companies/:companyId/ledgers/:ledgerName/statement  — Ledger statement
 * GET /api/v1/companies/:companyId/outstanding                    — Bill-wise outstanding
 * GET /api/v1/companies/:companyId/parties                        — Party summary
 * GET /api/v1/companies/:companyId/dashboard                      — Dashboard figures
 * GET /api/v1/companies/:companyId/sales-register                 — Sales register
 *
 * Every report is wrapped as `{ data }` and tagged with an ETag.
 * The request's abort signal reaches the engine.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  DashboardQuerySchema,
  OutstandingQuerySchema,
  PartiesQuerySchema,
  SalesRegisterQuerySchema,
  StatementQuerySchema,
} from "../types/dto.js";
import { respondWithReport } from "../middleware/etag.js";
import { parseQuery } from "../middleware/validate.js";

export function createCompanyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /
  routes.get("/", async (c) => {
    const companies = await c.get("service").listCompanies(c.req.raw.signal);
    return respondWithReport(c, companies);
  });

  // GET /:companyId/ledgers
  routes.get("/:companyId/ledgers", async (c) => {
    const ledgers = await c.get("service").listLedgers(c.req.param("companyId"));
    return respondWithReport(c, ledgers);
  });

  // GET /:companyId/period
  routes.get("/:companyId/period", async (c) => {
    const period = await c.get("service").periodInfo(c.req.param("companyId"), c.req.raw.signal);
    return respondWithReport(c, period);
  });

  // GET /:companyId/ledgers/:ledgerName/statement
  routes.get("/:companyId/ledgers/:ledgerName/statement", async (c) => {
    const query = parseQuery(c, StatementQuerySchema);
    const statement = await c.get("service").ledgerStatement(
      {
        companyId: c.req.param("companyId"),
        ledgerName: c.req.param("ledgerName"),
        fromDate: query.from,
        toDate: query.to,
      },
      c.req.raw.signal,
    );
    return respondWithReport(c, statement);
  });

  // GET /:companyId/outstanding
  routes.get("/:companyId/outstanding", async (c) => {
    const query = parseQuery(c, OutstandingQuerySchema);
    const report = await c.get("service").outstanding(
      {
        companyId: c.req.param("companyId"),
        reportType: query.type,
        asOnDate: query.asOn,
        ledgerName: query.ledger,
        policy: query.policy,
      },
      c.req.raw.signal,
    );
    return respondWithReport(c, report);
  });

  // GET /:companyId/parties
  routes.get("/:companyId/parties", async (c) => {
    const query = parseQuery(c, PartiesQuerySchema);
    const summary = await c.get("service").partySummary(
      { companyId: c.req.param("companyId"), asOnDate: query.asOn },
      c.req.raw.signal,
    );
    return respondWithReport(c, summary);
  });

  // GET /:companyId/dashboard
  routes.get("/:companyId/dashboard", async (c) => {
    const query = parseQuery(c, DashboardQuerySchema);
    const dashboard = await c.get("service").dashboard(
      { companyId: c.req.param("companyId"), asOnDate: query.asOn, limit: query.limit },
      c.req.raw.signal,
    );
    return respondWithReport(c, dashboard);
  });

  // GET /:companyId/sales-register
  routes.get("/:companyId/sales-register", async (c) => {
    const query = parseQuery(c, SalesRegisterQuerySchema);
    const register = await c.get("service").salesRegister(
      { companyId: c.req.param("companyId"), fromDate: query.from, toDate: query.to },
      c.req.raw.signal,
    );
    return respondWithReport(c, register);
  });

  return routes;
}
