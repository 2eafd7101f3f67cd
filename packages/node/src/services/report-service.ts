/**
 * ReportService — Composition root for the report engine.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. Every generated report is logged at info with its
 * counts; inconsistencies surfaced in a report are logged at warn.
 */

import { ReportEngine } from "@ledgerview/reports";
import type {
  DashboardRequest,
  LedgerStatementRequest,
  OutstandingRequest,
  PartySummaryRequest,
  ReportEngineOptions,
  SalesRegisterRequest,
} from "@ledgerview/reports";
import type { TransactionStore } from "@ledgerview/store";
import type {
  CompanyListItem,
  DashboardResponse,
  IssueView,
  LedgerListItem,
  LedgerStatementResponse,
  OutstandingResponse,
  PartySummaryResponse,
  PeriodInfo,
  SalesRegisterResponse,
} from "@ledgerview/types";
import type { Logger } from "pino";

// =============================================================================
// Service
// =============================================================================

export class ReportService {
  readonly engine: ReportEngine;

  private readonly _logger: Logger;

  constructor(store: TransactionStore, logger: Logger, options: ReportEngineOptions = {}) {
    this.engine = new ReportEngine(store, options);
    this._logger = logger.child({ component: "reports" });
  }

  // ─── Reports ────────────────────────────────────────────────────────

  async ledgerStatement(
    request: LedgerStatementRequest,
    signal?: AbortSignal,
  ): Promise<LedgerStatementResponse> {
    const report = await this.engine.ledgerStatement(request, signal);
    const context = {
      companyId: request.companyId,
      ledgerName: report.ledger_name,
      fromDate: report.from_date,
      toDate: report.to_date,
    };

    this._logger.info({ ...context, rows: report.total_transactions }, "Ledger statement generated");
    this.warnIssues(report.issues, context);
    return report;
  }

  async outstanding(request: OutstandingRequest, signal?: AbortSignal): Promise<OutstandingResponse> {
    const report = await this.engine.outstanding(request, signal);
    const context = {
      companyId: request.companyId,
      reportType: report.report_type,
      asOnDate: report.as_on_date,
    };

    this._logger.info(
      { ...context, bills: report.count, ledgers: report.ledger_count },
      "Outstanding report generated",
    );
    this.warnIssues(report.issues, context);
    return report;
  }

  async partySummary(request: PartySummaryRequest, signal?: AbortSignal): Promise<PartySummaryResponse> {
    const report = await this.engine.partySummary(request, signal);
    this._logger.info(
      { companyId: request.companyId, asOnDate: report.as_on_date, parties: report.total_parties },
      "Party summary generated",
    );
    return report;
  }

  async dashboard(request: DashboardRequest, signal?: AbortSignal): Promise<DashboardResponse> {
    const report = await this.engine.dashboard(request, signal);
    this._logger.info(
      { companyId: request.companyId, asOnDate: report.as_on_date, vouchers: report.stats.total_transactions },
      "Dashboard generated",
    );
    return report;
  }

  async salesRegister(request: SalesRegisterRequest, signal?: AbortSignal): Promise<SalesRegisterResponse> {
    const report = await this.engine.salesRegister(request, signal);
    this._logger.info(
      {
        companyId: request.companyId,
        fromDate: report.from_date,
        toDate: report.to_date,
        vouchers: report.total_vouchers,
      },
      "Sales register generated",
    );
    return report;
  }

  // ─── Listings ───────────────────────────────────────────────────────

  listCompanies(signal?: AbortSignal): Promise<CompanyListItem[]> {
    return this.engine.listCompanies(signal);
  }

  listLedgers(companyId: string): Promise<LedgerListItem[]> {
    return this.engine.listLedgers(companyId);
  }

  periodInfo(companyId: string, signal?: AbortSignal): Promise<PeriodInfo> {
    return this.engine.periodInfo(companyId, signal);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private warnIssues(issues: readonly IssueView[], context: Readonly<Record<string, unknown>>): void {
    if (issues.length === 0) return;
    this._logger.warn(
      { ...context, issueCount: issues.length, issues },
      "Report surfaced data inconsistencies",
    );
  }
}
