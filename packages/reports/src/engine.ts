/**
 * Report Engine — Top-level coordinator
 *
 * Composes loader, statement calculator, bill allocation, ageing,
 * aggregation and assembly into the public report operations, plus the
 * company dashboard and sales register.
 *
 * Usage:
 *   const engine = new ReportEngine(store, { decimals: 2 });
 *   const statement = await engine.ledgerStatement({ companyId, ledgerName, fromDate, toDate });
 *   const outstanding = await engine.outstanding({ companyId, asOnDate: "30-04-2024" });
 *
 * Every operation is a pure async function of store contents and
 * parameters. The caller's AbortSignal is checked between phases.
 */

import {
  aggregateOutstanding,
  allocateBills,
  classifyBills,
  fifoOnAccountPolicy,
  postedLegsFor,
  resolvePolicy,
} from "@ledgerview/billwise";
import type {
  AllocationResult,
  LedgerOutstanding,
  SettlementPolicy,
} from "@ledgerview/billwise";
import {
  ReportError,
  buildStatement,
  findUnbalancedVouchers,
  touchesLedger,
} from "@ledgerview/ledger";
import type { DataIssue, InconsistencyPolicy } from "@ledgerview/ledger";
import type { TransactionStore } from "@ledgerview/store";
import { ledgerKey } from "@ledgerview/types";
import type {
  CompanyListItem,
  DashboardResponse,
  Ledger,
  LedgerListItem,
  LedgerStatementResponse,
  OutstandingResponse,
  PartySummaryResponse,
  PeriodInfo,
  SalesRegisterResponse,
  Voucher,
} from "@ledgerview/types";
import {
  assembleCompanyList,
  assembleDashboard,
  assembleIssue,
  assembleLedgerList,
  assembleOutstanding,
  assemblePartySummary,
  assemblePeriodInfo,
  assembleSalesRegister,
  assembleStatement,
} from "./assembler.js";
import { throwIfCancelled } from "./cancellation.js";
import { DEFAULT_TOP_PARTIES, summarizeDashboard } from "./dashboard.js";
import { TransactionLoader } from "./loader.js";
import { isParty, summarizeParties } from "./party-summary.js";
import { buildSalesRegister, financialYear } from "./sales-register.js";
import type {
  DashboardRequest,
  LedgerStatementRequest,
  OutstandingRequest,
  PartySummaryRequest,
  ReportEngineOptions,
  SalesRegisterRequest,
} from "./types.js";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Keys of ledgers carrying bill references, in the order their first
 * bill-referenced leg appears chronologically.
 */
function billLedgerOrder(vouchers: readonly Voucher[]): string[] {
  const seen = new Set<string>();
  const order: string[] = [];
  for (const voucher of vouchers) {
    for (const leg of voucher.legs) {
      if (leg.bill === undefined) continue;
      const key = ledgerKey(leg.ledgerName);
      if (!seen.has(key)) {
        seen.add(key);
        order.push(key);
      }
    }
  }
  return order;
}

const NO_BILL_LEDGERS: ReadonlySet<string> = new Set();

/**
 * Ledgers the outstanding report allocates: those carrying bill
 * references first, then party ledgers (or the explicitly requested
 * one) without any, each group in the order its first leg appears.
 */
function outstandingLedgers(
  vouchers: readonly Voucher[],
  selected: readonly Ledger[],
  explicit: boolean,
): Ledger[] {
  const byKey = new Map(selected.map((l) => [ledgerKey(l.name), l] as const));
  const billKeys = billLedgerOrder(vouchers);
  const order = billKeys.flatMap((key) => byKey.get(key) ?? []);
  const seen = new Set(billKeys);

  for (const voucher of vouchers) {
    for (const leg of voucher.legs) {
      const key = ledgerKey(leg.ledgerName);
      if (seen.has(key)) continue;
      seen.add(key);
      const ledger = byKey.get(key);
      if (ledger !== undefined && (explicit || isParty(ledger, NO_BILL_LEDGERS))) {
        order.push(ledger);
      }
    }
  }
  return order;
}

// =============================================================================
// ReportEngine
// =============================================================================

export class ReportEngine {
  private readonly loader: TransactionLoader;
  private readonly decimals: number;
  private readonly settlementPolicy: SettlementPolicy;
  private readonly inconsistencyPolicy: InconsistencyPolicy;

  constructor(store: TransactionStore, options: ReportEngineOptions = {}) {
    this.loader = new TransactionLoader(store, options);
    this.decimals = options.decimals ?? 2;
    this.settlementPolicy =
      options.settlementPolicy !== undefined ? resolvePolicy(options.settlementPolicy) : fifoOnAccountPolicy;
    this.inconsistencyPolicy = options.inconsistencyPolicy ?? "report";
  }

  // ─── Ledger Statement ───────────────────────────────────────────────

  async ledgerStatement(
    request: LedgerStatementRequest,
    signal?: AbortSignal,
  ): Promise<LedgerStatementResponse> {
    throwIfCancelled(signal, "load");
    const loaded = await this.loader.load(request, signal);

    throwIfCancelled(signal, "resolve");
    const issues = findUnbalancedVouchers(loaded.vouchers, this.decimals);
    this.enforce(issues, {
      companyId: request.companyId,
      ledgerName: loaded.ledger.name,
      fromDate: loaded.fromDate,
      toDate: loaded.toDate,
    });

    throwIfCancelled(signal, "balance");
    const statement = buildStatement({
      ledger: loaded.ledger,
      fromDate: loaded.fromDate,
      toDate: loaded.toDate,
      openingBalance: loaded.openingBalance,
      vouchers: loaded.vouchers,
    });

    throwIfCancelled(signal, "assemble");
    return assembleStatement(loaded.company, statement, issues, this.decimals);
  }

  // ─── Outstanding ────────────────────────────────────────────────────

  async outstanding(request: OutstandingRequest, signal?: AbortSignal): Promise<OutstandingResponse> {
    const { companyId } = request;
    const policy = request.policy !== undefined ? resolvePolicy(request.policy) : this.settlementPolicy;
    const reportType = request.reportType ?? "both";
    const asOnDate =
      request.asOnDate !== undefined ? this.loader.parseDate(request.asOnDate) : this.loader.today();

    throwIfCancelled(signal, "load");
    const { company, ledgers, vouchers } = await this.loader.loadCompany(companyId, signal);

    throwIfCancelled(signal, "resolve");
    let selected = ledgers;
    if (request.ledgerName !== undefined) {
      const key = ledgerKey(request.ledgerName);
      const match = ledgers.find((l) => ledgerKey(l.name) === key);
      if (match === undefined) {
        throw new ReportError("NOT_FOUND", `Ledger "${request.ledgerName.trim()}" not found`, {
          companyId,
          ledgerName: request.ledgerName,
        });
      }
      selected = [match];
    }

    const earliest = vouchers[0]?.date;
    if (earliest !== undefined && asOnDate < earliest) {
      throw new ReportError(
        "INVALID_RANGE",
        `As-on date ${asOnDate} is before the earliest voucher date ${earliest}`,
        { companyId, asOnDate, earliestDate: earliest },
      );
    }

    const posted = vouchers.filter((v) => v.date <= asOnDate);
    const checked =
      request.ledgerName !== undefined
        ? posted.filter((v) => selected.some((l) => touchesLedger(v, l.name)))
        : posted;
    const issues: DataIssue[] = [...findUnbalancedVouchers(checked, this.decimals)];

    throwIfCancelled(signal, "allocate");
    const allocations: AllocationResult[] = [];
    for (const ledger of outstandingLedgers(posted, selected, request.ledgerName !== undefined)) {
      const allocation = allocateBills({
        ledger,
        legs: postedLegsFor(posted, ledger.name),
        asOnDate,
        policy,
        decimals: this.decimals,
      });
      issues.push(...allocation.issues);
      allocations.push(allocation);
    }

    throwIfCancelled(signal, "classify");
    const classified: LedgerOutstanding[] = allocations.map((a) => ({
      ledger: a.ledger,
      bills: classifyBills(a.openBills, a.ledger, asOnDate),
      onAccount: a.onAccount,
    }));

    throwIfCancelled(signal, "aggregate");
    const summary = aggregateOutstanding(classified, reportType, asOnDate);
    this.enforce(issues, { companyId, asOnDate, reportType });

    throwIfCancelled(signal, "assemble");
    return assembleOutstanding(company, summary, issues, this.decimals);
  }

  // ─── Party Summary ──────────────────────────────────────────────────

  async partySummary(request: PartySummaryRequest, signal?: AbortSignal): Promise<PartySummaryResponse> {
    const asOnDate = request.asOnDate !== undefined ? this.loader.parseDate(request.asOnDate) : undefined;

    throwIfCancelled(signal, "load");
    const { company, ledgers, vouchers } = await this.loader.loadCompany(request.companyId, signal);

    throwIfCancelled(signal, "aggregate");
    const parties = summarizeParties(ledgers, vouchers, asOnDate);

    throwIfCancelled(signal, "assemble");
    return assemblePartySummary(company, parties, asOnDate ?? null, this.decimals);
  }

  // ─── Dashboard ──────────────────────────────────────────────────────

  async dashboard(request: DashboardRequest, signal?: AbortSignal): Promise<DashboardResponse> {
    const asOnDate = request.asOnDate !== undefined ? this.loader.parseDate(request.asOnDate) : undefined;
    const limit = request.limit ?? DEFAULT_TOP_PARTIES;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ReportError("INVALID_RANGE", `Party limit must be a positive integer, got ${String(limit)}`, {
        companyId: request.companyId,
        limit,
      });
    }

    throwIfCancelled(signal, "load");
    const { company, ledgers, vouchers } = await this.loader.loadCompany(request.companyId, signal);

    throwIfCancelled(signal, "aggregate");
    const data = summarizeDashboard(ledgers, vouchers, asOnDate, limit);

    throwIfCancelled(signal, "assemble");
    return assembleDashboard(company, data, asOnDate ?? null, this.decimals);
  }

  // ─── Sales Register ─────────────────────────────────────────────────

  async salesRegister(request: SalesRegisterRequest, signal?: AbortSignal): Promise<SalesRegisterResponse> {
    const year = financialYear(this.loader.today());
    const fromDate = request.fromDate !== undefined ? this.loader.parseDate(request.fromDate) : year.fromDate;
    const toDate = request.toDate !== undefined ? this.loader.parseDate(request.toDate) : year.toDate;
    if (fromDate > toDate) {
      throw new ReportError("INVALID_RANGE", `From date ${fromDate} is after to date ${toDate}`, {
        companyId: request.companyId,
        fromDate,
        toDate,
      });
    }

    throwIfCancelled(signal, "load");
    const { company, vouchers } = await this.loader.loadCompany(request.companyId, signal);

    throwIfCancelled(signal, "aggregate");
    const register = buildSalesRegister(vouchers, fromDate, toDate);

    throwIfCancelled(signal, "assemble");
    return assembleSalesRegister(company, register, this.decimals);
  }

  // ─── Listings ───────────────────────────────────────────────────────

  /**
   * Every company with its imported row count, ordered by name.
   */
  async listCompanies(signal?: AbortSignal): Promise<CompanyListItem[]> {
    return assembleCompanyList(await this.loader.loadCompanies(signal));
  }

  /**
   * Ledger masters of a company, ordered by name.
   */
  async listLedgers(companyId: string): Promise<LedgerListItem[]> {
    const { ledgers } = await this.loader.loadLedgers(companyId);
    const sorted = [...ledgers].sort((a, b) => {
      const x = ledgerKey(a.name);
      const y = ledgerKey(b.name);
      return x < y ? -1 : x > y ? 1 : 0;
    });
    return assembleLedgerList(sorted);
  }

  /**
   * Earliest and latest voucher dates of a company.
   */
  async periodInfo(companyId: string, signal?: AbortSignal): Promise<PeriodInfo> {
    const { company, vouchers } = await this.loader.loadCompany(companyId, signal);
    return assemblePeriodInfo(company, vouchers[0]?.date ?? null, vouchers.at(-1)?.date ?? null);
  }

  get settlementPolicyName(): string {
    return this.settlementPolicy.name;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private enforce(issues: readonly DataIssue[], details: Readonly<Record<string, unknown>>): void {
    if (issues.length === 0 || this.inconsistencyPolicy === "report") {
      return;
    }
    const noun = issues.length === 1 ? "inconsistency" : "inconsistencies";
    throw new ReportError("INCONSISTENT_DATA", `Found ${String(issues.length)} data ${noun}`, {
      ...details,
      issues: issues.map((issue) => assembleIssue(issue, this.decimals)),
    });
  }
}
