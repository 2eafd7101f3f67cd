/**
 * @ledgerview/reports — Core types.
 *
 * Requests, intermediate results and options for the report engine.
 */

import type { SettlementPolicyName } from "@ledgerview/billwise";
import type { InconsistencyPolicy } from "@ledgerview/ledger";
import type {
  Company,
  IsoDate,
  Ledger,
  OutstandingReportType,
  Voucher,
} from "@ledgerview/types";

// =============================================================================
// Options
// =============================================================================

export interface LoaderOptions {
  /** Decimal places of the money scale (default 2) */
  readonly decimals?: number | undefined;
  /** Read ambiguous numeric dates day first (default true) */
  readonly dayFirst?: boolean | undefined;
  /** Clock used for defaulted dates */
  readonly now?: (() => Date) | undefined;
}

export interface ReportEngineOptions extends LoaderOptions {
  /** Default settlement policy for unreferenced amounts (default fifo-on-account) */
  readonly settlementPolicy?: SettlementPolicyName | undefined;
  /** What to do with detected inconsistencies (default report) */
  readonly inconsistencyPolicy?: InconsistencyPolicy | undefined;
}

// =============================================================================
// Requests
// =============================================================================

/**
 * Ledger statement request. Dates are in any supported layout; when
 * omitted they default to the ledger's first and last voucher dates.
 */
export interface LedgerStatementRequest {
  readonly companyId: string;
  readonly ledgerName: string;
  readonly fromDate?: string | undefined;
  readonly toDate?: string | undefined;
}

export interface OutstandingRequest {
  readonly companyId: string;
  /** Default "both" */
  readonly reportType?: OutstandingReportType | undefined;
  /** Default today */
  readonly asOnDate?: string | undefined;
  /** Restrict to one ledger */
  readonly ledgerName?: string | undefined;
  /** Override the engine's settlement policy */
  readonly policy?: string | undefined;
}

export interface PartySummaryRequest {
  readonly companyId: string;
  /** Only vouchers on or before this date; all when omitted */
  readonly asOnDate?: string | undefined;
}

export interface DashboardRequest {
  readonly companyId: string;
  /** Only vouchers on or before this date; all when omitted */
  readonly asOnDate?: string | undefined;
  /** Parties listed per side (default 10) */
  readonly limit?: number | undefined;
}

/**
 * Sales register request. The range defaults to the financial year
 * (1 April to 31 March) containing today.
 */
export interface SalesRegisterRequest {
  readonly companyId: string;
  readonly fromDate?: string | undefined;
  readonly toDate?: string | undefined;
}

// =============================================================================
// Loaded Data
// =============================================================================

export interface LoadedLedger {
  readonly company: Company;
  readonly ledger: Ledger;
  readonly fromDate: IsoDate;
  readonly toDate: IsoDate;
  /** Balance as of fromDate, minor units, debit positive */
  readonly openingBalance: bigint;
  /** Vouchers touching the ledger within [fromDate, toDate], all legs */
  readonly vouchers: readonly Voucher[];
}

export interface CompanySummary {
  readonly company: Company;
  /** Imported leg rows */
  readonly recordCount: number;
}

export interface LoadedCompany {
  readonly company: Company;
  /** Ledger masters in import order */
  readonly ledgers: readonly Ledger[];
  /** Every voucher of the company, chronological */
  readonly vouchers: readonly Voucher[];
}

// =============================================================================
// Party Summary
// =============================================================================

export interface PartyBalance {
  readonly ledger: Ledger;
  readonly debit: bigint;
  readonly credit: bigint;
  /** opening + debit - credit, debit positive */
  readonly balance: bigint;
  readonly transactionCount: number;
  readonly firstDate: IsoDate | null;
  readonly lastDate: IsoDate | null;
}

// =============================================================================
// Dashboard
// =============================================================================

export interface ActivityTotals {
  /** Vouchers */
  readonly count: number;
  readonly debit: bigint;
  readonly credit: bigint;
}

export interface DashboardData {
  readonly partyCount: number;
  readonly totals: ActivityTotals;
  readonly firstDate: IsoDate | null;
  readonly lastDate: IsoDate | null;
  /** Largest debit balances first */
  readonly topDebtors: readonly PartyBalance[];
  /** Largest credit balances first */
  readonly topCreditors: readonly PartyBalance[];
  /** Busiest voucher type first */
  readonly voucherTypes: ReadonlyArray<ActivityTotals & { readonly voucherType: string }>;
  /** Chronological, keyed "YYYY-MM" */
  readonly monthly: ReadonlyArray<ActivityTotals & { readonly month: string }>;
}

// =============================================================================
// Sales Register
// =============================================================================

export interface SalesEntry {
  readonly voucher: Voucher;
  readonly particulars: string;
  /** Sum of the voucher's credit legs */
  readonly amount: bigint;
}

export interface SalesMonth {
  /** "YYYY-MM" */
  readonly month: string;
  readonly amount: bigint;
  readonly voucherCount: number;
  readonly cumulative: bigint;
}

export interface SalesRegister {
  readonly fromDate: IsoDate;
  readonly toDate: IsoDate;
  readonly entries: readonly SalesEntry[];
  readonly months: readonly SalesMonth[];
  readonly total: bigint;
}
