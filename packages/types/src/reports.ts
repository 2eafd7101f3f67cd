/**
 * Report Response Types
 *
 * The wire shapes consumed by the presentation layer. Field names follow
 * the portal's JSON contract (snake_case); amounts are decimal strings and
 * dates ISO calendar dates, never locale-formatted.
 *
 * Only the output assembler constructs these.
 */

import type { BalanceSide, IsoDate } from "./domain.js";

/** Decimal amount string, e.g. "1000.00" or "-250.50". */
export type DecimalString = string;

export type OutstandingReportType = "receivables" | "payables" | "both";

export type AgeingBucket = "0-30" | "31-60" | "61-90" | "90+";

/**
 * A data inconsistency the engine detected but did not hide.
 */
export interface IssueView {
  readonly kind: string;
  readonly message: string;
  readonly voucher_id?: string | undefined;
  readonly ledger_name?: string | undefined;
  readonly bill_ref?: string | undefined;
  readonly amount?: DecimalString | undefined;
}

// =============================================================================
// Ledger statement
// =============================================================================

export interface StatementTransactionView {
  readonly date: IsoDate;
  readonly particulars: string;
  readonly voucher_type: string;
  readonly voucher_number: string;
  readonly narration: string;
  readonly debit: DecimalString;
  readonly credit: DecimalString;
  /** Magnitude of the running balance after this row */
  readonly balance: DecimalString;
  readonly balance_type: BalanceSide;
}

export interface LedgerStatementResponse {
  readonly company_name: string;
  readonly ledger_name: string;
  readonly from_date: IsoDate;
  readonly to_date: IsoDate;
  /** Signed, debit positive */
  readonly opening_balance: DecimalString;
  readonly opening_balance_type: BalanceSide;
  readonly total_debit: DecimalString;
  readonly total_credit: DecimalString;
  /** Signed, debit positive */
  readonly closing_balance: DecimalString;
  readonly closing_balance_type: BalanceSide;
  readonly net_movement: DecimalString;
  readonly total_transactions: number;
  readonly transactions: readonly StatementTransactionView[];
  readonly issues: readonly IssueView[];
}

// =============================================================================
// Outstanding (bill-wise)
// =============================================================================

export interface OutstandingRowView {
  readonly ledger_name: string;
  readonly bill_ref: string;
  readonly bill_date: IsoDate;
  readonly bill_type: string;
  readonly voucher_type: string;
  readonly voucher_no: string;
  readonly outstanding_amount: DecimalString;
  /** Magnitude of the ledger's running outstanding after this row */
  readonly balance: DecimalString;
  readonly balance_type: BalanceSide;
  readonly is_receivable: boolean;
  readonly is_advance: boolean;
  readonly due_date: IsoDate;
  readonly overdue_days: number;
  readonly ageing_bucket: AgeingBucket;
}

export interface LedgerSubtotalView {
  readonly ledger_name: string;
  readonly receivables: DecimalString;
  readonly payables: DecimalString;
  readonly bill_count: number;
}

export interface OnAccountView {
  readonly ledger_name: string;
  readonly amount: DecimalString;
  readonly balance_type: BalanceSide;
}

export interface OutstandingResponse {
  readonly company_name: string;
  readonly report_type: OutstandingReportType;
  readonly as_on_date: IsoDate;
  readonly count: number;
  readonly ledger_count: number;
  readonly total_outstanding_receivables: DecimalString;
  readonly total_outstanding_payables: DecimalString;
  readonly ageing: Readonly<Record<AgeingBucket, DecimalString>>;
  readonly ledgers: readonly LedgerSubtotalView[];
  readonly on_account: readonly OnAccountView[];
  readonly data: readonly OutstandingRowView[];
  readonly issues: readonly IssueView[];
}

// =============================================================================
// Party summary
// =============================================================================

export interface PartyView {
  readonly party_name: string;
  readonly debit: DecimalString;
  readonly credit: DecimalString;
  /** Signed, debit positive */
  readonly balance: DecimalString;
  readonly balance_type: BalanceSide;
  readonly transaction_count: number;
  /** Null when the balance is entirely the opening balance */
  readonly first_transaction: IsoDate | null;
  readonly last_transaction: IsoDate | null;
}

export interface PartySummaryResponse {
  readonly company_name: string;
  readonly as_on_date: IsoDate | null;
  readonly total_parties: number;
  readonly total_debit: DecimalString;
  readonly total_credit: DecimalString;
  /** Sum of party balance magnitudes; debtors and creditors do not offset */
  readonly total_outstanding: DecimalString;
  readonly parties: readonly PartyView[];
}

// =============================================================================
// Listings
// =============================================================================

export interface LedgerListItem {
  readonly name: string;
  readonly nature: string;
  readonly group: string | null;
}

export interface PeriodInfo {
  readonly company_name: string;
  readonly from_date: IsoDate | null;
  readonly to_date: IsoDate | null;
}

export interface CompanyListItem {
  readonly id: string;
  readonly name: string;
  /** Imported leg rows */
  readonly total_records: number;
}

// =============================================================================
// Dashboard
// =============================================================================

export interface DashboardStatsView {
  readonly total_parties: number;
  /** Vouchers, not legs */
  readonly total_transactions: number;
  readonly total_debit: DecimalString;
  readonly total_credit: DecimalString;
  /** Debit minus credit; non-zero only when vouchers are unbalanced */
  readonly net_balance: DecimalString;
  readonly first_transaction: IsoDate | null;
  readonly last_transaction: IsoDate | null;
}

export interface TopPartyView {
  readonly party_name: string;
  /** Magnitude */
  readonly balance: DecimalString;
  readonly transaction_count: number;
}

export interface VoucherActivityView {
  readonly voucher_type: string;
  readonly count: number;
  readonly debit: DecimalString;
  readonly credit: DecimalString;
}

export interface MonthlyActivityView {
  /** "YYYY-MM" */
  readonly month: string;
  readonly count: number;
  readonly debit: DecimalString;
  readonly credit: DecimalString;
}

export interface DashboardResponse {
  readonly company_name: string;
  readonly as_on_date: IsoDate | null;
  readonly stats: DashboardStatsView;
  readonly top_debtors: readonly TopPartyView[];
  readonly top_creditors: readonly TopPartyView[];
  readonly voucher_types: readonly VoucherActivityView[];
  readonly monthly_trend: readonly MonthlyActivityView[];
}

// =============================================================================
// Sales register
// =============================================================================

export interface SalesVoucherView {
  readonly date: IsoDate;
  readonly voucher_type: string;
  readonly voucher_number: string;
  /** The customer: the first debited ledger */
  readonly particulars: string;
  /** Invoice total, tax included */
  readonly amount: DecimalString;
  readonly narration: string;
}

export interface SalesMonthView {
  /** "YYYY-MM" */
  readonly month_key: string;
  readonly month_name: string;
  readonly year: string;
  readonly amount: DecimalString;
  readonly voucher_count: number;
  /** Running total through this month */
  readonly cumulative: DecimalString;
}

export interface SalesRegisterResponse {
  readonly company_name: string;
  readonly from_date: IsoDate;
  readonly to_date: IsoDate;
  readonly monthly_summary: readonly SalesMonthView[];
  readonly vouchers: readonly SalesVoucherView[];
  readonly total_amount: DecimalString;
  readonly total_vouchers: number;
}
