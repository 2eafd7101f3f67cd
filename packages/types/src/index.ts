/**
 * @ledgerview/types — Shared domain types for the Ledgerview stack.
 *
 * These types are used across all Ledgerview packages:
 * - Storage records as imported from the upstream accounting package
 * - Normalized vouchers, legs, ledgers
 * - Report wire shapes consumed by the presentation layer
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Storage records
export type {
  RawAmount,
  RawLegRow,
  CompanyRecord,
  LedgerRecord,
  LedgerNature,
} from "./records.js";
export { ledgerKey } from "./records.js";

// Domain projections
export type {
  IsoDate,
  EntrySide,
  BalanceSide,
  BillReference,
  Leg,
  Voucher,
  Company,
  Ledger,
} from "./domain.js";

// Report wire shapes
export type {
  DecimalString,
  OutstandingReportType,
  AgeingBucket,
  IssueView,
  StatementTransactionView,
  LedgerStatementResponse,
  OutstandingRowView,
  LedgerSubtotalView,
  OnAccountView,
  OutstandingResponse,
  PartyView,
  PartySummaryResponse,
  LedgerListItem,
  PeriodInfo,
  CompanyListItem,
  DashboardStatsView,
  TopPartyView,
  VoucherActivityView,
  MonthlyActivityView,
  DashboardResponse,
  SalesVoucherView,
  SalesMonthView,
  SalesRegisterResponse,
} from "./reports.js";

// Runtime type guards
export {
  isLedgerNature,
  isRawAmount,
  isCompanyRecord,
  isLedgerRecord,
  isRawLegRow,
  MAX_CREDIT_PERIOD_DAYS,
} from "./guards.js";
