/**
 * @ledgerview/reports — Report engine.
 *
 * Loads books from a TransactionStore and produces:
 * - Ledger statements with running balances
 * - Bill-wise outstanding reports with ageing
 * - Party-wise outstanding summaries
 * - Company dashboard and sales register
 * - Company and ledger listings, period info
 */

export { ReportEngine } from "./engine.js";
export { TransactionLoader } from "./loader.js";
export { throwIfCancelled } from "./cancellation.js";
export type { ReportPhase } from "./cancellation.js";
export { reportFingerprint } from "./fingerprint.js";
export { summarizeParties, billLedgerKeys, isParty } from "./party-summary.js";
export { summarizeDashboard, DEFAULT_TOP_PARTIES } from "./dashboard.js";
export { buildSalesRegister, financialYear, isSalesVoucher, monthName } from "./sales-register.js";
export {
  assembleIssue,
  assembleStatement,
  assembleOutstanding,
  assemblePartySummary,
  assembleLedgerList,
  assemblePeriodInfo,
  assembleCompanyList,
  assembleDashboard,
  assembleSalesRegister,
} from "./assembler.js";

export type {
  LoaderOptions,
  ReportEngineOptions,
  LedgerStatementRequest,
  OutstandingRequest,
  PartySummaryRequest,
  DashboardRequest,
  SalesRegisterRequest,
  LoadedLedger,
  LoadedCompany,
  CompanySummary,
  PartyBalance,
  ActivityTotals,
  DashboardData,
  SalesEntry,
  SalesMonth,
  SalesRegister,
} from "./types.js";
