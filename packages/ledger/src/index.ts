/**
 * @ledgerview/ledger — Ledger statement engine.
 *
 * Pure computation over normalized vouchers:
 * - Fixed-scale bigint money math (no floating point)
 * - Calendar date normalization and day arithmetic
 * - Deterministic voucher ordering and balance checks
 * - Running-balance ledger statements
 *
 * Design rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws ReportError
 * - Zero runtime dependencies
 */

// Statement computation
export {
  buildStatement,
  computeOpeningBalance,
  rowAmounts,
} from "./balance-calculator.js";
export type { StatementInput, RowAmounts } from "./balance-calculator.js";

// Particulars
export { resolveParticulars } from "./particulars.js";

// Voucher ordering and validation
export {
  compareVoucherKeys,
  compareVouchers,
  sortVouchers,
  legsForLedger,
  touchesLedger,
  findUnbalancedVouchers,
} from "./vouchers.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  normalizeAmount,
  absAmount,
  sumAmounts,
  directionOf,
  sideLabel,
  balanceSide,
} from "./money-math.js";

// Dates
export {
  normalizeDate,
  toEpochDay,
  fromEpochDay,
  addDays,
  daysBetween,
  isoDateOf,
} from "./dates.js";
export type { DateFormatOptions } from "./dates.js";

// Types
export type {
  DataIssueKind,
  DataIssue,
  InconsistencyPolicy,
  StatementRow,
  LedgerStatement,
  ReportErrorCode,
} from "./types.js";

export { ReportError, NORMAL_BALANCE } from "./types.js";
