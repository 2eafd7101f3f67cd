/**
 * @ledgerview/ledger — Internal types for the statement engine.
 *
 * These extend the shared @ledgerview/types with engine-specific
 * structures and the error taxonomy shared by every engine package.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws, never silently succeeds
 * - Inconsistencies are reported, never clamped away
 */

import type {
  BalanceSide,
  EntrySide,
  IsoDate,
  Ledger,
  LedgerNature,
} from "@ledgerview/types";

// ─── Normal Balance ──────────────────────────────────────────────────────

/**
 * Map ledger natures to their normal balance direction.
 *
 * - Asset, Expense → debit-normal (debtor-like)
 * - Liability, Income, Equity → credit-normal (creditor-like)
 */
export const NORMAL_BALANCE: Readonly<Record<LedgerNature, EntrySide>> = {
  asset: "debit",
  expense: "debit",
  liability: "credit",
  income: "credit",
  equity: "credit",
} as const;

// ─── Data Issues ─────────────────────────────────────────────────────────

/** Kinds of inconsistency the engine detects in source data. */
export type DataIssueKind =
  | "unbalanced-voucher"
  | "over-allocation"
  | "orphan-reference";

/**
 * A detected inconsistency. Carries the identifiers needed to find
 * the offending rows in the source system.
 */
export interface DataIssue {
  readonly kind: DataIssueKind;
  readonly message: string;
  readonly voucherId?: string | undefined;
  readonly ledgerName?: string | undefined;
  readonly billRef?: string | undefined;
  /** Offending amount in minor units (imbalance or excess) */
  readonly amount?: bigint | undefined;
}

/**
 * What to do when issues are found.
 *
 * - "fail": throw INCONSISTENT_DATA with the issues as details
 * - "report": return the full result with the issues attached
 */
export type InconsistencyPolicy = "fail" | "report";

// ─── Statement Types ─────────────────────────────────────────────────────

/**
 * One display row of a ledger statement (one per voucher).
 * Debit and credit are non-negative; at most one is non-zero.
 */
export interface StatementRow {
  readonly voucherId: string;
  readonly date: IsoDate;
  readonly particulars: string;
  readonly voucherType: string;
  readonly voucherNumber: string;
  readonly narration: string;
  readonly debit: bigint;
  readonly credit: bigint;
  /** Signed running balance after this row, debit positive */
  readonly balance: bigint;
  readonly balanceSide: BalanceSide;
}

/**
 * A computed ledger statement. All amounts in minor units.
 * closingBalance === openingBalance + totalDebit - totalCredit.
 */
export interface LedgerStatement {
  readonly ledger: Ledger;
  readonly fromDate: IsoDate;
  readonly toDate: IsoDate;
  readonly openingBalance: bigint;
  readonly totalDebit: bigint;
  readonly totalCredit: bigint;
  readonly closingBalance: bigint;
  readonly rows: readonly StatementRow[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for engine operations. */
export type ReportErrorCode =
  | "NOT_FOUND"
  | "INVALID_RANGE"
  | "INCONSISTENT_DATA"
  | "STORAGE_ERROR"
  | "INVALID_DATE"
  | "INVALID_AMOUNT"
  | "INVALID_POLICY"
  | "CANCELLED";

/**
 * Structured error from the report engine.
 * Always thrown, never returned.
 *
 * `details` carries the identifiers (company, ledger, date range,
 * offending vouchers) needed to reproduce the failing request.
 */
export class ReportError extends Error {
  public readonly code: ReportErrorCode;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(
    code: ReportErrorCode,
    message: string,
    details: Readonly<Record<string, unknown>> = {},
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "ReportError";
    this.code = code;
    this.details = details;
  }
}
