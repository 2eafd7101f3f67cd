/**
 * Domain Types
 *
 * Normalized projections the engine computes with. Produced by the
 * transaction loader from storage records; never persisted.
 *
 * Rules:
 * - Amounts are bigint minor units (fixed scale), debit positive
 * - Dates are ISO calendar dates ("YYYY-MM-DD")
 * - All types are readonly
 */

import type { LedgerNature } from "./records.js";

/** ISO calendar date, "YYYY-MM-DD". Compares correctly as a string. */
export type IsoDate = string;

/** Side of a double-entry posting. */
export type EntrySide = "debit" | "credit";

/** Display suffix for a balance magnitude. */
export type BalanceSide = "Dr" | "Cr";

/**
 * Bill-wise details carried by a leg.
 */
export interface BillReference {
  readonly ref: string;
  readonly type?: string | undefined;
  readonly billDate?: IsoDate | undefined;
  readonly dueDate?: IsoDate | undefined;
  readonly creditPeriodDays?: number | undefined;
}

/**
 * One debit-or-credit entry of a voucher against a ledger.
 */
export interface Leg {
  readonly voucherId: string;
  readonly lineNo: number;
  readonly ledgerName: string;
  /** Minor units, debit positive */
  readonly amount: bigint;
  readonly bill?: BillReference | undefined;
}

/**
 * One posted transaction event. Legs are in line order.
 */
export interface Voucher {
  readonly id: string;
  readonly date: IsoDate;
  readonly voucherType: string;
  readonly voucherNumber: string;
  readonly narration?: string | undefined;
  readonly legs: readonly Leg[];
}

export interface Company {
  readonly id: string;
  readonly name: string;
}

export interface Ledger {
  readonly companyId: string;
  readonly name: string;
  readonly nature: LedgerNature;
  /** Opening balance at the start of books, minor units, debit positive */
  readonly openingBalance: bigint;
  readonly creditPeriodDays?: number | undefined;
  readonly group?: string | undefined;
}
