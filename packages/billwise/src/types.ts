/**
 * @ledgerview/billwise domain types.
 *
 * Bill-wise matching types:
 * - Bills raised by legs carrying a bill reference
 * - Allocations of settling legs against bills
 * - Ageing classification of open bills
 * - Outstanding aggregates per ledger and per report
 */

import type { DataIssue } from "@ledgerview/ledger";
import type {
  AgeingBucket,
  BalanceSide,
  EntrySide,
  IsoDate,
  Leg,
  Ledger,
  OutstandingReportType,
  Voucher,
} from "@ledgerview/types";

// =============================================================================
// Input
// =============================================================================

/** A leg together with the voucher that posted it. */
export interface PostedLeg {
  readonly voucher: Voucher;
  readonly leg: Leg;
}

// =============================================================================
// Bills & Allocations
// =============================================================================

/**
 * Result of matching part of a settling leg against a bill.
 * Recomputed per request, never persisted.
 */
export interface BillAllocation {
  readonly billRef: string;
  /** Allocated magnitude, minor units */
  readonly amount: bigint;
  readonly date: IsoDate;
  readonly voucherId: string;
  /** Bill remaining amount after this allocation */
  readonly remainingAfter: bigint;
  /** True when the settling leg named the bill, false when a policy chose it */
  readonly referenced: boolean;
}

/**
 * A named reference (invoice number) raised by a leg.
 * Amounts are magnitudes; `direction` carries the side.
 */
export interface Bill {
  readonly ref: string;
  readonly ledgerName: string;
  readonly billDate: IsoDate;
  readonly billType: string;
  readonly direction: EntrySide;
  readonly originalAmount: bigint;
  readonly remaining: bigint;
  readonly voucherId: string;
  readonly voucherType: string;
  readonly voucherNumber: string;
  readonly dueDate?: IsoDate | undefined;
  readonly creditPeriodDays?: number | undefined;
  /** Creation order within the ledger; FIFO tie-break */
  readonly sequence: number;
  readonly allocations: readonly BillAllocation[];
}

/**
 * A leg amount that reduces bills of the opposite direction.
 */
export interface Settlement {
  /** Magnitude, minor units */
  readonly amount: bigint;
  readonly direction: EntrySide;
  readonly date: IsoDate;
  readonly voucherId: string;
}

/** Open bill as offered to a settlement policy. */
export interface OpenBillSlot {
  readonly ref: string;
  readonly billDate: IsoDate;
  readonly remaining: bigint;
}

/**
 * What a policy sees when asked to place an unreferenced settlement.
 */
export interface SettlementContext {
  readonly settlement: Settlement;
  /** Open bills of the opposite direction, FIFO order */
  readonly candidates: readonly OpenBillSlot[];
  /** Reduce a candidate bill. Amount must not exceed its remaining. */
  allocate(ref: string, amount: bigint): void;
}

export type SettlementPolicyName = "fifo-on-account" | "strict-reference";

/**
 * Strategy for unreferenced settlements. Returns the amount it did not
 * place on any bill; that remainder goes on account.
 */
export interface SettlementPolicy {
  readonly name: SettlementPolicyName;
  settle(context: SettlementContext): bigint;
}

export interface AllocationInput {
  readonly ledger: Ledger;
  readonly legs: readonly PostedLeg[];
  readonly asOnDate: IsoDate;
  readonly policy: SettlementPolicy;
  /** Scale used in issue messages (default 2) */
  readonly decimals?: number | undefined;
}

export interface AllocationResult {
  readonly ledger: Ledger;
  /** Every bill raised up to the as-on date, FIFO order */
  readonly bills: readonly Bill[];
  /** Bills with a non-zero remaining amount, FIFO order */
  readonly openBills: readonly Bill[];
  /** Signed amount not tied to any bill, debit positive */
  readonly onAccount: bigint;
  readonly allocations: readonly BillAllocation[];
  readonly issues: readonly DataIssue[];
}

// =============================================================================
// Ageing
// =============================================================================

export interface ClassifiedBill {
  readonly bill: Bill;
  readonly dueDate: IsoDate;
  readonly overdueDays: number;
  readonly bucket: AgeingBucket;
  readonly isReceivable: boolean;
  readonly isAdvance: boolean;
}

// =============================================================================
// Aggregates
// =============================================================================

/** Classified open bills of one ledger, ready for aggregation. */
export interface LedgerOutstanding {
  readonly ledger: Ledger;
  readonly bills: readonly ClassifiedBill[];
  readonly onAccount: bigint;
}

/** One output line: an open bill with the ledger's running balance. */
export interface OutstandingLine {
  readonly ledger: Ledger;
  readonly entry: ClassifiedBill;
  /** Running signed balance of the ledger's listed bills, debit positive */
  readonly balance: bigint;
  readonly balanceSide: BalanceSide;
}

export interface LedgerSubtotal {
  readonly ledgerName: string;
  readonly receivables: bigint;
  readonly payables: bigint;
  readonly billCount: number;
}

export interface OnAccountBalance {
  readonly ledgerName: string;
  /** Magnitude */
  readonly amount: bigint;
  readonly side: BalanceSide;
}

export interface OutstandingSummary {
  readonly reportType: OutstandingReportType;
  readonly asOnDate: IsoDate;
  readonly lines: readonly OutstandingLine[];
  readonly subtotals: readonly LedgerSubtotal[];
  readonly onAccount: readonly OnAccountBalance[];
  readonly totalReceivables: bigint;
  readonly totalPayables: bigint;
  readonly ledgerCount: number;
  readonly ageing: Readonly<Record<AgeingBucket, bigint>>;
}
