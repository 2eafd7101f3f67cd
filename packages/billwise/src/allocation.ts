/**
 * Bill Allocation Engine
 *
 * Matches a ledger's settling legs against the bills raised on it.
 *
 * Strategy:
 * 1. Walk the ledger's legs up to the as-on date in chronological order
 *    (date, voucher key, line) and sort each one into: bill creation,
 *    addition to an existing bill, referenced settlement, or
 *    unreferenced settlement
 * 2. Apply referenced settlements to the bill they name; any excess is
 *    reported as over-allocation and then treated as unreferenced
 * 3. Hand unreferenced settlements to the settlement policy, which may
 *    reduce open bills of the opposite direction in FIFO order; a bill
 *    raised after the settlement's date is not offered to it
 * 4. Whatever the policy leaves unplaced accumulates on account
 *
 * The walk is linear in the number of legs (times open bills for the
 * FIFO scan).
 */

import {
  absAmount,
  compareVouchers,
  formatAmount,
  legsForLedger,
} from "@ledgerview/ledger";
import type { DataIssue } from "@ledgerview/ledger";
import type { EntrySide, IsoDate, Voucher } from "@ledgerview/types";
import type {
  AllocationInput,
  AllocationResult,
  Bill,
  BillAllocation,
  OpenBillSlot,
  PostedLeg,
  Settlement,
} from "./types.js";

const AGAINST_REFERENCE = "agst ref";
const ON_ACCOUNT = "on account";
const DEFAULT_BILL_TYPE = "New Ref";

// =============================================================================
// Leg Ordering
// =============================================================================

/**
 * Pair each leg posted against the ledger with its voucher.
 */
export function postedLegsFor(
  vouchers: readonly Voucher[],
  ledgerName: string,
): PostedLeg[] {
  const posted: PostedLeg[] = [];
  for (const voucher of vouchers) {
    for (const leg of legsForLedger(voucher, ledgerName)) {
      posted.push({ voucher, leg });
    }
  }
  return posted;
}

/** Chronological leg order: date, voucher key, line number. */
export function comparePostedLegs(a: PostedLeg, b: PostedLeg): number {
  return compareVouchers(a.voucher, b.voucher) || a.leg.lineNo - b.leg.lineNo;
}

// =============================================================================
// Internal State
// =============================================================================

interface BillState {
  readonly ref: string;
  readonly ledgerName: string;
  readonly billDate: IsoDate;
  /** Date of the voucher that raised the bill */
  readonly raisedOn: IsoDate;
  readonly billType: string;
  readonly direction: EntrySide;
  readonly voucherId: string;
  readonly voucherType: string;
  readonly voucherNumber: string;
  readonly dueDate: IsoDate | undefined;
  readonly creditPeriodDays: number | undefined;
  readonly sequence: number;
  original: bigint;
  remaining: bigint;
  readonly allocations: BillAllocation[];
}

interface PendingSettlement {
  readonly settlement: Settlement;
  /** Position of the originating leg in the walk */
  readonly order: number;
}

function billTypeOf(type: string | undefined): string {
  const trimmed = type?.trim() ?? "";
  return trimmed === "" ? DEFAULT_BILL_TYPE : trimmed;
}

function compareFifo(a: BillState, b: BillState): number {
  if (a.billDate !== b.billDate) {
    return a.billDate < b.billDate ? -1 : 1;
  }
  return a.sequence - b.sequence;
}

function freeze(state: BillState): Bill {
  return {
    ref: state.ref,
    ledgerName: state.ledgerName,
    billDate: state.billDate,
    billType: state.billType,
    direction: state.direction,
    originalAmount: state.original,
    remaining: state.remaining,
    voucherId: state.voucherId,
    voucherType: state.voucherType,
    voucherNumber: state.voucherNumber,
    dueDate: state.dueDate,
    creditPeriodDays: state.creditPeriodDays,
    sequence: state.sequence,
    allocations: [...state.allocations],
  };
}

// =============================================================================
// Allocation
// =============================================================================

/**
 * Allocate a ledger's settlements against its bills as of a date.
 */
export function allocateBills(input: AllocationInput): AllocationResult {
  const { ledger, asOnDate, policy } = input;
  const decimals = input.decimals ?? 2;

  const legs = input.legs
    .filter((p) => p.voucher.date <= asOnDate && p.leg.amount !== 0n)
    .sort(comparePostedLegs);

  const bills = new Map<string, BillState>();
  const referenced: { bill: BillState; pending: PendingSettlement }[] = [];
  const unreferenced: PendingSettlement[] = [];
  const issues: DataIssue[] = [];

  // ─── Pass 1: classify legs ───────────────────────────────────────────

  legs.forEach(({ voucher, leg }, order) => {
    const direction: EntrySide = leg.amount > 0n ? "debit" : "credit";
    const amount = absAmount(leg.amount);
    const pending: PendingSettlement = {
      settlement: { amount, direction, date: voucher.date, voucherId: voucher.id },
      order,
    };

    const ref = leg.bill?.ref.trim() ?? "";
    const type = leg.bill?.type?.trim().toLowerCase() ?? "";

    if (ref === "" || type === ON_ACCOUNT) {
      unreferenced.push(pending);
      return;
    }

    const existing = bills.get(ref);

    if (existing === undefined) {
      if (type === AGAINST_REFERENCE) {
        issues.push({
          kind: "orphan-reference",
          message: `Voucher "${voucher.id}" settles unknown bill "${ref}" on ledger "${ledger.name}"`,
          voucherId: voucher.id,
          ledgerName: ledger.name,
          billRef: ref,
          amount,
        });
        unreferenced.push(pending);
        return;
      }

      bills.set(ref, {
        ref,
        ledgerName: ledger.name,
        billDate: leg.bill?.billDate ?? voucher.date,
        raisedOn: voucher.date,
        billType: billTypeOf(leg.bill?.type),
        direction,
        voucherId: voucher.id,
        voucherType: voucher.voucherType,
        voucherNumber: voucher.voucherNumber,
        dueDate: leg.bill?.dueDate,
        creditPeriodDays: leg.bill?.creditPeriodDays,
        sequence: bills.size,
        original: amount,
        remaining: amount,
        allocations: [],
      });
      return;
    }

    if (existing.direction === direction) {
      existing.original += amount;
      existing.remaining += amount;
      return;
    }

    referenced.push({ bill: existing, pending });
  });

  const queue = [...bills.values()].sort(compareFifo);
  const allocations: BillAllocation[] = [];

  const apply = (
    bill: BillState,
    amount: bigint,
    settlement: Settlement,
    isReferenced: boolean,
  ): void => {
    bill.remaining -= amount;
    const allocation: BillAllocation = {
      billRef: bill.ref,
      amount,
      date: settlement.date,
      voucherId: settlement.voucherId,
      remainingAfter: bill.remaining,
      referenced: isReferenced,
    };
    bill.allocations.push(allocation);
    allocations.push(allocation);
  };

  // ─── Pass 2: referenced settlements ──────────────────────────────────

  for (const { bill, pending } of referenced) {
    const { settlement } = pending;
    const available = bill.remaining;
    const take = settlement.amount < available ? settlement.amount : available;

    if (take > 0n) {
      apply(bill, take, settlement, true);
    }

    const excess = settlement.amount - take;
    if (excess > 0n) {
      issues.push({
        kind: "over-allocation",
        message:
          `Voucher "${settlement.voucherId}" allocates ${formatAmount(settlement.amount, decimals)} ` +
          `against bill "${bill.ref}" on ledger "${ledger.name}" with ${formatAmount(available, decimals)} remaining`,
        voucherId: settlement.voucherId,
        ledgerName: ledger.name,
        billRef: bill.ref,
        amount: excess,
      });
      unreferenced.push({ settlement: { ...settlement, amount: excess }, order: pending.order });
    }
  }

  // ─── Pass 3: unreferenced settlements through the policy ─────────────

  let onAccount = 0n;

  unreferenced.sort((a, b) => a.order - b.order);

  for (const { settlement } of unreferenced) {
    const opposite: EntrySide = settlement.direction === "debit" ? "credit" : "debit";
    const open = queue.filter(
      (b) => b.direction === opposite && b.remaining > 0n && b.raisedOn <= settlement.date,
    );
    const candidates: OpenBillSlot[] = open.map((b) => ({
      ref: b.ref,
      billDate: b.billDate,
      remaining: b.remaining,
    }));

    const left = policy.settle({
      settlement,
      candidates,
      allocate: (ref: string, amount: bigint): void => {
        const bill = open.find((b) => b.ref === ref);
        if (bill === undefined) {
          throw new RangeError(`Policy "${policy.name}" allocated to bill "${ref}", which is not open`);
        }
        if (amount <= 0n || amount > bill.remaining) {
          throw new RangeError(
            `Policy "${policy.name}" allocated ${amount.toString()} to bill "${ref}" with ${bill.remaining.toString()} remaining`,
          );
        }
        apply(bill, amount, settlement, false);
      },
    });

    if (left < 0n || left > settlement.amount) {
      throw new RangeError(`Policy "${policy.name}" returned an invalid remainder: ${left.toString()}`);
    }

    onAccount += settlement.direction === "debit" ? left : -left;
  }

  const frozen = queue.map(freeze);

  return {
    ledger,
    bills: frozen,
    openBills: frozen.filter((b) => b.remaining > 0n),
    onAccount,
    allocations,
    issues,
  };
}
