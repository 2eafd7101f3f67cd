/**
 * Ageing classifier: due dates, overdue days and buckets for open bills.
 */

import { NORMAL_BALANCE, addDays, daysBetween } from "@ledgerview/ledger";
import type { AgeingBucket, IsoDate, Ledger } from "@ledgerview/types";
import type { Bill, ClassifiedBill } from "./types.js";

export const AGEING_BUCKETS: readonly AgeingBucket[] = ["0-30", "31-60", "61-90", "90+"];

/**
 * Explicit due date, else bill date plus the credit period of the bill,
 * else of the ledger, else zero days.
 */
export function computeDueDate(bill: Bill, ledger: Ledger): IsoDate {
  if (bill.dueDate !== undefined) {
    return bill.dueDate;
  }
  const period = bill.creditPeriodDays ?? ledger.creditPeriodDays ?? 0;
  return addDays(bill.billDate, period);
}

/** Whole days past due as of a date; zero until the due date has passed. */
export function overdueDays(dueDate: IsoDate, asOnDate: IsoDate): number {
  return Math.max(0, daysBetween(dueDate, asOnDate));
}

export function ageingBucket(days: number): AgeingBucket {
  if (days <= 30) return "0-30";
  if (days <= 60) return "31-60";
  if (days <= 90) return "61-90";
  return "90+";
}

export function classifyBill(bill: Bill, ledger: Ledger, asOnDate: IsoDate): ClassifiedBill {
  const dueDate = computeDueDate(bill, ledger);
  const days = overdueDays(dueDate, asOnDate);

  return {
    bill,
    dueDate,
    overdueDays: days,
    bucket: ageingBucket(days),
    // Direction alone decides the side, whatever the ledger's nature
    isReceivable: bill.direction === "debit",
    // A credit bill on a debtor-like ledger is an advance received, and vice versa
    isAdvance: bill.direction !== NORMAL_BALANCE[ledger.nature],
  };
}

export function classifyBills(
  bills: readonly Bill[],
  ledger: Ledger,
  asOnDate: IsoDate,
): ClassifiedBill[] {
  return bills.map((bill) => classifyBill(bill, ledger, asOnDate));
}
