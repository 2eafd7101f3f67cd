/**
 * Sales register: every sales voucher in a date range with its invoice
 * total, plus a month-wise summary with a running total.
 *
 * A voucher counts as a sale when its type contains "SALES" ("Sales",
 * "GST Sales"). Its amount is the sum of its credit legs, so tax lines
 * are included; vouchers crediting nothing are left out.
 */

import { ledgerKey } from "@ledgerview/types";
import type { IsoDate, Voucher } from "@ledgerview/types";
import type { SalesEntry, SalesMonth, SalesRegister } from "./types.js";

const MONTH_NAMES = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
] as const;

export function isSalesVoucher(voucher: Voucher): boolean {
  return ledgerKey(voucher.voucherType).includes("SALES");
}

/** Financial year (1 April to 31 March) containing a date. */
export function financialYear(date: IsoDate): { readonly fromDate: IsoDate; readonly toDate: IsoDate } {
  const year = Number(date.slice(0, 4));
  const start = Number(date.slice(5, 7)) >= 4 ? year : year - 1;
  return {
    fromDate: `${String(start).padStart(4, "0")}-04-01`,
    toDate: `${String(start + 1).padStart(4, "0")}-03-31`,
  };
}

/** "2024-04" → "April" */
export function monthName(month: string): string {
  return MONTH_NAMES[Number(month.slice(5, 7)) - 1] ?? month;
}

/**
 * @param vouchers - chronological
 */
export function buildSalesRegister(
  vouchers: readonly Voucher[],
  fromDate: IsoDate,
  toDate: IsoDate,
): SalesRegister {
  const entries: SalesEntry[] = [];

  for (const voucher of vouchers) {
    if (voucher.date < fromDate || voucher.date > toDate || !isSalesVoucher(voucher)) continue;

    let amount = 0n;
    for (const leg of voucher.legs) {
      if (leg.amount < 0n) amount -= leg.amount;
    }
    if (amount === 0n) continue;

    const customer = voucher.legs.find((leg) => leg.amount > 0n);
    entries.push({ voucher, particulars: customer?.ledgerName ?? "-", amount });
  }

  const byMonth = new Map<string, { amount: bigint; voucherCount: number }>();
  for (const entry of entries) {
    const month = entry.voucher.date.slice(0, 7);
    const acc = byMonth.get(month) ?? { amount: 0n, voucherCount: 0 };
    acc.amount += entry.amount;
    acc.voucherCount += 1;
    byMonth.set(month, acc);
  }

  const months: SalesMonth[] = [];
  let total = 0n;
  for (const [month, acc] of byMonth) {
    total += acc.amount;
    months.push({ month, amount: acc.amount, voucherCount: acc.voucherCount, cumulative: total });
  }

  return { fromDate, toDate, entries, months, total };
}
