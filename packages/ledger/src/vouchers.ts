/**
 * @ledgerview/ledger — Voucher ordering and validation.
 *
 * Rules:
 * - Ordering is total and independent of input order: date, then the
 *   voucher key, so repeated requests produce identical output
 * - Vouchers whose legs do not sum to zero are reported, never fixed up
 */

import { ledgerKey } from "@ledgerview/types";
import type { Leg, Voucher } from "@ledgerview/types";
import { formatAmount, sumAmounts } from "./money-math.js";
import type { DataIssue } from "./types.js";

const NUMERIC_KEY = /^\d+$/;

/**
 * Compare voucher ordering keys.
 *
 * Purely numeric ids (the upstream master ids) compare by value, so
 * "99" sorts before "102". Anything else compares by UTF-16 code unit,
 * which is locale-independent.
 */
export function compareVoucherKeys(a: string, b: string): number {
  if (NUMERIC_KEY.test(a) && NUMERIC_KEY.test(b)) {
    const x = a.replace(/^0+(?=\d)/, "");
    const y = b.replace(/^0+(?=\d)/, "");
    if (x.length !== y.length) return x.length - y.length;
  }
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Chronological voucher order: date ascending, then voucher key ascending.
 */
export function compareVouchers(a: Voucher, b: Voucher): number {
  if (a.date !== b.date) {
    return a.date < b.date ? -1 : 1;
  }
  return compareVoucherKeys(a.id, b.id);
}

export function sortVouchers(vouchers: readonly Voucher[]): Voucher[] {
  return [...vouchers].sort(compareVouchers);
}

/**
 * Legs of a voucher posted against the given ledger.
 */
export function legsForLedger(voucher: Voucher, ledgerName: string): readonly Leg[] {
  const key = ledgerKey(ledgerName);
  return voucher.legs.filter((leg) => ledgerKey(leg.ledgerName) === key);
}

export function touchesLedger(voucher: Voucher, ledgerName: string): boolean {
  return legsForLedger(voucher, ledgerName).length > 0;
}

/**
 * Find vouchers whose legs do not balance (debits ≠ credits).
 */
export function findUnbalancedVouchers(
  vouchers: readonly Voucher[],
  decimals: number,
): readonly DataIssue[] {
  const issues: DataIssue[] = [];

  for (const voucher of vouchers) {
    const net = sumAmounts(voucher.legs.map((leg) => leg.amount));
    if (net !== 0n) {
      issues.push({
        kind: "unbalanced-voucher",
        message: `Voucher "${voucher.id}" (${voucher.voucherType} ${voucher.voucherNumber}) is unbalanced by ${formatAmount(net, decimals)}`,
        voucherId: voucher.id,
        amount: net,
      });
    }
  }

  return issues;
}
