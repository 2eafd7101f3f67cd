/**
 * Party-wise outstanding summary.
 *
 * A party is a ledger in a debtor or creditor group, or any ledger that
 * carries bill references. Parties with a zero balance are omitted; the
 * rest are ordered by balance magnitude, largest first, then by name.
 */

import { absAmount } from "@ledgerview/ledger";
import { ledgerKey } from "@ledgerview/types";
import type { IsoDate, Ledger, Voucher } from "@ledgerview/types";
import type { PartyBalance } from "./types.js";

const PARTY_GROUPS: ReadonlySet<string> = new Set(["SUNDRY DEBTORS", "SUNDRY CREDITORS"]);

interface Accumulator {
  debit: bigint;
  credit: bigint;
  count: number;
  firstDate: IsoDate | null;
  lastDate: IsoDate | null;
}

/**
 * Keys of ledgers that carry at least one bill reference.
 */
export function billLedgerKeys(vouchers: readonly Voucher[]): Set<string> {
  const keys = new Set<string>();
  for (const voucher of vouchers) {
    for (const leg of voucher.legs) {
      if (leg.bill !== undefined) keys.add(ledgerKey(leg.ledgerName));
    }
  }
  return keys;
}

export function isParty(ledger: Ledger, billLedgers: ReadonlySet<string>): boolean {
  const group = ledger.group !== undefined ? ledgerKey(ledger.group) : "";
  return PARTY_GROUPS.has(group) || billLedgers.has(ledgerKey(ledger.name));
}

/**
 * @param vouchers - chronological; those after `asOnDate` are ignored
 */
export function summarizeParties(
  ledgers: readonly Ledger[],
  vouchers: readonly Voucher[],
  asOnDate?: IsoDate,
): PartyBalance[] {
  const included = asOnDate === undefined ? vouchers : vouchers.filter((v) => v.date <= asOnDate);
  const billLedgers = billLedgerKeys(included);
  const parties = ledgers.filter((ledger) => isParty(ledger, billLedgers));

  const totals = new Map<string, Accumulator>();
  for (const ledger of parties) {
    totals.set(ledgerKey(ledger.name), { debit: 0n, credit: 0n, count: 0, firstDate: null, lastDate: null });
  }

  for (const voucher of included) {
    const touched = new Set<string>();
    for (const leg of voucher.legs) {
      const key = ledgerKey(leg.ledgerName);
      const acc = totals.get(key);
      if (acc === undefined) continue;

      if (leg.amount > 0n) acc.debit += leg.amount;
      else acc.credit -= leg.amount;

      if (!touched.has(key)) {
        touched.add(key);
        acc.count += 1;
        if (acc.firstDate === null) acc.firstDate = voucher.date;
        acc.lastDate = voucher.date;
      }
    }
  }

  const result: PartyBalance[] = [];
  for (const ledger of parties) {
    const acc = totals.get(ledgerKey(ledger.name));
    if (acc === undefined) continue;

    const balance = ledger.openingBalance + acc.debit - acc.credit;
    if (balance === 0n) continue;

    result.push({
      ledger,
      debit: acc.debit,
      credit: acc.credit,
      balance,
      transactionCount: acc.count,
      firstDate: acc.firstDate,
      lastDate: acc.lastDate,
    });
  }

  return result.sort((a, b) => {
    const x = absAmount(a.balance);
    const y = absAmount(b.balance);
    if (x !== y) return x > y ? -1 : 1;
    return a.ledger.name < b.ledger.name ? -1 : a.ledger.name > b.ledger.name ? 1 : 0;
  });
}
