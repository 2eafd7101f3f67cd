/**
 * Company dashboard figures.
 *
 * Activity totals count vouchers and sum their legs by side. Top debtors
 * and creditors come from the party summary, so they follow the same
 * party rules and opening balances.
 */

import { ledgerKey } from "@ledgerview/types";
import type { IsoDate, Ledger, Voucher } from "@ledgerview/types";
import { billLedgerKeys, isParty, summarizeParties } from "./party-summary.js";
import type { DashboardData } from "./types.js";

export const DEFAULT_TOP_PARTIES = 10;

interface Tally {
  count: number;
  debit: bigint;
  credit: bigint;
}

function emptyTally(): Tally {
  return { count: 0, debit: 0n, credit: 0n };
}

function addVoucher(tally: Tally, voucher: Voucher): void {
  tally.count += 1;
  for (const leg of voucher.legs) {
    if (leg.amount > 0n) tally.debit += leg.amount;
    else tally.credit -= leg.amount;
  }
}

function tallyBy(vouchers: readonly Voucher[], keyOf: (voucher: Voucher) => string): Map<string, Tally> {
  const tallies = new Map<string, Tally>();
  for (const voucher of vouchers) {
    const key = keyOf(voucher);
    const tally = tallies.get(key) ?? emptyTally();
    addVoucher(tally, voucher);
    tallies.set(key, tally);
  }
  return tallies;
}

/**
 * @param vouchers - chronological; those after `asOnDate` are ignored
 * @param limit - parties listed per side
 */
export function summarizeDashboard(
  ledgers: readonly Ledger[],
  vouchers: readonly Voucher[],
  asOnDate: IsoDate | undefined,
  limit: number,
): DashboardData {
  const included = asOnDate === undefined ? vouchers : vouchers.filter((v) => v.date <= asOnDate);

  const billLedgers = billLedgerKeys(included);
  const partyKeys = new Set(ledgers.filter((l) => isParty(l, billLedgers)).map((l) => ledgerKey(l.name)));
  const activeParties = new Set<string>();
  const totals = emptyTally();

  for (const voucher of included) {
    addVoucher(totals, voucher);
    for (const leg of voucher.legs) {
      const key = ledgerKey(leg.ledgerName);
      if (partyKeys.has(key)) activeParties.add(key);
    }
  }

  const parties = summarizeParties(ledgers, included);

  const voucherTypes = [...tallyBy(included, (v) => v.voucherType)]
    .map(([voucherType, tally]) => ({ voucherType, ...tally }))
    .sort((a, b) => b.count - a.count || (a.voucherType < b.voucherType ? -1 : a.voucherType > b.voucherType ? 1 : 0));

  // Vouchers are chronological, so months come out in order
  const monthly = [...tallyBy(included, (v) => v.date.slice(0, 7))].map(([month, tally]) => ({ month, ...tally }));

  return {
    partyCount: activeParties.size,
    totals,
    firstDate: included[0]?.date ?? null,
    lastDate: included.at(-1)?.date ?? null,
    topDebtors: parties.filter((p) => p.balance > 0n).slice(0, limit),
    topCreditors: parties.filter((p) => p.balance < 0n).slice(0, limit),
    voucherTypes,
    monthly,
  };
}
