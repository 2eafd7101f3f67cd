/**
 * Outstanding Aggregator
 *
 * Folds classified open bills into report lines, per-ledger subtotals,
 * grand totals and the ageing summary.
 *
 * Rules:
 * - Ledgers keep the order they are given in; bills keep FIFO order
 * - Receivables and payables are magnitudes, never netted together
 * - A ledger contributes to ledgerCount only when it lists a bill
 */

import { NORMAL_BALANCE, absAmount, balanceSide } from "@ledgerview/ledger";
import type { AgeingBucket, IsoDate, OutstandingReportType } from "@ledgerview/types";
import type {
  ClassifiedBill,
  LedgerOutstanding,
  LedgerSubtotal,
  OnAccountBalance,
  OutstandingLine,
  OutstandingSummary,
} from "./types.js";

export function matchesReportType(entry: ClassifiedBill, reportType: OutstandingReportType): boolean {
  switch (reportType) {
    case "receivables":
      return entry.isReceivable;
    case "payables":
      return !entry.isReceivable;
    case "both":
      return true;
  }
}

function onAccountMatches(amount: bigint, reportType: OutstandingReportType): boolean {
  switch (reportType) {
    case "receivables":
      return amount > 0n;
    case "payables":
      return amount < 0n;
    case "both":
      return amount !== 0n;
  }
}

export function aggregateOutstanding(
  ledgers: readonly LedgerOutstanding[],
  reportType: OutstandingReportType,
  asOnDate: IsoDate,
): OutstandingSummary {
  const lines: OutstandingLine[] = [];
  const subtotals: LedgerSubtotal[] = [];
  const onAccount: OnAccountBalance[] = [];
  const ageing: Record<AgeingBucket, bigint> = {
    "0-30": 0n,
    "31-60": 0n,
    "61-90": 0n,
    "90+": 0n,
  };

  let totalReceivables = 0n;
  let totalPayables = 0n;

  for (const item of ledgers) {
    const normal = NORMAL_BALANCE[item.ledger.nature];
    const listed = item.bills.filter((entry) => matchesReportType(entry, reportType));

    let balance = 0n;
    let receivables = 0n;
    let payables = 0n;

    for (const entry of listed) {
      const remaining = entry.bill.remaining;
      if (entry.isReceivable) {
        receivables += remaining;
        balance += remaining;
      } else {
        payables += remaining;
        balance -= remaining;
      }
      ageing[entry.bucket] += remaining;

      lines.push({
        ledger: item.ledger,
        entry,
        balance,
        balanceSide: balanceSide(balance, normal),
      });
    }

    if (listed.length > 0) {
      subtotals.push({
        ledgerName: item.ledger.name,
        receivables,
        payables,
        billCount: listed.length,
      });
      totalReceivables += receivables;
      totalPayables += payables;
    }

    if (onAccountMatches(item.onAccount, reportType)) {
      onAccount.push({
        ledgerName: item.ledger.name,
        amount: absAmount(item.onAccount),
        side: balanceSide(item.onAccount, normal),
      });
    }
  }

  return {
    reportType,
    asOnDate,
    lines,
    subtotals,
    onAccount,
    totalReceivables,
    totalPayables,
    ledgerCount: subtotals.length,
    ageing,
  };
}
