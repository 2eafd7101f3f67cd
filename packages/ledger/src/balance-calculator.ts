/**
 * @ledgerview/ledger — Running balance calculator.
 *
 * Folds vouchers into a per-ledger statement with a running balance.
 * All calculations are deterministic using bigint arithmetic.
 *
 * Rules:
 * - One row per voucher, never one per leg
 * - Rows ordered by date, then voucher key (stable across requests)
 * - A row never shows both a debit and a credit: they are netted
 * - closing = opening + total debit - total credit, exactly
 */

import type { IsoDate, Ledger, Voucher } from "@ledgerview/types";
import { balanceSide } from "./money-math.js";
import { resolveParticulars } from "./particulars.js";
import type { LedgerStatement, StatementRow } from "./types.js";
import { NORMAL_BALANCE } from "./types.js";
import { legsForLedger, sortVouchers } from "./vouchers.js";

/**
 * Input for a statement computation.
 */
export interface StatementInput {
  readonly ledger: Ledger;
  readonly fromDate: IsoDate;
  readonly toDate: IsoDate;
  /** Balance as of fromDate, minor units, debit positive */
  readonly openingBalance: bigint;
  readonly vouchers: readonly Voucher[];
}

/**
 * Debit and credit columns for one row.
 */
export interface RowAmounts {
  readonly debit: bigint;
  readonly credit: bigint;
}

/**
 * Split a voucher's legs against the ledger into debit and credit columns,
 * netting them when both sides are present.
 */
export function rowAmounts(voucher: Voucher, ledgerName: string): RowAmounts {
  let debit = 0n;
  let credit = 0n;

  for (const leg of legsForLedger(voucher, ledgerName)) {
    if (leg.amount > 0n) {
      debit += leg.amount;
    } else {
      credit -= leg.amount;
    }
  }

  if (debit !== 0n && credit !== 0n) {
    const net = debit - credit;
    return net >= 0n ? { debit: net, credit: 0n } : { debit: 0n, credit: -net };
  }

  return { debit, credit };
}

/**
 * Opening balance of a ledger as of `fromDate`: the book opening balance
 * plus every leg against the ledger dated strictly before `fromDate`.
 */
export function computeOpeningBalance(
  ledger: Ledger,
  vouchers: readonly Voucher[],
  fromDate: IsoDate,
): bigint {
  let balance = ledger.openingBalance;

  for (const voucher of vouchers) {
    if (voucher.date >= fromDate) continue;
    for (const leg of legsForLedger(voucher, ledger.name)) {
      balance += leg.amount;
    }
  }

  return balance;
}

/**
 * Build the running-balance statement for a ledger.
 *
 * Vouchers outside [fromDate, toDate] or without a leg against the
 * ledger are ignored.
 */
export function buildStatement(input: StatementInput): LedgerStatement {
  const { ledger, fromDate, toDate, openingBalance } = input;
  const normal = NORMAL_BALANCE[ledger.nature];

  const vouchers = sortVouchers(input.vouchers).filter(
    (v) => v.date >= fromDate && v.date <= toDate && legsForLedger(v, ledger.name).length > 0,
  );

  const rows: StatementRow[] = [];
  let balance = openingBalance;
  let totalDebit = 0n;
  let totalCredit = 0n;

  for (const voucher of vouchers) {
    const { debit, credit } = rowAmounts(voucher, ledger.name);

    balance += debit - credit;
    totalDebit += debit;
    totalCredit += credit;

    rows.push({
      voucherId: voucher.id,
      date: voucher.date,
      particulars: resolveParticulars(voucher, ledger.name),
      voucherType: voucher.voucherType,
      voucherNumber: voucher.voucherNumber,
      narration: voucher.narration ?? "",
      debit,
      credit,
      balance,
      balanceSide: balanceSide(balance, normal),
    });
  }

  return {
    ledger,
    fromDate,
    toDate,
    openingBalance,
    totalDebit,
    totalCredit,
    closingBalance: openingBalance + totalDebit - totalCredit,
    rows,
  };
}
