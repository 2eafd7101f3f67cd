/**
 * Tests for the running balance calculator.
 *
 * Covers:
 * - Row order, running balance and totals
 * - Netting of vouchers that hit the ledger on both sides
 * - Dr/Cr suffixes, including zero balances
 * - Opening balance carried from earlier vouchers
 */

import { describe, it, expect } from "vitest";
import type { Ledger, Voucher } from "@ledgerview/types";
import {
  buildStatement,
  computeOpeningBalance,
  rowAmounts,
} from "../src/balance-calculator.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const CASH: Ledger = {
  companyId: "c1",
  name: "Cash",
  nature: "asset",
  openingBalance: 100000n,
};

const CAPITAL: Ledger = {
  companyId: "c1",
  name: "Capital",
  nature: "equity",
  openingBalance: 0n,
};

function voucher(
  id: string,
  date: string,
  voucherType: string,
  legs: ReadonlyArray<readonly [string, bigint]>,
  narration?: string,
): Voucher {
  return {
    id,
    date,
    voucherType,
    voucherNumber: `${voucherType.charAt(0)}-${id}`,
    narration,
    legs: legs.map(([ledgerName, amount], i) => ({
      voucherId: id,
      lineNo: i + 1,
      ledgerName,
      amount,
    })),
  };
}

const RECEIPT = voucher("1", "2024-04-01", "Receipt", [["Cash", 50000n], ["Debtor A", -50000n]], "April dues");
const PAYMENT = voucher("2", "2024-04-03", "Payment", [["Rent", 20000n], ["Cash", -20000n]]);
const CONTRA = voucher("3", "2024-04-02", "Contra", [
  ["Cash", 10000n],
  ["Cash", -3000n],
  ["Bank", -7000n],
]);

// ─── rowAmounts ──────────────────────────────────────────────────────────

describe("rowAmounts", () => {
  it("puts a positive leg in the debit column", () => {
    expect(rowAmounts(RECEIPT, "Cash")).toEqual({ debit: 50000n, credit: 0n });
  });

  it("puts a negative leg in the credit column", () => {
    expect(rowAmounts(PAYMENT, "Cash")).toEqual({ debit: 0n, credit: 20000n });
  });

  it("nets legs on both sides", () => {
    expect(rowAmounts(CONTRA, "Cash")).toEqual({ debit: 7000n, credit: 0n });
    const reversed = voucher("4", "2024-04-02", "Journal", [["Cash", 1000n], ["Cash", -4000n], ["Bank", 3000n]]);
    expect(rowAmounts(reversed, "Cash")).toEqual({ debit: 0n, credit: 3000n });
  });
});

// ─── buildStatement ──────────────────────────────────────────────────────

describe("buildStatement", () => {
  const statement = buildStatement({
    ledger: CASH,
    fromDate: "2024-04-01",
    toDate: "2024-04-30",
    openingBalance: 100000n,
    vouchers: [RECEIPT, PAYMENT, CONTRA],
  });

  it("emits one row per voucher in date order", () => {
    expect(statement.rows.map((r) => r.voucherId)).toEqual(["1", "3", "2"]);
  });

  it("tracks the running balance", () => {
    expect(statement.rows.map((r) => r.balance)).toEqual([150000n, 157000n, 137000n]);
    expect(statement.rows.map((r) => r.balanceSide)).toEqual(["Dr", "Dr", "Dr"]);
  });

  it("computes totals and closing balance", () => {
    expect(statement.openingBalance).toBe(100000n);
    expect(statement.totalDebit).toBe(57000n);
    expect(statement.totalCredit).toBe(20000n);
    expect(statement.closingBalance).toBe(137000n);
  });

  it("fills the display columns", () => {
    expect(statement.rows[0]).toEqual({
      voucherId: "1",
      date: "2024-04-01",
      particulars: "Debtor A",
      voucherType: "Receipt",
      voucherNumber: "R-1",
      narration: "April dues",
      debit: 50000n,
      credit: 0n,
      balance: 150000n,
      balanceSide: "Dr",
    });
    expect(statement.rows.map((r) => r.particulars)).toEqual(["Debtor A", "Bank", "Rent"]);
    expect(statement.rows.map((r) => r.narration)).toEqual(["April dues", "", ""]);
  });

  it("ignores vouchers outside the range or not touching the ledger", () => {
    const result = buildStatement({
      ledger: CASH,
      fromDate: "2024-04-02",
      toDate: "2024-04-02",
      openingBalance: 0n,
      vouchers: [
        RECEIPT,
        PAYMENT,
        CONTRA,
        voucher("9", "2024-04-02", "Journal", [["Rent", 10n], ["Bank", -10n]]),
      ],
    });
    expect(result.rows.map((r) => r.voucherId)).toEqual(["3"]);
  });

  it("shows a balance crossing zero on the other side", () => {
    const result = buildStatement({
      ledger: CASH,
      fromDate: "2024-04-01",
      toDate: "2024-04-30",
      openingBalance: 10000n,
      vouchers: [PAYMENT],
    });
    expect(result.rows.map((r) => [r.balance, r.balanceSide])).toEqual([[-10000n, "Cr"]]);
    expect(result.closingBalance).toBe(-10000n);
  });

  it("shows a zero balance on the ledger's normal side", () => {
    const result = buildStatement({
      ledger: CAPITAL,
      fromDate: "2024-04-01",
      toDate: "2024-04-30",
      openingBalance: -500n,
      vouchers: [voucher("5", "2024-04-10", "Journal", [["Capital", 500n], ["Cash", -500n]])],
    });
    expect(result.rows.map((r) => [r.balance, r.balanceSide])).toEqual([[0n, "Cr"]]);
  });

  it("returns an empty statement when nothing was posted", () => {
    const result = buildStatement({
      ledger: CAPITAL,
      fromDate: "2024-04-01",
      toDate: "2024-04-30",
      openingBalance: 0n,
      vouchers: [],
    });
    expect(result.rows).toEqual([]);
    expect(result.totalDebit).toBe(0n);
    expect(result.totalCredit).toBe(0n);
    expect(result.closingBalance).toBe(0n);
  });
});

// ─── computeOpeningBalance ───────────────────────────────────────────────

describe("computeOpeningBalance", () => {
  it("adds legs dated strictly before the start date", () => {
    expect(computeOpeningBalance(CASH, [RECEIPT, PAYMENT, CONTRA], "2024-04-03")).toBe(157000n);
  });

  it("is the book opening balance when nothing precedes the range", () => {
    expect(computeOpeningBalance(CASH, [RECEIPT], "2024-04-01")).toBe(100000n);
  });
});
