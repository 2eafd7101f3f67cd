import { describe, it, expect } from "vitest";
import type { Voucher } from "@ledgerview/types";
import {
  buildSalesRegister,
  financialYear,
  isSalesVoucher,
  monthName,
} from "../src/sales-register.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

function voucher(
  id: string,
  date: string,
  voucherType: string,
  legs: ReadonlyArray<[string, bigint]>,
  narration?: string,
): Voucher {
  return {
    id,
    date,
    voucherType,
    voucherNumber: id,
    narration,
    legs: legs.map(([ledgerName, amount], index) => ({ voucherId: id, lineNo: index + 1, ledgerName, amount })),
  };
}

const BOOKS: readonly Voucher[] = [
  voucher("G-1", "2024-03-28", "GST Sales", [["Customer A", 11800n], ["Sales", -10000n], ["Output GST", -1800n]]),
  voucher("S-2", "2024-04-02", "Sales", [["Cash", 5000n], ["Sales", -5000n]], "Counter sale"),
  voucher("R-1", "2024-04-15", "Receipt", [["Bank", 11800n], ["Customer A", -11800n]]),
  voucher("S-3", "2024-05-06", "Sales", [["Customer B", 20000n], ["Sales", -20000n]]),
];

// ─── Tests ───────────────────────────────────────────────────────────────

describe("isSalesVoucher", () => {
  it("matches any voucher type containing SALES", () => {
    expect(BOOKS.map(isSalesVoucher)).toEqual([true, true, false, true]);
  });
});

describe("financialYear", () => {
  it("runs from 1 April to 31 March", () => {
    expect(financialYear("2024-04-01")).toEqual({ fromDate: "2024-04-01", toDate: "2025-03-31" });
    expect(financialYear("2024-03-31")).toEqual({ fromDate: "2023-04-01", toDate: "2024-03-31" });
  });
});

describe("monthName", () => {
  it("names the month of a YYYY-MM key", () => {
    expect(monthName("2024-01")).toBe("January");
    expect(monthName("2024-12")).toBe("December");
  });
});

describe("buildSalesRegister", () => {
  it("totals each invoice's credit legs, tax included", () => {
    const register = buildSalesRegister(BOOKS, "2024-03-01", "2024-05-31");
    expect(register.entries.map((e) => [e.voucher.id, e.particulars, e.amount])).toEqual([
      ["G-1", "Customer A", 11800n],
      ["S-2", "Cash", 5000n],
      ["S-3", "Customer B", 20000n],
    ]);
    expect(register.total).toBe(36800n);
  });

  it("summarizes months with a running total", () => {
    const register = buildSalesRegister(BOOKS, "2024-03-01", "2024-05-31");
    expect(register.months).toEqual([
      { month: "2024-03", amount: 11800n, voucherCount: 1, cumulative: 11800n },
      { month: "2024-04", amount: 5000n, voucherCount: 1, cumulative: 16800n },
      { month: "2024-05", amount: 20000n, voucherCount: 1, cumulative: 36800n },
    ]);
  });

  it("keeps only vouchers inside the range", () => {
    const register = buildSalesRegister(BOOKS, "2024-04-01", "2024-04-30");
    expect(register.entries.map((e) => e.voucher.id)).toEqual(["S-2"]);
    expect([register.fromDate, register.toDate, register.total]).toEqual(["2024-04-01", "2024-04-30", 5000n]);
  });

  it("leaves out a sales voucher that credits nothing", () => {
    const empty = voucher("S-4", "2024-04-10", "Sales", [["Sales", 0n]]);
    expect(buildSalesRegister([empty], "2024-04-01", "2024-04-30").entries).toEqual([]);
  });

  it("shows a dash when no ledger is debited", () => {
    const oneSided = voucher("S-5", "2024-04-10", "Sales", [["Sales", -700n]]);
    expect(buildSalesRegister([oneSided], "2024-04-01", "2024-04-30").entries[0]?.particulars).toBe("-");
  });
});
