/**
 * Tests for the ageing classifier.
 */

import { describe, it, expect } from "vitest";
import type { Ledger } from "@ledgerview/types";
import {
  ageingBucket,
  classifyBill,
  computeDueDate,
  overdueDays,
} from "../src/ageing.js";
import type { Bill } from "../src/types.js";

const DEBTOR: Ledger = {
  companyId: "c1",
  name: "Customer A",
  nature: "asset",
  openingBalance: 0n,
};

function bill(overrides: Partial<Bill> = {}): Bill {
  return {
    ref: "INV-1",
    ledgerName: "Customer A",
    billDate: "2024-04-10",
    billType: "New Ref",
    direction: "debit",
    originalAmount: 1000n,
    remaining: 1000n,
    voucherId: "1",
    voucherType: "Sales",
    voucherNumber: "S-1",
    sequence: 0,
    allocations: [],
    ...overrides,
  };
}

describe("computeDueDate", () => {
  it("prefers an explicit due date", () => {
    expect(computeDueDate(bill({ dueDate: "2024-06-01", creditPeriodDays: 5 }), DEBTOR)).toBe("2024-06-01");
  });

  it("adds the bill's credit period to the bill date", () => {
    expect(computeDueDate(bill({ creditPeriodDays: 15 }), { ...DEBTOR, creditPeriodDays: 30 })).toBe("2024-04-25");
  });

  it("falls back to the ledger's credit period", () => {
    expect(computeDueDate(bill(), { ...DEBTOR, creditPeriodDays: 30 })).toBe("2024-05-10");
  });

  it("is the bill date when no period is known", () => {
    expect(computeDueDate(bill(), DEBTOR)).toBe("2024-04-10");
  });
});

describe("overdueDays", () => {
  it("is zero on or before the due date", () => {
    expect(overdueDays("2024-04-25", "2024-04-20")).toBe(0);
    expect(overdueDays("2024-04-25", "2024-04-25")).toBe(0);
  });

  it("counts whole days after the due date", () => {
    expect(overdueDays("2024-04-25", "2024-05-25")).toBe(30);
    expect(overdueDays("2024-02-28", "2024-03-01")).toBe(2);
  });
});

describe("ageingBucket", () => {
  it.each([
    [0, "0-30"],
    [30, "0-30"],
    [31, "31-60"],
    [60, "31-60"],
    [61, "61-90"],
    [90, "61-90"],
    [91, "90+"],
    [400, "90+"],
  ] as const)("puts %i days in %s", (days, bucket) => {
    expect(ageingBucket(days)).toBe(bucket);
  });
});

describe("classifyBill", () => {
  it("classifies a debit bill on a debtor as a receivable", () => {
    expect(classifyBill(bill(), DEBTOR, "2024-05-20")).toEqual({
      bill: bill(),
      dueDate: "2024-04-10",
      overdueDays: 40,
      bucket: "31-60",
      isReceivable: true,
      isAdvance: false,
    });
  });

  it("classifies a credit bill on a debtor as an advance payable", () => {
    const advance = classifyBill(bill({ direction: "credit", billType: "Advance" }), DEBTOR, "2024-04-10");
    expect([advance.isReceivable, advance.isAdvance, advance.overdueDays]).toEqual([false, true, 0]);
  });

  it("classifies a credit bill on a creditor as a regular payable", () => {
    const supplier: Ledger = { ...DEBTOR, name: "Supplier B", nature: "liability" };
    const payable = classifyBill(bill({ direction: "credit" }), supplier, "2024-04-10");
    expect([payable.isReceivable, payable.isAdvance]).toEqual([false, false]);
  });

  it("classifies a debit bill on a creditor as an advance receivable", () => {
    const supplier: Ledger = { ...DEBTOR, name: "Supplier B", nature: "liability" };
    const advance = classifyBill(bill({ billType: "Advance" }), supplier, "2024-04-10");
    expect([advance.isReceivable, advance.isAdvance]).toEqual([true, true]);
  });
});
