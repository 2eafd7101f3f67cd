import { describe, it, expect } from "vitest";
import { ReportError } from "@ledgerview/ledger";
import type { RawLegRow } from "@ledgerview/types";
import { TransactionLoader } from "../src/loader.js";
import { createBooks } from "./fixtures.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

function row(overrides: Partial<RawLegRow> & Pick<RawLegRow, "voucher_id" | "ledger_name" | "amount">): RawLegRow {
  return {
    date: "2024-04-01",
    voucher_type: "Journal",
    voucher_number: "J-1",
    ...overrides,
  };
}

function loader(): TransactionLoader {
  return new TransactionLoader(createBooks(), { now: () => new Date("2024-07-01T00:00:00Z") });
}

function capture(run: () => unknown): ReportError {
  try {
    run();
  } catch (err) {
    if (err instanceof ReportError) return err;
    throw err;
  }
  throw new Error("expected a ReportError");
}

// ─── Normalization ───────────────────────────────────────────────────────

describe("TransactionLoader.toVouchers", () => {
  it("groups rows into chronological vouchers with legs in line order", () => {
    const vouchers = loader().toVouchers([
      row({ voucher_id: "9", date: "05-04-2024", ledger_name: "Cash", amount: "-50", line_no: 2 }),
      row({ voucher_id: "9", date: "05-04-2024", ledger_name: " Rent ", amount: "50", line_no: 1, narration: "April rent" }),
      row({ voucher_id: "3", date: "2024-04-02", ledger_name: "Cash", amount: 10 }),
      row({ voucher_id: "3", date: "2024-04-02", ledger_name: "Capital", amount: -10 }),
    ]);

    expect(vouchers.map((v) => [v.id, v.date, v.narration])).toEqual([
      ["3", "2024-04-02", undefined],
      ["9", "2024-04-05", "April rent"],
    ]);
    expect(vouchers[1]?.legs.map((l) => [l.lineNo, l.ledgerName, l.amount])).toEqual([
      [1, "Rent", 5000n],
      [2, "Cash", -5000n],
    ]);
    expect(vouchers[0]?.legs.map((l) => l.lineNo)).toEqual([1, 2]);
  });

  it("reads Dr/Cr markers and thousands separators", () => {
    const [voucher] = loader().toVouchers([
      row({ voucher_id: "1", ledger_name: "Customer", amount: "1,180.00 Dr" }),
      row({ voucher_id: "1", ledger_name: "Sales", amount: "1,180.00 Cr" }),
    ]);
    expect(voucher?.legs.map((l) => l.amount)).toEqual([118000n, -118000n]);
  });

  it("normalizes bill references and ignores blank ones", () => {
    const [voucher] = loader().toVouchers([
      row({
        voucher_id: "1",
        ledger_name: "Customer",
        amount: "100",
        bill_reference: " INV-9 ",
        bill_type: "New Ref",
        bill_date: "15-03-2024",
        due_date: "2024-04-14",
        credit_period_days: 30,
      }),
      row({ voucher_id: "1", ledger_name: "Sales", amount: "-100", bill_reference: "   " }),
    ]);

    expect(voucher?.legs[0]?.bill).toEqual({
      ref: "INV-9",
      type: "New Ref",
      billDate: "2024-03-15",
      dueDate: "2024-04-14",
      creditPeriodDays: 30,
    });
    expect(voucher?.legs[1]?.bill).toBeUndefined();
  });

  it("names the row behind a malformed amount", () => {
    const err = capture(() =>
      loader().toVouchers([row({ voucher_id: "5", ledger_name: "Cash", amount: "twelve" })]),
    );
    expect(err.code).toBe("INVALID_AMOUNT");
    expect(err.details).toMatchObject({ voucherId: "5", ledgerName: "Cash" });
  });
});

describe("TransactionLoader.toLedger", () => {
  it("defaults a missing opening balance to zero and drops blank groups", () => {
    const ledger = loader().toLedger({
      company_id: "c1",
      name: " Petty Cash ",
      nature: "asset",
      opening_balance: null,
      group: "  ",
    });
    expect(ledger).toEqual({
      companyId: "c1",
      name: "Petty Cash",
      nature: "asset",
      openingBalance: 0n,
      creditPeriodDays: undefined,
      group: undefined,
    });
  });
});

describe("TransactionLoader dates", () => {
  it("reads ambiguous dates month first when configured", () => {
    const monthFirst = new TransactionLoader(createBooks(), { dayFirst: false });
    expect(monthFirst.parseDate("04-05-2024")).toBe("2024-04-05");
    expect(loader().parseDate("04-05-2024")).toBe("2024-05-04");
  });

  it("takes today from the injected clock", () => {
    expect(loader().today()).toBe("2024-07-01");
  });
});

// ─── Loading ─────────────────────────────────────────────────────────────

describe("TransactionLoader.load", () => {
  it("loads every leg of the vouchers touching the ledger", async () => {
    const loaded = await loader().load({ companyId: "c1", ledgerName: "Customer A" });

    expect(loaded.vouchers.map((v) => v.id)).toEqual(["1", "2"]);
    expect(loaded.vouchers[1]?.legs.map((l) => l.ledgerName)).toEqual(["Bank", "Customer A"]);
    expect(loaded.openingBalance).toBe(0n);
  });

  it("computes the opening balance from earlier vouchers", async () => {
    const loaded = await loader().load({ companyId: "c2", ledgerName: "Customer B", fromDate: "2024-04-10" });

    expect(loaded.openingBalance).toBe(118000n);
    expect(loaded.vouchers.map((v) => v.id)).toEqual(["11"]);
    expect([loaded.fromDate, loaded.toDate]).toEqual(["2024-04-10", "2024-04-15"]);
  });

  it("never defaults the end date before a requested start", async () => {
    const loaded = await loader().load({ companyId: "c1", ledgerName: "Sales", fromDate: "2024-06-01" });
    expect([loaded.fromDate, loaded.toDate]).toEqual(["2024-06-01", "2024-06-01"]);
  });
});
