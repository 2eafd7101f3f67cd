/**
 * Tests for InMemoryTransactionStore.
 */

import { describe, it, expect } from "vitest";
import { InMemoryTransactionStore } from "../src/in-memory-store.js";
import type { StoredLegRow } from "../src/types.js";

function row(company_id: string, voucher_id: string, ledger_name: string, amount: string): StoredLegRow {
  return {
    company_id,
    voucher_id,
    date: "2024-04-10",
    voucher_type: "Journal",
    voucher_number: voucher_id,
    ledger_name,
    amount,
  };
}

const store = new InMemoryTransactionStore({
  companies: [
    { id: "c1", name: "Acme Traders" },
    { id: "c2", name: "Other Books" },
  ],
  ledgers: [
    { company_id: "c1", name: "Cash", nature: "asset" },
    { company_id: "c1", name: "Sales", nature: "income" },
    { company_id: "c2", name: "Bank", nature: "asset" },
  ],
  rows: [
    row("c1", "1", "Cash", "100.00"),
    row("c1", "1", "Sales", "-100.00"),
    row("c1", "2", " CASH ", "-40.00"),
    row("c1", "2", "Rent", "40.00"),
    row("c2", "9", "Bank", "5.00"),
  ],
});

describe("InMemoryTransactionStore", () => {
  it("returns companies by id", async () => {
    expect(await store.getCompany("c1")).toEqual({ id: "c1", name: "Acme Traders" });
    expect(await store.getCompany("missing")).toBeUndefined();
  });

  it("lists companies in import order", async () => {
    expect((await store.listCompanies()).map((c) => c.id)).toEqual(["c1", "c2"]);
  });

  it("lists a company's ledgers in import order", async () => {
    const ledgers = await store.listLedgers("c1");
    expect(ledgers.map((l) => l.name)).toEqual(["Cash", "Sales"]);
    expect(await store.listLedgers("missing")).toEqual([]);
  });

  it("returns rows without the company column", async () => {
    const rows = await store.readRows("c2");
    expect(rows).toEqual([
      {
        voucher_id: "9",
        date: "2024-04-10",
        voucher_type: "Journal",
        voucher_number: "9",
        ledger_name: "Bank",
        amount: "5.00",
      },
    ]);
  });

  it("filters rows by ledger key", async () => {
    const rows = await store.readRows("c1", { ledgerName: "cash" });
    expect(rows.map((r) => [r.voucher_id, r.amount])).toEqual([
      ["1", "100.00"],
      ["2", "-40.00"],
    ]);
  });

  it("filters rows by voucher id", async () => {
    const rows = await store.readRows("c1", { voucherIds: ["2"] });
    expect(rows.map((r) => r.ledger_name)).toEqual([" CASH ", "Rent"]);
  });

  it("combines filters", async () => {
    const rows = await store.readRows("c1", { ledgerName: "Rent", voucherIds: ["1"] });
    expect(rows).toEqual([]);
  });

  it("does not expose its internal arrays", async () => {
    const rows = await store.readRows("c1");
    expect(rows).toHaveLength(4);
    expect(store.rowCount("c1")).toBe(4);
    expect(store.companyCount).toBe(2);
  });
});
