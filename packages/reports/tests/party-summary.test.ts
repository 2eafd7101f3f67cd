import { describe, it, expect } from "vitest";
import type { Ledger, Voucher } from "@ledgerview/types";
import { billLedgerKeys, isParty, summarizeParties } from "../src/party-summary.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

function ledger(name: string, overrides: Partial<Ledger> = {}): Ledger {
  return { companyId: "c1", name, nature: "asset", openingBalance: 0n, ...overrides };
}

function voucher(id: string, date: string, legs: ReadonlyArray<[string, bigint, string?]>): Voucher {
  return {
    id,
    date,
    voucherType: "Journal",
    voucherNumber: id,
    legs: legs.map(([ledgerName, amount, ref], index) => ({
      voucherId: id,
      lineNo: index + 1,
      ledgerName,
      amount,
      bill: ref !== undefined ? { ref } : undefined,
    })),
  };
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("party classification", () => {
  it("treats debtor and creditor groups as parties", () => {
    const none = new Set<string>();
    expect(isParty(ledger("A", { group: "sundry debtors" }), none)).toBe(true);
    expect(isParty(ledger("B", { group: "Sundry Creditors" }), none)).toBe(true);
    expect(isParty(ledger("C", { group: "Bank Accounts" }), none)).toBe(false);
  });

  it("treats ledgers carrying bill references as parties", () => {
    const keys = billLedgerKeys([voucher("1", "2024-04-01", [["Agent", 100n, "B-1"], ["Sales", -100n]])]);
    expect([...keys]).toEqual(["AGENT"]);
    expect(isParty(ledger("agent"), keys)).toBe(true);
  });
});

describe("summarizeParties", () => {
  const ledgers = [
    ledger("Zeta", { group: "Sundry Debtors" }),
    ledger("Alpha", { group: "Sundry Debtors", openingBalance: 2000n }),
    ledger("Vendor", { group: "Sundry Creditors", nature: "liability" }),
    ledger("Cash"),
  ];

  const vouchers = [
    voucher("1", "2024-04-01", [["Zeta", 2000n], ["Cash", -2000n]]),
    voucher("2", "2024-04-02", [["Vendor", -3000n], ["Cash", 3000n]]),
    voucher("3", "2024-04-03", [["Zeta", 500n], ["Zeta", -500n]]),
  ];

  it("orders by balance magnitude, then name", () => {
    const parties = summarizeParties(ledgers, vouchers);
    expect(parties.map((p) => [p.ledger.name, p.balance])).toEqual([
      ["Vendor", -3000n],
      ["Alpha", 2000n],
      ["Zeta", 2000n],
    ]);
  });

  it("counts vouchers, not legs", () => {
    const zeta = summarizeParties(ledgers, vouchers).find((p) => p.ledger.name === "Zeta");
    expect(zeta).toMatchObject({
      debit: 2500n,
      credit: 500n,
      transactionCount: 2,
      firstDate: "2024-04-01",
      lastDate: "2024-04-03",
    });
  });

  it("keeps an opening-balance party with no transactions", () => {
    const alpha = summarizeParties(ledgers, vouchers).find((p) => p.ledger.name === "Alpha");
    expect(alpha).toMatchObject({ transactionCount: 0, firstDate: null, lastDate: null });
  });

  it("ignores vouchers after the as-on date and omits zero balances", () => {
    const parties = summarizeParties(ledgers, vouchers, "2024-04-01");
    expect(parties.map((p) => p.ledger.name)).toEqual(["Alpha", "Zeta"]);
  });
});
