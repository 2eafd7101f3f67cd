/**
 * Shared books for report tests.
 *
 * - c1 "Acme Traders": one invoice settled in full
 * - c2 "Beta Stores": partial settlement, multi-leg invoice, supplier bill
 * - c3 "Gamma Agencies": unbalanced voucher and over-allocation
 * - c4 "Empty Books": no vouchers
 * - c5 "Delta Traders": a billed debtor, a debtor with no bill references
 *   and an advance received before the bill it pays
 */

import { InMemoryTransactionStore } from "@ledgerview/store";
import type { StoredLegRow } from "@ledgerview/store";
import type { RawAmount } from "@ledgerview/types";

interface VoucherHeader {
  readonly company_id: string;
  readonly voucher_id: string;
  readonly date: string;
  readonly voucher_type: string;
  readonly voucher_number: string;
}

function header(
  company_id: string,
  voucher_id: string,
  date: string,
  voucher_type: string,
  voucher_number: string,
): VoucherHeader {
  return { company_id, voucher_id, date, voucher_type, voucher_number };
}

function leg(
  voucher: VoucherHeader,
  line_no: number,
  ledger_name: string,
  amount: RawAmount,
  extra: Partial<StoredLegRow> = {},
): StoredLegRow {
  return { ...voucher, line_no, ledger_name, amount, ...extra };
}

const S1 = header("c1", "1", "10-04-2024", "Sales", "S-1");
const R1 = header("c1", "2", "01-05-2024", "Receipt", "R-1");

const S10 = header("c2", "10", "2024-04-01", "Sales", "S-10");
const R10 = header("c2", "11", "2024-04-15", "Receipt", "R-10");
const P1 = header("c2", "12", "2024-04-20", "Purchase", "P-1");

const S20 = header("c3", "20", "2024-04-01", "Sales", "S-20");
const R20 = header("c3", "21", "2024-04-05", "Receipt", "R-20");

const S30 = header("c5", "30", "2024-04-02", "Sales", "S-30");
const S31 = header("c5", "31", "2024-04-03", "Sales", "S-31");
const R30 = header("c5", "32", "2024-04-05", "Receipt", "R-30");
const S32 = header("c5", "33", "2024-04-20", "Sales", "S-32");

export function createBooks(): InMemoryTransactionStore {
  return new InMemoryTransactionStore({
    companies: [
      { id: "c1", name: "Acme Traders" },
      { id: "c2", name: "Beta Stores" },
      { id: "c3", name: "Gamma Agencies" },
      { id: "c4", name: "Empty Books" },
      { id: "c5", name: "Delta Traders" },
    ],
    ledgers: [
      { company_id: "c1", name: "Sales", nature: "income" },
      { company_id: "c1", name: "Customer A", nature: "asset", group: "Sundry Debtors" },
      { company_id: "c1", name: "Bank", nature: "asset", opening_balance: "2,500.00" },

      { company_id: "c2", name: "Customer B", nature: "asset", group: "Sundry Debtors", credit_period_days: 30 },
      { company_id: "c2", name: "Sales", nature: "income" },
      { company_id: "c2", name: "Output GST", nature: "liability" },
      { company_id: "c2", name: "Cash", nature: "asset" },
      { company_id: "c2", name: "Supplier C", nature: "liability", group: "Sundry Creditors" },
      { company_id: "c2", name: "Purchases", nature: "expense" },

      { company_id: "c3", name: "Customer D", nature: "asset" },
      { company_id: "c3", name: "Sales", nature: "income" },

      { company_id: "c4", name: "Cash", nature: "asset" },

      { company_id: "c5", name: "Debtor E", nature: "asset", group: "Sundry Debtors" },
      { company_id: "c5", name: "Plain", nature: "asset", group: "Sundry Debtors" },
      { company_id: "c5", name: "Debtor F", nature: "asset", group: "Sundry Debtors" },
      { company_id: "c5", name: "Sales", nature: "income" },
      { company_id: "c5", name: "Bank", nature: "asset" },
    ],
    rows: [
      leg(S1, 1, "Customer A", "1000.00", { bill_reference: "INV-1", bill_type: "New Ref" }),
      leg(S1, 2, "Sales", "-1000.00"),
      leg(R1, 1, "Bank", "1000.00", { narration: "Cheque 123" }),
      leg(R1, 2, "Customer A", "-1000.00", { bill_reference: "INV-1", bill_type: "Agst Ref" }),

      leg(S10, 1, "Customer B", 1180, { bill_reference: "INV-2", bill_type: "New Ref" }),
      leg(S10, 2, "Sales", -1000),
      leg(S10, 3, "Output GST", -180),
      leg(R10, 1, "Cash", "300.00 Dr"),
      leg(R10, 2, "Customer B", "300.00 Cr", { bill_reference: "INV-2", bill_type: "Agst Ref" }),
      leg(P1, 1, "Purchases", "500"),
      leg(P1, 2, "Supplier C", "(500)", { bill_reference: "PB-1", bill_type: "New Ref", due_date: "05-05-2024" }),

      leg(S20, 1, "Customer D", "100.00", { bill_reference: "INV-5" }),
      leg(S20, 2, "Sales", "-90.00"),
      leg(R20, 1, "Customer D", "-150.00", { bill_reference: "INV-5", bill_type: "Agst Ref" }),
      leg(R20, 2, "Cash", "150.00"),

      leg(S30, 1, "Debtor E", "1000.00", { bill_reference: "INV-30", bill_type: "New Ref" }),
      leg(S30, 2, "Sales", "-1000.00"),
      leg(S31, 1, "Plain", "700.00"),
      leg(S31, 2, "Sales", "-700.00"),
      leg(R30, 1, "Bank", "400.00"),
      leg(R30, 2, "Debtor F", "-400.00"),
      leg(S32, 1, "Debtor F", "400.00", { bill_reference: "A-1", bill_type: "New Ref" }),
      leg(S32, 2, "Sales", "-400.00"),
    ],
  });
}
