/**
 * Storage Records
 *
 * Row shapes handed over by the storage collaborator, exactly as the
 * importer persisted them from the upstream accounting package.
 *
 * Rules:
 * - Field names follow the import format (snake_case), not the engine's
 * - Dates and amounts arrive in heterogeneous representations and are
 *   normalized by the transaction loader, never here
 * - Nullable columns may be absent, null, or present
 */

/**
 * An amount as stored: a JSON number, or a decimal string that may carry
 * thousands separators, a trailing "Dr"/"Cr" marker, or parentheses.
 */
export type RawAmount = string | number;

/**
 * The five fundamental ledger natures of double-entry accounting.
 */
export type LedgerNature = "asset" | "liability" | "income" | "expense" | "equity";

/**
 * One voucher leg as imported. Debit amounts are positive, credit negative.
 */
export interface RawLegRow {
  /** Voucher master id; every leg of one voucher shares it */
  readonly voucher_id: string;

  /** Voucher date in any supported calendar format */
  readonly date: string;

  readonly voucher_type: string;
  readonly voucher_number: string;
  readonly ledger_name: string;

  /** Signed amount, debit positive */
  readonly amount: RawAmount;

  readonly bill_reference?: string | null | undefined;

  /** "New Ref", "Agst Ref", "Advance", "On Account" */
  readonly bill_type?: string | null | undefined;

  readonly bill_date?: string | null | undefined;
  readonly due_date?: string | null | undefined;
  readonly credit_period_days?: number | null | undefined;
  readonly narration?: string | null | undefined;

  /** Position of the leg within its voucher */
  readonly line_no?: number | null | undefined;
}

/**
 * A company (books) known to the store.
 */
export interface CompanyRecord {
  readonly id: string;
  readonly name: string;
}

/**
 * Ledger master as imported.
 */
export interface LedgerRecord {
  readonly company_id: string;
  readonly name: string;
  readonly nature: LedgerNature;

  /** Opening balance at the start of books, debit positive */
  readonly opening_balance?: RawAmount | null | undefined;

  /** Default credit period for bills raised on this ledger */
  readonly credit_period_days?: number | null | undefined;

  /** Accounting group, e.g. "Sundry Debtors" */
  readonly group?: string | null | undefined;
}

/**
 * Lookup key for ledger names. The upstream system is inconsistent about
 * case and surrounding whitespace, so names compare on this key.
 */
export function ledgerKey(name: string): string {
  return name.trim().toUpperCase();
}
