/**
 * @ledgerview/store — In-memory TransactionStore implementation.
 *
 * Holds records in plain arrays indexed by company. Suitable for:
 * - Unit and integration tests
 * - Serving a data file loaded into memory (see JsonlTransactionStore)
 */

import { ledgerKey } from "@ledgerview/types";
import type { CompanyRecord, LedgerRecord, RawLegRow } from "@ledgerview/types";
import type {
  RowFilter,
  StoreContents,
  StoredLegRow,
  TransactionStore,
} from "./types.js";

export class InMemoryTransactionStore implements TransactionStore {
  private readonly _companies = new Map<string, CompanyRecord>();
  private readonly _ledgers = new Map<string, LedgerRecord[]>();
  private readonly _rows = new Map<string, RawLegRow[]>();

  constructor(contents: Partial<StoreContents> = {}) {
    for (const company of contents.companies ?? []) this.addCompany(company);
    for (const ledger of contents.ledgers ?? []) this.addLedger(ledger);
    this.addRows(contents.rows ?? []);
  }

  // ─── Loading ────────────────────────────────────────────────────────

  addCompany(company: CompanyRecord): void {
    this._companies.set(company.id, company);
  }

  addLedger(ledger: LedgerRecord): void {
    const list = this._ledgers.get(ledger.company_id) ?? [];
    list.push(ledger);
    this._ledgers.set(ledger.company_id, list);
  }

  addRows(rows: readonly StoredLegRow[]): void {
    for (const { company_id, ...row } of rows) {
      const list = this._rows.get(company_id) ?? [];
      list.push(row);
      this._rows.set(company_id, list);
    }
  }

  // ─── TransactionStore ───────────────────────────────────────────────

  async listCompanies(): Promise<readonly CompanyRecord[]> {
    return [...this._companies.values()];
  }

  async getCompany(companyId: string): Promise<CompanyRecord | undefined> {
    return this._companies.get(companyId);
  }

  async listLedgers(companyId: string): Promise<readonly LedgerRecord[]> {
    return [...(this._ledgers.get(companyId) ?? [])];
  }

  async readRows(companyId: string, filter?: RowFilter): Promise<readonly RawLegRow[]> {
    let rows: readonly RawLegRow[] = this._rows.get(companyId) ?? [];

    if (filter?.ledgerName !== undefined) {
      const key = ledgerKey(filter.ledgerName);
      rows = rows.filter((row) => ledgerKey(row.ledger_name) === key);
    }

    if (filter?.voucherIds !== undefined) {
      const ids = new Set(filter.voucherIds);
      rows = rows.filter((row) => ids.has(row.voucher_id));
    }

    return [...rows];
  }

  // ─── Query ──────────────────────────────────────────────────────────

  get companyCount(): number {
    return this._companies.size;
  }

  rowCount(companyId: string): number {
    return this._rows.get(companyId)?.length ?? 0;
  }
}
