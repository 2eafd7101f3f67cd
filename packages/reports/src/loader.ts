/**
 * Transaction Loader
 *
 * Reads raw rows from the storage collaborator and normalizes them into
 * vouchers, legs and ledgers the engine computes with.
 *
 * Rules:
 * - Pure read: the store is never written
 * - Storage failures surface as STORAGE_ERROR with the original error as
 *   `cause`; never retried
 * - Malformed dates and amounts fail with the identifiers of the row
 */

import {
  ReportError,
  computeOpeningBalance,
  isoDateOf,
  normalizeAmount,
  normalizeDate,
  sortVouchers,
} from "@ledgerview/ledger";
import type { DateFormatOptions } from "@ledgerview/ledger";
import type { RowFilter, TransactionStore } from "@ledgerview/store";
import { ledgerKey } from "@ledgerview/types";
import type {
  BillReference,
  Company,
  IsoDate,
  Leg,
  Ledger,
  LedgerRecord,
  RawLegRow,
  Voucher,
} from "@ledgerview/types";
import { throwIfCancelled } from "./cancellation.js";
import type {
  CompanySummary,
  LedgerStatementRequest,
  LoadedCompany,
  LoadedLedger,
  LoaderOptions,
} from "./types.js";

function present(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim() ?? "";
  return trimmed === "" ? undefined : trimmed;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TransactionLoader {
  private readonly store: TransactionStore;
  private readonly decimals: number;
  private readonly dateOptions: DateFormatOptions;
  private readonly now: () => Date;

  constructor(store: TransactionStore, options: LoaderOptions = {}) {
    this.store = store;
    this.decimals = options.decimals ?? 2;
    this.dateOptions = { dayFirst: options.dayFirst ?? true };
    this.now = options.now ?? (() => new Date());
  }

  // ─── Public API ─────────────────────────────────────────────────────

  /**
   * Load one ledger's vouchers within a date range plus its opening
   * balance as of the range start.
   */
  async load(request: LedgerStatementRequest, signal?: AbortSignal): Promise<LoadedLedger> {
    const { companyId, ledgerName } = request;
    const requestedFrom = request.fromDate !== undefined ? this.parseDate(request.fromDate) : undefined;
    const requestedTo = request.toDate !== undefined ? this.parseDate(request.toDate) : undefined;

    if (requestedFrom !== undefined && requestedTo !== undefined && requestedFrom > requestedTo) {
      throw new ReportError(
        "INVALID_RANGE",
        `From date ${requestedFrom} is after to date ${requestedTo}`,
        { companyId, ledgerName, fromDate: requestedFrom, toDate: requestedTo },
      );
    }

    const company = await this.requireCompany(companyId);
    throwIfCancelled(signal, "load");

    const ledgers = await this.readLedgers(companyId);
    const key = ledgerKey(ledgerName);
    const ledger = ledgers.find((l) => ledgerKey(l.name) === key);
    if (ledger === undefined) {
      throw new ReportError("NOT_FOUND", `Ledger "${ledgerName.trim()}" not found`, {
        companyId,
        ledgerName,
      });
    }
    throwIfCancelled(signal, "load");

    const ledgerRows = await this.readRows(companyId, { ledgerName: ledger.name });
    const voucherIds = [...new Set(ledgerRows.map((row) => row.voucher_id))];
    const rows = voucherIds.length > 0 ? await this.readRows(companyId, { voucherIds }) : [];
    const vouchers = this.toVouchers(rows);

    const first = vouchers[0]?.date;
    const last = vouchers.at(-1)?.date;
    const toDate = requestedTo ?? maxDate(last ?? this.today(), requestedFrom);
    const fromDate = requestedFrom ?? minDate(first ?? toDate, toDate);

    return {
      company,
      ledger,
      fromDate,
      toDate,
      openingBalance: computeOpeningBalance(ledger, vouchers, fromDate),
      vouchers: vouchers.filter((v) => v.date >= fromDate && v.date <= toDate),
    };
  }

  /**
   * Load a whole company: ledger masters and every voucher.
   */
  async loadCompany(companyId: string, signal?: AbortSignal): Promise<LoadedCompany> {
    const company = await this.requireCompany(companyId);
    throwIfCancelled(signal, "load");

    const ledgers = await this.readLedgers(companyId);
    throwIfCancelled(signal, "load");

    const rows = await this.readRows(companyId);

    return { company, ledgers, vouchers: this.toVouchers(rows) };
  }

  /**
   * Every company with its imported row count, ordered by name.
   */
  async loadCompanies(signal?: AbortSignal): Promise<CompanySummary[]> {
    const records = await this.query("listCompanies", {}, () => this.store.listCompanies());

    const summaries: CompanySummary[] = [];
    for (const record of records) {
      throwIfCancelled(signal, "load");
      const rows = await this.readRows(record.id);
      summaries.push({ company: { id: record.id, name: record.name }, recordCount: rows.length });
    }

    return summaries.sort((a, b) => {
      const x = ledgerKey(a.company.name);
      const y = ledgerKey(b.company.name);
      if (x !== y) return x < y ? -1 : 1;
      return a.company.id < b.company.id ? -1 : a.company.id > b.company.id ? 1 : 0;
    });
  }

  /**
   * Ledger masters of a company (NOT_FOUND for an unknown company).
   */
  async loadLedgers(companyId: string): Promise<{ company: Company; ledgers: readonly Ledger[] }> {
    const company = await this.requireCompany(companyId);
    return { company, ledgers: await this.readLedgers(companyId) };
  }

  /** Normalize a request date with the configured day/month order. */
  parseDate(raw: string): IsoDate {
    return normalizeDate(raw, this.dateOptions);
  }

  /** Today's date on the loader's clock. */
  today(): IsoDate {
    return isoDateOf(this.now());
  }

  // ─── Normalization ──────────────────────────────────────────────────

  /**
   * Group rows into vouchers, legs in line order, vouchers chronological.
   */
  toVouchers(rows: readonly RawLegRow[]): Voucher[] {
    const groups = new Map<string, RawLegRow[]>();
    for (const row of rows) {
      const group = groups.get(row.voucher_id) ?? [];
      group.push(row);
      groups.set(row.voucher_id, group);
    }

    const vouchers: Voucher[] = [];
    for (const [id, group] of groups) {
      const [head] = group;
      if (head === undefined) continue;

      const legs = group
        .map((row, index) => this.toLeg(row, index + 1))
        .sort((a, b) => a.lineNo - b.lineNo);

      vouchers.push({
        id,
        date: this.rowDate(head.date, { voucherId: id }),
        voucherType: head.voucher_type.trim(),
        voucherNumber: head.voucher_number.trim(),
        narration: group.map((row) => present(row.narration)).find((n) => n !== undefined),
        legs,
      });
    }

    return sortVouchers(vouchers);
  }

  toLeg(row: RawLegRow, fallbackLine: number): Leg {
    const context = { voucherId: row.voucher_id, ledgerName: row.ledger_name };
    const ref = present(row.bill_reference);

    let bill: BillReference | undefined;
    if (ref !== undefined) {
      const billDate = present(row.bill_date);
      const dueDate = present(row.due_date);
      bill = {
        ref,
        type: present(row.bill_type),
        billDate: billDate !== undefined ? this.rowDate(billDate, context) : undefined,
        dueDate: dueDate !== undefined ? this.rowDate(dueDate, context) : undefined,
        creditPeriodDays: row.credit_period_days ?? undefined,
      };
    }

    return {
      voucherId: row.voucher_id,
      lineNo: row.line_no ?? fallbackLine,
      ledgerName: row.ledger_name.trim(),
      amount: this.withContext(context, () => normalizeAmount(row.amount, this.decimals)),
      bill,
    };
  }

  toLedger(record: LedgerRecord): Ledger {
    const context = { ledgerName: record.name };
    const opening = record.opening_balance;
    return {
      companyId: record.company_id,
      name: record.name.trim(),
      nature: record.nature,
      openingBalance:
        opening === undefined || opening === null
          ? 0n
          : this.withContext(context, () => normalizeAmount(opening, this.decimals)),
      creditPeriodDays: record.credit_period_days ?? undefined,
      group: present(record.group),
    };
  }

  // ─── Storage ────────────────────────────────────────────────────────

  private async requireCompany(companyId: string): Promise<Company> {
    const record = await this.query("getCompany", { companyId }, () => this.store.getCompany(companyId));
    if (record === undefined) {
      throw new ReportError("NOT_FOUND", `Company "${companyId}" not found`, { companyId });
    }
    return { id: record.id, name: record.name };
  }

  private async readLedgers(companyId: string): Promise<Ledger[]> {
    const records = await this.query("listLedgers", { companyId }, () => this.store.listLedgers(companyId));
    return records.map((record) => this.toLedger(record));
  }

  private readRows(companyId: string, filter?: RowFilter): Promise<readonly RawLegRow[]> {
    return this.query("readRows", { companyId, ...filter }, () => this.store.readRows(companyId, filter));
  }

  private async query<T>(
    operation: string,
    details: Readonly<Record<string, unknown>>,
    run: () => Promise<T>,
  ): Promise<T> {
    try {
      return await run();
    } catch (err) {
      throw new ReportError(
        "STORAGE_ERROR",
        `Storage ${operation} failed: ${errorMessage(err)}`,
        details,
        { cause: err },
      );
    }
  }

  // ─── Helpers ────────────────────────────────────────────────────────

  private rowDate(raw: string, context: Readonly<Record<string, unknown>>): IsoDate {
    return this.withContext(context, () => normalizeDate(raw, this.dateOptions));
  }

  /**
   * Attach row identifiers to INVALID_DATE / INVALID_AMOUNT errors.
   */
  private withContext<T>(context: Readonly<Record<string, unknown>>, parse: () => T): T {
    try {
      return parse();
    } catch (err) {
      if (err instanceof ReportError) {
        throw new ReportError(err.code, err.message, { ...err.details, ...context }, { cause: err });
      }
      throw err;
    }
  }
}

function maxDate(a: IsoDate, b: IsoDate | undefined): IsoDate {
  return b !== undefined && b > a ? b : a;
}

function minDate(a: IsoDate, b: IsoDate): IsoDate {
  return a < b ? a : b;
}
