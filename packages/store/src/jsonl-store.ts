/**
 * @ledgerview/store — File-based JSONL TransactionStore implementation.
 *
 * Reads the import pipeline's output: one JSON object per line, each
 * tagged with its record kind.
 *
 * Crash safety:
 * - A partial last line (import interrupted mid-write) is skipped
 * - Lines that fail validation are skipped and listed in `skipped`
 * - The file is the source of truth; in-memory state is derived
 *
 * File format:
 * {"kind":"company","id":"c1","name":"Acme Traders"}
 * {"kind":"ledger","company_id":"c1","name":"Cash","nature":"asset","opening_balance":"1000.00"}
 * {"kind":"leg","company_id":"c1","voucher_id":"1","date":"2024-04-10","voucher_type":"Sales",...}
 */

import { existsSync, readFileSync } from "node:fs";
import {
  isCompanyRecord,
  isLedgerRecord,
  isRawLegRow,
} from "@ledgerview/types";
import type { CompanyRecord, LedgerRecord, RawLegRow } from "@ledgerview/types";
import { InMemoryTransactionStore } from "./in-memory-store.js";
import type { RowFilter, StoredLegRow, TransactionStore } from "./types.js";
import { StoreError } from "./types.js";

/**
 * Options for creating a JsonlTransactionStore.
 */
export interface JsonlTransactionStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

/** A line that was not loaded. */
export interface SkippedLine {
  /** 1-based line number */
  readonly line: number;
  readonly reason: string;
}

type ParsedLine =
  | { readonly kind: "company"; readonly record: CompanyRecord }
  | { readonly kind: "ledger"; readonly record: LedgerRecord }
  | { readonly kind: "leg"; readonly record: StoredLegRow };

function parseRecord(value: unknown): ParsedLine | string {
  if (typeof value !== "object" || value === null || !("kind" in value)) {
    return "missing record kind";
  }

  switch (value.kind) {
    case "company":
      return isCompanyRecord(value)
        ? { kind: "company", record: { id: value.id, name: value.name } }
        : "invalid company record";
    case "ledger":
      return isLedgerRecord(value) ? { kind: "ledger", record: value } : "invalid ledger record";
    case "leg":
      if (isRawLegRow(value) && "company_id" in value && typeof value.company_id === "string") {
        return { kind: "leg", record: { ...value, company_id: value.company_id } };
      }
      return "invalid leg row";
    default:
      return `unknown record kind: ${String(value.kind)}`;
  }
}

/**
 * File-based JSONL transaction store.
 *
 * The file is read on construction and on `reload()`. If the file does
 * not exist the store is empty.
 */
export class JsonlTransactionStore implements TransactionStore {
  private readonly _filePath: string;
  private _data = new InMemoryTransactionStore();
  private _skipped: SkippedLine[] = [];

  constructor(options: JsonlTransactionStoreOptions) {
    this._filePath = options.filePath;
    this.reload();
  }

  // ─── TransactionStore ───────────────────────────────────────────────

  listCompanies(): Promise<readonly CompanyRecord[]> {
    return this._data.listCompanies();
  }

  getCompany(companyId: string): Promise<CompanyRecord | undefined> {
    return this._data.getCompany(companyId);
  }

  listLedgers(companyId: string): Promise<readonly LedgerRecord[]> {
    return this._data.listLedgers(companyId);
  }

  readRows(companyId: string, filter?: RowFilter): Promise<readonly RawLegRow[]> {
    return this._data.readRows(companyId, filter);
  }

  // ─── Loading ────────────────────────────────────────────────────────

  /**
   * Re-read the file, replacing the in-memory state.
   *
   * @throws StoreError READ_FAILED if the file exists but cannot be read
   */
  reload(): void {
    const data = new InMemoryTransactionStore();
    const skipped: SkippedLine[] = [];

    if (existsSync(this._filePath)) {
      let content: string;
      try {
        content = readFileSync(this._filePath, "utf-8");
      } catch (err) {
        throw new StoreError(
          "READ_FAILED",
          `Cannot read data file "${this._filePath}"`,
          this._filePath,
          { cause: err },
        );
      }

      const lines = content.split("\n");

      lines.forEach((line, index) => {
        const trimmed = line.trim();
        if (trimmed.length === 0) {
          return;
        }

        let value: unknown;
        try {
          value = JSON.parse(trimmed);
        } catch {
          // Corrupt or partial line
          skipped.push({ line: index + 1, reason: "malformed JSON" });
          return;
        }

        const parsed = parseRecord(value);
        if (typeof parsed === "string") {
          skipped.push({ line: index + 1, reason: parsed });
          return;
        }

        switch (parsed.kind) {
          case "company":
            data.addCompany(parsed.record);
            break;
          case "ledger":
            data.addLedger(parsed.record);
            break;
          case "leg":
            data.addRows([parsed.record]);
            break;
        }
      });
    }

    this._data = data;
    this._skipped = skipped;
  }

  // ─── Query ──────────────────────────────────────────────────────────

  /** Lines skipped by the last load. */
  get skipped(): readonly SkippedLine[] {
    return this._skipped;
  }

  get companyCount(): number {
    return this._data.companyCount;
  }

  /**
   * Get the file path this store reads from.
   * Useful for testing and debugging.
   */
  get filePath(): string {
    return this._filePath;
  }
}
