/**
 * @ledgerview/store — Core types.
 *
 * The storage collaborator contract. The engine only ever reads: rows
 * arrive already posted by the import pipeline.
 *
 * Design principles:
 * - Stores return raw records; normalization happens in the loader
 * - Every read is async so database-backed adapters fit the same contract
 * - Each call returns a consistent snapshot
 */

import type { CompanyRecord, LedgerRecord, RawLegRow } from "@ledgerview/types";

// =============================================================================
// Records
// =============================================================================

/** A leg row as persisted: the raw row plus its owning company. */
export interface StoredLegRow extends RawLegRow {
  readonly company_id: string;
}

/** Everything a store holds. */
export interface StoreContents {
  readonly companies: readonly CompanyRecord[];
  readonly ledgers: readonly LedgerRecord[];
  readonly rows: readonly StoredLegRow[];
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Row selection. Filters combine with AND.
 */
export interface RowFilter {
  /** Rows posted against this ledger (matched on the ledger key) */
  readonly ledgerName?: string | undefined;
  /** Rows belonging to these vouchers */
  readonly voucherIds?: readonly string[] | undefined;
}

// =============================================================================
// TransactionStore Interface
// =============================================================================

/**
 * Read-only access to imported books.
 */
export interface TransactionStore {
  /** Every company, in import order */
  listCompanies(): Promise<readonly CompanyRecord[]>;

  getCompany(companyId: string): Promise<CompanyRecord | undefined>;

  /** Ledger masters of a company, in import order */
  listLedgers(companyId: string): Promise<readonly LedgerRecord[]>;

  /** Leg rows of a company, in import order */
  readRows(companyId: string, filter?: RowFilter): Promise<readonly RawLegRow[]>;
}

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode = "READ_FAILED";

export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly filePath?: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}
