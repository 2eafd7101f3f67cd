/**
 * @ledgerview/store — Read-only storage for imported books.
 *
 * Provides:
 * - TransactionStore interface (the storage collaborator contract)
 * - InMemoryTransactionStore for tests and in-process data
 * - JsonlTransactionStore reading the import pipeline's JSONL file
 */

export type {
  StoredLegRow,
  StoreContents,
  RowFilter,
  TransactionStore,
  StoreErrorCode,
} from "./types.js";
export { StoreError } from "./types.js";

export { InMemoryTransactionStore } from "./in-memory-store.js";

export { JsonlTransactionStore } from "./jsonl-store.js";
export type { JsonlTransactionStoreOptions, SkippedLine } from "./jsonl-store.js";
