/**
 * Runtime Type Guards
 *
 * Narrowing functions for storage records. These validate data at the
 * storage boundary (deserialized import files, external adapters).
 */

import type {
  CompanyRecord,
  LedgerNature,
  LedgerRecord,
  RawAmount,
  RawLegRow,
} from "./records.js";

const LEDGER_NATURES = new Set<string>(["asset", "liability", "income", "expense", "equity"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || value === null || typeof value === "string";
}

function isOptionalInteger(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "number" && Number.isInteger(value));
}

/** Longest credit period a record may carry, in days (100 years) */
export const MAX_CREDIT_PERIOD_DAYS = 36_500;

function isOptionalCreditPeriod(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    (typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_CREDIT_PERIOD_DAYS)
  );
}

// =============================================================================
// Scalar guards
// =============================================================================

export function isLedgerNature(value: unknown): value is LedgerNature {
  return typeof value === "string" && LEDGER_NATURES.has(value);
}

export function isRawAmount(value: unknown): value is RawAmount {
  return (typeof value === "number" && Number.isFinite(value)) || typeof value === "string";
}

// =============================================================================
// Record guards
// =============================================================================

export function isCompanyRecord(value: unknown): value is CompanyRecord {
  if (!isRecord(value)) return false;
  return (
    typeof value.id === "string" &&
    value.id.length > 0 &&
    typeof value.name === "string"
  );
}

export function isLedgerRecord(value: unknown): value is LedgerRecord {
  if (!isRecord(value)) return false;
  return (
    typeof value.company_id === "string" &&
    typeof value.name === "string" &&
    value.name.trim().length > 0 &&
    isLedgerNature(value.nature) &&
    (value.opening_balance === undefined || value.opening_balance === null || isRawAmount(value.opening_balance)) &&
    isOptionalCreditPeriod(value.credit_period_days) &&
    isOptionalString(value.group)
  );
}

export function isRawLegRow(value: unknown): value is RawLegRow {
  if (!isRecord(value)) return false;
  return (
    typeof value.voucher_id === "string" &&
    value.voucher_id.length > 0 &&
    typeof value.date === "string" &&
    typeof value.voucher_type === "string" &&
    typeof value.voucher_number === "string" &&
    typeof value.ledger_name === "string" &&
    isRawAmount(value.amount) &&
    isOptionalString(value.bill_reference) &&
    isOptionalString(value.bill_type) &&
    isOptionalString(value.bill_date) &&
    isOptionalString(value.due_date) &&
    isOptionalCreditPeriod(value.credit_period_days) &&
    isOptionalString(value.narration) &&
    isOptionalInteger(value.line_no)
  );
}
