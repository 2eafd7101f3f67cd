/**
 * @ledgerview/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations on amounts
 * - Amounts must be valid decimal strings with at most `decimals` places
 * - Zero runtime dependencies
 */

import type { BalanceSide, EntrySide, RawAmount } from "@ledgerview/types";
import { ReportError } from "./types.js";

// ─── Decimal Scaling ─────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=2 → 10000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();
  if (trimmed === "") {
    throw new ReportError("INVALID_AMOUNT", `Invalid amount: "${amount}"`);
  }

  // Validate format: optional sign, digits, optional decimal point + digits
  if (!/^[-+]?\d+(\.\d+)?$/.test(trimmed)) {
    throw new ReportError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = trimmed.replace(/^[-+]/, "");
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new ReportError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 * 0n with decimals=2 → "0.00"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Source Normalization ────────────────────────────────────────────────

/**
 * Normalize an amount as stored by the importer into minor units.
 *
 * Accepts:
 * - JSON numbers (rounded to `decimals` places)
 * - "1,20,000.50": thousands separators in any grouping
 * - "1000.00 Dr" / "1000.00 Cr": Cr negates
 * - "(250.00)": parentheses negate
 */
export function normalizeAmount(raw: RawAmount, decimals: number): bigint {
  if (typeof raw === "number") {
    if (!Number.isFinite(raw)) {
      throw new ReportError("INVALID_AMOUNT", `Invalid amount: ${String(raw)}`);
    }
    return parseAmount(raw.toFixed(decimals), decimals);
  }

  let text = raw.trim();
  let negate = false;

  const marker = /\s*(dr|cr)\.?$/i.exec(text);
  if (marker !== null) {
    negate = marker[1]?.toLowerCase() === "cr";
    text = text.slice(0, marker.index).trim();
  }

  if (text.startsWith("(") && text.endsWith(")")) {
    negate = !negate;
    text = text.slice(1, -1).trim();
  }

  const value = parseAmount(text.replace(/[,\s]/g, ""), decimals);
  return negate ? -value : value;
}

// ─── Helpers ─────────────────────────────────────────────────────────────

export function absAmount(amount: bigint): bigint {
  return amount < 0n ? -amount : amount;
}

export function sumAmounts(amounts: Iterable<bigint>): bigint {
  let total = 0n;
  for (const amount of amounts) {
    total += amount;
  }
  return total;
}

/** Direction of a signed amount. Zero takes `zeroSide`. */
export function directionOf(amount: bigint, zeroSide: EntrySide): EntrySide {
  if (amount > 0n) return "debit";
  if (amount < 0n) return "credit";
  return zeroSide;
}

export function sideLabel(direction: EntrySide): BalanceSide {
  return direction === "debit" ? "Dr" : "Cr";
}

/**
 * Dr/Cr suffix for a signed balance. A zero balance is shown on the
 * ledger's normal side.
 */
export function balanceSide(amount: bigint, normal: EntrySide): BalanceSide {
  return sideLabel(directionOf(amount, normal));
}
