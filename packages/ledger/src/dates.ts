/**
 * @ledgerview/ledger — Calendar dates.
 *
 * The upstream accounting package exports dates in several layouts and
 * its day/month ordering varies by installation. Every date is normalized
 * to an ISO calendar date ("YYYY-MM-DD") before the engine sees it.
 *
 * Day arithmetic runs on UTC epoch days, so results never depend on the
 * host time zone or daylight saving.
 */

import type { IsoDate } from "@ledgerview/types";
import { ReportError } from "./types.js";

const MS_PER_DAY = 86_400_000;

// 0000-01-01 and 9999-12-31
const MIN_EPOCH_DAY = -719_528;
const MAX_EPOCH_DAY = 2_932_896;

const MONTHS: Readonly<Record<string, number>> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

export interface DateFormatOptions {
  /**
   * Read ambiguous numeric dates ("04-05-2024") day first.
   * Default: true (DD-MM-YYYY).
   */
  readonly dayFirst?: boolean | undefined;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

function buildDate(year: number, month: number, day: number, raw: string): IsoDate {
  const time = Date.UTC(year, month - 1, day);
  const check = new Date(time);
  if (
    month < 1 ||
    month > 12 ||
    day < 1 ||
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    throw new ReportError("INVALID_DATE", `Invalid calendar date: "${raw}"`);
  }
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

function expandYear(year: string): number {
  const value = Number(year);
  return year.length === 2 ? 2000 + value : value;
}

/**
 * Normalize a stored or requested date to an ISO calendar date.
 *
 * Supported layouts:
 * - "2024-04-10", "2024-04-10T00:00:00" (time ignored), "2024/04/10"
 * - "20240410"
 * - "10-04-2024", "10/04/2024", "10.04.2024" (month first when dayFirst=false)
 * - "10-Apr-2024", "10 April 2024", "10-Apr-24"
 */
export function normalizeDate(raw: string, options: DateFormatOptions = {}): IsoDate {
  const text = raw.trim();
  const dayFirst = options.dayFirst ?? true;

  let m = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ].*)?$/.exec(text);
  if (m !== null) {
    return buildDate(Number(m[1]), Number(m[2]), Number(m[3]), raw);
  }

  m = /^(\d{4})(\d{2})(\d{2})$/.exec(text);
  if (m !== null) {
    return buildDate(Number(m[1]), Number(m[2]), Number(m[3]), raw);
  }

  m = /^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})$/.exec(text);
  if (m !== null) {
    const first = Number(m[1]);
    const second = Number(m[2]);
    const year = Number(m[3]);
    return dayFirst
      ? buildDate(year, second, first, raw)
      : buildDate(year, first, second, raw);
  }

  m = /^(\d{1,2})[-\s/]([A-Za-z]{3,9})[-\s/,]+(\d{4}|\d{2})$/.exec(text);
  if (m !== null) {
    const month = MONTHS[(m[2] ?? "").slice(0, 3).toLowerCase()];
    if (month !== undefined) {
      return buildDate(expandYear(m[3] ?? ""), month, Number(m[1]), raw);
    }
  }

  throw new ReportError("INVALID_DATE", `Unrecognized date format: "${raw}"`);
}

// ─── Day Arithmetic ──────────────────────────────────────────────────────

/** Days since 1970-01-01 for an ISO calendar date. */
export function toEpochDay(date: IsoDate): number {
  const [year, month, day] = date.split("-").map(Number);
  return Math.floor(Date.UTC(year ?? 1970, (month ?? 1) - 1, day ?? 1) / MS_PER_DAY);
}

export function fromEpochDay(epochDay: number): IsoDate {
  if (!Number.isInteger(epochDay) || epochDay < MIN_EPOCH_DAY || epochDay > MAX_EPOCH_DAY) {
    throw new ReportError("INVALID_DATE", `Date is out of range: ${String(epochDay)} days from 1970-01-01`, {
      epochDay,
    });
  }
  return new Date(epochDay * MS_PER_DAY).toISOString().slice(0, 10);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return fromEpochDay(toEpochDay(date) + days);
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return toEpochDay(to) - toEpochDay(from);
}

/** ISO calendar date of a Date instant, in UTC. */
export function isoDateOf(instant: Date): IsoDate {
  return instant.toISOString().slice(0, 10);
}
