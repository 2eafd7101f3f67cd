/**
 * Cooperative cancellation between report phases.
 */

import { ReportError } from "@ledgerview/ledger";

export type ReportPhase =
  | "load"
  | "resolve"
  | "balance"
  | "allocate"
  | "classify"
  | "aggregate"
  | "assemble";

/**
 * Throw CANCELLED if the caller has aborted.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, phase: ReportPhase): void {
  if (signal?.aborted === true) {
    throw new ReportError("CANCELLED", `Report cancelled before ${phase}`, { phase });
  }
}
