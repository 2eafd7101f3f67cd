/**
 * @ledgerview/ledger — Counter-particulars resolver.
 *
 * Decides which ledger name(s) a statement row shows as "particulars"
 * for the ledger being reported on.
 */

import { ledgerKey } from "@ledgerview/types";
import type { Voucher } from "@ledgerview/types";

/**
 * Resolve the particulars label of a voucher for the reported ledger.
 *
 * - Two legs: the other leg's ledger
 * - More legs: distinct non-zero counter ledgers in leg order, joined by ", "
 * - No counter ledger (self-contra, rounding entry): the voucher type name
 */
export function resolveParticulars(voucher: Voucher, ledgerName: string): string {
  const key = ledgerKey(ledgerName);

  if (voucher.legs.length === 2) {
    const others = voucher.legs.filter((leg) => ledgerKey(leg.ledgerName) !== key);
    const [other] = others;
    if (others.length === 1 && other !== undefined) {
      return other.ledgerName.trim();
    }
  }

  const names: string[] = [];
  const seen = new Set<string>();

  for (const leg of voucher.legs) {
    if (leg.amount === 0n) continue;

    const legKey = ledgerKey(leg.ledgerName);
    if (legKey === key || seen.has(legKey)) continue;

    seen.add(legKey);
    names.push(leg.ledgerName.trim());
  }

  return names.length > 0 ? names.join(", ") : voucher.voucherType;
}
