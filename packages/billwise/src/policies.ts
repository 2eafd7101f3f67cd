/**
 * Settlement policies
 *
 * Decide where an unreferenced settlement goes. The FIFO core in
 * allocation.ts does not change when the policy does.
 *
 * - fifo-on-account: settle the oldest open bills first, remainder on account
 * - strict-reference: never settle a bill without a reference
 */

import { ReportError } from "@ledgerview/ledger";
import type {
  SettlementContext,
  SettlementPolicy,
  SettlementPolicyName,
} from "./types.js";

export const fifoOnAccountPolicy: SettlementPolicy = {
  name: "fifo-on-account",
  settle(context: SettlementContext): bigint {
    let left = context.settlement.amount;

    for (const slot of context.candidates) {
      if (left === 0n) break;
      const take = left < slot.remaining ? left : slot.remaining;
      if (take === 0n) continue;
      context.allocate(slot.ref, take);
      left -= take;
    }

    return left;
  },
};

export const strictReferencePolicy: SettlementPolicy = {
  name: "strict-reference",
  settle(context: SettlementContext): bigint {
    return context.settlement.amount;
  },
};

const POLICIES: Readonly<Record<SettlementPolicyName, SettlementPolicy>> = {
  "fifo-on-account": fifoOnAccountPolicy,
  "strict-reference": strictReferencePolicy,
};

export const SETTLEMENT_POLICY_NAMES: readonly SettlementPolicyName[] = [
  "fifo-on-account",
  "strict-reference",
];

export function isSettlementPolicyName(value: string): value is SettlementPolicyName {
  return SETTLEMENT_POLICY_NAMES.some((name) => name === value);
}

/**
 * Look up a policy by name.
 */
export function resolvePolicy(name: string): SettlementPolicy {
  if (!isSettlementPolicyName(name)) {
    throw new ReportError("INVALID_POLICY", `Unknown settlement policy: "${name}"`, {
      policy: name,
      supported: SETTLEMENT_POLICY_NAMES,
    });
  }
  return POLICIES[name];
}
