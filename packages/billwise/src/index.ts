/**
 * @ledgerview/billwise — Bill-wise outstanding engine.
 *
 * Matches settlements to bills (FIFO with swappable settlement
 * policies), classifies open bills by due date and ageing bucket, and
 * aggregates them into outstanding summaries.
 *
 * Design rules:
 * - Over-allocation and orphan references are reported, never clamped
 * - Outstanding amounts are never negative
 * - Zero runtime dependencies
 */

// Allocation
export { allocateBills, postedLegsFor, comparePostedLegs } from "./allocation.js";

// Policies
export {
  fifoOnAccountPolicy,
  strictReferencePolicy,
  resolvePolicy,
  isSettlementPolicyName,
  SETTLEMENT_POLICY_NAMES,
} from "./policies.js";

// Ageing
export {
  AGEING_BUCKETS,
  computeDueDate,
  overdueDays,
  ageingBucket,
  classifyBill,
  classifyBills,
} from "./ageing.js";

// Aggregation
export { aggregateOutstanding, matchesReportType } from "./aggregator.js";

// Types
export type {
  PostedLeg,
  BillAllocation,
  Bill,
  Settlement,
  OpenBillSlot,
  SettlementContext,
  SettlementPolicyName,
  SettlementPolicy,
  AllocationInput,
  AllocationResult,
  ClassifiedBill,
  LedgerOutstanding,
  OutstandingLine,
  LedgerSubtotal,
  OnAccountBalance,
  OutstandingSummary,
} from "./types.js";
