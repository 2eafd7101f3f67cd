/**
 * Output Assembler
 *
 * Pure mapping from engine results to the wire shapes. No computation
 * beyond formatting decimals and picking Dr/Cr labels.
 */

import {
  NORMAL_BALANCE,
  absAmount,
  balanceSide,
  formatAmount,
} from "@ledgerview/ledger";
import type { DataIssue, LedgerStatement } from "@ledgerview/ledger";
import type { OutstandingSummary } from "@ledgerview/billwise";
import type {
  AgeingBucket,
  Company,
  CompanyListItem,
  DashboardResponse,
  IsoDate,
  IssueView,
  Ledger,
  LedgerListItem,
  LedgerStatementResponse,
  OutstandingResponse,
  PartySummaryResponse,
  PeriodInfo,
  SalesRegisterResponse,
  TopPartyView,
} from "@ledgerview/types";
import { monthName } from "./sales-register.js";
import type { CompanySummary, DashboardData, PartyBalance, SalesRegister } from "./types.js";

export function assembleIssue(issue: DataIssue, decimals: number): IssueView {
  return {
    kind: issue.kind,
    message: issue.message,
    ...(issue.voucherId !== undefined ? { voucher_id: issue.voucherId } : {}),
    ...(issue.ledgerName !== undefined ? { ledger_name: issue.ledgerName } : {}),
    ...(issue.billRef !== undefined ? { bill_ref: issue.billRef } : {}),
    ...(issue.amount !== undefined ? { amount: formatAmount(issue.amount, decimals) } : {}),
  };
}

export function assembleStatement(
  company: Company,
  statement: LedgerStatement,
  issues: readonly DataIssue[],
  decimals: number,
): LedgerStatementResponse {
  const normal = NORMAL_BALANCE[statement.ledger.nature];
  const fmt = (amount: bigint): string => formatAmount(amount, decimals);

  return {
    company_name: company.name,
    ledger_name: statement.ledger.name,
    from_date: statement.fromDate,
    to_date: statement.toDate,
    opening_balance: fmt(statement.openingBalance),
    opening_balance_type: balanceSide(statement.openingBalance, normal),
    total_debit: fmt(statement.totalDebit),
    total_credit: fmt(statement.totalCredit),
    closing_balance: fmt(statement.closingBalance),
    closing_balance_type: balanceSide(statement.closingBalance, normal),
    net_movement: fmt(statement.totalDebit - statement.totalCredit),
    total_transactions: statement.rows.length,
    transactions: statement.rows.map((row) => ({
      date: row.date,
      particulars: row.particulars,
      voucher_type: row.voucherType,
      voucher_number: row.voucherNumber,
      narration: row.narration,
      debit: fmt(row.debit),
      credit: fmt(row.credit),
      balance: fmt(absAmount(row.balance)),
      balance_type: row.balanceSide,
    })),
    issues: issues.map((issue) => assembleIssue(issue, decimals)),
  };
}

export function assembleOutstanding(
  company: Company,
  summary: OutstandingSummary,
  issues: readonly DataIssue[],
  decimals: number,
): OutstandingResponse {
  const fmt = (amount: bigint): string => formatAmount(amount, decimals);
  const ageing: Record<AgeingBucket, string> = {
    "0-30": fmt(summary.ageing["0-30"]),
    "31-60": fmt(summary.ageing["31-60"]),
    "61-90": fmt(summary.ageing["61-90"]),
    "90+": fmt(summary.ageing["90+"]),
  };

  return {
    company_name: company.name,
    report_type: summary.reportType,
    as_on_date: summary.asOnDate,
    count: summary.lines.length,
    ledger_count: summary.ledgerCount,
    total_outstanding_receivables: fmt(summary.totalReceivables),
    total_outstanding_payables: fmt(summary.totalPayables),
    ageing,
    ledgers: summary.subtotals.map((s) => ({
      ledger_name: s.ledgerName,
      receivables: fmt(s.receivables),
      payables: fmt(s.payables),
      bill_count: s.billCount,
    })),
    on_account: summary.onAccount.map((o) => ({
      ledger_name: o.ledgerName,
      amount: fmt(o.amount),
      balance_type: o.side,
    })),
    data: summary.lines.map(({ ledger, entry, balance, balanceSide: side }) => ({
      ledger_name: ledger.name,
      bill_ref: entry.bill.ref,
      bill_date: entry.bill.billDate,
      bill_type: entry.bill.billType,
      voucher_type: entry.bill.voucherType,
      voucher_no: entry.bill.voucherNumber,
      outstanding_amount: fmt(entry.bill.remaining),
      balance: fmt(absAmount(balance)),
      balance_type: side,
      is_receivable: entry.isReceivable,
      is_advance: entry.isAdvance,
      due_date: entry.dueDate,
      overdue_days: entry.overdueDays,
      ageing_bucket: entry.bucket,
    })),
    issues: issues.map((issue) => assembleIssue(issue, decimals)),
  };
}

export function assemblePartySummary(
  company: Company,
  parties: readonly PartyBalance[],
  asOnDate: IsoDate | null,
  decimals: number,
): PartySummaryResponse {
  const fmt = (amount: bigint): string => formatAmount(amount, decimals);
  let debit = 0n;
  let credit = 0n;
  let outstanding = 0n;
  for (const p of parties) {
    debit += p.debit;
    credit += p.credit;
    outstanding += absAmount(p.balance);
  }

  return {
    company_name: company.name,
    as_on_date: asOnDate,
    total_parties: parties.length,
    total_debit: fmt(debit),
    total_credit: fmt(credit),
    total_outstanding: fmt(outstanding),
    parties: parties.map((p) => ({
      party_name: p.ledger.name,
      debit: fmt(p.debit),
      credit: fmt(p.credit),
      balance: fmt(p.balance),
      balance_type: balanceSide(p.balance, NORMAL_BALANCE[p.ledger.nature]),
      transaction_count: p.transactionCount,
      first_transaction: p.firstDate,
      last_transaction: p.lastDate,
    })),
  };
}

export function assembleLedgerList(ledgers: readonly Ledger[]): LedgerListItem[] {
  return ledgers.map((ledger) => ({
    name: ledger.name,
    nature: ledger.nature,
    group: ledger.group ?? null,
  }));
}

export function assemblePeriodInfo(
  company: Company,
  fromDate: IsoDate | null,
  toDate: IsoDate | null,
): PeriodInfo {
  return { company_name: company.name, from_date: fromDate, to_date: toDate };
}

export function assembleCompanyList(companies: readonly CompanySummary[]): CompanyListItem[] {
  return companies.map(({ company, recordCount }) => ({
    id: company.id,
    name: company.name,
    total_records: recordCount,
  }));
}

export function assembleDashboard(
  company: Company,
  data: DashboardData,
  asOnDate: IsoDate | null,
  decimals: number,
): DashboardResponse {
  const fmt = (amount: bigint): string => formatAmount(amount, decimals);
  const party = (p: PartyBalance): TopPartyView => ({
    party_name: p.ledger.name,
    balance: fmt(absAmount(p.balance)),
    transaction_count: p.transactionCount,
  });

  return {
    company_name: company.name,
    as_on_date: asOnDate,
    stats: {
      total_parties: data.partyCount,
      total_transactions: data.totals.count,
      total_debit: fmt(data.totals.debit),
      total_credit: fmt(data.totals.credit),
      net_balance: fmt(data.totals.debit - data.totals.credit),
      first_transaction: data.firstDate,
      last_transaction: data.lastDate,
    },
    top_debtors: data.topDebtors.map(party),
    top_creditors: data.topCreditors.map(party),
    voucher_types: data.voucherTypes.map((t) => ({
      voucher_type: t.voucherType,
      count: t.count,
      debit: fmt(t.debit),
      credit: fmt(t.credit),
    })),
    monthly_trend: data.monthly.map((m) => ({
      month: m.month,
      count: m.count,
      debit: fmt(m.debit),
      credit: fmt(m.credit),
    })),
  };
}

export function assembleSalesRegister(
  company: Company,
  register: SalesRegister,
  decimals: number,
): SalesRegisterResponse {
  const fmt = (amount: bigint): string => formatAmount(amount, decimals);
  return {
    company_name: company.name,
    from_date: register.fromDate,
    to_date: register.toDate,
    monthly_summary: register.months.map((m) => ({
      month_key: m.month,
      month_name: monthName(m.month),
      year: m.month.slice(0, 4),
      amount: fmt(m.amount),
      voucher_count: m.voucherCount,
      cumulative: fmt(m.cumulative),
    })),
    vouchers: register.entries.map((e) => ({
      date: e.voucher.date,
      voucher_type: e.voucher.voucherType,
      voucher_number: e.voucher.voucherNumber,
      particulars: e.particulars,
      amount: fmt(e.amount),
      narration: e.voucher.narration ?? "",
    })),
    total_amount: fmt(register.total),
    total_vouchers: register.entries.length,
  };
}
