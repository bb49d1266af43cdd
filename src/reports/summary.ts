import type { Decimal } from 'decimal.js';
import type { InvoiceStatus } from '../models/invoice';
import type { InvoiceLedger } from '../engine/ledger';
import { ZERO, formatMoney } from '../engine/money';
import { effectiveStatus } from '../engine/status';

export interface ReportPeriod {
  start?: Date | undefined;
  end?: Date | undefined;
}

export interface SummaryReport {
  periodStart: string | null;
  periodEnd: string | null;
  totalInvoices: number;
  totalInvoiced: string;
  draftCount: number;
  sentCount: number;
  overdueCount: number;
  paidCount: number;
  paidTotal: string;
  overdueTotal: string;
  outstandingTotal: string;
  /** Paid invoices as a percentage of all invoices in the period, one decimal. */
  collectionRate: number;
}

/** Invoices are bucketed by their status at `now`, whether or not an overdue refresh has run. */
export function buildSummaryReport(ledger: InvoiceLedger, period: ReportPeriod, now: Date): SummaryReport {
  const invoices = ledger.list({ createdFrom: period.start, createdTo: period.end });

  const counts: Record<InvoiceStatus, number> = { draft: 0, sent: 0, overdue: 0, paid: 0 };
  const amounts: Record<InvoiceStatus, Decimal> = { draft: ZERO, sent: ZERO, overdue: ZERO, paid: ZERO };
  let totalInvoiced = ZERO;

  for (const invoice of invoices) {
    const { total } = ledger.computeTotals(invoice, now);
    const status = effectiveStatus(invoice, now);
    counts[status] += 1;
    amounts[status] = amounts[status].plus(total);
    totalInvoiced = totalInvoiced.plus(total);
  }

  const collectionRate =
    invoices.length === 0 ? 0 : Math.round((counts.paid / invoices.length) * 1000) / 10;

  return {
    periodStart: period.start ? period.start.toISOString() : null,
    periodEnd: period.end ? period.end.toISOString() : null,
    totalInvoices: invoices.length,
    totalInvoiced: formatMoney(totalInvoiced),
    draftCount: counts.draft,
    sentCount: counts.sent,
    overdueCount: counts.overdue,
    paidCount: counts.paid,
    paidTotal: formatMoney(amounts.paid),
    overdueTotal: formatMoney(amounts.overdue),
    outstandingTotal: formatMoney(amounts.sent.plus(amounts.overdue)),
    collectionRate,
  };
}
