import { stringify } from 'csv-stringify/sync';
import type { Invoice, InvoiceTotals } from '../models/invoice';
import type { InvoiceLedger } from '../engine/ledger';
import { formatMoney } from '../engine/money';

export const CSV_COLUMNS = [
  'id',
  'number',
  'client_name',
  'client_email',
  'status',
  'created_at',
  'due_at',
  'paid_at',
  'payment_method',
  'currency',
  'tax_rate',
  'discount_rate',
  'subtotal',
  'discount_amount',
  'tax_amount',
  'overdue_fee',
  'total',
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];
export type CsvRow = Record<CsvColumn, string>;

export function toCsvRow(invoice: Invoice, totals: InvoiceTotals): CsvRow {
  return {
    id: invoice.id,
    number: invoice.number,
    client_name: invoice.clientName,
    client_email: invoice.clientEmail,
    status: invoice.status,
    created_at: invoice.createdAt.toISOString(),
    due_at: invoice.dueAt.toISOString(),
    paid_at: invoice.paidAt ? invoice.paidAt.toISOString() : '',
    payment_method: invoice.paymentMethod ?? '',
    currency: invoice.currency,
    tax_rate: invoice.taxRate.toFixed(),
    discount_rate: invoice.discountRate.toFixed(),
    subtotal: formatMoney(totals.subtotal),
    discount_amount: formatMoney(totals.discountAmount),
    tax_amount: formatMoney(totals.taxAmount),
    overdue_fee: formatMoney(totals.overdueFee),
    total: formatMoney(totals.total),
  };
}

/**
 * One row per invoice, newest first, preceded by a header row.
 */
export function exportInvoicesCsv(ledger: InvoiceLedger, now: Date): string {
  const rows = ledger.list().map((invoice) => toCsvRow(invoice, ledger.computeTotals(invoice, now)));
  return stringify(rows, { header: true, columns: [...CSV_COLUMNS] });
}
