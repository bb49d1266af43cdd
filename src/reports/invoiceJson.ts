import type { Invoice, InvoiceTotals } from '../models/invoice';
import { formatMoney } from '../engine/money';
import { lineTotal } from '../engine/totals';

export interface InvoiceJson {
  id: string;
  number: string;
  clientName: string;
  clientEmail: string;
  status: Invoice['status'];
  createdAt: string;
  dueAt: string;
  paidAt: string | null;
  paymentMethod: string | null;
  currency: string;
  notes: string;
  taxRate: string;
  discountRate: string;
  lineItems: Array<{ description: string; qty: string; unitPrice: string; total: string }>;
  subtotal: string;
  discountAmount: string;
  taxAmount: string;
  overdueFee: string;
  total: string;
}

/** JSON view of an invoice with its totals rounded to cents. */
export function toInvoiceJson(invoice: Invoice, totals: InvoiceTotals): InvoiceJson {
  return {
    id: invoice.id,
    number: invoice.number,
    clientName: invoice.clientName,
    clientEmail: invoice.clientEmail,
    status: invoice.status,
    createdAt: invoice.createdAt.toISOString(),
    dueAt: invoice.dueAt.toISOString(),
    paidAt: invoice.paidAt ? invoice.paidAt.toISOString() : null,
    paymentMethod: invoice.paymentMethod ?? null,
    currency: invoice.currency,
    notes: invoice.notes,
    taxRate: invoice.taxRate.toFixed(),
    discountRate: invoice.discountRate.toFixed(),
    lineItems: invoice.lineItems.map((item) => ({
      description: item.description,
      qty: item.qty.toFixed(),
      unitPrice: item.unitPrice.toFixed(),
      total: formatMoney(lineTotal(item)),
    })),
    subtotal: formatMoney(totals.subtotal),
    discountAmount: formatMoney(totals.discountAmount),
    taxAmount: formatMoney(totals.taxAmount),
    overdueFee: formatMoney(totals.overdueFee),
    total: formatMoney(totals.total),
  };
}
