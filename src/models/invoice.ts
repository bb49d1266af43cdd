import type { Decimal } from 'decimal.js';

export type InvoiceStatus = 'draft' | 'sent' | 'overdue' | 'paid';

export const INVOICE_STATUSES: readonly InvoiceStatus[] = ['draft', 'sent', 'overdue', 'paid'];

export interface LineItem {
  description: string;
  qty: Decimal;
  unitPrice: Decimal;
}

export interface Invoice {
  id: string;
  number: string;
  clientName: string;
  clientEmail: string;
  lineItems: LineItem[];
  taxRate: Decimal;
  discountRate: Decimal;
  status: InvoiceStatus;
  createdAt: Date;
  dueAt: Date;
  /** Set only once the invoice is paid, together with paymentMethod and overdueFee. */
  paidAt?: Date | undefined;
  paymentMethod?: string | undefined;
  /** Overdue fee frozen at payment time. */
  overdueFee?: Decimal | undefined;
  notes: string;
  currency: string;
}

export interface InvoiceTotals {
  subtotal: Decimal;
  discountAmount: Decimal;
  taxableBase: Decimal;
  taxAmount: Decimal;
  baseTotal: Decimal;
  overdueFee: Decimal;
  daysOverdue: number;
  total: Decimal;
}

export interface InvoiceFilter {
  status?: InvoiceStatus | undefined;
  client?: string | undefined;
  createdFrom?: Date | undefined;
  createdTo?: Date | undefined;
}
