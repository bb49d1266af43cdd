import type { Decimal } from 'decimal.js';
import type { Invoice, InvoiceTotals, LineItem } from '../models/invoice';
import { ZERO, sumDecimals, toDecimal } from './money';
import { daysOverdue, isOverdueAt } from './status';

export const DEFAULT_DAILY_OVERDUE_RATE = toDecimal('0.001');

export function lineTotal(item: LineItem): Decimal {
  return item.qty.times(item.unitPrice);
}

/** Daily-compounded surcharge: base * ((1 + rate)^days - 1). */
export function compoundOverdueFee(base: Decimal, dailyRate: Decimal, days: number): Decimal {
  if (days <= 0) return ZERO;
  return base.times(dailyRate.plus(1).pow(days).minus(1));
}

/**
 * Monetary breakdown of an invoice at `now`. Reads only; the stored status is
 * not refreshed here, but a sent invoice past its due date accrues a fee.
 * Paid invoices report the fee frozen at payment.
 */
export function computeTotals(
  invoice: Invoice,
  now: Date,
  dailyRate: Decimal = DEFAULT_DAILY_OVERDUE_RATE,
): InvoiceTotals {
  const subtotal = sumDecimals(invoice.lineItems.map(lineTotal));
  const discountAmount = subtotal.times(invoice.discountRate);
  const taxableBase = subtotal.minus(discountAmount);
  const taxAmount = taxableBase.times(invoice.taxRate);
  const baseTotal = taxableBase.plus(taxAmount);

  let overdueFee = ZERO;
  let days = 0;
  if (invoice.status === 'paid') {
    overdueFee = invoice.overdueFee ?? ZERO;
    if (invoice.paidAt && overdueFee.gt(0)) {
      days = daysOverdue(invoice, invoice.paidAt);
    }
  } else if (isOverdueAt(invoice, now)) {
    days = daysOverdue(invoice, now);
    overdueFee = compoundOverdueFee(baseTotal, dailyRate, days);
  }

  return {
    subtotal,
    discountAmount,
    taxableBase,
    taxAmount,
    baseTotal,
    overdueFee,
    daysOverdue: days,
    total: baseTotal.plus(overdueFee),
  };
}
