import type { Invoice, InvoiceTotals } from '../models/invoice';
import { formatMoney, formatRate } from '../engine/money';
import { lineTotal } from '../engine/totals';

const WIDTH = 60;
const DESCRIPTION_WIDTH = 28;
const QTY_WIDTH = 6;
const PRICE_WIDTH = 10;
const LABEL_WIDTH = 46;
const AMOUNT_WIDTH = 10;

const HEAVY_RULE = '='.repeat(WIDTH);
const LIGHT_RULE = '-'.repeat(WIDTH);

function isoDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

function column(text: string, width: number): string {
  return text.length > width ? text.slice(0, width) : text.padEnd(width);
}

function amountLine(label: string, amount: string): string {
  return `  ${column(label, LABEL_WIDTH)} ${amount.padStart(AMOUNT_WIDTH)}`;
}

/** Plain-text invoice, laid out for printing or conversion to PDF. */
export function renderInvoiceText(invoice: Invoice, totals: InvoiceTotals): string {
  const lines = [
    HEAVY_RULE,
    '  INVOICE',
    HEAVY_RULE,
    `  Invoice #: ${invoice.number}`,
    `  Date:      ${isoDate(invoice.createdAt)}`,
    `  Due Date:  ${isoDate(invoice.dueAt)}`,
    `  Status:    ${invoice.status.toUpperCase()}`,
    '',
    '  Bill To:',
    `  ${invoice.clientName}`,
    `  ${invoice.clientEmail}`,
    '',
    LIGHT_RULE,
    `  ${column('Description', DESCRIPTION_WIDTH)} ${'Qty'.padStart(QTY_WIDTH)} ${'Unit Price'.padStart(PRICE_WIDTH)} ${'Total'.padStart(AMOUNT_WIDTH)}`,
    LIGHT_RULE,
  ];

  for (const item of invoice.lineItems) {
    lines.push(
      `  ${column(item.description, DESCRIPTION_WIDTH)} ${item.qty.toFixed(2).padStart(QTY_WIDTH)} ${formatMoney(item.unitPrice).padStart(PRICE_WIDTH)} ${formatMoney(lineTotal(item)).padStart(AMOUNT_WIDTH)}`,
    );
  }

  lines.push(LIGHT_RULE, amountLine('Subtotal', formatMoney(totals.subtotal)));
  if (invoice.discountRate.gt(0)) {
    lines.push(
      amountLine(`Discount (${formatRate(invoice.discountRate)}%)`, `-${formatMoney(totals.discountAmount)}`),
    );
  }
  if (invoice.taxRate.gt(0)) {
    lines.push(amountLine(`Tax (${formatRate(invoice.taxRate)}%)`, formatMoney(totals.taxAmount)));
  }
  if (totals.overdueFee.gt(0)) {
    const days = totals.daysOverdue === 1 ? '1 day' : `${totals.daysOverdue} days`;
    lines.push(amountLine(`Overdue fee (${days})`, formatMoney(totals.overdueFee)));
  }
  lines.push(HEAVY_RULE, amountLine(`TOTAL ${invoice.currency}`, formatMoney(totals.total)), HEAVY_RULE);

  if (invoice.status === 'paid' && invoice.paidAt) {
    lines.push(`  PAID on ${isoDate(invoice.paidAt)} via ${invoice.paymentMethod ?? 'unknown'}`);
  }
  if (invoice.notes) {
    lines.push('', `  Notes: ${invoice.notes}`);
  }
  return lines.join('\n');
}
