import type { Invoice, InvoiceStatus } from '../models/invoice';
import { InvalidTransitionError } from './errors';

const ALLOWED_TRANSITIONS: Record<InvoiceStatus, readonly InvoiceStatus[]> = {
  draft: ['sent'],
  sent: ['overdue', 'paid'],
  overdue: ['paid'],
  paid: [],
};

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function canTransition(from: InvoiceStatus, to: InvoiceStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(invoice: Invoice, to: InvoiceStatus): void {
  if (!canTransition(invoice.status, to)) {
    throw new InvalidTransitionError(invoice.number, invoice.status, to);
  }
}

export function isPastDue(invoice: Pick<Invoice, 'dueAt'>, now: Date): boolean {
  return now.getTime() > invoice.dueAt.getTime();
}

/**
 * Whether the invoice accrues an overdue fee at `now`: explicitly overdue, or
 * sent with its due date passed but not yet refreshed.
 */
export function isOverdueAt(invoice: Pick<Invoice, 'status' | 'dueAt'>, now: Date): boolean {
  if (invoice.status === 'overdue') return true;
  return invoice.status === 'sent' && isPastDue(invoice, now);
}

/** Status as it would read after an overdue refresh at `now`. */
export function effectiveStatus(invoice: Pick<Invoice, 'status' | 'dueAt'>, now: Date): InvoiceStatus {
  return isOverdueAt(invoice, now) ? 'overdue' : invoice.status;
}

export function daysOverdue(invoice: Pick<Invoice, 'dueAt'>, now: Date): number {
  const elapsed = now.getTime() - invoice.dueAt.getTime();
  return Math.max(0, Math.floor(elapsed / MS_PER_DAY));
}
