import type { InvoiceStatus } from '../src/models/invoice';
import { InvalidTransitionError } from '../src/engine/errors';
import { assertTransition, canTransition, daysOverdue, effectiveStatus } from '../src/engine/status';
import { daysAfter, makeInvoice } from './helpers';

describe('invoice state machine', () => {
  const allowed: Array<[InvoiceStatus, InvoiceStatus]> = [
    ['draft', 'sent'],
    ['sent', 'overdue'],
    ['sent', 'paid'],
    ['overdue', 'paid'],
  ];
  const forbidden: Array<[InvoiceStatus, InvoiceStatus]> = [
    ['draft', 'paid'],
    ['draft', 'overdue'],
    ['sent', 'sent'],
    ['sent', 'draft'],
    ['overdue', 'sent'],
    ['paid', 'sent'],
    ['paid', 'overdue'],
    ['paid', 'paid'],
  ];

  it.each(allowed)('allows %s -> %s', (from, to) => {
    expect(canTransition(from, to)).toBe(true);
  });

  it.each(forbidden)('forbids %s -> %s', (from, to) => {
    expect(canTransition(from, to)).toBe(false);
  });

  it('names the invoice and both states when a transition is refused', () => {
    const invoice = makeInvoice({ status: 'draft', number: 'INV-2026-00007' });

    let caught: unknown;
    try {
      assertTransition(invoice, 'paid');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidTransitionError);
    expect(caught).toMatchObject({
      code: 'INVALID_TRANSITION',
      from: 'draft',
      to: 'paid',
      message: 'Invoice INV-2026-00007 cannot move from draft to paid',
    });
  });
});

describe('overdue derivation', () => {
  it('treats a sent invoice past its due date as overdue', () => {
    const invoice = makeInvoice({ status: 'sent' });

    expect(effectiveStatus(invoice, invoice.dueAt)).toBe('sent');
    expect(effectiveStatus(invoice, daysAfter(invoice.dueAt, 1))).toBe('overdue');
  });

  it('leaves drafts and paid invoices alone', () => {
    const later = daysAfter(makeInvoice().dueAt, 10);

    expect(effectiveStatus(makeInvoice({ status: 'draft' }), later)).toBe('draft');
    expect(effectiveStatus(makeInvoice({ status: 'paid' }), later)).toBe('paid');
  });

  it('counts whole days only, never below zero', () => {
    const invoice = makeInvoice();

    expect(daysOverdue(invoice, daysAfter(invoice.dueAt, -2))).toBe(0);
    expect(daysOverdue(invoice, daysAfter(invoice.dueAt, 2.9))).toBe(2);
  });
});
