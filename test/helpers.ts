import type { Invoice, LineItem } from '../src/models/invoice';
import { createInvoiceLedger, type InvoiceLedger, type InvoiceLedgerOptions } from '../src/engine/ledger';
import { toDecimal } from '../src/engine/money';
import { MS_PER_DAY } from '../src/engine/status';
import { IN_MEMORY, openLedgerDatabase, type LedgerDatabase } from '../src/store/db';
import { createInvoiceRepository, type InvoiceRepository } from '../src/store/invoiceRepository';

export const START = '2026-03-01T09:00:00.000Z';

export class TestClock {
  private current: Date;

  constructor(iso: string = START) {
    this.current = new Date(iso);
  }

  now = (): Date => this.current;

  set(iso: string): void {
    this.current = new Date(iso);
  }

  advanceDays(days: number): Date {
    this.current = new Date(this.current.getTime() + days * MS_PER_DAY);
    return this.current;
  }
}

export interface TestLedger {
  db: LedgerDatabase;
  repository: InvoiceRepository;
  ledger: InvoiceLedger;
  clock: TestClock;
}

export function createTestLedger(
  options: Omit<InvoiceLedgerOptions, 'clock'> = {},
  repositoryOverride?: (repository: InvoiceRepository) => InvoiceRepository,
): TestLedger {
  const db = openLedgerDatabase(IN_MEMORY);
  const base = createInvoiceRepository(db);
  const repository = repositoryOverride ? repositoryOverride(base) : base;
  const clock = new TestClock();
  const ledger = createInvoiceLedger(repository, { ...options, clock: clock.now });
  return { db, repository, ledger, clock };
}

export function webDevItems() {
  return [{ description: 'Web Dev', qty: 10, unitPrice: 150 }];
}

export function lineItem(description: string, qty: string, unitPrice: string): LineItem {
  return { description, qty: toDecimal(qty), unitPrice: toDecimal(unitPrice) };
}

export function makeInvoice(overrides: Partial<Invoice> = {}): Invoice {
  const createdAt = new Date(START);
  return {
    id: 'inv-test',
    number: 'INV-2026-00001',
    clientName: 'Acme Corp',
    clientEmail: 'billing@acme.test',
    lineItems: [lineItem('Web Dev', '10', '150')],
    taxRate: toDecimal('0.1'),
    discountRate: toDecimal('0'),
    status: 'draft',
    createdAt,
    dueAt: new Date(createdAt.getTime() + 30 * MS_PER_DAY),
    notes: '',
    currency: 'USD',
    ...overrides,
  };
}

export function daysAfter(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}
