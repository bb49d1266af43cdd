import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PersistenceError } from '../src/engine/errors';
import { toDecimal } from '../src/engine/money';
import { IN_MEMORY, openLedgerDatabase } from '../src/store/db';
import { createInvoiceRepository } from '../src/store/invoiceRepository';
import { lineItem, makeInvoice } from './helpers';

describe('invoice repository', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'invoice-ledger-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('keeps invoices and line-item order across reopening the file', () => {
    const file = path.join(tempDir, 'nested', 'ledger.db');
    const first = openLedgerDatabase(file);
    createInvoiceRepository(first).insertInvoice(
      makeInvoice({
        id: 'inv-1',
        lineItems: [lineItem('Zeta', '1', '1'), lineItem('Alpha', '2', '0.333')],
        taxRate: toDecimal('0.0825'),
      }),
    );
    first.close();

    const second = openLedgerDatabase(file);
    const loaded = createInvoiceRepository(second).getInvoiceById('inv-1');
    second.close();

    expect(loaded?.lineItems.map((item) => item.description)).toEqual(['Zeta', 'Alpha']);
    expect(loaded?.lineItems[1]?.unitPrice.toString()).toBe('0.333');
    expect(loaded?.taxRate.toString()).toBe('0.0825');
    expect(loaded?.status).toBe('draft');
  });

  it('stores and clears the payment fields with the status', () => {
    const repository = createInvoiceRepository(openLedgerDatabase(IN_MEMORY));
    const invoice = makeInvoice({ id: 'inv-2' });
    repository.insertInvoice(invoice);

    repository.saveInvoiceState({
      ...invoice,
      status: 'paid',
      paidAt: new Date('2026-04-02T10:00:00.000Z'),
      paymentMethod: 'card',
      overdueFee: toDecimal('1.32'),
    });
    const paid = repository.getInvoiceById('inv-2');

    expect(paid?.status).toBe('paid');
    expect(paid?.paidAt?.toISOString()).toBe('2026-04-02T10:00:00.000Z');
    expect(paid?.paymentMethod).toBe('card');
    expect(paid?.overdueFee?.toString()).toBe('1.32');
  });

  it('returns the highest sequence issued in a year', () => {
    const repository = createInvoiceRepository(openLedgerDatabase(IN_MEMORY));
    repository.insertInvoice(makeInvoice({ id: 'a', number: 'INV-2026-00001' }));
    repository.insertInvoice(makeInvoice({ id: 'b', number: 'INV-2026-00012' }));
    repository.insertInvoice(makeInvoice({ id: 'c', number: 'INV-2025-00099' }));

    expect(repository.lastSequenceForYear(2026)).toBe(12);
    expect(repository.lastSequenceForYear(2025)).toBe(99);
    expect(repository.lastSequenceForYear(2024)).toBeUndefined();
  });

  it('wraps SQLite failures in a PersistenceError and writes nothing', () => {
    const repository = createInvoiceRepository(openLedgerDatabase(IN_MEMORY));
    repository.insertInvoice(makeInvoice({ id: 'dup', number: 'INV-2026-00001' }));

    expect(() => repository.insertInvoice(makeInvoice({ id: 'other', number: 'INV-2026-00001' }))).toThrow(
      PersistenceError,
    );
    expect(repository.getInvoiceById('other')).toBeUndefined();
    expect(repository.findInvoices()).toHaveLength(1);
  });

  it('refuses to update an invoice that was never stored', () => {
    const repository = createInvoiceRepository(openLedgerDatabase(IN_MEMORY));

    expect(() => repository.saveInvoiceState(makeInvoice({ id: 'ghost' }))).toThrow(
      'Failed to update invoice INV-2026-00001: no row was updated',
    );
  });

  it('rejects rows with an unknown status', () => {
    const db = openLedgerDatabase(IN_MEMORY);
    const repository = createInvoiceRepository(db);
    repository.insertInvoice(makeInvoice({ id: 'odd' }));
    db.prepare("UPDATE invoices SET status = 'void' WHERE id = 'odd'").run();

    expect(() => repository.getInvoiceById('odd')).toThrow(PersistenceError);
  });

  it('reports a database path it cannot open', () => {
    const blocker = path.join(tempDir, 'file');
    fs.writeFileSync(blocker, '');

    expect(() => openLedgerDatabase(path.join(blocker, 'ledger.db'))).toThrow(PersistenceError);
  });
});
