import type { LedgerDatabase } from './db';
import type { Invoice, InvoiceFilter, InvoiceStatus, LineItem } from '../models/invoice';
import { INVOICE_STATUSES } from '../models/invoice';
import { LedgerError, PersistenceError } from '../engine/errors';
import { toDecimal } from '../engine/money';
import { invoiceNumberPrefix } from '../engine/numbering';
import type { Logger } from '../logging/logger';

export interface InvoiceRepository {
  insertInvoice(invoice: Invoice): void;
  /** Persists the mutable lifecycle fields: status, paidAt, paymentMethod, overdueFee. */
  saveInvoiceState(invoice: Invoice): void;
  getInvoiceById(id: string): Invoice | undefined;
  findInvoices(filter?: InvoiceFilter): Invoice[];
  lastSequenceForYear(year: number): number | undefined;
  transaction<T>(work: () => T): T;
}

interface InvoiceRow {
  id: string;
  number: string;
  client_name: string;
  client_email: string;
  tax_rate: string;
  discount_rate: string;
  status: string;
  created_at: string;
  due_at: string;
  paid_at: string | null;
  payment_method: string | null;
  overdue_fee: string | null;
  notes: string;
  currency: string;
}

interface LineItemRow {
  description: string;
  qty: string;
  unit_price: string;
}

interface InvoiceStateParams {
  id: string;
  status: InvoiceStatus;
  paid_at: string | null;
  payment_method: string | null;
  overdue_fee: string | null;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS invoices (
    id             TEXT PRIMARY KEY,
    number         TEXT UNIQUE NOT NULL,
    client_name    TEXT NOT NULL,
    client_email   TEXT NOT NULL,
    tax_rate       TEXT NOT NULL DEFAULT '0',
    discount_rate  TEXT NOT NULL DEFAULT '0',
    status         TEXT NOT NULL DEFAULT 'draft',
    created_at     TEXT NOT NULL,
    due_at         TEXT NOT NULL,
    paid_at        TEXT,
    payment_method TEXT,
    overdue_fee    TEXT,
    notes          TEXT NOT NULL DEFAULT '',
    currency       TEXT NOT NULL DEFAULT 'USD'
  );
  CREATE TABLE IF NOT EXISTS line_items (
    invoice_id  TEXT NOT NULL REFERENCES invoices(id),
    position    INTEGER NOT NULL,
    description TEXT NOT NULL,
    qty         TEXT NOT NULL,
    unit_price  TEXT NOT NULL,
    PRIMARY KEY (invoice_id, position)
  );
  CREATE INDEX IF NOT EXISTS idx_invoices_status ON invoices(status);
  CREATE INDEX IF NOT EXISTS idx_invoices_created ON invoices(created_at);
`;

const INVOICE_COLUMNS = `id, number, client_name, client_email, tax_rate, discount_rate, status,
  created_at, due_at, paid_at, payment_method, overdue_fee, notes, currency`;

function isInvoiceStatus(value: string): value is InvoiceStatus {
  return INVOICE_STATUSES.some((status) => status === value);
}

function guard<T>(operation: string, work: () => T): T {
  try {
    return work();
  } catch (error) {
    if (error instanceof LedgerError) throw error;
    throw new PersistenceError(operation, error);
  }
}

function toInvoice(row: InvoiceRow, lineItems: LineItem[]): Invoice {
  if (!isInvoiceStatus(row.status)) {
    throw new PersistenceError(`read invoice ${row.number}`, `unknown status "${row.status}"`);
  }
  const invoice: Invoice = {
    id: row.id,
    number: row.number,
    clientName: row.client_name,
    clientEmail: row.client_email,
    lineItems,
    taxRate: toDecimal(row.tax_rate),
    discountRate: toDecimal(row.discount_rate),
    status: row.status,
    createdAt: new Date(row.created_at),
    dueAt: new Date(row.due_at),
    notes: row.notes,
    currency: row.currency,
  };
  if (row.paid_at !== null) invoice.paidAt = new Date(row.paid_at);
  if (row.payment_method !== null) invoice.paymentMethod = row.payment_method;
  if (row.overdue_fee !== null) invoice.overdueFee = toDecimal(row.overdue_fee);
  return invoice;
}

export function createInvoiceRepository(db: LedgerDatabase, logger?: Logger): InvoiceRepository {
  guard('initialise ledger schema', () => db.exec(SCHEMA));
  logger?.debug('ledger schema ready');

  const insertInvoiceStmt = db.prepare<{
    id: string;
    number: string;
    client_name: string;
    client_email: string;
    tax_rate: string;
    discount_rate: string;
    status: InvoiceStatus;
    created_at: string;
    due_at: string;
    notes: string;
    currency: string;
  }>(`
    INSERT INTO invoices (id, number, client_name, client_email, tax_rate, discount_rate,
                          status, created_at, due_at, notes, currency)
    VALUES (@id, @number, @client_name, @client_email, @tax_rate, @discount_rate,
            @status, @created_at, @due_at, @notes, @currency)
  `);

  const insertLineItemStmt = db.prepare<{
    invoice_id: string;
    position: number;
    description: string;
    qty: string;
    unit_price: string;
  }>(`
    INSERT INTO line_items (invoice_id, position, description, qty, unit_price)
    VALUES (@invoice_id, @position, @description, @qty, @unit_price)
  `);

  const updateStateStmt = db.prepare<InvoiceStateParams>(`
    UPDATE invoices
    SET status = @status, paid_at = @paid_at, payment_method = @payment_method, overdue_fee = @overdue_fee
    WHERE id = @id
  `);

  const getByIdStmt = db.prepare<[string], InvoiceRow>(
    `SELECT ${INVOICE_COLUMNS} FROM invoices WHERE id = ?`,
  );

  const lineItemsStmt = db.prepare<[string], LineItemRow>(
    'SELECT description, qty, unit_price FROM line_items WHERE invoice_id = ? ORDER BY position',
  );

  const lastSequenceStmt = db.prepare<[number, string], { seq: number | null }>(
    'SELECT MAX(CAST(substr(number, ?) AS INTEGER)) AS seq FROM invoices WHERE number LIKE ?',
  );

  function loadLineItems(invoiceId: string): LineItem[] {
    return lineItemsStmt.all(invoiceId).map((row) => ({
      description: row.description,
      qty: toDecimal(row.qty),
      unitPrice: toDecimal(row.unit_price),
    }));
  }

  return {
    insertInvoice(invoice: Invoice) {
      guard(`insert invoice ${invoice.number}`, () =>
        db.transaction(() => {
          insertInvoiceStmt.run({
            id: invoice.id,
            number: invoice.number,
            client_name: invoice.clientName,
            client_email: invoice.clientEmail,
            tax_rate: invoice.taxRate.toString(),
            discount_rate: invoice.discountRate.toString(),
            status: invoice.status,
            created_at: invoice.createdAt.toISOString(),
            due_at: invoice.dueAt.toISOString(),
            notes: invoice.notes,
            currency: invoice.currency,
          });
          invoice.lineItems.forEach((item, position) => {
            insertLineItemStmt.run({
              invoice_id: invoice.id,
              position,
              description: item.description,
              qty: item.qty.toString(),
              unit_price: item.unitPrice.toString(),
            });
          });
        })(),
      );
    },
    saveInvoiceState(invoice: Invoice) {
      guard(`update invoice ${invoice.number}`, () => {
        const result = updateStateStmt.run({
          id: invoice.id,
          status: invoice.status,
          paid_at: invoice.paidAt ? invoice.paidAt.toISOString() : null,
          payment_method: invoice.paymentMethod ?? null,
          overdue_fee: invoice.overdueFee ? invoice.overdueFee.toString() : null,
        });
        if (result.changes !== 1) {
          throw new PersistenceError(`update invoice ${invoice.number}`, 'no row was updated');
        }
      });
    },
    getInvoiceById(id: string) {
      return guard(`read invoice ${id}`, () => {
        const row = getByIdStmt.get(id);
        if (!row) return undefined;
        return toInvoice(row, loadLineItems(row.id));
      });
    },
    findInvoices(filter: InvoiceFilter = {}) {
      const conditions: string[] = [];
      const params: string[] = [];
      if (filter.status) {
        conditions.push('status = ?');
        params.push(filter.status);
      }
      if (filter.client) {
        conditions.push('instr(lower(client_name), lower(?)) > 0');
        params.push(filter.client);
      }
      if (filter.createdFrom) {
        conditions.push('created_at >= ?');
        params.push(filter.createdFrom.toISOString());
      }
      if (filter.createdTo) {
        conditions.push('created_at <= ?');
        params.push(filter.createdTo.toISOString());
      }
      const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
      return guard('list invoices', () =>
        db
          .prepare<string[], InvoiceRow>(
            `SELECT ${INVOICE_COLUMNS} FROM invoices ${where} ORDER BY created_at DESC, number DESC`,
          )
          .all(...params)
          .map((row) => toInvoice(row, loadLineItems(row.id))),
      );
    },
    lastSequenceForYear(year: number) {
      const prefix = invoiceNumberPrefix(year);
      return guard(`read last invoice sequence for ${year}`, () => {
        const row = lastSequenceStmt.get(prefix.length + 1, `${prefix}%`);
        return row?.seq ?? undefined;
      });
    },
    transaction<T>(work: () => T): T {
      return guard('commit ledger transaction', () => db.transaction(work)());
    },
  };
}
