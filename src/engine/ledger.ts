import { v4 as uuidv4 } from 'uuid';
import type { Decimal } from 'decimal.js';
import type { Invoice, InvoiceFilter, InvoiceTotals } from '../models/invoice';
import type { Clock, CreateInvoiceInput } from '../models/ledger';
import type { InvoiceRepository } from '../store/invoiceRepository';
import { silentLogger, type Logger } from '../logging/logger';
import { NotFoundError } from './errors';
import { ZERO, formatMoney } from './money';
import { nextInvoiceNumber } from './numbering';
import { MS_PER_DAY, assertTransition, isPastDue } from './status';
import { DEFAULT_DAILY_OVERDUE_RATE, computeTotals } from './totals';
import { validateCreateInvoice, validatePaymentMethod } from './validation';

export interface InvoiceLedgerOptions {
  clock?: Clock | undefined;
  overdueDailyRate?: Decimal | undefined;
  defaultDueDays?: number | undefined;
  currency?: string | undefined;
  logger?: Logger | undefined;
}

export interface InvoiceLedger {
  create(input: CreateInvoiceInput): Invoice;
  get(invoiceId: string): Invoice;
  list(filter?: InvoiceFilter): Invoice[];
  send(invoiceId: string): Invoice;
  pay(invoiceId: string, method: string): Invoice;
  computeTotals(invoice: Invoice, now?: Date): InvoiceTotals;
  /** Fee accrued at `now`; `dailyRate` overrides the configured rate for this query only. */
  overdueFee(invoiceId: string, now?: Date, dailyRate?: Decimal): Decimal;
  refreshOverdueStatus(now?: Date): number;
}

const DEFAULT_DUE_DAYS = 30;
const DEFAULT_CURRENCY = 'USD';

/**
 * The authoritative collection of invoices. Every mutation validates first and
 * then writes inside one repository transaction, so a failure leaves the stored
 * invoice exactly as it was.
 */
export function createInvoiceLedger(
  repository: InvoiceRepository,
  options: InvoiceLedgerOptions = {},
): InvoiceLedger {
  const clock = options.clock ?? (() => new Date());
  const dailyRate = options.overdueDailyRate ?? DEFAULT_DAILY_OVERDUE_RATE;
  const defaultDueDays = options.defaultDueDays ?? DEFAULT_DUE_DAYS;
  const defaultCurrency = options.currency ?? DEFAULT_CURRENCY;
  const logger = options.logger ?? silentLogger;

  function load(invoiceId: string): Invoice {
    const invoice = repository.getInvoiceById(invoiceId);
    if (!invoice) {
      throw new NotFoundError(invoiceId);
    }
    return invoice;
  }

  return {
    create(input: CreateInvoiceInput) {
      const payload = validateCreateInvoice(input);
      const createdAt = clock();
      const dueDays = payload.dueDays ?? defaultDueDays;

      const invoice = repository.transaction(() => {
        const year = createdAt.getUTCFullYear();
        const draft: Invoice = {
          id: uuidv4(),
          number: nextInvoiceNumber(year, repository.lastSequenceForYear(year)),
          clientName: payload.clientName,
          clientEmail: payload.clientEmail,
          lineItems: payload.lineItems.map((item) => ({
            description: item.description,
            qty: item.qty,
            unitPrice: item.unitPrice,
          })),
          taxRate: payload.taxRate ?? ZERO,
          discountRate: payload.discountRate ?? ZERO,
          status: 'draft',
          createdAt,
          dueAt: new Date(createdAt.getTime() + dueDays * MS_PER_DAY),
          notes: payload.notes ?? '',
          currency: payload.currency ?? defaultCurrency,
        };
        repository.insertInvoice(draft);
        return draft;
      });

      logger.info('invoice created', { number: invoice.number, client: invoice.clientName });
      return invoice;
    },

    get(invoiceId: string) {
      return load(invoiceId);
    },

    list(filter: InvoiceFilter = {}) {
      return repository.findInvoices(filter);
    },

    send(invoiceId: string) {
      const invoice = repository.transaction(() => {
        const current = load(invoiceId);
        assertTransition(current, 'sent');
        const sent: Invoice = { ...current, status: 'sent' };
        repository.saveInvoiceState(sent);
        return sent;
      });

      logger.info('invoice sent', { number: invoice.number });
      return invoice;
    },

    pay(invoiceId: string, method: string) {
      const paymentMethod = validatePaymentMethod(method);
      const paidAt = clock();

      const invoice = repository.transaction(() => {
        const current = load(invoiceId);
        assertTransition(current, 'paid');
        const { overdueFee } = computeTotals(current, paidAt, dailyRate);
        const paid: Invoice = {
          ...current,
          status: 'paid',
          paidAt,
          paymentMethod,
          overdueFee,
        };
        repository.saveInvoiceState(paid);
        return paid;
      });

      logger.info('invoice paid', {
        number: invoice.number,
        method: paymentMethod,
        overdueFee: formatMoney(invoice.overdueFee ?? ZERO),
      });
      return invoice;
    },

    computeTotals(invoice: Invoice, now: Date = clock()) {
      return computeTotals(invoice, now, dailyRate);
    },

    overdueFee(invoiceId: string, now: Date = clock(), rateOverride: Decimal = dailyRate) {
      return computeTotals(load(invoiceId), now, rateOverride).overdueFee;
    },

    refreshOverdueStatus(now: Date = clock()) {
      const updated = repository.transaction(() => {
        const pastDue = repository
          .findInvoices({ status: 'sent' })
          .filter((invoice) => isPastDue(invoice, now));
        for (const invoice of pastDue) {
          assertTransition(invoice, 'overdue');
          repository.saveInvoiceState({ ...invoice, status: 'overdue' });
        }
        return pastDue.map((invoice) => invoice.number);
      });

      if (updated.length > 0) {
        logger.info('invoices marked overdue', { count: updated.length, numbers: updated });
      }
      return updated.length;
    },
  };
}
