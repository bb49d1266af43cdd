import { z } from 'zod';
import type { InvoiceStatus } from '../models/invoice';
import { INVOICE_STATUSES } from '../models/invoice';
import type { LineItemInput } from '../models/ledger';
import { ValidationError } from '../engine/errors';
import { parseOrThrow } from '../engine/validation';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const cliLineItemSchema = z.object({
  description: z.string(),
  qty: z.union([z.number(), z.string()]),
  unit_price: z.union([z.number(), z.string()]),
});

/** Parses the `--items` JSON: `[{"description":"X","qty":1,"unit_price":100}]`. */
export function parseItemsJson(text: string): LineItemInput[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError([{ path: 'items', message: `Invalid JSON: ${reason}` }]);
  }
  const items = parseOrThrow(z.array(cliLineItemSchema), raw);
  return items.map((item) => ({
    description: item.description,
    qty: item.qty,
    unitPrice: item.unit_price,
  }));
}

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DOTTED_DATE = /^(\d{2})\.(\d{2})\.(\d{4})$/;

/**
 * Accepts `YYYY-MM-DD`, `DD.MM.YYYY` or a full ISO timestamp. Date-only values
 * resolve to the start of that UTC day, or its last millisecond with `endOfDay`.
 */
export function parseDateArg(name: string, value: string, endOfDay = false): Date {
  const trimmed = value.trim();
  let dayParts: [string, string, string] | undefined;

  const isoMatch = DATE_ONLY.exec(trimmed);
  if (isoMatch) {
    const [, yyyy = '', mm = '', dd = ''] = isoMatch;
    dayParts = [yyyy, mm, dd];
  }
  const dotMatch = DOTTED_DATE.exec(trimmed);
  if (dotMatch) {
    const [, dd = '', mm = '', yyyy = ''] = dotMatch;
    dayParts = [yyyy, mm, dd];
  }

  if (dayParts) {
    const [yyyy, mm, dd] = dayParts;
    const time = endOfDay ? 'T23:59:59.999Z' : 'T00:00:00.000Z';
    const date = new Date(`${yyyy}-${mm}-${dd}${time}`);
    if (!Number.isNaN(date.getTime())) return date;
  } else {
    const date = new Date(trimmed);
    if (trimmed.length > 0 && !Number.isNaN(date.getTime())) return date;
  }
  throw new ValidationError([{ path: name, message: `Invalid date "${value}"` }]);
}

export function parseStatusArg(value: string): InvoiceStatus {
  const status = INVOICE_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new ValidationError([
      { path: 'status', message: `Must be one of ${INVOICE_STATUSES.join(', ')}` },
    ]);
  }
  return status;
}

export function parseIntegerArg(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new ValidationError([{ path: name, message: `Expected a whole number, got "${value}"` }]);
  }
  return parsed;
}
