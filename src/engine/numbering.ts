import { SequenceExhaustedError } from './errors';

const NUMBER_PREFIX = 'INV';
const SEQUENCE_WIDTH = 5;
const MAX_SEQUENCE = 10 ** SEQUENCE_WIDTH - 1;

/** Sequences restart at 00001 each calendar year (UTC). */
export function formatInvoiceNumber(year: number, sequence: number): string {
  if (!Number.isInteger(sequence) || sequence < 1 || sequence > MAX_SEQUENCE) {
    throw new RangeError(`Invoice sequence ${sequence} is outside 1..${MAX_SEQUENCE}`);
  }
  return `${NUMBER_PREFIX}-${String(year).padStart(4, '0')}-${String(sequence).padStart(SEQUENCE_WIDTH, '0')}`;
}

export function invoiceNumberPrefix(year: number): string {
  return `${NUMBER_PREFIX}-${String(year).padStart(4, '0')}-`;
}

export function nextInvoiceNumber(year: number, lastSequence: number | undefined): string {
  const last = lastSequence ?? 0;
  if (last >= MAX_SEQUENCE) {
    throw new SequenceExhaustedError(year, formatInvoiceNumber(year, MAX_SEQUENCE));
  }
  return formatInvoiceNumber(year, last + 1);
}
