import { SequenceExhaustedError } from '../src/engine/errors';
import { formatInvoiceNumber, invoiceNumberPrefix, nextInvoiceNumber } from '../src/engine/numbering';

describe('invoice numbering', () => {
  it('formats year and zero-padded sequence', () => {
    expect(formatInvoiceNumber(2026, 1)).toBe('INV-2026-00001');
    expect(formatInvoiceNumber(2026, 12345)).toBe('INV-2026-12345');
  });

  it('rejects sequences that do not fit five digits', () => {
    expect(() => formatInvoiceNumber(2026, 0)).toThrow(RangeError);
    expect(() => formatInvoiceNumber(2026, 100000)).toThrow('Invoice sequence 100000 is outside 1..99999');
  });

  it('starts at one and continues from the last sequence', () => {
    expect(nextInvoiceNumber(2027, undefined)).toBe('INV-2027-00001');
    expect(nextInvoiceNumber(2026, 41)).toBe('INV-2026-00042');
  });

  it('issues the last five-digit number and then refuses', () => {
    expect(nextInvoiceNumber(2026, 99998)).toBe('INV-2026-99999');
    expect(() => nextInvoiceNumber(2026, 99999)).toThrow(SequenceExhaustedError);
    expect(() => nextInvoiceNumber(2026, 99999)).toThrow(
      'No invoice numbers left for 2026; last issued INV-2026-99999',
    );
  });

  it('builds the per-year prefix used for sequence lookups', () => {
    expect(invoiceNumberPrefix(2026)).toBe('INV-2026-');
  });
});
