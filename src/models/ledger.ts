import type { Decimal } from 'decimal.js';

export type Clock = () => Date;

/** Raw amounts accepted from callers before validation; numbers and strings both parse to decimals. */
export type DecimalInput = number | string | Decimal;

export interface LineItemInput {
  description: string;
  qty: DecimalInput;
  unitPrice: DecimalInput;
}

export interface CreateInvoiceInput {
  clientName: string;
  clientEmail: string;
  lineItems: LineItemInput[];
  taxRate?: DecimalInput | undefined;
  discountRate?: DecimalInput | undefined;
  dueDays?: number | undefined;
  notes?: string | undefined;
  currency?: string | undefined;
}
