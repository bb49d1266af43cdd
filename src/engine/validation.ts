import { z } from 'zod';
import { Decimal } from 'decimal.js';
import { toDecimal } from './money';
import { ValidationError, type ValidationIssue } from './errors';

const decimalInput = z.union([
  z.number(),
  z.string().trim().min(1),
  z.custom<Decimal>((value) => Decimal.isDecimal(value)),
]);

/** Accepts a number, numeric string or Decimal and checks the converted value. */
function decimalValue(check: (value: Decimal) => boolean, message: string) {
  return decimalInput.transform((value, ctx): Decimal => {
    let decimal: Decimal;
    try {
      decimal = toDecimal(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a decimal number' });
      return z.NEVER;
    }
    if (!check(decimal)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      return z.NEVER;
    }
    return decimal;
  });
}

/** Longest payment term accepted for a single invoice. */
export const MAX_DUE_DAYS = 3650;

const rate = decimalValue((value) => value.gte(0) && value.lte(1), 'Must be between 0 and 1');

const lineItemSchema = z.object({
  description: z.string().trim().min(1, 'Description is required'),
  qty: decimalValue((value) => value.gt(0), 'Quantity must be positive'),
  unitPrice: decimalValue((value) => value.gte(0), 'Unit price must not be negative'),
});

export const createInvoiceSchema = z.object({
  clientName: z.string().trim().min(1, 'Client name is required'),
  clientEmail: z.string().trim().email('Client email must be an e-mail address'),
  lineItems: z.array(lineItemSchema).min(1, 'Invoice must have at least one line item'),
  taxRate: rate.optional(),
  discountRate: rate.optional(),
  dueDays: z
    .number()
    .int('Due days must be a whole number')
    .min(0, 'Due days must not be negative')
    .max(MAX_DUE_DAYS, `Due days must not exceed ${MAX_DUE_DAYS}`)
    .optional(),
  notes: z.string().optional(),
  currency: z
    .string()
    .trim()
    .regex(/^[A-Z]{3}$/, 'Currency must be a three-letter code')
    .optional(),
});

export type ValidatedInvoiceInput = z.infer<typeof createInvoiceSchema>;

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

export function parseOrThrow<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  input: unknown,
): z.output<TSchema> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toValidationIssues(result.error));
  }
  return result.data;
}

export function validateCreateInvoice(input: unknown): ValidatedInvoiceInput {
  return parseOrThrow(createInvoiceSchema, input);
}

export function validatePaymentMethod(method: unknown): string {
  return parseOrThrow(z.string().trim().min(1, 'Payment method is required'), method);
}

/** Daily overdue rate given per query, e.g. from the command line. */
export function validateDailyRate(value: unknown): Decimal {
  return parseOrThrow(z.object({ rate }), { rate: value }).rate;
}
