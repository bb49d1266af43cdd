import * as os from 'os';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import type { Decimal } from 'decimal.js';
import { toDecimal } from '../engine/money';
import { MAX_DUE_DAYS, parseOrThrow } from '../engine/validation';
import { LOG_LEVELS, type LogLevel } from '../logging/logger';

export interface LedgerConfig {
  dbPath: string;
  overdueDailyRate: Decimal;
  defaultDueDays: number;
  currency: string;
  logLevel: LogLevel;
}

export const DEFAULT_DB_PATH = path.join(os.homedir(), '.invoice-ledger', 'invoices.db');

const logLevelSchema = z.custom<LogLevel>(
  (value) => LOG_LEVELS.some((level) => level === value),
  { message: `Must be one of ${LOG_LEVELS.join(', ')}` },
);

/**
 * Environment variables understood by the ledger.
 */
export const envSchema = z.object({
  INVOICE_DB_PATH: z.string().trim().min(1).default(DEFAULT_DB_PATH),
  INVOICE_OVERDUE_DAILY_RATE: z
    .string()
    .trim()
    .regex(/^\d+(\.\d+)?$/, 'Must be a non-negative decimal')
    .default('0.001')
    .transform((value, ctx) => {
      const rate = toDecimal(value);
      if (rate.gt(1)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must not exceed 1' });
        return z.NEVER;
      }
      return rate;
    }),
  INVOICE_DEFAULT_DUE_DAYS: z
    .string()
    .trim()
    .regex(/^\d+$/, 'Must be a whole number of days')
    .default('30')
    .transform((value, ctx) => {
      const days = Number(value);
      if (days > MAX_DUE_DAYS) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Must not exceed ${MAX_DUE_DAYS}` });
        return z.NEVER;
      }
      return days;
    }),
  INVOICE_CURRENCY: z
    .string()
    .trim()
    .regex(/^[A-Z]{3}$/, 'Must be a three-letter code')
    .default('USD'),
  LOG_LEVEL: logLevelSchema.default('warn'),
});

export function parseConfig(env: NodeJS.ProcessEnv): LedgerConfig {
  const parsed = parseOrThrow(envSchema, env);
  return {
    dbPath: parsed.INVOICE_DB_PATH,
    overdueDailyRate: parsed.INVOICE_OVERDUE_DAILY_RATE,
    defaultDueDays: parsed.INVOICE_DEFAULT_DUE_DAYS,
    currency: parsed.INVOICE_CURRENCY,
    logLevel: parsed.LOG_LEVEL,
  };
}

/** Loads `.env` from the working directory (if any) on top of the process environment. */
export function loadConfig(): LedgerConfig {
  dotenv.config();
  return parseConfig(process.env);
}
