#!/usr/bin/env node
import * as fs from 'fs';
import { parseArgs } from 'util';
import type { Clock } from '../models/ledger';
import { loadConfig, type LedgerConfig } from '../config/env';
import { LedgerError, PersistenceError } from '../engine/errors';
import { createInvoiceLedger, type InvoiceLedger } from '../engine/ledger';
import { formatMoney } from '../engine/money';
import { validateDailyRate } from '../engine/validation';
import { createLogger, type Logger } from '../logging/logger';
import { buildSummaryReport, exportInvoicesCsv, renderInvoiceText, toInvoiceJson } from '../reports';
import { createInvoiceRepository, openLedgerDatabase } from '../store';
import { UsageError, parseDateArg, parseIntegerArg, parseItemsJson, parseStatusArg } from './args';

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliDependencies {
  config: LedgerConfig;
  clock?: Clock | undefined;
  io?: CliIo | undefined;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const USAGE = `Usage: invoice-ledger [--db <path>] <command> [options]

Commands:
  init                                   Create an empty ledger
  create <client> <email> --items <json> [--tax-rate <r>] [--discount-rate <r>]
                                         [--due-days <n>] [--notes <text>] [--currency <code>]
  get <id>                               Show one invoice
  list [--status <status>] [--client <name>]
  send <id>                              Mark a draft invoice as sent
  pay <id> [--method <name>]             Record payment (default method: bank_transfer)
  pdf <id>                               Render the invoice as text
  overdue-fee <id> [--rate <r>]          Show the overdue fee accrued so far
  mark-overdue                           Move past-due sent invoices to overdue
  report [--start <date>] [--end <date>] Summary for invoices created in the period
  export-csv [--output <path>]           Export all invoices as CSV`;

const OPTIONS = {
  db: { type: 'string' },
  items: { type: 'string' },
  'tax-rate': { type: 'string' },
  'discount-rate': { type: 'string' },
  'due-days': { type: 'string' },
  notes: { type: 'string' },
  currency: { type: 'string' },
  status: { type: 'string' },
  client: { type: 'string' },
  method: { type: 'string' },
  start: { type: 'string' },
  end: { type: 'string' },
  output: { type: 'string' },
  rate: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

type CliValues = ReturnType<typeof parseCommandLine>['values'];

const DEFAULT_PAYMENT_METHOD = 'bank_transfer';

const defaultIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
  stderr: (text) => {
    process.stderr.write(`${text}\n`);
  },
};

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

function requirePositional(positionals: string[], index: number, name: string): string {
  const value = positionals[index];
  if (value === undefined || value === '') {
    throw new UsageError(`Missing <${name}>`);
  }
  return value;
}

function printJson(io: CliIo, value: unknown): void {
  io.stdout(JSON.stringify(value, null, 2));
}

function runCommand(
  command: string,
  positionals: string[],
  values: CliValues,
  ledger: InvoiceLedger,
  io: CliIo,
  now: () => Date,
): void {
  switch (command) {
    case 'create': {
      if (values.items === undefined) throw new UsageError('create requires --items <json>');
      const invoice = ledger.create({
        clientName: requirePositional(positionals, 1, 'client'),
        clientEmail: requirePositional(positionals, 2, 'email'),
        lineItems: parseItemsJson(values.items),
        taxRate: values['tax-rate'],
        discountRate: values['discount-rate'],
        dueDays: values['due-days'] === undefined ? undefined : parseIntegerArg('due-days', values['due-days']),
        notes: values.notes,
        currency: values.currency,
      });
      printJson(io, toInvoiceJson(invoice, ledger.computeTotals(invoice, now())));
      return;
    }
    case 'get': {
      const invoice = ledger.get(requirePositional(positionals, 1, 'id'));
      printJson(io, toInvoiceJson(invoice, ledger.computeTotals(invoice, now())));
      return;
    }
    case 'list': {
      const at = now();
      const invoices = ledger.list({
        status: values.status === undefined ? undefined : parseStatusArg(values.status),
        client: values.client,
      });
      printJson(
        io,
        invoices.map((invoice) => toInvoiceJson(invoice, ledger.computeTotals(invoice, at))),
      );
      return;
    }
    case 'send': {
      const invoice = ledger.send(requirePositional(positionals, 1, 'id'));
      printJson(io, toInvoiceJson(invoice, ledger.computeTotals(invoice, now())));
      return;
    }
    case 'pay': {
      const invoice = ledger.pay(requirePositional(positionals, 1, 'id'), values.method ?? DEFAULT_PAYMENT_METHOD);
      printJson(io, toInvoiceJson(invoice, ledger.computeTotals(invoice, now())));
      return;
    }
    case 'pdf': {
      const id = requirePositional(positionals, 1, 'id');
      const at = now();
      ledger.refreshOverdueStatus(at);
      const invoice = ledger.get(id);
      io.stdout(renderInvoiceText(invoice, ledger.computeTotals(invoice, at)));
      return;
    }
    case 'overdue-fee': {
      const id = requirePositional(positionals, 1, 'id');
      const rate = values.rate === undefined ? undefined : validateDailyRate(values.rate);
      const at = now();
      ledger.refreshOverdueStatus(at);
      printJson(io, { id, overdueFee: formatMoney(ledger.overdueFee(id, at, rate)) });
      return;
    }
    case 'mark-overdue': {
      printJson(io, { updated: ledger.refreshOverdueStatus(now()) });
      return;
    }
    case 'report': {
      const at = now();
      ledger.refreshOverdueStatus(at);
      const report = buildSummaryReport(
        ledger,
        {
          start: values.start === undefined ? undefined : parseDateArg('start', values.start),
          end: values.end === undefined ? undefined : parseDateArg('end', values.end, true),
        },
        at,
      );
      printJson(io, report);
      return;
    }
    case 'export-csv': {
      const at = now();
      ledger.refreshOverdueStatus(at);
      const csv = exportInvoicesCsv(ledger, at);
      if (values.output === undefined) {
        io.stdout(csv.trimEnd());
      } else {
        writeExport(values.output, csv);
        io.stdout(`Exported to ${values.output}`);
      }
      return;
    }
    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}

function writeExport(target: string, contents: string): void {
  try {
    fs.writeFileSync(target, contents, 'utf8');
  } catch (error) {
    throw new PersistenceError(`write export to ${target}`, error);
  }
}

export function runCli(argv: string[], deps: CliDependencies): number {
  const io = deps.io ?? defaultIo;
  const clock = deps.clock ?? (() => new Date());
  const logger: Logger = createLogger(deps.config.logLevel, (line) => io.stderr(line));

  try {
    const { values, positionals } = parseCommandLine(argv);
    const command = positionals[0];
    if (values.help) {
      io.stdout(USAGE);
      return EXIT_OK;
    }
    if (command === undefined) {
      throw new UsageError('Missing <command>');
    }

    const dbPath = values.db ?? deps.config.dbPath;
    const db = openLedgerDatabase(dbPath);
    try {
      const repository = createInvoiceRepository(db, logger);
      if (command === 'init') {
        io.stdout(`Ledger initialised at ${dbPath}`);
        return EXIT_OK;
      }
      const ledger = createInvoiceLedger(repository, {
        clock,
        overdueDailyRate: deps.config.overdueDailyRate,
        defaultDueDays: deps.config.defaultDueDays,
        currency: deps.config.currency,
        logger,
      });
      runCommand(command, positionals, values, ledger, io, clock);
      return EXIT_OK;
    } finally {
      db.close();
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`error: ${error.message}`);
      io.stderr(USAGE);
      return EXIT_USAGE;
    }
    if (error instanceof LedgerError) {
      io.stderr(`error: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}

export function main(argv: string[] = process.argv.slice(2)): number {
  try {
    return runCli(argv, { config: loadConfig() });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    defaultIo.stderr(`error: ${message}`);
    return EXIT_FAILURE;
  }
}

if (require.main === module) {
  process.exitCode = main();
}
