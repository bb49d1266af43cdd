import type { InvoiceStatus } from '../models/invoice';

export type LedgerErrorCode =
  | 'VALIDATION_FAILED'
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'SEQUENCE_EXHAUSTED'
  | 'PERSISTENCE_FAILED';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'LedgerError';
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends LedgerError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super('VALIDATION_FAILED', formatIssues(issues));
    this.issues = issues;
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends LedgerError {
  readonly invoiceId: string;

  constructor(invoiceId: string) {
    super('NOT_FOUND', `Invoice ${invoiceId} not found`);
    this.invoiceId = invoiceId;
    this.name = 'NotFoundError';
  }
}

export class InvalidTransitionError extends LedgerError {
  readonly from: InvoiceStatus;
  readonly to: InvoiceStatus;

  constructor(invoiceNumber: string, from: InvoiceStatus, to: InvoiceStatus) {
    super('INVALID_TRANSITION', `Invoice ${invoiceNumber} cannot move from ${from} to ${to}`);
    this.from = from;
    this.to = to;
    this.name = 'InvalidTransitionError';
  }
}

export class SequenceExhaustedError extends LedgerError {
  readonly year: number;

  constructor(year: number, lastNumber: string) {
    super('SEQUENCE_EXHAUSTED', `No invoice numbers left for ${year}; last issued ${lastNumber}`);
    this.year = year;
    this.name = 'SequenceExhaustedError';
  }
}

export class PersistenceError extends LedgerError {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('PERSISTENCE_FAILED', `Failed to ${operation}: ${reason}`, { cause });
    this.name = 'PersistenceError';
  }
}

function formatIssues(issues: ValidationIssue[]): string {
  if (issues.length === 0) return 'Invalid input';
  return issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ');
}
