export * from './db';
export * from './invoiceRepository';
