export * from './invoiceText';
export * from './csvExport';
export * from './summary';
export * from './invoiceJson';
