export * from './errors';
export * from './money';
export * from './numbering';
export * from './status';
export * from './totals';
export * from './validation';
export * from './ledger';
