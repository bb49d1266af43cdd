export * from './invoice';
export * from './ledger';
