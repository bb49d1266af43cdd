import * as fs from 'fs';
import * as path from 'path';
import Database = require('better-sqlite3');
import { PersistenceError } from '../engine/errors';

export type LedgerDatabase = Database.Database;

export const IN_MEMORY = ':memory:';

export function openLedgerDatabase(filename: string): LedgerDatabase {
  try {
    if (filename !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(filename), { recursive: true });
    }
    const db = new Database(filename);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    return db;
  } catch (error) {
    throw new PersistenceError(`open ledger database at ${filename}`, error);
  }
}
