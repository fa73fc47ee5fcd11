import Database from 'better-sqlite3';
import fs from 'fs-extra';
import path from 'path';

import { CATALOG_SCHEMA } from './schema.js';

export type CatalogDatabase = Database.Database;

const IN_MEMORY = ':memory:';

/**
 * Opens the catalog store and makes sure both tables exist. The handle is
 * passed explicitly to the router and services; nothing holds it globally.
 */
export function openDatabase(filename: string): CatalogDatabase {
  if (filename !== IN_MEMORY) {
    fs.ensureDirSync(path.dirname(filename));
  }

  const db = new Database(filename);
  if (filename !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.exec(CATALOG_SCHEMA);

  return db;
}
