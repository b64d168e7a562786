/**
 * SQLite connection + schema
 *
 * One better-sqlite3 connection per process. Statements run synchronously,
 * so a read-modify-write wrapped in db.transaction() cannot interleave with
 * another session's write. References between tables are advisory: there
 * are no foreign keys and no cascades.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { StoreError, ValidationError, errorMessage } from '../errors.js';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS supplies (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  category TEXT NOT NULL,
  brand TEXT,
  color TEXT,
  size TEXT,
  unit TEXT,
  notes TEXT,
  quantity_level TEXT NOT NULL CHECK (quantity_level IN ('plenty', 'low', 'empty')),
  amount REAL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  superseded_by INTEGER
);

CREATE TABLE IF NOT EXISTS supply_usage (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  supply_id INTEGER NOT NULL,
  project_id INTEGER,
  amount_used REAL NOT NULL,
  used_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS projects (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  title TEXT NOT NULL,
  description TEXT,
  status TEXT NOT NULL CHECK (status IN ('idea', 'in-progress', 'completed')),
  medium TEXT,
  style TEXT,
  materials TEXT NOT NULL DEFAULT '[]',
  steps TEXT NOT NULL DEFAULT '[]',
  notes TEXT,
  estimated_budget REAL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  completed_at TEXT
);

CREATE TABLE IF NOT EXISTS project_supplies (
  project_id INTEGER NOT NULL,
  supply_id INTEGER NOT NULL,
  PRIMARY KEY (project_id, supply_id)
);

CREATE TABLE IF NOT EXISTS portfolio_pieces (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  title TEXT NOT NULL,
  description TEXT,
  project_id INTEGER,
  status TEXT NOT NULL CHECK (status IN ('sketch', 'wip', 'completed')),
  medium TEXT,
  dimensions TEXT,
  image_ref TEXT,
  progress_images TEXT NOT NULL DEFAULT '[]',
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  completed_at TEXT
);

CREATE TABLE IF NOT EXISTS style_preferences (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  category TEXT NOT NULL,
  value TEXT NOT NULL,
  source TEXT NOT NULL,
  created_at TEXT NOT NULL
);
`;

/**
 * Open (or create) the studio database and apply the schema.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(filename: string): Database.Database {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  const db = new Database(filename);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);

  console.log(`[Store] Database ready at ${filename}`);
  return db;
}

/** Parse a JSON string-list column, tolerating legacy garbage */
export function parseList(value: string | null): string[] {
  if (!value) return [];
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
  } catch {
    return [];
  }
}

/** SQLite NULL → undefined for optional record fields */
export function optional<T>(value: T | null): T | undefined {
  return value === null ? undefined : value;
}

/** Anything the driver threw becomes a StoreError; typed errors pass through */
export function toStoreError(error: unknown): Error {
  if (error instanceof ValidationError || error instanceof StoreError) return error;
  return new StoreError(errorMessage(error), { cause: error });
}

/**
 * Wrap every method of a repository so driver failures (SqliteError, a closed
 * connection) surface as StoreError.
 */
export function guardRepository<T extends object>(repository: T, name: string): T {
  return new Proxy(repository, {
    get(target, property, receiver) {
      const value: unknown = Reflect.get(target, property, receiver);
      if (typeof value !== 'function') return value;
      return (...args: unknown[]): unknown => {
        try {
          return value.apply(target, args);
        } catch (error) {
          const wrapped = toStoreError(error);
          if (wrapped !== error) console.warn(`[Store] ${name}.${String(property)} failed: ${wrapped.message}`);
          throw wrapped;
        }
      };
    },
  });
}
