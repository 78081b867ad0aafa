import Database from 'better-sqlite3';
import type { Dataset } from '../types';
import { BadInputError, errorMessage } from '../utils/errors';
import { buildColumn, type RawValue } from './columns';

const quoteIdentifier = (name: string): string => `"${name.replace(/"/g, '""')}"`;

const toRawValue = (cell: unknown): RawValue => {
  if (cell === null || cell === undefined) {
    return null;
  }
  if (typeof cell === 'number') {
    return cell;
  }
  if (typeof cell === 'bigint') {
    return Number(cell);
  }
  if (typeof cell === 'string') {
    return cell;
  }
  if (cell instanceof Uint8Array) {
    return Buffer.from(cell).toString('base64');
  }
  return String(cell);
};

/**
 * Load the first table of an SQLite file, in catalog order. Any other
 * tables are ignored.
 */
export function readFirstTable(path: string): { table: string; dataset: Dataset } {
  let db: Database.Database;
  try {
    db = new Database(path, { readonly: true, fileMustExist: true });
  } catch (error) {
    throw new BadInputError(`Error opening database: ${errorMessage(error)}`);
  }

  try {
    let tables: unknown[];
    try {
      tables = db.prepare("SELECT name FROM sqlite_master WHERE type = 'table'").pluck().all();
    } catch (error) {
      throw new BadInputError(`Error reading database: ${errorMessage(error)}`);
    }

    const table = tables.find((name): name is string => typeof name === 'string');
    if (table === undefined) {
      throw new BadInputError('No tables found in database');
    }

    const statement = db.prepare(`SELECT * FROM ${quoteIdentifier(table)}`);
    const names = statement.columns().map((column) => column.name);
    const rows = statement.raw(true).all().filter((row): row is unknown[] => Array.isArray(row));

    return {
      table,
      dataset: {
        rowCount: rows.length,
        columns: names.map((name, index) => buildColumn(name, rows.map((row) => toRawValue(row[index])))),
      },
    };
  } finally {
    db.close();
  }
}
