import Database from 'better-sqlite3';
import { QueryResult, ReadOnlyQueryError } from '../../../core';

/**
 * Run ad-hoc SQL on a separate read-only connection to the database file
 *
 * A statement is accepted only when SQLite's parser reports it read-only
 * and row-returning; anything else is rejected before it runs.
 */
export function runReadOnlyQuery(databasePath: string, query: string): QueryResult {
  const sql = query.trim();
  if (!sql) {
    throw new ReadOnlyQueryError('Query cannot be empty', 'empty');
  }

  let db: Database.Database;
  try {
    db = new Database(databasePath, { readonly: true, fileMustExist: true });
  } catch (error) {
    throw new ReadOnlyQueryError(`Database unavailable: ${describe(error)}`, 'unavailable');
  }

  try {
    let statement: Database.Statement;
    try {
      statement = db.prepare(sql);
    } catch (error) {
      throw new ReadOnlyQueryError(`SQL Error: ${describe(error)}`, 'syntax');
    }

    if (!statement.readonly || !statement.reader) {
      throw new ReadOnlyQueryError('Only read-only queries that return rows are allowed', 'not_read_only');
    }

    try {
      const columns = statement.columns().map((column) => column.name);
      const rows = statement.raw(true).all();
      return { columns, rows: rows.map(toRow) };
    } catch (error) {
      throw new ReadOnlyQueryError(`SQL Error: ${describe(error)}`, 'syntax');
    }
  } finally {
    db.close();
  }
}

function toRow(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [value];
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
