import Database from 'better-sqlite3';

import { StoreError, errorMessage } from '../server/errors.js';
import { debugLog, errorLog } from '../utils/logger.js';
import { isRow, type Row, type SqlValue } from '../utils/types.js';

/**
 * Read access to the cricket store. Implementations run each query to
 * completion before returning.
 */
export interface CricketStore {
  all(sql: string, params?: readonly SqlValue[]): Row[];
  get(sql: string, params?: readonly SqlValue[]): Row | undefined;
}

function toRows(values: unknown[]): Row[] {
  return values.map((value) => {
    if (!isRow(value)) {
      throw new StoreError('Query returned a row with an unsupported column type');
    }
    return value;
  });
}

/**
 * SQLite-backed store. Every query opens its own read-only connection and
 * closes it afterwards, whether or not the query succeeded.
 */
export class SqliteStore implements CricketStore {
  constructor(private readonly dbPath: string) {}

  private run<T>(sql: string, query: (db: Database.Database) => T): T {
    let db: Database.Database | undefined;
    try {
      db = new Database(this.dbPath, { readonly: true, fileMustExist: true });
      return query(db);
    } catch (error) {
      errorLog('Database error:', errorMessage(error), '\n', sql.trim());
      if (error instanceof StoreError) {
        throw error;
      }
      throw new StoreError(`Database error: ${errorMessage(error)}`);
    } finally {
      db?.close();
    }
  }

  all(sql: string, params: readonly SqlValue[] = []): Row[] {
    debugLog('Query:', sql.replace(/\s+/g, ' ').trim(), params);
    return this.run(sql, (db) => toRows(db.prepare(sql).all(...params)));
  }

  get(sql: string, params: readonly SqlValue[] = []): Row | undefined {
    return this.all(sql, params)[0];
  }
}
