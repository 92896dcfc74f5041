/**
 * Thin helpers over better-sqlite3
 * All calls are synchronous; callers wrap them in async methods where the API is async.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

export type SQLiteDatabase = Database.Database;
export type SQLiteParam = string | number | bigint | Buffer | null;

export interface SQLiteOptions {
  readonly?: boolean;
  walMode?: boolean;
}

export function createSQLiteDatabase(dbPath: string, options: SQLiteOptions = {}): SQLiteDatabase {
  if (dbPath !== ':memory:' && !options.readonly) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath, { readonly: options.readonly ?? false });

  if (options.walMode && dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');

  return db;
}

export function sqliteExec(db: SQLiteDatabase, sql: string): void {
  db.exec(sql);
}

export function sqliteRun(db: SQLiteDatabase, sql: string, params: SQLiteParam[] = []): Database.RunResult {
  return db.prepare(sql).run(...params);
}

export function sqliteAll(db: SQLiteDatabase, sql: string, params: SQLiteParam[] = []): unknown[] {
  return db.prepare(sql).all(...params);
}

export function sqliteGet(db: SQLiteDatabase, sql: string, params: SQLiteParam[] = []): unknown {
  return db.prepare(sql).get(...params);
}

/**
 * Run fn inside a transaction. Nested calls join the outer transaction.
 */
export function sqliteTransaction<T>(db: SQLiteDatabase, fn: () => T): T {
  if (db.inTransaction) {
    return fn();
  }
  return db.transaction(fn)();
}

export function sqliteClose(db: SQLiteDatabase): void {
  if (db.open) {
    db.close();
  }
}

export function toSQLiteTimestamp(date: Date = new Date()): string {
  return date.toISOString();
}

export function toDateFromSQLite(value: string): Date {
  return new Date(value);
}

export function toSQLiteBool(value: boolean): number {
  return value ? 1 : 0;
}
