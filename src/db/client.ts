import { readFileSync } from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import type { RunResult } from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { ExtractTablesWithRelations, Logger } from 'drizzle-orm';
import type { BaseSQLiteDatabase, SQLiteTransaction } from 'drizzle-orm/sqlite-core';
import * as schema from './schema';

export type Schema = typeof schema;
export type DB = BetterSQLite3Database<Schema>;
export type Transaction = SQLiteTransaction<'sync', RunResult, Schema, ExtractTablesWithRelations<Schema>>;

/** Anything queries can run against: the database itself or an open transaction. */
export type Executor = BaseSQLiteDatabase<'sync', RunResult, Schema>;

export interface DatabaseOptions {
  /** SQLite file path, or `:memory:` */
  url: string;
  /** DDL applied on open; defaults to db/schema.sql under the working directory */
  schemaPath?: string;
  /** `true` uses drizzle's console logger */
  logger?: Logger | boolean;
}

export interface DatabaseHandle {
  db: DB;
  sqlite: Database.Database;
  close: () => void;
}

export const DEFAULT_SCHEMA_PATH = path.resolve(process.cwd(), 'db', 'schema.sql');

export const createDatabase = (options: DatabaseOptions): DatabaseHandle => {
  const sqlite = new Database(options.url);
  sqlite.pragma('foreign_keys = ON');
  if (options.url !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  sqlite.exec(readFileSync(options.schemaPath ?? DEFAULT_SCHEMA_PATH, 'utf8'));

  const db = drizzle(sqlite, { schema, logger: options.logger ?? false });

  return {
    db,
    sqlite,
    close: () => sqlite.close(),
  };
};
