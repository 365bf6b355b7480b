import { existsSync, readFileSync, writeFileSync } from 'fs';
import { fileURLToPath } from 'url';
import initSqlJs, { type Database, type Statement } from 'sql.js';
import { SchedulingError } from '@spaced-review/shared/scheduler';
import { StoreUnavailableError } from '../errors';
import { createLogger } from '../logger';

const log = createLogger('Store');

const SCHEMA_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

export const MEMORY_DATABASE = ':memory:';

type SqlJsStatic = Awaited<ReturnType<typeof initSqlJs>>;

export type SqlValue = string | number | Uint8Array | null;

export type Row = ReturnType<Statement['getAsObject']>;

export interface RunResult {
  changes: number;
}

let sqlJsPromise: Promise<SqlJsStatic> | null = null;

async function loadSqlJs(): Promise<SqlJsStatic> {
  if (sqlJsPromise) return sqlJsPromise;

  sqlJsPromise = initSqlJs();
  try {
    return await sqlJsPromise;
  } catch (err) {
    sqlJsPromise = null;
    throw err;
  }
}

/**
 * A statement plus its bound values. Placeholders are positional (`?` or
 * `?N` when a value is used more than once).
 */
export class PreparedQuery {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly sql: string,
    private readonly values: SqlValue[] = []
  ) {}

  bind(...values: SqlValue[]): PreparedQuery {
    return new PreparedQuery(this.db, this.sql, values);
  }

  first(): Row | null {
    return this.db.withStatement(this.sql, this.values, (stmt) => (stmt.step() ? stmt.getAsObject() : null));
  }

  all(): Row[] {
    return this.db.withStatement(this.sql, this.values, (stmt) => {
      const rows: Row[] = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows;
    });
  }

  run(): RunResult {
    const changes = this.db.withStatement(this.sql, this.values, (stmt) => {
      stmt.step();
      return this.db.rowsModified();
    });
    this.db.markWritten();
    return { changes };
  }
}

/**
 * sql.js holds the whole database in memory. A file-backed database is
 * loaded on open and written back after every write outside a transaction
 * and after every committed write transaction.
 */
export class SqliteDatabase {
  private inTransaction = false;

  constructor(
    private readonly handle: Database,
    readonly path: string
  ) {}

  prepare(sql: string): PreparedQuery {
    return new PreparedQuery(this, sql);
  }

  exec(sql: string): void {
    this.handle.exec(sql);
    this.markWritten();
  }

  /**
   * Run `fn` in a write transaction. IMMEDIATE takes the write lock before
   * the first read, so a version check and the write that follows it see
   * the same state.
   */
  transaction<T>(fn: () => T): T {
    const result = this.inside('BEGIN IMMEDIATE', fn);
    this.persist();
    return result;
  }

  /** Run `fn` in a read transaction so every query sees one state */
  read<T>(fn: () => T): T {
    return this.inside('BEGIN DEFERRED', fn);
  }

  close(): void {
    this.handle.close();
  }

  /** @internal */
  withStatement<T>(sql: string, values: SqlValue[], fn: (stmt: Statement) => T): T {
    const stmt = this.handle.prepare(sql);
    try {
      if (values.length > 0) stmt.bind(values);
      return fn(stmt);
    } finally {
      stmt.free();
    }
  }

  /** @internal */
  rowsModified(): number {
    return this.handle.getRowsModified();
  }

  /** @internal */
  markWritten(): void {
    if (!this.inTransaction) this.persist();
  }

  private inside<T>(begin: string, fn: () => T): T {
    this.handle.exec(begin);
    this.inTransaction = true;
    try {
      const result = fn();
      this.handle.exec('COMMIT');
      return result;
    } catch (err) {
      try {
        this.handle.exec('ROLLBACK');
      } catch (rollbackError) {
        log.warn('Rollback failed', rollbackError);
      }
      throw err;
    } finally {
      this.inTransaction = false;
    }
  }

  private persist(): void {
    if (this.path === MEMORY_DATABASE) return;
    writeFileSync(this.path, Buffer.from(this.handle.export()));
    // export() reopens the connection, which resets per-connection pragmas
    this.handle.exec('PRAGMA foreign_keys = ON');
  }
}

/**
 * Open (or create) the database and apply the schema.
 * Pass ':memory:' for a throwaway database.
 */
export async function openDatabase(path: string): Promise<SqliteDatabase> {
  const SQL = await loadSqlJs();
  const handle = path !== MEMORY_DATABASE && existsSync(path)
    ? new SQL.Database(readFileSync(path))
    : new SQL.Database();

  handle.exec('PRAGMA foreign_keys = ON');
  const db = new SqliteDatabase(handle, path);
  db.exec(readFileSync(SCHEMA_PATH, 'utf8'));
  return db;
}

/**
 * Run a synchronous database call behind the async store interfaces.
 * Driver failures become StoreUnavailableError; domain errors pass through.
 */
export async function guardStore<T>(operation: string, fn: () => T): Promise<T> {
  try {
    return fn();
  } catch (err) {
    if (err instanceof SchedulingError) {
      throw err;
    }
    log.error(`${operation} failed`, err);
    throw new StoreUnavailableError(operation, err);
  }
}
