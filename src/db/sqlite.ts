import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type { Row, Statement } from '../types.js';
import { StoreError, errorMessage } from '../engine/errors.js';
import type { StoreDriver } from './driver.js';

export function openSqlite(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    // Ensure data directory exists
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const sqlite = new Database(dbPath);
  if (dbPath !== ':memory:') sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  return sqlite;
}

function driverCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export function classifySqliteError(err: unknown): StoreError {
  if (err instanceof StoreError) return err;
  const code = driverCode(err) ?? '';
  const message = `[sqlite] ${errorMessage(err)}`;
  if (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED') || code.startsWith('SQLITE_IOERR')) {
    return new StoreError('transient', message, { cause: err });
  }
  if (code.startsWith('SQLITE_CONSTRAINT')) {
    return new StoreError('integrity', message, { cause: err });
  }
  return new StoreError('fatal', message, { cause: err });
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// better-sqlite3 is synchronous; every call is pushed to the next turn of the
// event loop so completions are never delivered inside the issuing call.
export class SqliteDriver implements StoreDriver {
  readonly backend = 'sqlite' as const;
  private closed = false;

  constructor(
    readonly sqlite: Database.Database,
    private readonly options: { closeConnection?: boolean } = {}
  ) {}

  execute(statement: Statement): Promise<Row[]> {
    return this.defer(() => this.run(statement));
  }

  transaction(statements: readonly Statement[]): Promise<void> {
    return this.defer(() => {
      // Rolls back on throw.
      const apply = this.sqlite.transaction((batch: readonly Statement[]) => {
        for (const statement of batch) this.run(statement);
      });
      apply(statements);
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.options.closeConnection !== false) this.sqlite.close();
  }

  private run(statement: Statement): Row[] {
    const prepared = this.sqlite.prepare(statement.sql);
    if (prepared.reader) {
      return prepared.all(...statement.params).filter(isRow);
    }
    prepared.run(...statement.params);
    return [];
  }

  private defer<T>(work: () => T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      setImmediate(() => {
        if (this.closed) {
          reject(new StoreError('aborted', '[sqlite] driver closed'));
          return;
        }
        try {
          resolve(work());
        } catch (err) {
          reject(classifySqliteError(err));
        }
      });
    });
  }
}
