import pg from 'pg';
import type { Row, Statement } from '../types.js';
import { StoreError, errorMessage } from '../engine/errors.js';
import type { StoreDriver } from './driver.js';

const TRANSIENT_SQLSTATES = new Set(['40001', '40P01', '57P01', '57P02', '57P03', '53300']);
const TRANSIENT_NODE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN']);

export function createPool(connectionString: string): pg.Pool {
  const pool = new pg.Pool({ connectionString, max: 10, idleTimeoutMillis: 30_000 });
  // Idle clients can error out when the server restarts; the next checkout reconnects.
  pool.on('error', (err) => {
    console.error('[DB] Idle PostgreSQL client error:', err.message);
  });
  return pool;
}

export function classifyPgError(err: unknown): StoreError {
  if (err instanceof StoreError) return err;
  const code = err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : '';
  const message = `[postgres] ${errorMessage(err)}`;

  if (code.startsWith('08') || TRANSIENT_SQLSTATES.has(code) || TRANSIENT_NODE_CODES.has(code)) {
    return new StoreError('transient', message, { cause: err });
  }
  if (code.startsWith('23')) {
    return new StoreError('integrity', message, { cause: err });
  }
  if (/connection terminated|timeout exceeded when trying to connect/i.test(message)) {
    return new StoreError('transient', message, { cause: err });
  }
  return new StoreError('fatal', message, { cause: err });
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class PostgresDriver implements StoreDriver {
  readonly backend = 'postgres' as const;
  private closed = false;

  constructor(readonly pool: pg.Pool) {}

  async execute(statement: Statement): Promise<Row[]> {
    this.assertOpen();
    try {
      const result = await this.pool.query(statement.sql, [...statement.params]);
      const rows: unknown[] = result.rows;
      return rows.filter(isRow);
    } catch (err) {
      throw classifyPgError(err);
    }
  }

  async transaction(statements: readonly Statement[]): Promise<void> {
    this.assertOpen();
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw classifyPgError(err);
    }

    try {
      await client.query('BEGIN');
      for (const statement of statements) {
        await client.query(statement.sql, [...statement.params]);
      }
      await client.query('COMMIT');
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        console.error('[DB] ROLLBACK failed:', errorMessage(rollbackErr));
      }
      throw classifyPgError(err);
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.pool.end();
  }

  private assertOpen(): void {
    if (this.closed) throw new StoreError('aborted', '[postgres] driver closed');
  }
}
