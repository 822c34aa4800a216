import type { Row, Statement, StoreBackend, StoredPurchase, StoredUser } from '../types.js';

// A driver runs statements against one backend. It may complete in any order
// and may throw driver-native errors; the gateway owns ordering, timeouts,
// retries and classification beyond what classifyError() reports.
export interface StoreDriver {
  readonly backend: StoreBackend;
  execute(statement: Statement): Promise<Row[]>;
  transaction(statements: readonly Statement[]): Promise<void>;
  close(): Promise<void>;
}

// ─── Row decoding ───
// pg returns BIGINT columns as strings; better-sqlite3 may hand back bigint.

function readInteger(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number' && Number.isSafeInteger(value)) return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return Number(value);
  throw new Error(`Column ${column} is not an integer: ${String(value)}`);
}

function readText(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') throw new Error(`Column ${column} is not text: ${String(value)}`);
  return value;
}

export function decodeUser(row: Row): StoredUser {
  return {
    identity: readText(row, 'identity'),
    credits: readInteger(row, 'credits'),
  };
}

export function decodePurchase(row: Row): StoredPurchase {
  return {
    categoryKey: readText(row, 'category_key'),
    itemKey: readText(row, 'item_key'),
    acquiredAt: readInteger(row, 'acquired_at'),
    pricePaid: readInteger(row, 'price_paid'),
  };
}
