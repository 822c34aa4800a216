import type Database from 'better-sqlite3';
import type { EconomyConfig } from '../world/config.js';
import type { StoreDriver } from './driver.js';
import { pgStatements, sqliteStatements, type StoreStatements } from './statements.js';
import { SqliteDriver, openSqlite } from './sqlite.js';
import { PostgresDriver, createPool } from './postgres.js';

export type { StoreDriver } from './driver.js';
export { decodePurchase, decodeUser } from './driver.js';
export type { StoreStatements } from './statements.js';

export interface Store {
  driver: StoreDriver;
  statements: StoreStatements;
}

export function openStore(config: Pick<EconomyConfig, 'backend' | 'dbPath' | 'databaseUrl' | 'tablePrefix'>): Store {
  if (config.backend === 'postgres') {
    if (!config.databaseUrl) throw new Error('DATABASE_URL is required for the postgres backend');
    const pool = createPool(config.databaseUrl);
    console.log('[DB] Using PostgreSQL backend');
    return {
      driver: new PostgresDriver(pool),
      statements: pgStatements(config.tablePrefix),
    };
  }

  console.log(`[DB] Using SQLite backend at ${config.dbPath}`);
  return sqliteStore(openSqlite(config.dbPath), config.tablePrefix);
}

// Wraps an already-open connection; closing the store leaves it open when
// closeConnection is false so another store can reopen the same data.
export function sqliteStore(
  sqlite: Database.Database,
  tablePrefix: string,
  options: { closeConnection?: boolean } = {}
): Store {
  return {
    driver: new SqliteDriver(sqlite, options),
    statements: sqliteStatements(tablePrefix),
  };
}
