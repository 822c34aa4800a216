import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import { pgTable, text as pgText, bigint, serial } from 'drizzle-orm/pg-core';

// Table names carry a configurable prefix so several deployments can share
// one database.

const PREFIX_PATTERN = /^[A-Za-z0-9_]*$/;

export function assertTablePrefix(prefix: string): string {
  if (!PREFIX_PATTERN.test(prefix)) {
    throw new Error(`Invalid table prefix "${prefix}" (letters, digits and underscores only)`);
  }
  return prefix;
}

export function tableNames(prefix: string) {
  assertTablePrefix(prefix);
  return {
    users: `${prefix}users`,
    purchases: `${prefix}purchases`,
  };
}

// ─── SQLite ───
export function createSqliteSchema(prefix: string) {
  const names = tableNames(prefix);

  const users = sqliteTable(names.users, {
    identity: text('identity').primaryKey(),
    credits: integer('credits').notNull().default(0),
    createdAt: integer('created_at').notNull(),
    updatedAt: integer('updated_at').notNull(),
  });

  const purchases = sqliteTable(names.purchases, {
    id: integer('id').primaryKey({ autoIncrement: true }),
    identity: text('identity').notNull(),
    categoryKey: text('category_key').notNull(),
    itemKey: text('item_key').notNull(),
    acquiredAt: integer('acquired_at').notNull(), // Unix timestamp (ms)
    pricePaid: integer('price_paid').notNull(),
  });

  return { users, purchases };
}

export type SqliteSchema = ReturnType<typeof createSqliteSchema>;

// ─── PostgreSQL ───
// Balances and prices are safe integers in memory, so they are BIGINT here;
// SQLite's INTEGER is already 64-bit.
export function createPgSchema(prefix: string) {
  const names = tableNames(prefix);

  const users = pgTable(names.users, {
    identity: pgText('identity').primaryKey(),
    credits: bigint('credits', { mode: 'number' }).notNull().default(0),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
    updatedAt: bigint('updated_at', { mode: 'number' }).notNull(),
  });

  const purchases = pgTable(names.purchases, {
    id: serial('id').primaryKey(),
    identity: pgText('identity').notNull(),
    categoryKey: pgText('category_key').notNull(),
    itemKey: pgText('item_key').notNull(),
    acquiredAt: bigint('acquired_at', { mode: 'number' }).notNull(),
    pricePaid: bigint('price_paid', { mode: 'number' }).notNull(),
  });

  return { users, purchases };
}

export type PgSchema = ReturnType<typeof createPgSchema>;

// ─── DDL ───
// drizzle-kit is not part of the runtime; tables are created on boot the same
// way for both backends.

export function sqliteDDL(prefix: string): string[] {
  const t = tableNames(prefix);
  return [
    `CREATE TABLE IF NOT EXISTS ${t.users} (
      identity TEXT PRIMARY KEY,
      credits INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS ${t.purchases} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      identity TEXT NOT NULL,
      category_key TEXT NOT NULL,
      item_key TEXT NOT NULL,
      acquired_at INTEGER NOT NULL,
      price_paid INTEGER NOT NULL,
      UNIQUE(identity, category_key, item_key)
    )`,
    `CREATE INDEX IF NOT EXISTS ${t.purchases}_identity_idx ON ${t.purchases}(identity)`,
  ];
}

export function pgDDL(prefix: string): string[] {
  const t = tableNames(prefix);
  return [
    `CREATE TABLE IF NOT EXISTS ${t.users} (
      identity TEXT PRIMARY KEY,
      credits BIGINT NOT NULL DEFAULT 0,
      created_at BIGINT NOT NULL,
      updated_at BIGINT NOT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS ${t.purchases} (
      id SERIAL PRIMARY KEY,
      identity TEXT NOT NULL,
      category_key TEXT NOT NULL,
      item_key TEXT NOT NULL,
      acquired_at BIGINT NOT NULL,
      price_paid BIGINT NOT NULL,
      UNIQUE(identity, category_key, item_key)
    )`,
    `CREATE INDEX IF NOT EXISTS ${t.purchases}_identity_idx ON ${t.purchases}(identity)`,
    // Tables created while these columns were INTEGER.
    `ALTER TABLE ${t.users} ALTER COLUMN credits TYPE BIGINT`,
    `ALTER TABLE ${t.purchases} ALTER COLUMN price_paid TYPE BIGINT`,
  ];
}
