import { sql, type Column, type Name, type SQL, type Table } from 'drizzle-orm';
import { SQLiteSyncDialect } from 'drizzle-orm/sqlite-core';
import { PgDialect } from 'drizzle-orm/pg-core';
import type { Statement, StoreBackend, StoredPurchase } from '../types.js';
import { createPgSchema, createSqliteSchema, pgDDL, sqliteDDL } from './schema.js';

// Statements are written once against drizzle's dialect-neutral sql template and
// rendered by the active dialect into plain SQL + params; the gateway never
// sees a query builder.

export interface StoreStatements {
  readonly backend: StoreBackend;
  createSchema(): Statement[];
  selectUser(identity: string): Statement;
  insertDefaultUser(identity: string, credits: number, now: number): Statement;
  selectPurchases(identity: string): Statement;
  // Full-state replacement; idempotent, safe to re-issue after a failure.
  saveState(identity: string, credits: number, purchases: readonly StoredPurchase[], now: number): Statement[];
}

type UsersTable = Table & Record<'identity' | 'credits' | 'createdAt' | 'updatedAt', Column>;
type PurchasesTable = Table & Record<'identity' | 'categoryKey' | 'itemKey' | 'acquiredAt' | 'pricePaid', Column>;

interface SqlRenderer {
  sqlToQuery(query: SQL): { sql: string; params: unknown[] };
}

// Unqualified column name; insert lists and ON CONFLICT targets reject "table"."column".
function col(column: Column): Name {
  return sql.identifier(column.name);
}

export class DrizzleStatements implements StoreStatements {
  constructor(
    readonly backend: StoreBackend,
    private readonly dialect: SqlRenderer,
    private readonly users: UsersTable,
    private readonly purchases: PurchasesTable,
    private readonly ddl: readonly string[]
  ) {}

  createSchema(): Statement[] {
    return this.ddl.map((text): Statement => ({ sql: text, params: [], mode: 'write' }));
  }

  selectUser(identity: string): Statement {
    const u = this.users;
    return this.render(
      'read',
      sql`select ${col(u.identity)}, ${col(u.credits)} from ${u} where ${col(u.identity)} = ${identity}`
    );
  }

  insertDefaultUser(identity: string, credits: number, now: number): Statement {
    const u = this.users;
    return this.render(
      'write',
      sql`insert into ${u} (${col(u.identity)}, ${col(u.credits)}, ${col(u.createdAt)}, ${col(u.updatedAt)})
        values (${identity}, ${credits}, ${now}, ${now})
        on conflict (${col(u.identity)}) do nothing`
    );
  }

  selectPurchases(identity: string): Statement {
    const p = this.purchases;
    return this.render(
      'read',
      sql`select ${col(p.categoryKey)}, ${col(p.itemKey)}, ${col(p.acquiredAt)}, ${col(p.pricePaid)}
        from ${p} where ${col(p.identity)} = ${identity}`
    );
  }

  saveState(identity: string, credits: number, rows: readonly StoredPurchase[], now: number): Statement[] {
    const u = this.users;
    const p = this.purchases;
    const statements = [
      this.render(
        'write',
        sql`insert into ${u} (${col(u.identity)}, ${col(u.credits)}, ${col(u.createdAt)}, ${col(u.updatedAt)})
          values (${identity}, ${credits}, ${now}, ${now})
          on conflict (${col(u.identity)}) do update
          set ${col(u.credits)} = excluded.${col(u.credits)}, ${col(u.updatedAt)} = excluded.${col(u.updatedAt)}`
      ),
      this.render('write', sql`delete from ${p} where ${col(p.identity)} = ${identity}`),
    ];
    if (rows.length > 0) {
      const values = rows.map(
        (row) => sql`(${identity}, ${row.categoryKey}, ${row.itemKey}, ${row.acquiredAt}, ${row.pricePaid})`
      );
      statements.push(
        this.render(
          'write',
          sql`insert into ${p} (${col(p.identity)}, ${col(p.categoryKey)}, ${col(p.itemKey)}, ${col(p.acquiredAt)}, ${col(p.pricePaid)})
            values ${sql.join(values, sql`, `)}`
        )
      );
    }
    return statements;
  }

  private render(mode: Statement['mode'], query: SQL): Statement {
    const rendered = this.dialect.sqlToQuery(query);
    return { sql: rendered.sql, params: rendered.params, mode };
  }
}

export function sqliteStatements(prefix: string): StoreStatements {
  const { users, purchases } = createSqliteSchema(prefix);
  return new DrizzleStatements('sqlite', new SQLiteSyncDialect(), users, purchases, sqliteDDL(prefix));
}

export function pgStatements(prefix: string): StoreStatements {
  const { users, purchases } = createPgSchema(prefix);
  return new DrizzleStatements('postgres', new PgDialect(), users, purchases, pgDDL(prefix));
}
