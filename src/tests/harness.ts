/**
 * Shared test helpers
 *
 * Suites are plain scripts: each case prints ✅/❌, finish() prints the
 * summary and sets the exit code for run-all.ts.
 */

import assert from 'node:assert/strict';
import Database from 'better-sqlite3';
import type { Outcome } from '../types.js';
import { sqliteStore, type Store } from '../db/index.js';
import { PersistenceGateway, type GatewayOptions } from '../services/gateway.js';
import { Registry } from '../engine/registry.js';
import { SessionCache, type SessionCacheOptions } from '../engine/sessions.js';
import { EconomyApi } from '../engine/api.js';
import { ControlledDriver } from './support/controlled-driver.js';

interface TestResult {
  name: string;
  passed: boolean;
  details: string;
}

const results: TestResult[] = [];

export async function test(name: string, fn: () => Promise<void> | void): Promise<void> {
  try {
    await fn();
    results.push({ name, passed: true, details: '' });
    console.log(`✅ ${name}`);
  } catch (err) {
    const details = err instanceof Error ? err.message : String(err);
    results.push({ name, passed: false, details });
    console.log(`❌ ${name}`);
    console.log(`   ${details.split('\n').join('\n   ')}`);
  }
}

export function banner(title: string): void {
  console.log('╔═══════════════════════════════════════════════════════════════╗');
  console.log(`║  ${title.padEnd(61)}║`);
  console.log('╚═══════════════════════════════════════════════════════════════╝\n');
}

export function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

export function finish(): void {
  const passed = results.filter((r) => r.passed).length;
  const failed = results.length - passed;
  console.log(`\n${passed}/${results.length} passed${failed > 0 ? `, ${failed} failed` : ''}`);
  process.exit(failed > 0 ? 1 : 0);
}

export function run(main: () => Promise<void>): void {
  main().then(finish, (err: unknown) => {
    console.error('Suite crashed:', err);
    process.exit(1);
  });
}

// ─── Assertions ───

export function equal<T>(actual: T, expected: T, message?: string): void {
  assert.deepStrictEqual(actual, expected, message);
}

export function unwrap<T>(outcome: Outcome<T>): T {
  if (!outcome.success) throw new Error(`Expected success, got ${outcome.error.code}: ${outcome.error.message}`);
  return outcome.value;
}

export function failureCode<T>(outcome: Outcome<T>): string {
  if (outcome.success) throw new Error(`Expected failure, got success: ${JSON.stringify(outcome.value)}`);
  return outcome.error.code;
}

export async function rejectsWith(promise: Promise<unknown>, kind: string): Promise<void> {
  try {
    await promise;
  } catch (err) {
    const actual = typeof err === 'object' && err !== null && 'kind' in err ? String(err.kind) : String(err);
    assert.equal(actual, kind);
    return;
  }
  throw new Error(`Expected rejection with ${kind}, but the promise fulfilled`);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function waitFor(check: () => boolean, timeoutMs = 1_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error(`Condition not met within ${timeoutMs}ms`);
    await sleep(5);
  }
}

// Lets setImmediate-deferred driver work and promise continuations run.
export async function ticks(count = 5): Promise<void> {
  for (let i = 0; i < count; i++) await new Promise((resolve) => setImmediate(resolve));
}

// ─── Economy fixture ───

export const TEST_GATEWAY: GatewayOptions = {
  requestTimeoutMs: 1_000,
  retryAttempts: 2,
  retryBaseMs: 5,
};

export const TEST_SESSIONS: SessionCacheOptions = {
  startingCredits: 0,
  creditFloor: 0,
  creditCeiling: null,
  sellRatio: 0.5,
  flushIntervalMs: 60_000,
  loadTimeoutMs: 1_000,
  flushTimeoutMs: 1_000,
  flushRetryLimit: 2,
  retryBaseMs: 5,
};

export interface Economy {
  sqlite: Database.Database;
  store: Store;
  driver: ControlledDriver;
  gateway: PersistenceGateway;
  registry: Registry;
  sessions: SessionCache;
  api: EconomyApi;
}

export interface EconomyOptions {
  sqlite?: Database.Database;
  gateway?: Partial<GatewayOptions>;
  sessions?: Partial<SessionCacheOptions>;
  // Hook to register catalog content before any session loads.
  catalog?: (api: EconomyApi) => void;
}

// One "server process": its own registry, cache and gateway over a shared
// database, so a second economy on the same sqlite handle acts as a restart.
export async function createEconomy(options: EconomyOptions = {}): Promise<Economy> {
  const sqlite = options.sqlite ?? new Database(':memory:');
  const store = sqliteStore(sqlite, 'test_', { closeConnection: false });
  const driver = new ControlledDriver(store.driver);
  const gateway = new PersistenceGateway(driver, { ...TEST_GATEWAY, ...options.gateway });
  await gateway.runTransaction(store.statements.createSchema(), 'schema');

  const registry = new Registry();
  const sessions = new SessionCache(registry, gateway, store.statements, { ...TEST_SESSIONS, ...options.sessions });
  const api = new EconomyApi(registry, sessions);
  options.catalog?.(api);
  return { sqlite, store, driver, gateway, registry, sessions, api };
}

// Joins and waits for the load to finish.
export async function joinActive(economy: Economy, slot: number, identity: string): Promise<number> {
  const token = unwrap(economy.api.join(slot, identity));
  await economy.sessions.settle();
  const session = unwrap(economy.api.getSession(token));
  if (session.state !== 'active') throw new Error(`Session ${token} is ${session.state}, expected active`);
  return token;
}

export function storedCredits(sqlite: Database.Database, identity: string): number | null {
  const row: unknown = sqlite.prepare('SELECT credits FROM test_users WHERE identity = ?').get(identity);
  if (typeof row !== 'object' || row === null || !('credits' in row) || typeof row.credits !== 'number') return null;
  return row.credits;
}

export function storedItems(sqlite: Database.Database, identity: string): string[] {
  const rows: unknown[] = sqlite
    .prepare('SELECT category_key, item_key FROM test_purchases WHERE identity = ? ORDER BY category_key, item_key')
    .all(identity);
  return rows.map((row) => {
    if (typeof row !== 'object' || row === null || !('category_key' in row) || !('item_key' in row)) {
      throw new Error('Unexpected purchase row');
    }
    return `${String(row.category_key)}/${String(row.item_key)}`;
  });
}
