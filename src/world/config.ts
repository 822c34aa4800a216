import path from 'path';
import type { StoreBackend } from '../types.js';

// ─── Economy Configuration ───
// Read once at startup from the environment. Bad numbers fall back to the
// default with a warning; inconsistent bounds stop the server.

export interface EconomyConfig {
  backend: StoreBackend;
  dbPath: string;
  databaseUrl: string | null;
  tablePrefix: string;
  startingCredits: number;
  creditFloor: number;
  creditCeiling: number | null; // null = unbounded
  sellRatio: number;
  flushIntervalMs: number;
  loadTimeoutMs: number;
  flushTimeoutMs: number;
  requestTimeoutMs: number;
  retryAttempts: number;
  retryBaseMs: number;
  flushRetryLimit: number;
  adminKey: string | null;
  port: number;
}

export const DEFAULTS: EconomyConfig = {
  backend: 'sqlite',
  dbPath: path.join(process.cwd(), 'data', 'economy.db'),
  databaseUrl: null,
  tablePrefix: 'shop_',
  startingCredits: 0,
  creditFloor: 0,
  creditCeiling: null,
  sellRatio: 0.5,
  flushIntervalMs: 30_000,
  loadTimeoutMs: 10_000,
  flushTimeoutMs: 10_000,
  requestTimeoutMs: 5_000,
  retryAttempts: 3,
  retryBaseMs: 100,
  flushRetryLimit: 3,
  adminKey: null,
  port: 3000,
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = Number.MIN_SAFE_INTEGER): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    console.warn(`[Config] ${name}="${raw}" is not a valid integer >= ${min}, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readRatio(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    console.warn(`[Config] ${name}="${raw}" must be between 0 and 1, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readBackend(env: Env): StoreBackend {
  const raw = env.ECONOMY_BACKEND?.trim().toLowerCase();
  if (!raw) return DEFAULTS.backend;
  if (raw === 'sqlite' || raw === 'postgres') return raw;
  if (raw === 'postgresql' || raw === 'pg') return 'postgres';
  console.warn(`[Config] Unknown ECONOMY_BACKEND "${env.ECONOMY_BACKEND}", using ${DEFAULTS.backend}`);
  return DEFAULTS.backend;
}

export function loadConfig(env: Env = process.env): EconomyConfig {
  const ceilingRaw = env.CREDIT_CEILING;
  const creditCeiling =
    ceilingRaw === undefined || ceilingRaw.trim() === '' ? null : readInt(env, 'CREDIT_CEILING', Number.MAX_SAFE_INTEGER);

  const config: EconomyConfig = {
    backend: readBackend(env),
    dbPath: env.DB_PATH || DEFAULTS.dbPath,
    databaseUrl: env.DATABASE_URL || null,
    tablePrefix: env.TABLE_PREFIX ?? DEFAULTS.tablePrefix,
    startingCredits: readInt(env, 'STARTING_CREDITS', DEFAULTS.startingCredits),
    creditFloor: readInt(env, 'CREDIT_FLOOR', DEFAULTS.creditFloor),
    creditCeiling,
    sellRatio: readRatio(env, 'SELL_RATIO', DEFAULTS.sellRatio),
    flushIntervalMs: readInt(env, 'FLUSH_INTERVAL_MS', DEFAULTS.flushIntervalMs, 1),
    loadTimeoutMs: readInt(env, 'LOAD_TIMEOUT_MS', DEFAULTS.loadTimeoutMs, 1),
    flushTimeoutMs: readInt(env, 'FLUSH_TIMEOUT_MS', DEFAULTS.flushTimeoutMs, 1),
    requestTimeoutMs: readInt(env, 'REQUEST_TIMEOUT_MS', DEFAULTS.requestTimeoutMs, 1),
    retryAttempts: readInt(env, 'STORE_RETRY_ATTEMPTS', DEFAULTS.retryAttempts, 0),
    retryBaseMs: readInt(env, 'STORE_RETRY_BASE_MS', DEFAULTS.retryBaseMs, 0),
    flushRetryLimit: readInt(env, 'FLUSH_RETRY_LIMIT', DEFAULTS.flushRetryLimit, 0),
    adminKey: env.ADMIN_KEY || null,
    port: readInt(env, 'PORT', DEFAULTS.port, 1),
  };

  validateConfig(config);
  return config;
}

export function validateConfig(config: EconomyConfig): void {
  if (!/^[A-Za-z0-9_]*$/.test(config.tablePrefix)) {
    throw new Error(`TABLE_PREFIX "${config.tablePrefix}" may only contain letters, digits and underscores`);
  }
  if (config.creditCeiling !== null && config.creditCeiling < config.creditFloor) {
    throw new Error(`CREDIT_CEILING (${config.creditCeiling}) is below CREDIT_FLOOR (${config.creditFloor})`);
  }
  if (config.startingCredits < config.creditFloor) {
    throw new Error(`STARTING_CREDITS (${config.startingCredits}) is below CREDIT_FLOOR (${config.creditFloor})`);
  }
  if (config.creditCeiling !== null && config.startingCredits > config.creditCeiling) {
    throw new Error(`STARTING_CREDITS (${config.startingCredits}) is above CREDIT_CEILING (${config.creditCeiling})`);
  }
  if (config.backend === 'postgres' && !config.databaseUrl) {
    throw new Error('ECONOMY_BACKEND=postgres requires DATABASE_URL');
  }
}
