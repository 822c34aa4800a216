import { serve } from '@hono/node-server';
import { loadConfig } from './world/config.js';
import { registerCatalog } from './world/catalog.js';
import { openStore } from './db/index.js';
import { PersistenceGateway } from './services/gateway.js';
import { Registry } from './engine/registry.js';
import { SessionCache } from './engine/sessions.js';
import { EconomyApi } from './engine/api.js';
import { errorMessage } from './engine/errors.js';
import { createApp } from './app.js';

// ─── Initialize ───
console.log('[Server] Initializing storefront economy...');
const config = loadConfig();
const store = openStore(config);
const gateway = new PersistenceGateway(store.driver, config);

try {
  await gateway.runTransaction(store.statements.createSchema(), 'schema');
} catch (err) {
  console.error('[Server] Failed to create schema:', errorMessage(err));
  await gateway.shutdown();
  process.exit(1);
}

const registry = new Registry();
const sessions = new SessionCache(registry, gateway, store.statements, config);
const api = new EconomyApi(registry, sessions);
registerCatalog(api);
sessions.start();

if (!config.adminKey) {
  console.log('[Server] ADMIN_KEY not set, admin catalog routes disabled');
}

// ─── App ───
const app = createApp(api, gateway, { adminKey: config.adminKey });

// ─── Start ───
const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`[Server] Economy is live at http://localhost:${info.port} (${config.backend})`);
});

// ─── Shutdown ───
let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[Server] ${signal} received, flushing sessions...`);
  server.close();
  try {
    await sessions.shutdown();
    process.exit(0);
  } catch (err) {
    console.error('[Server] Shutdown failed:', errorMessage(err));
    process.exit(1);
  }
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

export default app;
