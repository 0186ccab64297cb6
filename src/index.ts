/**
 * modelgate: one request shape over local and cloud model backends.
 *
 * Entry point. Loads config, opens the store, builds the registry,
 * starts the server. One process, one port.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { loadConfig } from './core/config.js';
import { createLogger, setLogLevel } from './core/logger.js';
import { createRegistryFromConfig } from './core/registry.js';
import { createRetryPolicy } from './core/retry.js';
import { createOrchestrator } from './core/orchestrator.js';
import { createHealthAggregator } from './core/health.js';
import { createStore } from './db/index.js';
import { createAPI } from './server/api.js';

const log = createLogger('main');

async function main() {
  // 1. Config (first pass only needs the database path)
  const bootstrap = loadConfig();
  setLogLevel(bootstrap.logLevel);

  // 2. Store
  console.log(`  db:        ${bootstrap.database.path}`);
  const store = createStore(bootstrap.database.path);

  // 3. Stored credentials fill in keys the environment left out
  const config = loadConfig({ credentials: (provider) => store.getCredential(provider) });

  // 4. Registry + core services
  const registry = createRegistryFromConfig(config.providers);
  const orchestrator = createOrchestrator({
    registry,
    ledger: store,
    retry: createRetryPolicy(config.generation.retry),
    timeoutMs: config.generation.timeoutMs,
    trackUsage: config.usage.track,
  });
  const health = createHealthAggregator(registry);

  console.log(`  providers: ${registry.size > 0 ? registry.names().join(', ') : '(none)'}`);
  const stored = store.listCredentialProviders();
  if (stored.length > 0) console.log(`  stored:    ${stored.join(', ')}`);
  console.log(`  usage:     ${config.usage.track ? 'tracked' : 'not tracked'}`);
  console.log(`  admin:     ${config.admin.token ? 'enabled' : 'disabled (no ADMIN_TOKEN)'}`);
  if (registry.size === 0) {
    log.warn('No providers configured. Set OLLAMA_HOST or a cloud API key.');
  }

  // 5. Server
  const app = createAPI({
    orchestrator,
    health,
    registry,
    store,
    adminToken: config.admin.token,
  });

  const { host, port } = config.server;
  const server = serve({ fetch: app.fetch, port, hostname: host }, () => {
    console.log('');
    console.log(`  ✓ listening on http://${host}:${port}`);
    console.log('');
  });

  const shutdown = () => {
    log.info('Shutting down');
    server.close(() => {
      store.close();
      process.exit(0);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Failed to start modelgate:', error);
  process.exit(1);
});
