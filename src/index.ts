// ═══════════════════════════════════════════════════════════════════════════════
// SERVER ENTRYPOINT
// ═══════════════════════════════════════════════════════════════════════════════

import { createApp, createServices } from './app.js';
import { loadConfig } from './config/index.js';
import {
  ShutdownHandler,
  ShutdownRegistry,
  createDisconnectHook,
  createServerCloseHook,
} from './infrastructure/shutdown/index.js';
import { getLogger } from './observability/logging/index.js';
import { createUserLock } from './services/engagement/index.js';
import { storeManager } from './storage/index.js';

const logger = getLogger({ component: 'server' });

async function main(): Promise<void> {
  const config = loadConfig();
  const store = storeManager.getStore();
  const services = createServices(config, storeManager.getDocuments(), { lock: createUserLock(store) });
  const app = createApp(config, store, services);

  const server = app.listen(config.server.port, () => {
    logger.info('Server listening', {
      port: config.server.port,
      apiPrefix: config.server.apiPrefix,
      environment: config.env.environment,
      timezone: config.engagement.timezone,
    });
  });

  if (config.scheduler.enabled) {
    services.scheduler.start();
  } else {
    logger.info('Engagement scheduler disabled');
  }

  const registry = new ShutdownRegistry();
  registry.register('scheduler', () => services.scheduler.stop(), { priority: 'critical' });
  registry.register('http-server', createServerCloseHook(server), { priority: 'high', timeoutMs: 10_000 });
  registry.register('store', createDisconnectHook(storeManager), { priority: 'low' });

  new ShutdownHandler(registry).install();
}

main().catch(error => {
  logger.fatal('Server failed to start', error);
  process.exit(1);
});
