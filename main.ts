/**
 * Application Entry Point
 *
 * Boot sequence: configuration, logging, database, middleware, routes,
 * then the HTTP server.
 */

import {
  Application,
  KVStore,
  Logger,
  corsMiddleware,
  getLogger,
  isLogLevel,
  loadConfig,
  loggingMiddleware,
  setKV,
  setLogger,
  toError,
} from './framework/mod.ts';
import { createStickerContext } from './src/contexts/stickers/module.ts';
import { registerRoutes } from './src/routes/mod.ts';

async function main(): Promise<void> {
  // 1. Load configuration
  const config = await loadConfig({ configPath: 'config.json' });

  // 2. Configure logging
  const level = config.getString('logLevel');
  setLogger(
    new Logger({
      level: isLogLevel(level) ? level : 'info',
      format: config.getString('logFormat') === 'json' ? 'json' : 'pretty',
    })
  );

  // 3. Open database (KV)
  const store = new KVStore({ path: config.getString('database.url') });
  await store.init();
  setKV(store);

  // 4. Create application instance
  const app = new Application({ config });

  // 5. Register global middleware
  app.use(loggingMiddleware());
  app.use(
    corsMiddleware({
      origin: config.getList('cors.origins', ['*']),
      credentials: config.getBoolean('cors.credentials', true),
      allowedHeaders: ['Content-Type', 'Authorization', 'secret-key'],
    })
  );

  // 6. Register routes
  registerRoutes(app, createStickerContext(config, store), store);
  await app.init();

  // 7. Close the database last on shutdown
  app.getLifecycle().onShutdown(() => store.close());

  // 8. Start server
  await app.listen();
}

main().catch((error) => {
  getLogger().error('Failed to start application', toError(error));
  process.exit(1);
});
