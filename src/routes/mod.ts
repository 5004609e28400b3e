/**
 * Application Routes
 *
 * Defines all application routes and handlers.
 */

import { HealthCheck, healthRoutes, type Application, type KVStore } from '../../framework/mod.ts';
import { setupStickerRoutes } from '../contexts/stickers/presentation/sticker_routes.ts';
import type { StickerContext } from '../contexts/stickers/module.ts';

/**
 * Register all application routes
 */
export function registerRoutes(app: Application, stickers: StickerContext, store?: KVStore): void {
  const config = app.getConfig();
  const name = config.getString('name', 'DORO Sticker Collection');
  const version = config.getString('version', '1.0.0');

  app.get('/', () => Response.json({ message: `${name} API`, version }));

  // Health
  const health = new HealthCheck({ version, store });
  for (const [path, handler] of Object.entries(healthRoutes(health))) {
    app.get(path, handler);
  }

  // Stickers (DDD Context)
  setupStickerRoutes(app, stickers);
}
