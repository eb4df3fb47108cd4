import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { importAuth } from './middleware/auth.js';
import { createImportRouter } from './routes/import.js';
import { createExportRouter } from './routes/export.js';
import { createDidRouter } from './routes/did.js';
import { loadConfig, type MirrorConfig } from './config.js';
import { createMirrorServices, type MirrorServices } from './mirror.js';

export function createApp(config: MirrorConfig = loadConfig()): { app: Hono; mirror: MirrorServices } {
  const mirror = createMirrorServices(config);
  const app = new Hono();

  // Middleware
  app.use('*', logger());

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok', dids: mirror.store.size }));

  // Protected routes
  app.use('/import', importAuth(config.importToken));

  // Routes
  app.route('/import', createImportRouter(mirror));
  app.route('/export', createExportRouter(mirror));
  app.route('/', createDidRouter(mirror));

  return { app, mirror };
}
