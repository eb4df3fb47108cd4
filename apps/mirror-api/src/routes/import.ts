import { Hono } from 'hono';
import { z } from 'zod';
import type { MirrorServices } from '../mirror.js';
import { StoredEntrySchema } from '../store.js';

const ImportSchema = z.array(StoredEntrySchema).min(1);

export function createImportRouter(services: MirrorServices) {
  const router = new Hono();

  // POST /import - Append audit-log entries
  router.post('/', async (c) => {
    const body: unknown = await c.req.json().catch(() => undefined);
    const parsed = ImportSchema.safeParse(body);

    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const imported = services.store.import(parsed.data);
    return c.json({ imported });
  });

  return router;
}
