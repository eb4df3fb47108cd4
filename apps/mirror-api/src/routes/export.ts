import { Hono } from 'hono';
import { z } from 'zod';
import type { MirrorServices } from '../mirror.js';

export function createExportRouter(services: MirrorServices) {
  const router = new Hono();

  const ExportQuerySchema = z.object({
    count: z.coerce
      .number()
      .int()
      .min(1)
      .default(10)
      .transform((count) => Math.min(count, services.config.exportMaxCount)),
    after: z.string().datetime({ offset: true }).optional(),
  });

  // GET /export - Entries of every DID as JSON lines
  router.get('/', (c) => {
    const parsed = ExportQuerySchema.safeParse(c.req.query());

    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const lines = services.store.export(parsed.data).map((entry) => `${JSON.stringify(entry)}\n`);
    return c.body(lines.join(''), 200, { 'Content-Type': 'application/jsonlines' });
  });

  return router;
}
