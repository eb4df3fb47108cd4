import { Hono, type Context } from 'hono';
import { z } from 'zod';
import type { ValidatedChain } from '@plclog/types';
import { isPlcDid, toJsonOperation } from '@plclog/codec';
import { buildDidDocument, diffStates, toPlcData } from '@plclog/chain';
import type { MirrorServices } from '../mirror.js';

const DidParamSchema = z.string().refine(isPlcDid, 'Not a did:plc identifier');

export function createDidRouter(services: MirrorServices) {
  const router = new Hono();

  /** Validate the stored log of the `:did` parameter and hand its chain to `handle`. */
  function withChain(c: Context, handle: (chain: ValidatedChain) => Response): Response {
    const parsed = DidParamSchema.safeParse(c.req.param('did'));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const did = parsed.data;
    const resolution = services.resolve(did);
    switch (resolution.status) {
      case 'missing':
        return c.json({ message: `DID not registered: ${did}` }, 404);
      case 'invalid':
        return c.json({ message: resolution.reason, code: resolution.code }, 422);
      case 'valid':
        return handle(resolution.chain);
    }
  }

  // GET /:did - DID document
  router.get('/:did', (c) =>
    withChain(c, (chain) => {
      if (chain.state.status === 'deactivated') {
        return c.json({ message: `DID not available: ${chain.did}` }, 410);
      }
      const document = buildDidDocument(chain.did, chain.state);
      return c.body(JSON.stringify(document), 200, { 'Content-Type': 'application/did+ld+json' });
    }),
  );

  // GET /:did/data - Current identity data
  router.get('/:did/data', (c) =>
    withChain(c, (chain) => {
      if (chain.state.status === 'deactivated') {
        return c.json({ message: `DID not available: ${chain.did}` }, 410);
      }
      return c.json({ did: chain.did, ...toPlcData(chain.state) });
    }),
  );

  // GET /:did/log - Operations of the validated chain
  router.get('/:did/log', (c) =>
    withChain(c, (chain) => c.json(chain.steps.map((step) => toJsonOperation(step.operation)))),
  );

  // GET /:did/log/audit - Stored entries as imported
  router.get('/:did/log/audit', (c) =>
    withChain(c, (chain) => c.json([...(services.store.get(chain.did) ?? [])])),
  );

  // GET /:did/log/last - Latest operation
  router.get('/:did/log/last', (c) =>
    withChain(c, (chain) => {
      const last = chain.steps[chain.steps.length - 1];
      if (!last) {
        return c.json({ message: `DID not registered: ${chain.did}` }, 404);
      }
      return c.json(toJsonOperation(last.operation));
    }),
  );

  // GET /:did/log/history - Steps with the changes each one made
  router.get('/:did/log/history', (c) =>
    withChain(c, (chain) =>
      c.json(
        chain.steps.map((step, index) => ({
          position: step.position,
          cid: step.cid,
          createdAt: step.createdAt,
          signerIndex: step.signerIndex,
          operation: toJsonOperation(step.operation),
          changes: diffStates(chain.steps[index - 1]?.state, step.state),
        })),
      ),
    ),
  );

  // GET /:did/log/verify - Audit the stored nullification flags
  router.get('/:did/log/verify', (c) => {
    const parsed = DidParamSchema.safeParse(c.req.param('did'));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const report = services.audit(parsed.data);
    if (!report) {
      return c.json({ message: `DID not registered: ${parsed.data}` }, 404);
    }
    return c.json({ valid: report.valid, reason: report.reason, findings: report.findings });
  });

  return router;
}
