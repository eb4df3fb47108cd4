import type { Context, MiddlewareHandler, Next } from 'hono';

/**
 * Bearer-token guard for write routes.
 * Without a configured token the guard lets every request through.
 */
export function importAuth(token: string | undefined): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    if (token === undefined) {
      await next();
      return;
    }

    if (c.req.header('authorization') !== `Bearer ${token}`) {
      return c.json({ error: 'Missing or invalid bearer token' }, 401);
    }

    await next();
  };
}
