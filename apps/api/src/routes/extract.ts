/**
 * Extraction API Routes
 *
 * Stateless contact extraction over arbitrary text. Nothing is written to
 * any session's event log.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { ContactResolver } from '../services/contact-resolution';

const extractSchema = z.object({
  text: z.string().max(100_000),
});

interface Env {
  Variables: {
    resolver: ContactResolver;
  };
}

/**
 * Create extraction routes
 */
export function createExtractRoutes(): Hono<Env> {
  const app = new Hono<Env>();

  /**
   * POST /extract - Resolve contact info from text
   */
  app.post('/', zValidator('json', extractSchema), async (c) => {
    const { text } = c.req.valid('json');
    const resolver = c.get('resolver');

    const result = await resolver.resolve(text);

    return c.json({
      result: {
        email: result.email,
        phone: result.phone,
        method: result.method,
      },
    });
  });

  return app;
}
